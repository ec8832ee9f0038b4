import type { AttachmentReference } from "./naming.js";
import type { AddressRecord } from "./store.js";

export const MAC_ADDRESS_KEY = "mac_address";
export const IP_ADDRESS_KEY = "ip_address";

/**
 * Annotation key -> value, merged into the VM template metadata
 */
export type AnnotationSet = Record<string, string>;

/**
 * Addresses of one interface, keyed by its attachment reference
 */
export interface NetInfo {
  attachmentReference: AttachmentReference;
  macAddress: string;
  /** IPv4 then IPv6, comma separated, empty families left out */
  combinedAddresses: string;
}

export function toNetInfo(
  attachmentReference: AttachmentReference,
  record: AddressRecord
): NetInfo {
  const addresses = [record.ipv4Address, record.ipv6Address].filter(
    (address) => address !== ""
  );

  return {
    attachmentReference,
    macAddress: record.macAddress,
    combinedAddresses: addresses.join(","),
  };
}

/**
 * The two Kube-OVN annotations pinning an interface's MAC and IPs
 */
export function toAnnotations(info: NetInfo): AnnotationSet {
  return {
    [`${info.attachmentReference}/${MAC_ADDRESS_KEY}`]: info.macAddress,
    [`${info.attachmentReference}/${IP_ADDRESS_KEY}`]: info.combinedAddresses,
  };
}

export function mergeAnnotations(infos: readonly NetInfo[]): AnnotationSet {
  return infos.reduce<AnnotationSet>(
    (merged, info) => ({ ...merged, ...toAnnotations(info) }),
    {}
  );
}
