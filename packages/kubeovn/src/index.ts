/**
 * @vmident/kubeovn
 *
 * Kube-OVN side of the network identity: the naming grammar linking VM
 * interfaces to IP resources, the record store and fetcher, and the
 * annotations that pin addresses at restore time.
 *
 * @example
 * ```typescript
 * import { RecordFetcher, recordIdentifierFor, toNetInfo, toAnnotations } from "@vmident/kubeovn";
 *
 * const id = recordIdentifierFor("ovn.kubernetes.io", "web", "prod").unwrap();
 * const record = await fetcher.fetch(id);
 * if (record.isOk()) {
 *   toAnnotations(toNetInfo("ovn.kubernetes.io", record.unwrap()));
 *   // => { "ovn.kubernetes.io/mac_address": "...", "ovn.kubernetes.io/ip_address": "..." }
 * }
 * ```
 */

// Naming grammar
export {
  DEFAULT_ATTACHMENT,
  isDefaultAttachment,
  toAttachmentReference,
  parseAttachmentReference,
  recordIdentifierFor,
  type AttachmentReference,
  type ParsedAttachment,
} from "./naming.js";

// Record store and fetcher
export type { AddressRecord, AddressRecordStore } from "./store.js";
export { RecordFetcher, type AddressRecordStoreFactory } from "./fetcher.js";
export {
  KubeOvnIPStore,
  decodeIPResource,
  statusCodeOf,
  KUBEOVN_GROUP,
  KUBEOVN_VERSION,
  IP_PLURAL,
  type ClusterCustomObjectReader,
  type ClusterCustomObjectRequest,
  type KubeOvnIPStoreOptions,
} from "./kube-store.js";

// Annotations
export {
  MAC_ADDRESS_KEY,
  IP_ADDRESS_KEY,
  toNetInfo,
  toAnnotations,
  mergeAnnotations,
  type AnnotationSet,
  type NetInfo,
} from "./annotations.js";
