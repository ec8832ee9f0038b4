import type { Result } from "better-result";
import type { StoreError } from "@vmident/errors";

/**
 * Addresses Kube-OVN assigned to one interface. Any field may be empty.
 */
export interface AddressRecord {
  macAddress: string;
  ipv4Address: string;
  ipv6Address: string;
}

/**
 * Keyed, read-only access to Kube-OVN address records
 */
export interface AddressRecordStore {
  get(identifier: string): Promise<Result<AddressRecord, StoreError>>;
}
