import { Result } from "better-result";
import { RecordNotFoundError, StoreUnavailableError, type StoreError } from "@vmident/errors";
import { RecordFetcher, type AddressRecord, type AddressRecordStore } from "@vmident/kubeovn";
import type { Network, VirtualMachine } from "@vmident/kubevirt";

/**
 * In-process address store that records every lookup
 */
export class InMemoryAddressStore implements AddressRecordStore {
  readonly lookups: string[] = [];
  private readonly records: Map<string, AddressRecord>;
  private readonly unavailable: Set<string>;

  constructor(records: Record<string, AddressRecord> = {}, unavailable: string[] = []) {
    this.records = new Map(Object.entries(records));
    this.unavailable = new Set(unavailable);
  }

  async get(identifier: string): Promise<Result<AddressRecord, StoreError>> {
    this.lookups.push(identifier);
    if (this.unavailable.has(identifier)) {
      return Result.err(
        new StoreUnavailableError({ message: "connection refused", identifier })
      );
    }
    const record = this.records.get(identifier);
    if (!record) {
      return Result.err(
        new RecordNotFoundError({ message: `IP resource ${identifier} not found`, identifier })
      );
    }
    return Result.ok(record);
  }
}

export function fetcherFor(store: AddressRecordStore): RecordFetcher {
  return RecordFetcher.fromStore(store);
}

export function makeVM(networks?: Network[], name = "test-vm", namespace = "test-ns"): VirtualMachine {
  return {
    metadata: { name, namespace },
    spec: { template: { spec: { networks } } },
  };
}

export const defaultRecord: AddressRecord = {
  macAddress: "00:00:00:00:00:01",
  ipv4Address: "10.0.0.1",
  ipv6Address: "",
};

export const nadRecord: AddressRecord = {
  macAddress: "00:00:00:00:00:02",
  ipv4Address: "10.0.1.5",
  ipv6Address: "fd00:1::5",
};

export const otherNadRecord: AddressRecord = {
  macAddress: "00:00:00:00:00:03",
  ipv4Address: "",
  ipv6Address: "fd00:2::7",
};
