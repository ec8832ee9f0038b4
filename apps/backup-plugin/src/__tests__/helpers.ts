import { Result } from "better-result";
import {
  RecordNotFoundError,
  type StoreError,
  type StoreUnavailableError,
} from "@vmident/errors";
import type { AddressRecord, AddressRecordStore } from "@vmident/kubeovn";
import type { VMIReader } from "@vmident/kubevirt";
import type { Backup } from "../velero.js";

export function makeBackup(
  spec: Backup["spec"] = { includedResources: ["*"] },
  labels?: Record<string, string>
): Backup {
  return { metadata: { name: "test-backup", namespace: "velero", labels }, spec };
}

export function vmiReaderWith(
  labels: Record<string, string> = {}
): VMIReader & { calls: Array<[string, string]> } {
  const calls: Array<[string, string]> = [];
  return {
    calls,
    getLabels: async (
      namespace: string,
      name: string
    ): Promise<Result<Record<string, string>, StoreUnavailableError>> => {
      calls.push([namespace, name]);
      return Result.ok(labels);
    },
  };
}

export function vmItem(options: {
  name?: string;
  namespace?: string;
  status?: string;
  networks?: unknown[];
  volumes?: unknown[];
  dataVolumeTemplates?: unknown[];
  templateAnnotations?: Record<string, string>;
} = {}): Record<string, unknown> {
  const template: Record<string, unknown> = {
    spec: {
      domain: { devices: {} },
      networks: options.networks ?? [],
      volumes: options.volumes ?? [],
    },
  };
  if (options.templateAnnotations) {
    template.metadata = { annotations: options.templateAnnotations };
  }

  return {
    apiVersion: "kubevirt.io/v1",
    kind: "VirtualMachine",
    metadata: {
      name: options.name ?? "test-vm",
      namespace: options.namespace ?? "test-ns",
    },
    spec: {
      runStrategy: "Always",
      dataVolumeTemplates: options.dataVolumeTemplates ?? [],
      template,
    },
    status: options.status ? { printableStatus: options.status } : {},
  };
}

/**
 * Address store answering from a fixed map of IP resource names
 */
export function storeWith(records: Record<string, AddressRecord>): AddressRecordStore & {
  lookups: string[];
} {
  const lookups: string[] = [];
  return {
    lookups,
    get: async (identifier: string): Promise<Result<AddressRecord, StoreError>> => {
      lookups.push(identifier);
      const record = records[identifier];
      if (!record) {
        return Result.err(
          new RecordNotFoundError({ message: `IP resource ${identifier} not found`, identifier })
        );
      }
      return Result.ok(record);
    },
  };
}
