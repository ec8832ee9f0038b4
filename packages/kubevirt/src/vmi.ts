/**
 * Access to the VirtualMachineInstance of a running VM
 */

import { Result } from "better-result";
import { StoreUnavailableError, TimeoutError } from "@vmident/errors";
import { withTimeout } from "@vmident/resilience";
import { isRecord } from "./decode.js";

export const KUBEVIRT_GROUP = "kubevirt.io";
export const KUBEVIRT_VERSION = "v1";
export const VMI_PLURAL = "virtualmachineinstances";

/** Label excluding a VMI (and so a running VM) from Velero backups */
export const VELERO_EXCLUDE_LABEL = "velero.kubevirt.io/exclude";

export interface NamespacedCustomObjectRequest {
  group: string;
  version: string;
  namespace: string;
  plural: string;
  name: string;
}

/**
 * The slice of `CustomObjectsApi` the reader needs
 */
export interface NamespacedCustomObjectReader {
  getNamespacedCustomObject(request: NamespacedCustomObjectRequest): Promise<unknown>;
}

export interface VMIReader {
  getLabels(
    namespace: string,
    name: string
  ): Promise<Result<Record<string, string>, StoreUnavailableError>>;
}

export interface KubeVirtVMIReaderOptions {
  /** Deadline for one VMI lookup in milliseconds (default: 10000) */
  timeoutMs?: number;
}

export class KubeVirtVMIReader implements VMIReader {
  private readonly timeoutMs: number;

  constructor(
    private readonly api: NamespacedCustomObjectReader,
    options: KubeVirtVMIReaderOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async getLabels(
    namespace: string,
    name: string
  ): Promise<Result<Record<string, string>, StoreUnavailableError>> {
    const vmi = `${namespace}/${name}`;
    const response = await withTimeout(
      () =>
        this.api.getNamespacedCustomObject({
          group: KUBEVIRT_GROUP,
          version: KUBEVIRT_VERSION,
          namespace,
          plural: VMI_PLURAL,
          name,
        }),
      { timeoutMs: this.timeoutMs, message: `VMI lookup for ${vmi} timed out` },
      (error) =>
        new StoreUnavailableError({
          message: `failed to retrieve VMI ${vmi}: ${error instanceof Error ? error.message : String(error)}`,
          identifier: vmi,
          cause: error,
        })
    );

    if (response.isErr()) {
      const error = response.error;
      if (TimeoutError.is(error)) {
        return Result.err(
          new StoreUnavailableError({ message: error.message, identifier: vmi, cause: error })
        );
      }
      return Result.err(error);
    }

    const body = response.unwrap();
    const labels = isRecord(body) && isRecord(body.metadata) ? body.metadata.labels : undefined;
    if (!isRecord(labels)) {
      return Result.ok({});
    }

    return Result.ok(
      Object.fromEntries(
        Object.entries(labels).filter(
          (entry): entry is [string, string] => typeof entry[1] === "string"
        )
      )
    );
  }
}

/**
 * Whether the VMI of a VM carries the Velero exclusion label
 */
export async function isVMIExcludedByLabel(
  reader: VMIReader,
  namespace: string,
  name: string
): Promise<Result<boolean, StoreUnavailableError>> {
  const labels = await reader.getLabels(namespace, name);
  if (labels.isErr()) {
    return Result.err(labels.error);
  }
  return Result.ok(labels.unwrap()[VELERO_EXCLUDE_LABEL] === "true");
}
