import { Result } from "better-result";
import {
  BackupRejectedError,
  InvalidInputError,
  toLogMeta,
  type VmidentError,
} from "@vmident/errors";
import type { NetworkIdentityResolver } from "@vmident/identity";
import {
  decodeVirtualMachine,
  isRecord,
  withTemplateAnnotations,
  type VMIReader,
  type Volume,
} from "@vmident/kubevirt";
import { generateCorrelationId, type Logger } from "@vmident/logger";
import { canBeSafelyBackedUp, isVolumeInDataVolumeTemplates } from "./safety.js";
import {
  isMetadataBackup,
  type Backup,
  type ResourceIdentifier,
  type ResourceSelector,
} from "./velero.js";

/**
 * Decides whether the volumes of a VM would be restored consistently from the
 * backup. The policy lives outside this project.
 */
export type RestorePossible = (
  volumes: readonly Volume[],
  backup: Backup,
  namespace: string,
  skipVolume: (volume: Volume) => boolean,
  logger: Logger
) => Promise<Result<boolean, VmidentError>>;

export interface ExecuteOutput {
  /** The VM item, with its network identity in the template annotations */
  item: Record<string, unknown>;
  additionalItems: ResourceIdentifier[];
}

export interface VMBackupItemActionDeps {
  resolver: NetworkIdentityResolver;
  vmiReader: VMIReader;
  restorePossible: RestorePossible;
  logger: Logger;
}

/**
 * Backup item action for `virtualmachines.kubevirt.io`.
 *
 * Backs a VM up only when it can be restored consistently, and records the
 * Kube-OVN addresses of its interfaces so the restored VM gets them back.
 */
export class VMBackupItemAction {
  constructor(private readonly deps: VMBackupItemActionDeps) {}

  appliesTo(): ResourceSelector {
    return { includedResources: ["virtualmachines.kubevirt.io"] };
  }

  async execute(
    item: unknown,
    backup: Backup | null | undefined
  ): Promise<Result<ExecuteOutput, VmidentError>> {
    const logger = this.deps.logger.child({
      correlationId: generateCorrelationId(),
      backup: backup?.metadata.name,
    });
    logger.info("Executing VMBackupItemAction");

    const result = await this.run(item, backup, logger);
    if (result.isErr()) {
      logger.error("VM backup failed", toLogMeta(result.error));
    }
    return result;
  }

  private async run(
    item: unknown,
    backup: Backup | null | undefined,
    logger: Logger
  ): Promise<Result<ExecuteOutput, VmidentError>> {
    if (!backup) {
      return Result.err(new InvalidInputError({ message: "backup object is nil" }));
    }
    if (!isRecord(item)) {
      return Result.err(new InvalidInputError({ message: "item must be an object" }));
    }

    const decoded = decodeVirtualMachine(item);
    if (decoded.isErr()) {
      return Result.err(decoded.error);
    }
    const vm = decoded.unwrap();
    const label = `${vm.metadata.namespace}/${vm.metadata.name}`;
    const vmLogger = logger.child({ vm: label });

    const safe = await canBeSafelyBackedUp(vm, backup, this.deps.vmiReader, vmLogger);
    if (safe.isErr()) {
      return Result.err(safe.error);
    }
    if (!safe.unwrap()) {
      return Result.err(
        new BackupRejectedError({ message: "VM cannot be safely backed up", vm: label })
      );
    }

    // Consistency checks only matter when volume data is part of the backup
    if (!isMetadataBackup(backup)) {
      const check = await Result.tryPromise({
        try: () =>
          this.deps.restorePossible(
            vm.spec.template.spec.volumes ?? [],
            backup,
            vm.metadata.namespace,
            (volume) => isVolumeInDataVolumeTemplates(volume, vm),
            vmLogger
          ),
        catch: (error) =>
          new BackupRejectedError({
            message: `restore check failed: ${error instanceof Error ? error.message : String(error)}`,
            vm: label,
            cause: error,
          }),
      });
      if (check.isErr()) {
        return Result.err(check.error);
      }
      const restore = check.unwrap();
      if (restore.isErr()) {
        return Result.err(restore.error);
      }
      if (!restore.unwrap()) {
        return Result.err(
          new BackupRejectedError({ message: "VM would not be restored correctly", vm: label })
        );
      }
    }

    const annotations = await this.deps.resolver.resolveAnnotations(vm);
    if (annotations.isErr()) {
      return Result.err(annotations.error);
    }

    const pinned = annotations.unwrap();
    vmLogger.info("Persisting VM network identity", {
      annotations: Object.keys(pinned).length,
    });

    return Result.ok({
      item: withTemplateAnnotations(item, pinned),
      additionalItems: [],
    });
  }
}
