/**
 * Backup-safety rules of the KubeVirt Velero plugin.
 *
 * A running VM is only consistent in a backup that also captures its VMI, and
 * its launcher pod whenever PVCs are captured.
 */

import { Result } from "better-result";
import type { StoreUnavailableError } from "@vmident/errors";
import {
  isVMIExcludedByLabel,
  type PrintableStatus,
  type VirtualMachine,
  type VMIReader,
  type Volume,
} from "@vmident/kubevirt";
import type { Logger } from "@vmident/logger";
import { isResourceInBackup, type Backup } from "./velero.js";

const ACTIVE_STATUSES: readonly PrintableStatus[] = ["Starting", "Running"];

export function isRunning(vm: VirtualMachine): boolean {
  const status = vm.status?.printableStatus;
  return ACTIVE_STATUSES.some((active) => active === status);
}

export async function canBeSafelyBackedUp(
  vm: VirtualMachine,
  backup: Backup,
  vmiReader: VMIReader,
  logger: Logger
): Promise<Result<boolean, StoreUnavailableError>> {
  if (!isRunning(vm)) {
    return Result.ok(true);
  }

  if (!isResourceInBackup("virtualmachineinstances", backup)) {
    logger.info("Backup of a running VM does not contain VMI");
    return Result.ok(false);
  }

  const excluded = await isVMIExcludedByLabel(
    vmiReader,
    vm.metadata.namespace,
    vm.metadata.name
  );
  if (excluded.isErr()) {
    return Result.err(excluded.error);
  }
  if (excluded.unwrap()) {
    logger.info("VM is running but VMI is not included in the backup");
    return Result.ok(false);
  }

  if (
    !isResourceInBackup("pods", backup) &&
    isResourceInBackup("persistentvolumeclaims", backup)
  ) {
    logger.info("Backup of a running VM does not contain Pod but contains PVC");
    return Result.ok(false);
  }

  return Result.ok(true);
}

/**
 * Volumes provisioned from one of the VM's own data volume templates are
 * recreated by CDI on restore and need no restore check.
 */
export function isVolumeInDataVolumeTemplates(
  volume: Volume,
  vm: VirtualMachine
): boolean {
  const dataVolume = volume.dataVolume;
  if (!dataVolume) {
    return false;
  }
  return (vm.spec.dataVolumeTemplates ?? []).some(
    (template) => template.metadata.name === dataVolume.name
  );
}
