/**
 * @vmident/backup-plugin
 *
 * Backup item action that pins the Kube-OVN network identity of KubeVirt VMs.
 *
 * @example
 * ```typescript
 * import { createBackupPlugin, loadConfig } from "@vmident/backup-plugin";
 *
 * const config = loadConfig().unwrap();
 * const plugin = createBackupPlugin(config, restorePossible);
 *
 * const result = await plugin.action.execute(item, backup);
 * if (result.isOk()) {
 *   // result.unwrap().item carries the ovn.kubernetes.io/* template annotations
 * }
 * ```
 */

import { Result } from "better-result";
import type { StoreUnavailableError } from "@vmident/errors";
import { NetworkIdentityResolver } from "@vmident/identity";
import {
  KubeOvnIPStore,
  RecordFetcher,
  type AddressRecordStore,
} from "@vmident/kubeovn";
import { KubeVirtVMIReader, type VMIReader } from "@vmident/kubevirt";
import { createLogger, type Logger } from "@vmident/logger";
import { VMBackupItemAction, type RestorePossible } from "./action.js";
import type { PluginConfig } from "./config.js";
import { lazyCustomObjectsApi, type CustomObjectsApiFactory } from "./kube.js";

/** Name the action registers under with the plugin host */
export const BACKUP_ACTION_NAME = "vmident.io/backup-virtualmachine";

export interface BackupPlugin {
  name: string;
  action: VMBackupItemAction;
}

export interface BackupPluginOverrides {
  logger?: Logger;
  api?: CustomObjectsApiFactory;
}

/**
 * Wire the action to the cluster: Kube-OVN IP lookups and VMI lookups share
 * one lazily created custom objects client.
 */
export function createBackupPlugin(
  config: PluginConfig,
  restorePossible: RestorePossible,
  overrides: BackupPluginOverrides = {}
): BackupPlugin {
  const logger =
    overrides.logger ??
    createLogger({ correlationId: "plugin", plugin: BACKUP_ACTION_NAME }, { level: config.logLevel });
  const api = overrides.api ?? lazyCustomObjectsApi(config.kubeconfigPath);

  const fetcher = new RecordFetcher((): Result<AddressRecordStore, StoreUnavailableError> => {
    const client = api();
    if (client.isErr()) {
      return Result.err(client.error);
    }
    return Result.ok(new KubeOvnIPStore(client.unwrap(), { timeoutMs: config.storeTimeoutMs }));
  });

  const vmiReader: VMIReader = {
    getLabels: async (namespace, name) => {
      const client = api();
      if (client.isErr()) {
        return Result.err(client.error);
      }
      return new KubeVirtVMIReader(client.unwrap(), {
        timeoutMs: config.storeTimeoutMs,
      }).getLabels(namespace, name);
    },
  };

  const action = new VMBackupItemAction({
    resolver: new NetworkIdentityResolver(fetcher, logger),
    vmiReader,
    restorePossible,
    logger,
  });

  return { name: BACKUP_ACTION_NAME, action };
}

export {
  VMBackupItemAction,
  type RestorePossible,
  type ExecuteOutput,
  type VMBackupItemActionDeps,
} from "./action.js";
export { canBeSafelyBackedUp, isRunning, isVolumeInDataVolumeTemplates } from "./safety.js";
export {
  isResourceInBackup,
  isMetadataBackup,
  METADATA_BACKUP_LABEL,
  type Backup,
  type ResourceSelector,
  type ResourceIdentifier,
} from "./velero.js";
export { loadConfig, type PluginConfig } from "./config.js";
export {
  createCustomObjectsApi,
  lazyCustomObjectsApi,
  type CustomObjectsApiFactory,
  type CustomObjectsClient,
} from "./kube.js";
