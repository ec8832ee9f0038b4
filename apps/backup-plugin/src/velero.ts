/**
 * The part of the Velero API a backup item action sees
 */

/** Marks a backup that only keeps manifests, without volume data */
export const METADATA_BACKUP_LABEL = "velero.kubevirt.io/metadataBackup";

export interface Backup {
  metadata: {
    name: string;
    namespace?: string;
    labels?: Record<string, string>;
  };
  spec: {
    includedResources?: string[];
    excludedResources?: string[];
    includedNamespaces?: string[];
  };
}

export interface ResourceSelector {
  includedResources?: string[];
  excludedResources?: string[];
  includedNamespaces?: string[];
  excludedNamespaces?: string[];
  labelSelector?: string;
}

/**
 * Another object the host should back up along with the item
 */
export interface ResourceIdentifier {
  group: string;
  resource: string;
  namespace: string;
  name: string;
}

function isResourceIncluded(resource: string, backup: Backup): boolean {
  const included = backup.spec.includedResources ?? [];
  if (included.length === 0) {
    return true;
  }
  return included.some((entry) => entry === "*" || entry === resource);
}

function isResourceExcluded(resource: string, backup: Backup): boolean {
  return (backup.spec.excludedResources ?? []).includes(resource);
}

/**
 * Whether objects of the given resource (e.g. "pods") end up in the backup
 */
export function isResourceInBackup(resource: string, backup: Backup): boolean {
  return isResourceIncluded(resource, backup) && !isResourceExcluded(resource, backup);
}

export function isMetadataBackup(backup: Backup): boolean {
  return backup.metadata.labels?.[METADATA_BACKUP_LABEL] === "true";
}
