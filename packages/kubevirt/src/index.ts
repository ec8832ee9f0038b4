/**
 * @vmident/kubevirt
 *
 * Typed view of KubeVirt VirtualMachine items and access to their VMIs.
 */

export type {
  ObjectMeta,
  MultusNetwork,
  Network,
  Volume,
  VirtualMachineInstanceTemplate,
  PrintableStatus,
  VirtualMachine,
  VMIdentity,
  NetworkDeclaration,
} from "./types.js";

export {
  VirtualMachineSchema,
  VirtualMachineInstanceTemplateSchema,
  NetworkSchema,
  MultusNetworkSchema,
  VolumeSchema,
  ObjectMetaSchema,
} from "./types.js";

export { decodeVirtualMachine, withTemplateAnnotations, isRecord } from "./decode.js";

export {
  identityOf,
  toNetworkDeclaration,
  networkDeclarationsOf,
} from "./declarations.js";

export {
  KubeVirtVMIReader,
  isVMIExcludedByLabel,
  KUBEVIRT_GROUP,
  KUBEVIRT_VERSION,
  VMI_PLURAL,
  VELERO_EXCLUDE_LABEL,
  type VMIReader,
  type NamespacedCustomObjectReader,
  type NamespacedCustomObjectRequest,
  type KubeVirtVMIReaderOptions,
} from "./vmi.js";
