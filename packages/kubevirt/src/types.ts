/**
 * The part of the `kubevirt.io/v1` VirtualMachine object this project reads.
 * Other fields are allowed in the input and dropped when decoding.
 */

import { Type, type Static } from "@sinclair/typebox";

const StringMap = Type.Record(Type.String(), Type.String());

export const ObjectMetaSchema = Type.Object({
  name: Type.String(),
  namespace: Type.String(),
  labels: Type.Optional(StringMap),
  annotations: Type.Optional(StringMap),
});

export type ObjectMeta = Static<typeof ObjectMetaSchema>;

export const MultusNetworkSchema = Type.Object({
  /** "<namespace>/<name>" of a NetworkAttachmentDefinition */
  networkName: Type.String(),
  /** The interface replaces the pod network as the primary one */
  default: Type.Optional(Type.Boolean()),
});

export type MultusNetwork = Static<typeof MultusNetworkSchema>;

/**
 * One entry of `spec.template.spec.networks`; sets exactly one of pod/multus
 */
export const NetworkSchema = Type.Object({
  name: Type.String(),
  pod: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  multus: Type.Optional(MultusNetworkSchema),
});

export type Network = Static<typeof NetworkSchema>;

export const VolumeSchema = Type.Object({
  name: Type.String(),
  dataVolume: Type.Optional(Type.Object({ name: Type.String() })),
});

export type Volume = Static<typeof VolumeSchema>;

export const VirtualMachineInstanceTemplateSchema = Type.Object({
  metadata: Type.Optional(
    Type.Object({
      labels: Type.Optional(StringMap),
      annotations: Type.Optional(StringMap),
    })
  ),
  spec: Type.Object({
    networks: Type.Optional(Type.Array(NetworkSchema)),
    volumes: Type.Optional(Type.Array(VolumeSchema)),
  }),
});

export type VirtualMachineInstanceTemplate = Static<typeof VirtualMachineInstanceTemplateSchema>;

export const VirtualMachineSchema = Type.Object({
  metadata: ObjectMetaSchema,
  spec: Type.Object({
    template: VirtualMachineInstanceTemplateSchema,
    dataVolumeTemplates: Type.Optional(
      Type.Array(Type.Object({ metadata: Type.Object({ name: Type.String() }) }))
    ),
  }),
  status: Type.Optional(
    Type.Object({
      /** Free-form in practice; compare against PrintableStatus values */
      printableStatus: Type.Optional(Type.String()),
    })
  ),
});

export type VirtualMachine = Static<typeof VirtualMachineSchema>;

export type PrintableStatus =
  | "Stopped"
  | "Provisioning"
  | "Starting"
  | "Running"
  | "Paused"
  | "Stopping"
  | "Terminating"
  | "CrashLoopBackOff"
  | "Migrating"
  | "Unknown"
  | "ErrorUnschedulable"
  | "ErrImagePull"
  | "ImagePullBackOff"
  | "ErrorPvcNotFound"
  | "DataVolumeError"
  | "WaitingForVolumeBinding";

export interface VMIdentity {
  name: string;
  namespace: string;
}

/**
 * A VM network, reduced to what decides its Kube-OVN attachment
 */
export type NetworkDeclaration =
  | { kind: "pod" }
  | { kind: "multus"; networkName: string; isDefault: boolean };
