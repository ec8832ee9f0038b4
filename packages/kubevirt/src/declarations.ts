import { Result } from "better-result";
import { InvalidInputError } from "@vmident/errors";
import type { Network, NetworkDeclaration, VirtualMachine, VMIdentity } from "./types.js";

export function identityOf(vm: VirtualMachine): VMIdentity {
  return { name: vm.metadata.name, namespace: vm.metadata.namespace };
}

/**
 * Reduce a KubeVirt network to its declaration. A network must mount either
 * the pod network or a multus network, never both or neither.
 */
export function toNetworkDeclaration(
  network: Network
): Result<NetworkDeclaration, InvalidInputError> {
  if (network.pod && !network.multus) {
    return Result.ok({ kind: "pod" });
  }

  if (network.multus && !network.pod) {
    return Result.ok({
      kind: "multus",
      networkName: network.multus.networkName,
      isDefault: network.multus.default === true,
    });
  }

  return Result.err(
    new InvalidInputError({
      message: `network '${network.name}' must set exactly one of pod or multus`,
    })
  );
}

/**
 * Declarations of `spec.template.spec.networks`, in order
 */
export function networkDeclarationsOf(
  vm: VirtualMachine
): Result<NetworkDeclaration[], InvalidInputError> {
  const declarations: NetworkDeclaration[] = [];
  for (const network of vm.spec.template.spec.networks ?? []) {
    const declaration = toNetworkDeclaration(network);
    if (declaration.isErr()) {
      return Result.err(declaration.error);
    }
    declarations.push(declaration.unwrap());
  }
  return Result.ok(declarations);
}
