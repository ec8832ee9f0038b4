import { Result } from "better-result";
import {
  InvalidInputError,
  ResolutionError,
  type NetworkIdentityError,
} from "@vmident/errors";
import {
  mergeAnnotations,
  toNetInfo,
  type AnnotationSet,
  type NetInfo,
  type RecordFetcher,
} from "@vmident/kubeovn";
import {
  identityOf,
  networkDeclarationsOf,
  type VirtualMachine,
} from "@vmident/kubevirt";
import type { Logger } from "@vmident/logger";
import { resolveAttachments } from "./enumerator.js";

/**
 * Entry point of the engine: turns a VM into the Kube-OVN annotations that
 * pin the MAC and IP addresses of all its interfaces.
 */
export class NetworkIdentityResolver {
  constructor(
    private readonly fetcher: RecordFetcher,
    private readonly logger?: Logger
  ) {}

  /**
   * Addresses of every interface of the VM, in enumeration order
   */
  async resolveNetInfo(
    vm: VirtualMachine | null | undefined
  ): Promise<Result<NetInfo[], InvalidInputError | ResolutionError>> {
    if (!vm) {
      return Result.err(new InvalidInputError({ message: "VM object is nil" }));
    }

    const identity = identityOf(vm);
    const label = `${identity.namespace}/${identity.name}`;
    const wrap = (cause: NetworkIdentityError) =>
      new ResolutionError({
        message: `failed to resolve network identity for VM ${label}: ${cause.message}`,
        vm: label,
        cause,
      });

    const declarations = networkDeclarationsOf(vm);
    if (declarations.isErr()) {
      return Result.err(wrap(declarations.error));
    }

    const resolved = await resolveAttachments(identity, declarations.unwrap(), this.fetcher);
    if (resolved.isErr()) {
      return Result.err(wrap(resolved.error));
    }

    const infos = resolved.unwrap().map(({ reference, record }) => toNetInfo(reference, record));
    this.logger?.debug("Resolved VM network identity", {
      vm: label,
      attachments: infos.map((info) => info.attachmentReference),
    });
    return Result.ok(infos);
  }

  async resolveAnnotations(
    vm: VirtualMachine | null | undefined
  ): Promise<Result<AnnotationSet, InvalidInputError | ResolutionError>> {
    const infos = await this.resolveNetInfo(vm);
    if (infos.isErr()) {
      return Result.err(infos.error);
    }
    return Result.ok(mergeAnnotations(infos.unwrap()));
  }
}
