/**
 * Attachment enumeration
 *
 * Walks the networks of a VM and resolves the Kube-OVN address record of
 * every interface that ends up on it. The default network is present unless a
 * pod network is declared explicitly or a multus network takes over as primary:
 *
 * | networks                              | resolved, in order                  |
 * | ------------------------------------- | ----------------------------------- |
 * | none                                  | default                             |
 * | pod, nadA                             | default, nadA                       |
 * | nadA (default: true)                  | nadA                                |
 * | nadA, nadB                            | nadA, nadB, default (implicit)      |
 */

import { Result } from "better-result";
import type { NetworkIdentityError } from "@vmident/errors";
import {
  DEFAULT_ATTACHMENT,
  recordIdentifierFor,
  toAttachmentReference,
  type AddressRecord,
  type AttachmentReference,
  type RecordFetcher,
} from "@vmident/kubeovn";
import type { NetworkDeclaration, VMIdentity } from "@vmident/kubevirt";

export interface ResolvedAttachment {
  reference: AttachmentReference;
  record: AddressRecord;
}

interface EnumerationState {
  resolved: readonly ResolvedAttachment[];
  explicitPodNetwork: boolean;
  multusIsPrimary: boolean;
}

const INITIAL_STATE: EnumerationState = {
  resolved: [],
  explicitPodNetwork: false,
  multusIsPrimary: false,
};

/**
 * Fetch the address record behind one attachment of a VM
 */
export async function resolveAttachment(
  identity: VMIdentity,
  reference: AttachmentReference,
  fetcher: RecordFetcher
): Promise<Result<ResolvedAttachment, NetworkIdentityError>> {
  const identifier = recordIdentifierFor(reference, identity.name, identity.namespace);
  if (identifier.isErr()) {
    return Result.err(identifier.error);
  }

  const record = await fetcher.fetch(identifier.unwrap());
  if (record.isErr()) {
    return Result.err(record.error);
  }

  return Result.ok({ reference, record: record.unwrap() });
}

async function step(
  state: EnumerationState,
  declaration: NetworkDeclaration,
  identity: VMIdentity,
  fetcher: RecordFetcher
): Promise<Result<EnumerationState, NetworkIdentityError>> {
  switch (declaration.kind) {
    case "pod": {
      const resolved = await resolveAttachment(identity, DEFAULT_ATTACHMENT, fetcher);
      if (resolved.isErr()) {
        return Result.err(resolved.error);
      }
      return Result.ok({
        ...state,
        resolved: [...state.resolved, resolved.unwrap()],
        explicitPodNetwork: true,
      });
    }

    case "multus": {
      const reference = toAttachmentReference(declaration.networkName);
      if (reference.isErr()) {
        return Result.err(reference.error);
      }

      const resolved = await resolveAttachment(identity, reference.unwrap(), fetcher);
      if (resolved.isErr()) {
        return Result.err(resolved.error);
      }
      return Result.ok({
        ...state,
        resolved: [...state.resolved, resolved.unwrap()],
        multusIsPrimary: state.multusIsPrimary || declaration.isDefault,
      });
    }
  }
}

/**
 * Resolve every interface of a VM, in declaration order.
 *
 * Lookups run one after the other; the first failure aborts the whole
 * enumeration.
 */
export async function resolveAttachments(
  identity: VMIdentity,
  declarations: readonly NetworkDeclaration[],
  fetcher: RecordFetcher
): Promise<Result<ResolvedAttachment[], NetworkIdentityError>> {
  let state = INITIAL_STATE;
  for (const declaration of declarations) {
    const next = await step(state, declaration, identity, fetcher);
    if (next.isErr()) {
      return Result.err(next.error);
    }
    state = next.unwrap();
  }

  // KubeVirt injects the default network unless something took its place.
  // This also covers a VM without any network.
  if (state.explicitPodNetwork || state.multusIsPrimary) {
    return Result.ok([...state.resolved]);
  }

  const implicit = await resolveAttachment(identity, DEFAULT_ATTACHMENT, fetcher);
  if (implicit.isErr()) {
    return Result.err(implicit.error);
  }
  return Result.ok([...state.resolved, implicit.unwrap()]);
}
