/**
 * Kube-OVN naming grammar
 *
 * Translates between the three string forms Kube-OVN uses for a VM interface:
 * - a KubeVirt multus network name: "<namespace>/<name>"
 * - an attachment reference, the prefix of the Kube-OVN interface annotations:
 *   "ovn.kubernetes.io" for the default network,
 *   "<name>.<namespace>.ovn.kubernetes.io" for a NetworkAttachmentDefinition
 * - the name of the Kube-OVN IP resource holding the addresses:
 *   "<vm>.<vmNamespace>" or "<vm>.<vmNamespace>.<name>.<namespace>.ovn"
 *
 * The grammar is strict: nothing is trimmed or case-folded.
 */

import { Result } from "better-result";
import {
  EmptyIdentityError,
  InvalidReferenceSuffixError,
  MalformedReferenceError,
  NamespaceMismatchError,
  type NamingError,
} from "@vmident/errors";

/** Annotation prefix Kube-OVN uses for the default (pod) network */
export const DEFAULT_ATTACHMENT = "ovn.kubernetes.io";

/** Suffix of the IP resource name of an interface attached through a NAD */
const NAD_RECORD_SUFFIX = "ovn";

const SECONDARY_SUFFIX = `.${DEFAULT_ATTACHMENT}`;

/**
 * Symbolic key of one network attachment, as found in Kube-OVN annotation keys
 */
export type AttachmentReference = string;

export type ParsedAttachment =
  | { kind: "default" }
  | { kind: "secondary"; name: string; namespace: string };

export function isDefaultAttachment(reference: AttachmentReference): boolean {
  return reference === DEFAULT_ATTACHMENT;
}

/**
 * Translate a KubeVirt multus network name ("<namespace>/<name>") into the
 * attachment reference Kube-OVN uses for it
 */
export function toAttachmentReference(
  networkName: string
): Result<AttachmentReference, MalformedReferenceError> {
  const parts = networkName.split("/");
  if (parts.length !== 2 || parts.some((part) => part === "")) {
    return Result.err(
      new MalformedReferenceError({
        message: `expected network name to have format [NS]/[NAD], got '${networkName}'`,
        reference: networkName,
      })
    );
  }

  const [namespace, name] = parts;
  return Result.ok(`${name}.${namespace}${SECONDARY_SUFFIX}`);
}

/**
 * Parse an attachment reference back into the network it designates
 */
export function parseAttachmentReference(
  reference: AttachmentReference
): Result<ParsedAttachment, MalformedReferenceError | InvalidReferenceSuffixError> {
  if (isDefaultAttachment(reference)) {
    return Result.ok({ kind: "default" });
  }

  if (!reference.endsWith(SECONDARY_SUFFIX)) {
    return Result.err(
      new InvalidReferenceSuffixError({
        message: `invalid network annotation, expected '${reference}' to have suffix ${SECONDARY_SUFFIX}`,
        reference,
        expectedSuffix: SECONDARY_SUFFIX,
      })
    );
  }

  // What remains must be exactly [NAD].[NS]
  const remainder = reference.slice(0, -SECONDARY_SUFFIX.length);
  const parts = remainder.split(".");
  if (parts.length !== 2 || parts.some((part) => part === "")) {
    return Result.err(
      new MalformedReferenceError({
        message: `expected NAD annotation to have pattern [NAD].[NS], got '${remainder}'`,
        reference,
      })
    );
  }

  const [name, namespace] = parts;
  return Result.ok({ kind: "secondary", name, namespace });
}

/**
 * Name of the Kube-OVN IP resource holding the addresses of one VM interface.
 *
 * @example
 * ```ts
 * recordIdentifierFor("ovn.kubernetes.io", "web", "prod");
 * // => "web.prod"
 * recordIdentifierFor("vlan10.prod.ovn.kubernetes.io", "web", "prod");
 * // => "web.prod.vlan10.prod.ovn"
 * ```
 */
export function recordIdentifierFor(
  reference: AttachmentReference,
  vmName: string,
  vmNamespace: string
): Result<string, NamingError> {
  if (vmName === "" || vmNamespace === "") {
    return Result.err(
      new EmptyIdentityError({
        message: `expected a VM name/namespace, got '${vmName}' and '${vmNamespace}'`,
        vmName,
        vmNamespace,
      })
    );
  }

  const parsed = parseAttachmentReference(reference);
  if (parsed.isErr()) {
    return Result.err(parsed.error);
  }

  const attachment = parsed.unwrap();
  if (attachment.kind === "default") {
    return Result.ok(`${vmName}.${vmNamespace}`);
  }

  // A NAD is only usable from its own namespace
  if (attachment.namespace !== vmNamespace) {
    return Result.err(
      new NamespaceMismatchError({
        message: `expected NAD to be in the same namespace as the VM, got ${attachment.namespace} for NAD and ${vmNamespace} for VM`,
        reference,
        attachmentNamespace: attachment.namespace,
        vmNamespace,
      })
    );
  }

  return Result.ok(
    [vmName, vmNamespace, attachment.name, attachment.namespace, NAD_RECORD_SUFFIX].join(".")
  );
}
