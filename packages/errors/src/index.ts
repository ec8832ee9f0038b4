/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Caller supplied a missing or structurally invalid object
export const InvalidInputError = TaggedError("InvalidInputError")<{
  message: string;
}>();

export type InvalidInputError = InstanceType<typeof InvalidInputError>;

// Network name or attachment reference breaks the naming grammar
export const MalformedReferenceError = TaggedError("MalformedReferenceError")<{
  message: string;
  reference: string;
}>();

export type MalformedReferenceError = InstanceType<typeof MalformedReferenceError>;

// Attachment reference does not carry the Kube-OVN annotation suffix
export const InvalidReferenceSuffixError = TaggedError("InvalidReferenceSuffixError")<{
  message: string;
  reference: string;
  expectedSuffix: string;
}>();

export type InvalidReferenceSuffixError = InstanceType<typeof InvalidReferenceSuffixError>;

// Secondary network lives in another namespace than the VM
export const NamespaceMismatchError = TaggedError("NamespaceMismatchError")<{
  message: string;
  reference: string;
  attachmentNamespace: string;
  vmNamespace: string;
}>();

export type NamespaceMismatchError = InstanceType<typeof NamespaceMismatchError>;

// VM name or namespace missing when building a record identifier
export const EmptyIdentityError = TaggedError("EmptyIdentityError")<{
  message: string;
  vmName: string;
  vmNamespace: string;
}>();

export type EmptyIdentityError = InstanceType<typeof EmptyIdentityError>;

// No address record under the derived identifier
export const RecordNotFoundError = TaggedError("RecordNotFoundError")<{
  message: string;
  identifier: string;
}>();

export type RecordNotFoundError = InstanceType<typeof RecordNotFoundError>;

// Address record store unreachable or failing transport-side
export const StoreUnavailableError = TaggedError("StoreUnavailableError")<{
  message: string;
  identifier?: string;
  cause?: unknown;
}>();

export type StoreUnavailableError = InstanceType<typeof StoreUnavailableError>;

// Timeout errors
export const TimeoutError = TaggedError("TimeoutError")<{
  message: string;
}>();

export type TimeoutError = InstanceType<typeof TimeoutError>;

// Facade wrapper, labels any resolution failure with the VM it concerns
export const ResolutionError = TaggedError("ResolutionError")<{
  message: string;
  vm: string;
  cause: NetworkIdentityError;
}>();

export type ResolutionError = InstanceType<typeof ResolutionError>;

// The backup action refused to back up a VM
export const BackupRejectedError = TaggedError("BackupRejectedError")<{
  message: string;
  vm: string;
  cause?: unknown;
}>();

export type BackupRejectedError = InstanceType<typeof BackupRejectedError>;

// Failures of the naming grammar
export type NamingError =
  | MalformedReferenceError
  | InvalidReferenceSuffixError
  | NamespaceMismatchError
  | EmptyIdentityError;

// Failures of the address record store
export type StoreError = RecordNotFoundError | StoreUnavailableError;

// Everything the resolution engine can fail with before the facade wraps it
export type NetworkIdentityError = InvalidInputError | NamingError | StoreError;

// Union type for all vmident errors
export type VmidentError =
  | NetworkIdentityError
  | TimeoutError
  | ResolutionError
  | BackupRejectedError;

/**
 * Whether a caller may reasonably retry the operation that produced the error.
 * Nothing inside the engine retries; this only informs the surrounding host.
 */
export function isRetryable(error: VmidentError): boolean {
  switch (error._tag) {
    case "StoreUnavailableError":
    case "TimeoutError":
      return true;
    case "ResolutionError":
      return isRetryable(error.cause);
    case "InvalidInputError":
    case "MalformedReferenceError":
    case "InvalidReferenceSuffixError":
    case "NamespaceMismatchError":
    case "EmptyIdentityError":
    case "RecordNotFoundError":
    case "BackupRejectedError":
    default:
      return false;
  }
}

/**
 * Flatten an error into log fields, following ResolutionError causes
 */
export function toLogMeta(error: VmidentError): Record<string, unknown> {
  const meta: Record<string, unknown> = {
    errorTag: error._tag,
    error: error.message,
    retryable: isRetryable(error),
  };

  if (ResolutionError.is(error)) {
    meta.vm = error.vm;
    meta.causeTag = error.cause._tag;
    meta.cause = error.cause.message;
  }

  return meta;
}

export { validate, formatSchemaPath } from "./schema.js";
