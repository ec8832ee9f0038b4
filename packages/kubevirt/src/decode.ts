import { Result } from "better-result";
import { Value } from "@sinclair/typebox/value";
import { InvalidInputError, validate } from "@vmident/errors";
import { VirtualMachineSchema, type VirtualMachine } from "./types.js";

type UnknownRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validate an unstructured `VirtualMachine` item and read it into the typed
 * model. The item itself is left untouched.
 */
export function decodeVirtualMachine(
  item: unknown
): Result<VirtualMachine, InvalidInputError> {
  const decoded = validate(VirtualMachineSchema, item);
  if (decoded.isErr()) {
    return Result.err(
      new InvalidInputError({ message: `invalid VirtualMachine: ${decoded.error.message}` })
    );
  }
  return decoded;
}

/**
 * Copy of an unstructured VM item with annotations merged into
 * `spec.template.metadata.annotations`. Existing keys are kept unless the
 * new set overwrites them; nothing is removed.
 */
export function withTemplateAnnotations(
  item: UnknownRecord,
  annotations: Record<string, string>
): UnknownRecord {
  const copy = Value.Clone(item);

  const spec = isRecord(copy.spec) ? copy.spec : {};
  const template = isRecord(spec.template) ? spec.template : {};
  const metadata = isRecord(template.metadata) ? template.metadata : {};
  const existing = isRecord(metadata.annotations) ? metadata.annotations : {};

  metadata.annotations = { ...existing, ...annotations };
  template.metadata = metadata;
  spec.template = template;
  copy.spec = spec;

  return copy;
}
