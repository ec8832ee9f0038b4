import { Result } from "better-result";
import type { Static, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { InvalidInputError } from "./index.js";

/**
 * Turn a TypeBox JSON pointer ("/spec/networks/0/name") into the dotted form
 * used in messages ("spec.networks[0].name")
 */
export function formatSchemaPath(pointer: string): string {
  if (pointer === "") {
    return "<root>";
  }

  return pointer
    .slice(1)
    .split("/")
    .map((segment) => segment.replace(/~1/g, "/").replace(/~0/g, "~"))
    .reduce(
      (path, segment) =>
        /^\d+$/.test(segment) ? `${path}[${segment}]` : path === "" ? segment : `${path}.${segment}`,
      ""
    );
}

/**
 * Check an unstructured value against a schema. Properties the schema does
 * not declare are dropped from the returned copy; the input is not modified.
 * The error message is "<path>: <reason>" for the first violation.
 */
export function validate<T extends TSchema>(
  schema: T,
  value: unknown
): Result<Static<T>, InvalidInputError> {
  const cleaned = Value.Clean(schema, Value.Clone(value));
  if (Value.Check(schema, cleaned)) {
    return Result.ok(cleaned);
  }

  const violation = Value.Errors(schema, cleaned).First();
  const message = violation
    ? `${formatSchemaPath(violation.path)}: ${violation.message}`
    : "value does not match the expected shape";
  return Result.err(new InvalidInputError({ message }));
}
