import { describe, it, expect } from "vitest";
import { Type } from "@sinclair/typebox";
import { InvalidInputError, formatSchemaPath, validate } from "../index.js";

const Item = Type.Object({
  name: Type.String(),
  tags: Type.Optional(Type.Array(Type.Object({ key: Type.String() }))),
});

describe("formatSchemaPath", () => {
  it.each([
    ["", "<root>"],
    ["/name", "name"],
    ["/spec/networks/0/name", "spec.networks[0].name"],
    ["/metadata/labels/kubevirt.io~1vm", "metadata.labels.kubevirt.io/vm"],
    ["/a~0b", "a~b"],
  ])("%j -> %s", (pointer, expected) => {
    expect(formatSchemaPath(pointer)).toBe(expected);
  });
});

describe("validate", () => {
  it("returns a copy without undeclared properties", () => {
    const input = { name: "web", extra: true, tags: [{ key: "a", value: "b" }] };

    const result = validate(Item, input);

    expect(result.unwrap()).toEqual({ name: "web", tags: [{ key: "a" }] });
    expect(input).toEqual({ name: "web", extra: true, tags: [{ key: "a", value: "b" }] });
  });

  it("names the path of the first violation", () => {
    const result = validate(Item, { name: "web", tags: [{ key: "a" }, { key: 7 }] });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(InvalidInputError.is(result.error)).toBe(true);
      expect(result.error.message.startsWith("tags[1].key: ")).toBe(true);
    }
  });

  it("rejects a value that is not an object", () => {
    const result = validate(Item, "web");

    expect(result.isErr() ? result.error.message.startsWith("<root>: ") : false).toBe(true);
  });
});
