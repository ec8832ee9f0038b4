import { describe, it, expect, vi } from "vitest";
import { Result } from "better-result";
import { StoreUnavailableError } from "@vmident/errors";
import {
  KubeVirtVMIReader,
  isVMIExcludedByLabel,
  type NamespacedCustomObjectRequest,
  type VMIReader,
} from "../vmi.js";

describe("KubeVirtVMIReader", () => {
  it("reads the labels of the VMI", async () => {
    const api = {
      getNamespacedCustomObject: vi.fn(async (_request: NamespacedCustomObjectRequest) => ({
        metadata: {
          name: "test-vm",
          labels: { "velero.kubevirt.io/exclude": "true", "kubevirt.io/nodeName": "node-1" },
        },
      })),
    };
    const reader = new KubeVirtVMIReader(api);

    const result = await reader.getLabels("test-ns", "test-vm");

    expect(result.unwrap()).toEqual({
      "velero.kubevirt.io/exclude": "true",
      "kubevirt.io/nodeName": "node-1",
    });
    expect(api.getNamespacedCustomObject).toHaveBeenCalledWith({
      group: "kubevirt.io",
      version: "v1",
      namespace: "test-ns",
      plural: "virtualmachineinstances",
      name: "test-vm",
    });
  });

  it("returns no labels for a VMI without any", async () => {
    const reader = new KubeVirtVMIReader({
      getNamespacedCustomObject: async () => ({ metadata: { name: "test-vm" } }),
    });

    expect((await reader.getLabels("test-ns", "test-vm")).unwrap()).toEqual({});
  });

  it("reports lookup failures as StoreUnavailableError", async () => {
    const reader = new KubeVirtVMIReader({
      getNamespacedCustomObject: async () => {
        throw new Error("Not Found");
      },
    });

    const result = await reader.getLabels("test-ns", "test-vm");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(StoreUnavailableError.is(result.error)).toBe(true);
      expect(result.error.message).toBe("failed to retrieve VMI test-ns/test-vm: Not Found");
    }
  });
});

describe("isVMIExcludedByLabel", () => {
  const readerWith = (labels: Record<string, string>): VMIReader => ({
    getLabels: async () => Result.ok(labels),
  });

  it("is true only for the label set to \"true\"", async () => {
    expect(
      (await isVMIExcludedByLabel(readerWith({ "velero.kubevirt.io/exclude": "true" }), "ns", "vm")).unwrap()
    ).toBe(true);
    expect(
      (await isVMIExcludedByLabel(readerWith({ "velero.kubevirt.io/exclude": "false" }), "ns", "vm")).unwrap()
    ).toBe(false);
    expect((await isVMIExcludedByLabel(readerWith({}), "ns", "vm")).unwrap()).toBe(false);
  });

  it("propagates reader failures", async () => {
    const reader: VMIReader = {
      getLabels: async () => Result.err(new StoreUnavailableError({ message: "down" })),
    };

    const result = await isVMIExcludedByLabel(reader, "ns", "vm");
    expect(result.isErr()).toBe(true);
  });
});
