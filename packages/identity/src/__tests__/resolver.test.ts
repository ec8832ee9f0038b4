import { describe, it, expect, vi, afterEach } from "vitest";
import {
  InvalidInputError,
  NamespaceMismatchError,
  RecordNotFoundError,
  ResolutionError,
  StoreUnavailableError,
} from "@vmident/errors";
import { createLogger } from "@vmident/logger";
import { NetworkIdentityResolver } from "../resolver.js";
import { InMemoryAddressStore, fetcherFor, makeVM } from "./helpers.js";

const store = () =>
  new InMemoryAddressStore({
    "test-vm.test-ns": {
      macAddress: "00:00:00:00:00:01",
      ipv4Address: "10.0.0.1",
      ipv6Address: "",
    },
    "test-vm.test-ns.test-nad.test-ns.ovn": {
      macAddress: "00:00:00:00:00:02",
      ipv4Address: "10.0.1.1",
      ipv6Address: "fd00::2",
    },
  });

describe("NetworkIdentityResolver", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("pins the default network of a VM without networks", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveAnnotations(makeVM([]));

    expect(result.unwrap()).toEqual({
      "ovn.kubernetes.io/mac_address": "00:00:00:00:00:01",
      "ovn.kubernetes.io/ip_address": "10.0.0.1",
    });
  });

  it("pins a secondary network and the implicit default network", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveNetInfo(
      makeVM([{ name: "nad", multus: { networkName: "test-ns/test-nad" } }])
    );

    expect(result.unwrap()).toEqual([
      {
        attachmentReference: "test-nad.test-ns.ovn.kubernetes.io",
        macAddress: "00:00:00:00:00:02",
        combinedAddresses: "10.0.1.1,fd00::2",
      },
      {
        attachmentReference: "ovn.kubernetes.io",
        macAddress: "00:00:00:00:00:01",
        combinedAddresses: "10.0.0.1",
      },
    ]);
  });

  it("returns both interfaces as annotations", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveAnnotations(
      makeVM([{ name: "nad", multus: { networkName: "test-ns/test-nad" } }])
    );

    expect(result.unwrap()).toEqual({
      "test-nad.test-ns.ovn.kubernetes.io/mac_address": "00:00:00:00:00:02",
      "test-nad.test-ns.ovn.kubernetes.io/ip_address": "10.0.1.1,fd00::2",
      "ovn.kubernetes.io/mac_address": "00:00:00:00:00:01",
      "ovn.kubernetes.io/ip_address": "10.0.0.1",
    });
  });

  it.each([null, undefined])("rejects a %s VM with InvalidInputError", async (vm) => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveAnnotations(vm);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(InvalidInputError.is(result.error)).toBe(true);
      expect(result.error.message).toBe("VM object is nil");
    }
  });

  it("wraps failures with the VM identity", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveAnnotations(
      makeVM([{ name: "nad", multus: { networkName: "other-ns/test-nad" } }])
    );

    expect(result.isErr()).toBe(true);
    const error = result.isErr() ? result.error : undefined;
    expect(ResolutionError.is(error)).toBe(true);
    if (ResolutionError.is(error)) {
      expect(error.vm).toBe("test-ns/test-vm");
      expect(NamespaceMismatchError.is(error.cause)).toBe(true);
      expect(error.message).toBe(
        "failed to resolve network identity for VM test-ns/test-vm: " +
          "expected NAD to be in the same namespace as the VM, got other-ns for NAD and test-ns for VM"
      );
    }
  });

  it("wraps a missing record", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(new InMemoryAddressStore()));

    const result = await resolver.resolveAnnotations(makeVM([], "web", "prod"));

    const error = result.isErr() ? result.error : undefined;
    expect(ResolutionError.is(error)).toBe(true);
    if (ResolutionError.is(error)) {
      expect(error.vm).toBe("prod/web");
      expect(RecordNotFoundError.is(error.cause)).toBe(true);
    }
  });

  it("wraps a network that is neither pod nor multus", async () => {
    const resolver = new NetworkIdentityResolver(fetcherFor(store()));

    const result = await resolver.resolveAnnotations(makeVM([{ name: "bare" }]));

    const error = result.isErr() ? result.error : undefined;
    expect(ResolutionError.is(error)).toBe(true);
    if (ResolutionError.is(error)) {
      expect(InvalidInputError.is(error.cause)).toBe(true);
    }
  });

  it("wraps a store whose lookups reject", async () => {
    const resolver = new NetworkIdentityResolver(
      fetcherFor({
        get: async () => {
          throw new Error("ECONNRESET");
        },
      })
    );

    const result = await resolver.resolveAnnotations(makeVM());

    const error = result.isErr() ? result.error : undefined;
    expect(ResolutionError.is(error)).toBe(true);
    if (ResolutionError.is(error)) {
      expect(StoreUnavailableError.is(error.cause)).toBe(true);
      expect(error.message).toBe(
        "failed to resolve network identity for VM test-ns/test-vm: address store lookup for test-vm.test-ns failed: ECONNRESET"
      );
    }
  });

  it("logs the resolved attachments at debug level", async () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const logger = createLogger({ correlationId: "test" }, { level: "debug" });
    const resolver = new NetworkIdentityResolver(fetcherFor(store()), logger);

    await resolver.resolveAnnotations(makeVM([]));

    expect(debug).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(debug.mock.calls[0][0]));
    expect(entry.message).toBe("Resolved VM network identity");
    expect(entry.vm).toBe("test-ns/test-vm");
    expect(entry.attachments).toEqual(["ovn.kubernetes.io"]);
  });
});
