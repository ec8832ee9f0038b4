/**
 * Address record store backed by Kube-OVN IP custom resources
 *
 * Kube-OVN keeps one cluster-scoped `ips.kubeovn.io` object per interface,
 * named after the pod (or VM) and the attachment, e.g. `web.prod` or
 * `web.prod.vlan10.prod.ovn`.
 */

import { Result } from "better-result";
import { Type } from "@sinclair/typebox";
import {
  RecordNotFoundError,
  StoreUnavailableError,
  TimeoutError,
  validate,
  type InvalidInputError,
  type StoreError,
} from "@vmident/errors";
import { withTimeout } from "@vmident/resilience";
import type { AddressRecord, AddressRecordStore } from "./store.js";

export const KUBEOVN_GROUP = "kubeovn.io";
export const KUBEOVN_VERSION = "v1";
export const IP_PLURAL = "ips";

export interface ClusterCustomObjectRequest {
  group: string;
  version: string;
  plural: string;
  name: string;
}

/**
 * The slice of `CustomObjectsApi` the store needs
 */
export interface ClusterCustomObjectReader {
  getClusterCustomObject(request: ClusterCustomObjectRequest): Promise<unknown>;
}

export interface KubeOvnIPStoreOptions {
  /** Deadline for one IP lookup in milliseconds (default: 10000) */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * HTTP status carried by a Kubernetes client failure, if any
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }
  if (typeof error.code === "number") {
    return error.code;
  }
  if (typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const IPResourceSchema = Type.Object({
  spec: Type.Optional(
    Type.Object({
      macAddress: Type.Optional(Type.String()),
      v4IpAddress: Type.Optional(Type.String()),
      v6IpAddress: Type.Optional(Type.String()),
    })
  ),
});

/**
 * Read the address fields of an IP resource; absent fields are empty strings
 */
export function decodeIPResource(body: unknown): Result<AddressRecord, InvalidInputError> {
  const decoded = validate(IPResourceSchema, body);
  if (decoded.isErr()) {
    return Result.err(decoded.error);
  }

  const spec = decoded.unwrap().spec ?? {};
  return Result.ok({
    macAddress: spec.macAddress ?? "",
    ipv4Address: spec.v4IpAddress ?? "",
    ipv6Address: spec.v6IpAddress ?? "",
  });
}

type LookupFailure = RecordNotFoundError | StoreUnavailableError;

export class KubeOvnIPStore implements AddressRecordStore {
  private readonly timeoutMs: number;

  constructor(
    private readonly api: ClusterCustomObjectReader,
    options: KubeOvnIPStoreOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async get(identifier: string): Promise<Result<AddressRecord, StoreError>> {
    const response = await withTimeout(
      () =>
        this.api.getClusterCustomObject({
          group: KUBEOVN_GROUP,
          version: KUBEOVN_VERSION,
          plural: IP_PLURAL,
          name: identifier,
        }),
      {
        timeoutMs: this.timeoutMs,
        message: `IP lookup for ${identifier} timed out after ${this.timeoutMs}ms`,
      },
      (error): LookupFailure => {
        if (statusCodeOf(error) === 404) {
          return new RecordNotFoundError({
            message: `IP resource ${identifier} not found`,
            identifier,
          });
        }
        return new StoreUnavailableError({
          message: `failed to retrieve IP resource ${identifier}: ${describe(error)}`,
          identifier,
          cause: error,
        });
      }
    );

    if (response.isErr()) {
      const error = response.error;
      if (TimeoutError.is(error)) {
        return Result.err(
          new StoreUnavailableError({
            message: error.message,
            identifier,
            cause: error,
          })
        );
      }
      return Result.err(error);
    }

    const record = decodeIPResource(response.unwrap());
    if (record.isErr()) {
      return Result.err(
        new StoreUnavailableError({
          message: `IP resource ${identifier} has an unexpected shape: ${record.error.message}`,
          identifier,
          cause: record.error,
        })
      );
    }

    return Result.ok(record.unwrap());
  }
}
