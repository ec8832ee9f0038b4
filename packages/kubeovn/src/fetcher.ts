import { Result } from "better-result";
import {
  StoreUnavailableError,
  type StoreError,
} from "@vmident/errors";
import type { AddressRecord, AddressRecordStore } from "./store.js";

export type AddressRecordStoreFactory = () => Result<
  AddressRecordStore,
  StoreUnavailableError
>;

/**
 * Fetches address records through a store that is only built on first use.
 *
 * A failing factory is not remembered: the next fetch tries again. A factory
 * that throws or a store that rejects is reported as StoreUnavailableError.
 */
export class RecordFetcher {
  private store: AddressRecordStore | null = null;

  constructor(private readonly factory: AddressRecordStoreFactory) {}

  /**
   * Wrap an already constructed store
   */
  static fromStore(store: AddressRecordStore): RecordFetcher {
    return new RecordFetcher(() => Result.ok(store));
  }

  async fetch(identifier: string): Promise<Result<AddressRecord, StoreError>> {
    const store = this.connect(identifier);
    if (store.isErr()) {
      return Result.err(store.error);
    }

    const lookup = await Result.tryPromise({
      try: () => store.unwrap().get(identifier),
      catch: (error) =>
        new StoreUnavailableError({
          message: `address store lookup for ${identifier} failed: ${describe(error)}`,
          identifier,
          cause: error,
        }),
    });
    if (lookup.isErr()) {
      return Result.err(lookup.error);
    }
    return lookup.unwrap();
  }

  private connect(identifier: string): Result<AddressRecordStore, StoreUnavailableError> {
    if (this.store) {
      return Result.ok(this.store);
    }

    const attempt = Result.try({
      try: () => this.factory(),
      catch: (error) => new StoreUnavailableError({ message: describe(error), cause: error }),
    });
    const created: Result<AddressRecordStore, StoreUnavailableError> = attempt.isOk()
      ? attempt.unwrap()
      : Result.err(attempt.error);

    if (created.isErr()) {
      return Result.err(
        new StoreUnavailableError({
          message: `failed to reach the address store for ${identifier}: ${created.error.message}`,
          identifier,
          cause: created.error,
        })
      );
    }

    this.store = created.unwrap();
    return created;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
