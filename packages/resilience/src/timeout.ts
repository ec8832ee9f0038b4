import { Result } from "better-result";
import { TimeoutError } from "@vmident/errors";

export interface TimeoutOptions {
  /** Upper bound for the call in milliseconds */
  timeoutMs: number;
  /** Message of the TimeoutError (default: "Operation timed out after <n>ms") */
  message?: string;
}

/**
 * Runs an async call under a deadline, returning a Result.
 *
 * The deadline timer is unref'd so a pending call never keeps the process
 * alive on its own. A rejection of the call itself is handed to `mapError`.
 *
 * @example
 * ```ts
 * const result = await withTimeout(
 *   () => api.getClusterCustomObject(request),
 *   { timeoutMs: 5000 },
 *   (error) => new StoreUnavailableError({ message: String(error) })
 * );
 * ```
 */
export async function withTimeout<T, E>(
  run: () => Promise<T>,
  options: TimeoutOptions,
  mapError: (error: unknown) => E
): Promise<Result<T, TimeoutError | E>> {
  const message =
    options.message ?? `Operation timed out after ${options.timeoutMs}ms`;

  return Result.tryPromise({
    try: async () => {
      let timeoutId: ReturnType<typeof setTimeout> | undefined;

      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(new TimeoutError({ message }));
        }, options.timeoutMs);
        timeoutId.unref();
      });

      try {
        return await Promise.race([run(), timeoutPromise]);
      } finally {
        clearTimeout(timeoutId);
      }
    },
    catch: (error): TimeoutError | E => {
      if (TimeoutError.is(error)) {
        return error;
      }
      return mapError(error);
    },
  });
}
