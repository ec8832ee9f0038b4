import { Result } from "better-result";
import { InvalidInputError } from "@vmident/errors";
import { isLogLevel, type LogLevel } from "@vmident/logger";

export interface PluginConfig {
  /** Explicit kubeconfig; the client's default lookup applies when unset */
  kubeconfigPath?: string;
  /** Deadline for one Kubernetes lookup */
  storeTimeoutMs: number;
  logLevel: LogLevel;
}

const DEFAULT_STORE_TIMEOUT_MS = 10_000;
const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Read the plugin configuration from environment variables:
 * KUBECONFIG, VMIDENT_STORE_TIMEOUT_MS, VMIDENT_LOG_LEVEL
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<PluginConfig, InvalidInputError> {
  const rawTimeout = env.VMIDENT_STORE_TIMEOUT_MS;
  let storeTimeoutMs = DEFAULT_STORE_TIMEOUT_MS;
  if (rawTimeout !== undefined && rawTimeout !== "") {
    storeTimeoutMs = Number(rawTimeout);
    if (!Number.isInteger(storeTimeoutMs) || storeTimeoutMs <= 0) {
      return Result.err(
        new InvalidInputError({
          message: `VMIDENT_STORE_TIMEOUT_MS must be a positive integer, got '${rawTimeout}'`,
        })
      );
    }
  }

  const rawLevel = env.VMIDENT_LOG_LEVEL;
  let logLevel = DEFAULT_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel !== "") {
    if (!isLogLevel(rawLevel)) {
      return Result.err(
        new InvalidInputError({
          message: `VMIDENT_LOG_LEVEL must be one of debug, info, warn, error, got '${rawLevel}'`,
        })
      );
    }
    logLevel = rawLevel;
  }

  const kubeconfigPath = env.KUBECONFIG;

  return Result.ok({
    kubeconfigPath: kubeconfigPath === "" ? undefined : kubeconfigPath,
    storeTimeoutMs,
    logLevel,
  });
}
