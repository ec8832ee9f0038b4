/**
 * @vmident/logger
 *
 * Structured logging with correlation IDs, one JSON line per entry
 */

import { customAlphabet } from "nanoid";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  correlationId: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped (default: "info") */
  level?: LogLevel;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  correlationId: string;
  message: string;
  [key: string]: unknown;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a structured logger with correlation ID support
 */
export function createLogger(
  context: LogContext,
  options: LoggerOptions = {}
): Logger {
  const minLevel = LOG_LEVELS.indexOf(options.level ?? "info");

  const enabled = (level: LogLevel): boolean =>
    LOG_LEVELS.indexOf(level) >= minLevel;

  const formatLog = (
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>
  ): string => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: context.correlationId,
      message,
      ...Object.fromEntries(
        Object.entries(context).filter(([key]) => key !== "correlationId")
      ),
      ...meta,
    };
    return JSON.stringify(entry);
  };

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) console.debug(formatLog("debug", msg, meta));
    },
    info: (msg, meta) => {
      if (enabled("info")) console.info(formatLog("info", msg, meta));
    },
    warn: (msg, meta) => {
      if (enabled("warn")) console.warn(formatLog("warn", msg, meta));
    },
    error: (msg, meta) => {
      if (enabled("error")) console.error(formatLog("error", msg, meta));
    },
    child: (childContext) =>
      createLogger(
        {
          ...context,
          ...childContext,
          correlationId:
            typeof childContext.correlationId === "string"
              ? childContext.correlationId
              : context.correlationId,
        },
        options
      ),
  };
}

const correlationSuffix = customAlphabet("0123456789abcdefghijklmnopqrstuvwxyz", 8);

/**
 * Generate a unique correlation ID, one per backup item execution
 */
export function generateCorrelationId(): string {
  return `bk_${Date.now().toString(36)}_${correlationSuffix()}`;
}
