// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in the streaming gateway.
 *
 * Allows applications to integrate their own logging solutions (Winston, Pino,
 * structured logging services) instead of console output.
 *
 * @example
 * ```typescript
 * import { StreamGateway, type LoggerAdapter } from "@entity-stream/core";
 *
 * class MyLogger implements LoggerAdapter {
 *   debug(context: string, message: string, data?: unknown) {
 *     console.debug(`[${context}] ${message}`, data);
 *   }
 *   info(context: string, message: string, data?: unknown) {
 *     console.log(`[${context}] ${message}`, data);
 *   }
 *   warn(context: string, message: string, data?: unknown) {
 *     console.warn(`[${context}] ${message}`, data);
 *   }
 *   error(context: string, message: string, data?: unknown) {
 *     console.error(`[${context}] ${message}`, data);
 *   }
 * }
 *
 * const gateway = new StreamGateway({ broker, logger: new MyLogger() });
 * ```
 */
export interface LoggerAdapter {
  /**
   * Log a debug-level message
   *
   * @param context - Category or source of the log (e.g., "connection", "broker")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  /**
   * Log an info-level message
   */
  info(context: string, message: string, data?: unknown): void;

  /**
   * Log a warning-level message
   */
  warn(context: string, message: string, data?: unknown): void;

  /**
   * Log an error-level message
   *
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Default logger adapter that uses console methods
 *
 * @internal
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data ?? "");
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data ?? "");
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data ?? "");
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data ?? "");
  }
}

export interface LoggerOptions {
  /**
   * Custom log sink. When set, it receives every record at or above
   * `minLevel` and console output is skipped.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger adapter with custom configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({
 *   minLevel: "info",
 *   log: (level, context, message, data) => {
 *     logService.log({ level, context, message, data, timestamp: new Date() });
 *   },
 * });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LEVELS[options.minLevel ?? "debug"];
  const fallback = new DefaultLoggerAdapter();
  const sink = options.log;

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (sink) {
      sink(level, context, message, data);
      return;
    }
    fallback[level](context, message, data);
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Logger that discards everything. Useful as a default in tests.
 */
export const silentLogger: LoggerAdapter = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/**
 * Log context constants used across the streaming packages.
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  SUBSCRIPTION: "subscription",
  PUBLISH: "publish",
  BROKER: "broker",
  FANOUT: "fanout",
  AUTH: "auth",
  ENTITY_EVENT: "entity-event",
  SERVER: "server",
} as const;
