// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Structured log sink for dispatcher events.
 *
 * `context` is one of LOG_CONTEXT; `data` carries identities, type tags and
 * serialized errors.
 *
 * @example
 * ```typescript
 * const dispatcher = new Dispatcher({
 *   logger: {
 *     debug: () => {},
 *     info: (context, message, data) => audit.write({ context, message, data }),
 *     warn: (context, message, data) => console.warn(context, message, data),
 *     error: (context, message, data) => alerts.raise({ context, message, data }),
 *   },
 * });
 * ```
 */
export interface LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void;
  info(context: string, message: string, data?: unknown): void;
  warn(context: string, message: string, data?: unknown): void;
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
    console.debug(`[${context}] ${message}`, data);
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data);
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data);
  }
}

export interface LoggerOptions {
  /**
   * Custom log function. When set, console output is skipped.
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

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LEVELS[level] < minLevelValue) return;
    if (options.log) {
      options.log(level, context, message, data);
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
 * Log context constants used by the dispatcher
 *
 * Applications can use these to filter or categorize logs
 */
export const LOG_CONTEXT = {
  REGISTRY: "registry",
  DISPATCH: "dispatch",
  CLAIM: "claim",
  PATHWAY: "pathway",
  LIFECYCLE: "lifecycle",
} as const;
