/**
 * ## Scoped Loggers
 *
 * Factory for loggers that prefix every line with a scope and drop messages
 * below the configured level.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("DriverOrders:coordinator", "INFO");
 *
 * logger.debug("Snapshot loaded");          // suppressed
 * logger.info("Transition committed");      // [DriverOrders:coordinator] Transition committed
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

/**
 * The subset of `console` the scoped logger writes to.
 */
export interface LogSink {
  log: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
  time: (label: string) => void;
  timeEnd: (label: string) => void;
}

/**
 * Resolved on every call so tests can replace globalThis.console after import.
 */
function runtimeSink(): LogSink {
  return globalThis.console;
}

/**
 * Values for the `timing` field of trace data.
 */
export const TRACE_TIMING = {
  START: "start",
  END: "end",
} as const;
export type TraceTiming = (typeof TRACE_TIMING)[keyof typeof TRACE_TIMING];

export interface ScopedLoggerOptions {
  /**
   * Where lines are written. Defaults to the global console.
   */
  sink?: LogSink;

  /**
   * Clock used for REPORT timestamps.
   */
  now?: () => number;
}

/**
 * Create a scoped logger with level filtering.
 *
 * TRACE with `{ timing: "start" | "end" }` uses console.time / timeEnd;
 * REPORT writes a single JSON object for log aggregation.
 */
export function createScopedLogger(
  scope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL,
  options: ScopedLoggerOptions = {}
): Logger {
  const prefix = `[${scope}]`;
  const sink = (): LogSink => options.sink ?? runtimeSink();
  const now = options.now ?? Date.now;

  const format = (message: string, data?: UnknownRecord): string => {
    if (data && Object.keys(data).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(data)}`;
    }
    return `${prefix} ${message}`;
  };

  return {
    debug(message, data) {
      if (shouldLog("DEBUG", level)) sink().debug(format(message, data));
    },

    trace(message, data) {
      if (!shouldLog("TRACE", level)) return;
      const timing = data?.["timing"];
      if (timing === TRACE_TIMING.START) {
        sink().time(`${prefix} ${message}`);
      } else if (timing === TRACE_TIMING.END) {
        sink().timeEnd(`${prefix} ${message}`);
      } else {
        sink().debug(format(message, data));
      }
    },

    info(message, data) {
      if (shouldLog("INFO", level)) sink().info(format(message, data));
    },

    report(message, data) {
      if (shouldLog("REPORT", level)) {
        sink().log(JSON.stringify({ scope, message, ...data, timestamp: now() }));
      }
    },

    warn(message, data) {
      if (shouldLog("WARN", level)) sink().warn(format(message, data));
    },

    error(message, data) {
      if (shouldLog("ERROR", level)) sink().error(format(message, data));
    },
  };
}

/**
 * Logger that discards everything. Used as the default when a component
 * is constructed without one.
 */
export function createNoOpLogger(): Logger {
  return {
    debug: () => {},
    trace: () => {},
    info: () => {},
    report: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * Create a logger scoped `parentScope:childScope`.
 *
 * @example
 * ```typescript
 * createChildLogger("DriverOrders", "normalize"); // [DriverOrders:normalize]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL,
  options: ScopedLoggerOptions = {}
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level, options);
}
