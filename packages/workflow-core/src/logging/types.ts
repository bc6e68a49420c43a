/**
 * Logging Types
 *
 * Six-level logger contract shared by every @courierflow package.
 *
 * Log levels (most to least verbose):
 * - DEBUG: State details, snapshot contents
 * - TRACE: Timing of commits and refreshes
 * - INFO: Transitions committed, feeds connected
 * - REPORT: Structured summaries for aggregation
 * - WARN: Ignored pushes, ambiguous data, degraded proof
 * - ERROR: Commit failures that cannot be retried
 */

import type { UnknownRecord } from "../types.js";

export type LogLevel = "DEBUG" | "TRACE" | "INFO" | "REPORT" | "WARN" | "ERROR";

/**
 * Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  TRACE: 1,
  INFO: 2,
  REPORT: 3,
  WARN: 4,
  ERROR: 5,
};

export const LOG_LEVELS: readonly LogLevel[] = ["DEBUG", "TRACE", "INFO", "REPORT", "WARN", "ERROR"];

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * Each method takes a descriptive message plus optional structured data.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("DriverOrders:coordinator", "DEBUG");
 *
 * logger.info("Transition committed", { orderId: "ord-1", to: "pickedUp" });
 * logger.warn("Realtime push ignored", { orderId: "ord-1", reason: "backward" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  trace(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false
 * shouldLog("WARN", "INFO");  // true
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}
