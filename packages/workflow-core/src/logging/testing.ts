/**
 * Testing utilities for logging.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const coordinator = createDriverOrderCoordinator({ repository, logger });
 *
 * await coordinator.performAction("ord-1", "navigateToVendor");
 *
 * expect(logger.hasLoggedAt("INFO", "Transition committed")).toBe(true);
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

/**
 * A single log call captured by the mock logger.
 */
export interface LogCall {
  level: LogLevel;
  message: string;
  /** undefined when the call passed no data */
  data: UnknownRecord | undefined;
}

export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;

  clear(): void;

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;

  /**
   * Substring match against every captured message.
   */
  hasLoggedMessage(message: string): boolean;

  hasLoggedAt(level: LogLevel, message: string): boolean;

  getLastCallAt(level: LogLevel): LogCall | undefined;
}

/**
 * Create a mock logger that records every call.
 */
export function createMockLogger(): MockLogger {
  const calls: LogCall[] = [];

  const record =
    (level: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      calls.push({ level, message, data });
    };

  return {
    get calls(): ReadonlyArray<LogCall> {
      return calls;
    },

    clear(): void {
      calls.length = 0;
    },

    getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall> {
      return calls.filter((call) => call.level === level);
    },

    hasLoggedMessage(message: string): boolean {
      return calls.some((call) => call.message.includes(message));
    },

    hasLoggedAt(level: LogLevel, message: string): boolean {
      return calls.some((call) => call.level === level && call.message.includes(message));
    },

    getLastCallAt(level: LogLevel): LogCall | undefined {
      const levelCalls = calls.filter((call) => call.level === level);
      return levelCalls[levelCalls.length - 1];
    },

    debug: record("DEBUG"),
    trace: record("TRACE"),
    info: record("INFO"),
    report: record("REPORT"),
    warn: record("WARN"),
    error: record("ERROR"),
  };
}
