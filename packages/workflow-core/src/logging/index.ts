/**
 * Logging module.
 *
 * @module @courierflow/core/logging
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export {
  LOG_LEVEL_PRIORITY,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  shouldLog,
  isLogLevel,
} from "./types.js";

// Factories
export {
  createScopedLogger,
  createNoOpLogger,
  createChildLogger,
  TRACE_TIMING,
} from "./scoped.js";
export type { TraceTiming, LogSink, ScopedLoggerOptions } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";

// Transition logging helpers
export type { TransitionLogContext } from "./transitions.js";
export {
  logTransitionRequested,
  logTransitionCommitted,
  logTransitionRejected,
  logTransitionFailed,
} from "./transitions.js";
