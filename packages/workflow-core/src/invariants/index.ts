/**
 * Declarative invariant framework.
 *
 * @module @courierflow/core/invariants
 */

export { InvariantError } from "./InvariantError.js";
export { createInvariant } from "./createInvariant.js";
export type { InvariantConfig } from "./createInvariant.js";
export { createInvariantSet } from "./createInvariantSet.js";
export type {
  Invariant,
  InvariantErrorConstructor,
  InvariantResult,
  InvariantSet,
  InvariantSetResult,
  InvariantViolation,
} from "./types.js";
