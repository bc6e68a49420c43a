/**
 * @module @courierflow/core/outcome
 */

export type { Outcome, OutcomeSuccess, OutcomeRejected, OutcomeFailed } from "./types.js";
export { success, rejected, failed, isSuccess, isRejected, isFailed } from "./types.js";
