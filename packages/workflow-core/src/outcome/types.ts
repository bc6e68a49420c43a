/**
 * ## Outcomes - Success, Rejection, Failure
 *
 * Operations that may refuse to act or may fail remotely return an
 * `Outcome` instead of throwing.
 *
 * | Variant | Meaning |
 * |---------|---------|
 * | `OutcomeSuccess` | The operation took effect |
 * | `OutcomeRejected` | Refused locally (validation); nothing was attempted |
 * | `OutcomeFailed` | Attempted and failed; carries a typed failure detail |
 *
 * @example
 * ```typescript
 * const outcome = await coordinator.performAction(orderId, "confirmPickup", proof);
 *
 * switch (outcome.status) {
 *   case "success":
 *     return showStatus(outcome.data.status);
 *   case "rejected":
 *     return showValidationError(outcome.message);
 *   case "failed":
 *     return outcome.failure.requiresRefresh ? offerRefresh() : showError(outcome.reason);
 * }
 * ```
 */

import type { UnknownRecord } from "../types.js";

export interface OutcomeSuccess<TData> {
  status: "success";
  data: TData;
}

export interface OutcomeRejected<TCode extends string = string> {
  status: "rejected";

  /**
   * Machine-readable reason (e.g., "COMMIT_IN_PROGRESS").
   */
  code: TCode;

  /**
   * Human-readable explanation.
   */
  message: string;

  context?: UnknownRecord;
}

export interface OutcomeFailed<TFailure> {
  status: "failed";

  reason: string;

  failure: TFailure;

  context?: UnknownRecord;
}

export type Outcome<TData, TFailure = unknown, TCode extends string = string> =
  | OutcomeSuccess<TData>
  | OutcomeRejected<TCode>
  | OutcomeFailed<TFailure>;

export function success<TData>(data: TData): OutcomeSuccess<TData> {
  return { status: "success", data };
}

export function rejected<TCode extends string>(
  code: TCode,
  message: string,
  context?: UnknownRecord
): OutcomeRejected<TCode> {
  const result: OutcomeRejected<TCode> = { status: "rejected", code, message };
  if (context !== undefined) {
    result.context = context;
  }
  return result;
}

export function failed<TFailure>(
  reason: string,
  failure: TFailure,
  context?: UnknownRecord
): OutcomeFailed<TFailure> {
  const result: OutcomeFailed<TFailure> = { status: "failed", reason, failure };
  if (context !== undefined) {
    result.context = context;
  }
  return result;
}

export function isSuccess<TData, TFailure, TCode extends string>(
  outcome: Outcome<TData, TFailure, TCode>
): outcome is OutcomeSuccess<TData> {
  return outcome.status === "success";
}

export function isRejected<TData, TFailure, TCode extends string>(
  outcome: Outcome<TData, TFailure, TCode>
): outcome is OutcomeRejected<TCode> {
  return outcome.status === "rejected";
}

export function isFailed<TData, TFailure, TCode extends string>(
  outcome: Outcome<TData, TFailure, TCode>
): outcome is OutcomeFailed<TFailure> {
  return outcome.status === "failed";
}
