/**
 * Transition logging helpers.
 *
 * Keep the wording of workflow log lines identical across the coordinator,
 * the guarded repository and anything else that moves an entity between
 * states, so log searches work on one vocabulary.
 *
 * @example
 * ```typescript
 * const context = { orderId: "ord-1", action: "confirmPickup", from: "arrivedAtVendor", to: "pickedUp" };
 *
 * logTransitionRequested(logger, context);
 * logTransitionCommitted(logger, context);
 * ```
 */

import type { Logger } from "./types.js";

export type TransitionLogContext = {
  /** Entity being moved */
  entityId: string;
  from: string;
  to: string;
  [key: string]: unknown;
};

export function logTransitionRequested(logger: Logger, context: TransitionLogContext): void {
  logger.debug("Transition requested", context);
}

export function logTransitionCommitted(logger: Logger, context: TransitionLogContext): void {
  logger.info("Transition committed", context);
}

/**
 * Local rejection (validation); nothing was sent anywhere.
 */
export function logTransitionRejected(
  logger: Logger,
  context: TransitionLogContext,
  reason: { code: string; message: string }
): void {
  logger.warn("Transition rejected", {
    ...context,
    rejectionCode: reason.code,
    rejectionMessage: reason.message,
  });
}

/**
 * Remote failure with a classified kind. Retryable failures are warnings,
 * everything else is an error.
 */
export function logTransitionFailed(
  logger: Logger,
  context: TransitionLogContext,
  failure: { kind: string; message: string; retryable: boolean }
): void {
  const data = {
    ...context,
    failureKind: failure.kind,
    failureMessage: failure.message,
    retryable: failure.retryable,
  };
  if (failure.retryable) {
    logger.warn("Transition failed", data);
  } else {
    logger.error("Transition failed", data);
  }
}
