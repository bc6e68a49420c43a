/**
 * ## Order Repository Contract
 *
 * The only collaborator that talks to the backend. Commits are
 * compare-and-set: `fromStatus` is the status the caller believes is current,
 * and a mismatch comes back as `Conflict` rather than overwriting.
 */

import {
  createNoOpLogger,
  logTransitionRejected,
  type InvariantViolation,
  type Logger,
} from "@courierflow/core";
import {
  checkCommitProof,
  DEFAULT_CONFIRMATION_LIMITS,
  type Confirmation,
  type ConfirmationLimits,
} from "./confirmation.js";
import { createCommitError, type CommitError } from "./errors.js";
import type { DriverOrder } from "./order.js";
import { driverOrderStateMachine, type DriverOrderStateMachine } from "./stateMachine.js";
import type { DriverOrderStatus } from "./status.js";

export type CommitResult =
  | { ok: true; status: DriverOrderStatus }
  | { ok: false; error: CommitError };

export interface OrderRepository {
  /**
   * Move an order from `fromStatus` to `toStatus`, attaching proof for
   * pickup and delivery. Never throws for expected failures.
   */
  commitStatus(
    orderId: string,
    fromStatus: DriverOrderStatus,
    toStatus: DriverOrderStatus,
    proof?: Confirmation
  ): Promise<CommitResult>;

  fetchOrder(orderId: string): Promise<DriverOrder | null>;
}

export interface GuardedRepositoryOptions {
  stateMachine?: DriverOrderStateMachine;
  limits?: ConfirmationLimits;
  logger?: Logger;
}

/**
 * Wrap a repository so every commit is re-validated before it leaves the
 * process: the transition must be driver-committable and the proof must pass
 * the confirmation gate. Refused commits never reach `inner`.
 */
export function createGuardedOrderRepository(
  inner: OrderRepository,
  options: GuardedRepositoryOptions = {}
): OrderRepository {
  const stateMachine = options.stateMachine ?? driverOrderStateMachine;
  const limits = options.limits ?? DEFAULT_CONFIRMATION_LIMITS;
  const logger = options.logger ?? createNoOpLogger();

  function refuse(
    orderId: string,
    fromStatus: DriverOrderStatus,
    toStatus: DriverOrderStatus,
    code: string,
    violations: InvariantViolation[]
  ): CommitResult {
    const message = violations.map((violation) => violation.message).join("; ");
    logTransitionRejected(
      logger,
      { entityId: orderId, from: fromStatus, to: toStatus, guard: "repository" },
      { code, message }
    );
    return {
      ok: false,
      error: createCommitError("ValidationFailed", message, {
        violations,
        context: { orderId, fromStatus, toStatus },
      }),
    };
  }

  return {
    async commitStatus(orderId, fromStatus, toStatus, proof) {
      const transition = stateMachine.validateTransition(fromStatus, toStatus);
      if (!transition.isValid) {
        return refuse(orderId, fromStatus, toStatus, transition.code, [
          { code: transition.code, message: transition.errorMessage },
        ]);
      }

      const proofCheck = checkCommitProof(orderId, fromStatus, toStatus, proof, limits);
      if (!proofCheck.valid) {
        const [first] = proofCheck.violations;
        return refuse(
          orderId,
          fromStatus,
          toStatus,
          first?.code ?? "PROOF_INVALID",
          proofCheck.violations
        );
      }

      return inner.commitStatus(orderId, fromStatus, toStatus, proof);
    },

    fetchOrder(orderId) {
      return inner.fetchOrder(orderId);
    },
  };
}
