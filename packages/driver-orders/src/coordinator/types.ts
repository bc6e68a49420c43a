/**
 * Types for the driver order coordinator.
 */

import type { ConfirmationErrorCode } from "../confirmation.js";
import type { Logger, Outcome } from "@courierflow/core";
import type { DriverOrderAction } from "../actions.js";
import type { WorkflowConfig } from "../config.js";
import type { CommitError } from "../errors.js";
import type { DriverOrder } from "../order.js";
import type { OrderRepository } from "../repository.js";
import type { DriverOrderStateMachine, TransitionErrorCode } from "../stateMachine.js";
import type { DriverOrderStatus } from "../status.js";

export interface CoordinatorDependencies {
  repository: OrderRepository;
  stateMachine?: DriverOrderStateMachine;
  config?: WorkflowConfig;
  /**
   * Defaults to a console logger scoped `DriverOrders:coordinator` at
   * `config.logLevel`.
   */
  logger?: Logger;
  now?: () => Date;
}

/**
 * What the driver's screen shows for one order.
 */
export interface OrderSnapshot {
  orderId: string;
  order: DriverOrder;
  /** Status to display; equals `pendingStatus` while an optimistic commit runs */
  status: DriverOrderStatus;
  /** Last status the backend confirmed */
  confirmedStatus: DriverOrderStatus;
  /** Target of the commit in flight */
  pendingStatus: DriverOrderStatus | null;
  isCommitting: boolean;
  availableActions: readonly DriverOrderAction[];
  instructions: string;
  lastError: CommitError | null;
  updatedAt: Date;
}

export type SnapshotChangeReason =
  | "tracked"
  | "optimistic"
  | "committed"
  | "rolled_back"
  | "remote"
  | "refreshed"
  | "untracked";

export interface SnapshotChange {
  orderId: string;
  snapshot: OrderSnapshot;
  reason: SnapshotChangeReason;
}

export type SnapshotListener = (change: SnapshotChange) => void;

export type ActionRejectionCode =
  | "ORDER_NOT_TRACKED"
  | "COMMIT_IN_PROGRESS"
  | "ACTION_NOT_AVAILABLE"
  | "ACTION_HAS_NO_TRANSITION"
  | TransitionErrorCode
  | ConfirmationErrorCode;

export interface ActionSuccess {
  status: DriverOrderStatus;
  snapshot: OrderSnapshot;
}

export interface ActionFailure {
  error: CommitError;
  retryable: boolean;
  requiresRefresh: boolean;
  /** Status adopted from the backend after a conflict, when the re-fetch worked */
  refreshedStatus: DriverOrderStatus | null;
  snapshot: OrderSnapshot;
}

export type ActionOutcome = Outcome<ActionSuccess, ActionFailure, ActionRejectionCode>;

/**
 * What happened to a realtime push.
 */
export type RemoteUpdateResult = "applied" | "deferred" | "ignored" | "not_tracked";
