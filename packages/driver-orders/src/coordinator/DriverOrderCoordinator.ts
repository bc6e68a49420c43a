/**
 * ## DriverOrderCoordinator - One Writer per Order
 *
 * Holds the status of every order the driver is working on and is the only
 * place that moves it. Driver actions, commit results and realtime pushes
 * all pass through here, so they cannot interleave.
 *
 * ### performAction Steps
 *
 * | Step | Action | On failure |
 * |------|--------|------------|
 * | 1 | Order tracked, no commit in flight | `rejected` |
 * | 2 | Action has a transition | `rejected` |
 * | 3 | `validateTransition`, action available | `rejected` with the rule's code |
 * | 4 | Confirmation gate | `rejected` with the proof code |
 * | 5 | Optimistic status (if enabled) | - |
 * | 6 | `repository.commitStatus` | see below |
 * | 7 | Apply any push that arrived meanwhile | - |
 *
 * Commit failures that require a refresh (`AlreadyCompleted`, `Conflict`)
 * re-fetch the order and adopt the backend's status. Every other failure
 * rolls back to the last confirmed status.
 *
 * ### Realtime Pushes
 *
 * The backend wins. A push is checked with `validateAuthoritativeTransition`
 * against the confirmed status; backward or stale pushes are dropped with a
 * warning. A push that arrives while a commit is in flight is held and
 * applied once the commit settles.
 *
 * @example
 * ```typescript
 * const coordinator = createDriverOrderCoordinator({
 *   repository: createGuardedOrderRepository(httpRepository),
 *   config: loadWorkflowConfig(process.env),
 * });
 *
 * coordinator.track(order);
 * coordinator.connect(feed);
 *
 * const outcome = await coordinator.performAction(order.id, "navigateToVendor");
 * ```
 */

import {
  createScopedLogger,
  failed,
  generateId,
  logTransitionCommitted,
  logTransitionFailed,
  logTransitionRejected,
  logTransitionRequested,
  rejected,
  success,
  type Logger,
  type TransitionLogContext,
} from "@courierflow/core";
import { DriverOrderAction } from "../actions.js";
import { DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from "../config.js";
import { checkCommitProof, exceedsPreferredAccuracy, type Confirmation } from "../confirmation.js";
import {
  ALREADY_COMPLETED_MESSAGE,
  CONFLICT_MESSAGE,
  classifyCommitFailure,
  userMessageFor,
  type CommitError,
} from "../errors.js";
import type { DriverOrder } from "../order.js";
import type { OrderStatusEvent, RealtimeFeed, Unsubscribe } from "../realtime.js";
import type { CommitResult, OrderRepository } from "../repository.js";
import { driverOrderStateMachine, type DriverOrderStateMachine } from "../stateMachine.js";
import { getStatusDisplayName, type DriverOrderStatus } from "../status.js";
import type {
  ActionOutcome,
  ActionRejectionCode,
  CoordinatorDependencies,
  OrderSnapshot,
  RemoteUpdateResult,
  SnapshotChangeReason,
  SnapshotListener,
} from "./types.js";

export const COORDINATOR_LOG_SCOPE = "DriverOrders:coordinator";

interface InFlightCommit {
  commitId: string;
  target: DriverOrderStatus;
}

interface TrackedOrder {
  order: DriverOrder;
  confirmed: DriverOrderStatus;
  displayed: DriverOrderStatus;
  inFlight: InFlightCommit | null;
  /** Bumped whenever a commit starts or the confirmed status changes */
  revision: number;
  /** Latest push received while a commit was in flight */
  heldPush: OrderStatusEvent | null;
  lastObservedAt: Date | null;
  lastError: CommitError | null;
  updatedAt: Date;
}

export class DriverOrderCoordinator {
  private readonly repository: OrderRepository;
  private readonly stateMachine: DriverOrderStateMachine;
  private readonly config: WorkflowConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  private readonly orders = new Map<string, TrackedOrder>();
  private readonly listeners = new Set<SnapshotListener>();
  private readonly feedSubscriptions = new Set<Unsubscribe>();

  constructor(deps: CoordinatorDependencies) {
    this.repository = deps.repository;
    this.stateMachine = deps.stateMachine ?? driverOrderStateMachine;
    this.config = deps.config ?? DEFAULT_WORKFLOW_CONFIG;
    this.logger = deps.logger ?? createScopedLogger(COORDINATOR_LOG_SCOPE, this.config.logLevel);
    this.now = deps.now ?? (() => new Date());
  }

  // ==========================================================================
  // Tracking
  // ==========================================================================

  /**
   * Start tracking an order. Tracking an order again refreshes its details
   * and treats its status as a backend update.
   */
  track(order: DriverOrder): OrderSnapshot {
    const existing = this.orders.get(order.id);
    if (existing) {
      existing.order = { ...order, status: existing.order.status };
      this.applyRemoteStatus({ orderId: order.id, status: order.status, observedAt: this.now() });
      return this.snapshotOf(order.id, existing);
    }

    const entry: TrackedOrder = {
      order,
      confirmed: order.status,
      displayed: order.status,
      inFlight: null,
      revision: 0,
      heldPush: null,
      lastObservedAt: null,
      lastError: null,
      updatedAt: this.now(),
    };
    this.orders.set(order.id, entry);
    this.logger.debug("Order tracked", { orderId: order.id, status: order.status });
    return this.publish(order.id, entry, "tracked");
  }

  untrack(orderId: string): boolean {
    const entry = this.orders.get(orderId);
    if (!entry) return false;

    this.orders.delete(orderId);
    this.logger.debug("Order untracked", { orderId, status: entry.confirmed });
    this.publish(orderId, entry, "untracked");
    return true;
  }

  getSnapshot(orderId: string): OrderSnapshot | null {
    const entry = this.orders.get(orderId);
    return entry ? this.snapshotOf(orderId, entry) : null;
  }

  trackedOrderIds(): string[] {
    return [...this.orders.keys()];
  }

  subscribe(listener: SnapshotListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Driver actions
  // ==========================================================================

  async performAction(
    orderId: string,
    action: DriverOrderAction,
    proof?: Confirmation
  ): Promise<ActionOutcome> {
    const entry = this.orders.get(orderId);
    if (!entry) {
      return this.reject(
        { entityId: orderId, from: "unknown", to: "unknown", action },
        "ORDER_NOT_TRACKED",
        `Order ${orderId} is not being tracked`
      );
    }

    const from = entry.confirmed;
    const to = this.stateMachine.mapActionToTargetStatus(action);
    const logContext: TransitionLogContext = { entityId: orderId, from, to, action };

    if (entry.inFlight) {
      return this.reject(
        { ...logContext, commitId: entry.inFlight.commitId },
        "COMMIT_IN_PROGRESS",
        `An update for order ${orderId} is already in progress`
      );
    }

    const available = this.stateMachine.getAvailableActions(from).includes(action);
    const notAvailable = `${action} is not available while the order is ${getStatusDisplayName(from)}`;

    if (action === DriverOrderAction.reportIssue) {
      return available
        ? this.reject(
            logContext,
            "ACTION_HAS_NO_TRANSITION",
            "Reporting an issue does not change the order status"
          )
        : this.reject(logContext, "ACTION_NOT_AVAILABLE", notAvailable);
    }

    const transition = this.stateMachine.validateTransition(from, to);
    if (!transition.isValid) {
      return this.reject(logContext, transition.code, transition.errorMessage);
    }

    if (!available) {
      return this.reject(logContext, "ACTION_NOT_AVAILABLE", notAvailable);
    }

    const proofCheck = checkCommitProof(orderId, from, to, proof, this.config);
    if (!proofCheck.valid) {
      const [first] = proofCheck.violations;
      return this.reject(
        logContext,
        first.code,
        proofCheck.violations.map((violation) => violation.message).join("; "),
        { violations: proofCheck.violations }
      );
    }
    if (proof && exceedsPreferredAccuracy(proof, this.config)) {
      this.logger.warn("Confirmation location is less accurate than preferred", {
        orderId,
        accuracy: proof.location?.accuracy,
        preferredLocationAccuracyMeters: this.config.preferredLocationAccuracyMeters,
      });
    }

    const commitId = generateId("driver", "commit");
    const commitContext: TransitionLogContext = { ...logContext, commitId };
    entry.inFlight = { commitId, target: to };
    entry.revision += 1;
    logTransitionRequested(this.logger, commitContext);

    if (this.config.optimisticUpdates) {
      entry.displayed = to;
      this.publish(orderId, entry, "optimistic");
    }

    const result = await this.commit(orderId, from, to, proof);

    if (this.orders.get(orderId) !== entry) {
      // Untracked while the commit was running; nothing left to update
      entry.inFlight = null;
      return result.ok
        ? success({ status: result.status, snapshot: this.snapshotOf(orderId, entry) })
        : this.fail(commitContext, entry, result.error, null);
    }

    if (result.ok) {
      entry.inFlight = null;
      entry.revision += 1;
      entry.confirmed = result.status;
      entry.displayed = result.status;
      entry.order = { ...entry.order, status: result.status };
      entry.lastError = null;
      logTransitionCommitted(this.logger, { ...commitContext, to: result.status });
      this.publish(orderId, entry, "committed");
      this.releaseHeldPush(entry);
      return success({ status: result.status, snapshot: this.snapshotOf(orderId, entry) });
    }

    const error = result.error;
    entry.lastError = error;

    if (error.requiresRefresh) {
      const refreshed = await this.refetch(orderId);
      entry.inFlight = null;
      if (refreshed) {
        this.adopt(entry, refreshed);
        this.publish(orderId, entry, "refreshed");
      } else {
        entry.displayed = entry.confirmed;
        this.publish(orderId, entry, "rolled_back");
      }
      this.releaseHeldPush(entry);
      return this.fail(commitContext, entry, error, refreshed ? refreshed.status : null);
    }

    entry.inFlight = null;
    entry.displayed = entry.confirmed;
    this.publish(orderId, entry, "rolled_back");
    this.releaseHeldPush(entry);
    return this.fail(commitContext, entry, error, null);
  }

  /**
   * Re-fetch an order and adopt whatever the backend holds. Skipped while a
   * commit is in flight, and discarded if a commit or push settled while the
   * fetch was running.
   */
  async refresh(orderId: string): Promise<OrderSnapshot | null> {
    const entry = this.orders.get(orderId);
    if (!entry) return null;
    if (entry.inFlight) {
      this.logger.debug("Refresh skipped during commit", { orderId });
      return this.snapshotOf(orderId, entry);
    }

    const revision = entry.revision;
    const refreshed = await this.refetch(orderId);
    if (this.orders.get(orderId) !== entry) return null;
    if (entry.inFlight || entry.revision !== revision) {
      this.logger.debug("Stale refresh discarded", {
        orderId,
        fetchedStatus: refreshed ? refreshed.status : null,
        confirmedStatus: entry.confirmed,
      });
      return this.snapshotOf(orderId, entry);
    }
    if (refreshed) {
      this.adopt(entry, refreshed);
      return this.publish(orderId, entry, "refreshed");
    }
    return this.snapshotOf(orderId, entry);
  }

  // ==========================================================================
  // Realtime
  // ==========================================================================

  applyRemoteStatus(event: OrderStatusEvent): RemoteUpdateResult {
    const entry = this.orders.get(event.orderId);
    if (!entry) {
      this.logger.debug("Realtime push for untracked order", {
        orderId: event.orderId,
        status: event.status,
      });
      return "not_tracked";
    }

    if (entry.inFlight) {
      if (!entry.heldPush || entry.heldPush.observedAt.getTime() <= event.observedAt.getTime()) {
        entry.heldPush = event;
      }
      this.logger.debug("Realtime push held until commit settles", {
        orderId: event.orderId,
        status: event.status,
        commitId: entry.inFlight.commitId,
      });
      return "deferred";
    }

    return this.applyPush(entry, event);
  }

  /**
   * Route a feed's pushes into `applyRemoteStatus`. Returns the feed's
   * unsubscribe, which `dispose` also calls.
   */
  connect(feed: RealtimeFeed): Unsubscribe {
    const unsubscribe = feed.subscribe((event) => {
      this.applyRemoteStatus(event);
    });
    const release: Unsubscribe = () => {
      if (this.feedSubscriptions.delete(release)) unsubscribe();
    };
    this.feedSubscriptions.add(release);
    this.logger.info("Realtime feed connected", { feeds: this.feedSubscriptions.size });
    return release;
  }

  dispose(): void {
    for (const release of [...this.feedSubscriptions]) {
      release();
    }
    this.listeners.clear();
    this.orders.clear();
    this.logger.debug("Coordinator disposed");
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async commit(
    orderId: string,
    from: DriverOrderStatus,
    to: DriverOrderStatus,
    proof: Confirmation | undefined
  ): Promise<CommitResult> {
    try {
      return await this.repository.commitStatus(orderId, from, to, proof);
    } catch (error) {
      return { ok: false, error: classifyCommitFailure(error) };
    }
  }

  private async refetch(orderId: string): Promise<DriverOrder | null> {
    try {
      return await this.repository.fetchOrder(orderId);
    } catch (error) {
      this.logger.error("Order refresh failed", {
        orderId,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private adopt(entry: TrackedOrder, order: DriverOrder): void {
    entry.order = order;
    entry.revision += 1;
    entry.confirmed = order.status;
    entry.displayed = order.status;
  }

  private applyPush(entry: TrackedOrder, event: OrderStatusEvent): RemoteUpdateResult {
    const context = {
      orderId: event.orderId,
      from: entry.confirmed,
      to: event.status,
      observedAt: event.observedAt.toISOString(),
    };

    if (entry.lastObservedAt && event.observedAt.getTime() < entry.lastObservedAt.getTime()) {
      this.logger.warn("Realtime push ignored", { ...context, reason: "stale" });
      return "ignored";
    }

    if (event.status === entry.confirmed) {
      entry.lastObservedAt = event.observedAt;
      this.logger.debug("Realtime push matches confirmed status", context);
      return "ignored";
    }

    const validation = this.stateMachine.validateAuthoritativeTransition(
      entry.confirmed,
      event.status
    );
    if (!validation.isValid) {
      this.logger.warn("Realtime push ignored", {
        ...context,
        reason: validation.code,
        detail: validation.errorMessage,
      });
      return "ignored";
    }

    entry.lastObservedAt = event.observedAt;
    entry.revision += 1;
    entry.confirmed = event.status;
    entry.displayed = event.status;
    entry.order = { ...entry.order, status: event.status };
    this.logger.info("Realtime status applied", context);
    this.publish(event.orderId, entry, "remote");
    return "applied";
  }

  private releaseHeldPush(entry: TrackedOrder): void {
    const held = entry.heldPush;
    if (!held) return;
    entry.heldPush = null;
    this.applyPush(entry, held);
  }

  private reject(
    context: TransitionLogContext,
    code: ActionRejectionCode,
    message: string,
    extra?: Record<string, unknown>
  ): ActionOutcome {
    logTransitionRejected(this.logger, context, { code, message });
    return rejected(code, message, { orderId: context.entityId, ...extra });
  }

  private fail(
    context: TransitionLogContext,
    entry: TrackedOrder,
    error: CommitError,
    refreshedStatus: DriverOrderStatus | null
  ): ActionOutcome {
    logTransitionFailed(this.logger, context, error);

    let userMessage = userMessageFor(error);
    if (error.requiresRefresh) {
      const adoptedTerminal =
        refreshedStatus !== null && this.stateMachine.isTerminalStatus(refreshedStatus);
      userMessage =
        error.kind === "AlreadyCompleted" || adoptedTerminal
          ? ALREADY_COMPLETED_MESSAGE
          : CONFLICT_MESSAGE;
    }

    return failed(userMessage, {
      error,
      retryable: error.retryable,
      requiresRefresh: error.requiresRefresh,
      refreshedStatus,
      snapshot: this.snapshotOf(context.entityId, entry),
    });
  }

  private publish(
    orderId: string,
    entry: TrackedOrder,
    reason: SnapshotChangeReason
  ): OrderSnapshot {
    entry.updatedAt = this.now();
    const snapshot = this.snapshotOf(orderId, entry);
    for (const listener of [...this.listeners]) {
      try {
        listener({ orderId, snapshot, reason });
      } catch (error) {
        this.logger.error("Snapshot listener threw", {
          orderId,
          reason,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return snapshot;
  }

  private snapshotOf(orderId: string, entry: TrackedOrder): OrderSnapshot {
    const isCommitting = entry.inFlight !== null;
    return {
      orderId,
      order: entry.order,
      status: entry.displayed,
      confirmedStatus: entry.confirmed,
      pendingStatus: entry.inFlight ? entry.inFlight.target : null,
      isCommitting,
      availableActions: isCommitting ? [] : this.stateMachine.getAvailableActions(entry.confirmed),
      instructions: this.stateMachine.getDriverInstructions(entry.displayed),
      lastError: entry.lastError,
      updatedAt: entry.updatedAt,
    };
  }
}

export function createDriverOrderCoordinator(deps: CoordinatorDependencies): DriverOrderCoordinator {
  return new DriverOrderCoordinator(deps);
}
