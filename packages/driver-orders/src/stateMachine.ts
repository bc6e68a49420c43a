/**
 * ## Driver Order State Machine
 *
 * Pure, synchronous rules for moving a driver order between statuses.
 * Nothing here performs I/O or holds state; invalid moves come back as data.
 *
 * Two FSMs describe the workflow:
 *
 * | FSM | Who moves the order | Edges from each non-terminal status |
 * |-----|---------------------|-------------------------------------|
 * | `driverOrderFSM` | The driver, one tap at a time | next status, `cancelled` |
 * | `orderLifecycleFSM` | The backend (realtime pushes) | next status, `cancelled`, `failed` |
 *
 * Driver commits must follow a single edge of `driverOrderFSM`. Authoritative
 * updates may land anywhere reachable in `orderLifecycleFSM`, because pushes
 * can be coalesced.
 */

import {
  defineFSM,
  intermediateStates,
  isReachable,
  type FSM,
  type FSMDefinition,
} from "@courierflow/fsm";
import { DriverOrderAction, DRIVER_ACTION_METADATA } from "./actions.js";
import {
  DriverOrderStatus,
  DRIVER_STATUS_PROGRESSION,
  getStatusDisplayName,
  getTransitionDescription,
  isTerminalStatus,
  progressionIndex,
} from "./status.js";

// ============================================================================
// FSM definitions
// ============================================================================

const NEXT_STATUS: Readonly<Record<DriverOrderStatus, DriverOrderStatus | null>> = {
  assigned: DriverOrderStatus.onRouteToVendor,
  onRouteToVendor: DriverOrderStatus.arrivedAtVendor,
  arrivedAtVendor: DriverOrderStatus.pickedUp,
  pickedUp: DriverOrderStatus.onRouteToCustomer,
  onRouteToCustomer: DriverOrderStatus.arrivedAtCustomer,
  arrivedAtCustomer: DriverOrderStatus.delivered,
  delivered: null,
  cancelled: null,
  failed: null,
};

function buildTransitions(
  exits: readonly DriverOrderStatus[]
): FSMDefinition<DriverOrderStatus>["transitions"] {
  const edgesFrom = (status: DriverOrderStatus): readonly DriverOrderStatus[] => {
    const next = NEXT_STATUS[status];
    return next === null ? [] : [next, ...exits];
  };

  return {
    assigned: edgesFrom("assigned"),
    onRouteToVendor: edgesFrom("onRouteToVendor"),
    arrivedAtVendor: edgesFrom("arrivedAtVendor"),
    pickedUp: edgesFrom("pickedUp"),
    onRouteToCustomer: edgesFrom("onRouteToCustomer"),
    arrivedAtCustomer: edgesFrom("arrivedAtCustomer"),
    delivered: [],
    cancelled: [],
    failed: [],
  };
}

/**
 * Moves a driver may commit.
 */
export const driverOrderFSM: FSM<DriverOrderStatus> = defineFSM<DriverOrderStatus>({
  initial: DriverOrderStatus.assigned,
  transitions: buildTransitions([DriverOrderStatus.cancelled]),
});

/**
 * Moves the backend may report. Adds `failed` as an exit.
 */
export const orderLifecycleFSM: FSM<DriverOrderStatus> = defineFSM<DriverOrderStatus>({
  initial: DriverOrderStatus.assigned,
  transitions: buildTransitions([DriverOrderStatus.cancelled, DriverOrderStatus.failed]),
});

// ============================================================================
// Actions per status
// ============================================================================

const AVAILABLE_ACTIONS: Readonly<Record<DriverOrderStatus, readonly DriverOrderAction[]>> =
  Object.freeze({
    assigned: Object.freeze([DriverOrderAction.navigateToVendor, DriverOrderAction.cancel]),
    onRouteToVendor: Object.freeze([DriverOrderAction.arrivedAtVendor, DriverOrderAction.cancel]),
    arrivedAtVendor: Object.freeze([
      DriverOrderAction.confirmPickup,
      DriverOrderAction.reportIssue,
      DriverOrderAction.cancel,
    ]),
    pickedUp: Object.freeze([DriverOrderAction.navigateToCustomer, DriverOrderAction.cancel]),
    onRouteToCustomer: Object.freeze([
      DriverOrderAction.arrivedAtCustomer,
      DriverOrderAction.cancel,
    ]),
    arrivedAtCustomer: Object.freeze([
      DriverOrderAction.confirmDeliveryWithPhoto,
      DriverOrderAction.reportIssue,
      DriverOrderAction.cancel,
    ]),
    delivered: Object.freeze([]),
    cancelled: Object.freeze([]),
    failed: Object.freeze([]),
  });

const DRIVER_INSTRUCTIONS: Readonly<Record<DriverOrderStatus, string>> = {
  assigned: "Start navigation to the restaurant to pick up the order",
  onRouteToVendor: 'Navigate to the restaurant. Mark "Arrived" when you reach the location',
  arrivedAtVendor:
    "Confirm pickup with the restaurant staff. You must verify the order before proceeding",
  pickedUp: "Start navigation to the customer delivery address",
  onRouteToCustomer:
    'Navigate to customer. Mark "Arrived" when you reach the delivery location',
  arrivedAtCustomer:
    "Complete delivery by taking a photo of the delivered order. This is mandatory",
  delivered: "Order completed successfully. You can now accept new orders",
  cancelled: "Order was cancelled. You can now accept new orders",
  failed: "Order delivery failed. Please contact support if needed",
};

// ============================================================================
// Validation results
// ============================================================================

export type TransitionErrorCode =
  | "TERMINAL_STATE"
  | "SAME_STATUS"
  | "BACKWARD_TRANSITION"
  | "SKIPPED_STEPS"
  | "TERMINAL_NOT_DRIVER_REACHABLE";

export type TransitionValidation =
  | { isValid: true }
  | { isValid: false; errorMessage: string; code: TransitionErrorCode };

export type ConfirmationKind = "pickup" | "delivery";

const VALID: TransitionValidation = { isValid: true };

function invalid(code: TransitionErrorCode, errorMessage: string): TransitionValidation {
  return { isValid: false, errorMessage, code };
}

function names(statuses: readonly DriverOrderStatus[]): string {
  return statuses.map(getStatusDisplayName).join(", ");
}

/**
 * Shared checks for both validators: terminal origin, no-op, backward move.
 * Returns null when none of them apply.
 */
function validateDirection(
  from: DriverOrderStatus,
  to: DriverOrderStatus
): TransitionValidation | null {
  if (isTerminalStatus(from)) {
    return invalid(
      "TERMINAL_STATE",
      `Order already in terminal state (${getStatusDisplayName(from)}); no further transitions are allowed`
    );
  }
  if (from === to) {
    return invalid("SAME_STATUS", `Order is already ${getStatusDisplayName(from)}`);
  }
  const toIndex = progressionIndex(to);
  if (toIndex !== -1 && toIndex < progressionIndex(from)) {
    return invalid(
      "BACKWARD_TRANSITION",
      `Cannot move backward from ${getStatusDisplayName(from)} to ${getStatusDisplayName(to)}`
    );
  }
  return null;
}

// ============================================================================
// Operations
// ============================================================================

export function getAvailableActions(status: DriverOrderStatus): readonly DriverOrderAction[] {
  return AVAILABLE_ACTIONS[status];
}

/**
 * The action that advances the workflow, or null for terminal statuses.
 */
export function getPrimaryAction(status: DriverOrderStatus): DriverOrderAction | null {
  const primary = AVAILABLE_ACTIONS[status].find(
    (action) => action !== DriverOrderAction.cancel && action !== DriverOrderAction.reportIssue
  );
  return primary ?? null;
}

export function nextStatus(status: DriverOrderStatus): DriverOrderStatus | null {
  return NEXT_STATUS[status];
}

export function getValidNextStatuses(status: DriverOrderStatus): readonly DriverOrderStatus[] {
  return driverOrderFSM.validTransitions(status);
}

/**
 * Validate a move the driver is about to commit.
 *
 * Valid only for the designated next status, or `cancelled` from any
 * non-terminal status.
 */
export function validateTransition(
  from: DriverOrderStatus,
  to: DriverOrderStatus
): TransitionValidation {
  const directionError = validateDirection(from, to);
  if (directionError) return directionError;

  if (driverOrderFSM.canTransition(from, to)) return VALID;

  if (to === DriverOrderStatus.failed) {
    return invalid(
      "TERMINAL_NOT_DRIVER_REACHABLE",
      `${getStatusDisplayName(to)} can only be set by dispatch; report an issue instead`
    );
  }

  const skipped = intermediateStates(driverOrderFSM, from, to) ?? [];
  const rule = skipped.includes(DriverOrderStatus.pickedUp)
    ? "Cannot skip pickup confirmation"
    : "Cannot skip workflow steps";
  return invalid(
    "SKIPPED_STEPS",
    `${rule}: moving from ${getStatusDisplayName(from)} to ${getStatusDisplayName(to)} skips ${names(skipped)}`
  );
}

/**
 * Validate an update reported by the backend.
 *
 * Forward jumps of any length and exits to `cancelled`/`failed` are accepted.
 */
export function validateAuthoritativeTransition(
  from: DriverOrderStatus,
  to: DriverOrderStatus
): TransitionValidation {
  const directionError = validateDirection(from, to);
  if (directionError) return directionError;

  if (isReachable(orderLifecycleFSM, from, to)) return VALID;

  return invalid(
    "BACKWARD_TRANSITION",
    `${getStatusDisplayName(to)} is not reachable from ${getStatusDisplayName(from)}`
  );
}

export function getDriverInstructions(status: DriverOrderStatus): string {
  return DRIVER_INSTRUCTIONS[status];
}

export function mapActionToTargetStatus(action: DriverOrderAction): DriverOrderStatus {
  return DRIVER_ACTION_METADATA[action].targetStatus;
}

/**
 * Proof the driver must collect before leaving `status`.
 */
export function getRequiredConfirmation(status: DriverOrderStatus): ConfirmationKind | null {
  switch (status) {
    case DriverOrderStatus.arrivedAtVendor:
      return "pickup";
    case DriverOrderStatus.arrivedAtCustomer:
      return "delivery";
    default:
      return null;
  }
}

/**
 * Proof a commit into `to` must carry.
 */
export function getConfirmationForTarget(to: DriverOrderStatus): ConfirmationKind | null {
  switch (to) {
    case DriverOrderStatus.pickedUp:
      return "pickup";
    case DriverOrderStatus.delivered:
      return "delivery";
    default:
      return null;
  }
}

export function canBeCancelledByDriver(status: DriverOrderStatus): boolean {
  return AVAILABLE_ACTIONS[status].includes(DriverOrderAction.cancel);
}

export function allowsDriverActions(status: DriverOrderStatus): boolean {
  return AVAILABLE_ACTIONS[status].length > 0;
}

export function actionRequiresConfirmation(action: DriverOrderAction): boolean {
  return DRIVER_ACTION_METADATA[action].requiresConfirmation;
}

// ============================================================================
// Injectable facade
// ============================================================================

/**
 * The state machine as a single collaborator, for code that receives its
 * rules by injection.
 */
export interface DriverOrderStateMachine {
  readonly progression: readonly DriverOrderStatus[];
  getAvailableActions(status: DriverOrderStatus): readonly DriverOrderAction[];
  getPrimaryAction(status: DriverOrderStatus): DriverOrderAction | null;
  nextStatus(status: DriverOrderStatus): DriverOrderStatus | null;
  getValidNextStatuses(status: DriverOrderStatus): readonly DriverOrderStatus[];
  validateTransition(from: DriverOrderStatus, to: DriverOrderStatus): TransitionValidation;
  validateAuthoritativeTransition(
    from: DriverOrderStatus,
    to: DriverOrderStatus
  ): TransitionValidation;
  getDriverInstructions(status: DriverOrderStatus): string;
  getTransitionDescription(to: DriverOrderStatus): string;
  mapActionToTargetStatus(action: DriverOrderAction): DriverOrderStatus;
  getRequiredConfirmation(status: DriverOrderStatus): ConfirmationKind | null;
  getConfirmationForTarget(to: DriverOrderStatus): ConfirmationKind | null;
  isTerminalStatus(status: DriverOrderStatus): boolean;
  canBeCancelledByDriver(status: DriverOrderStatus): boolean;
  allowsDriverActions(status: DriverOrderStatus): boolean;
  actionRequiresConfirmation(action: DriverOrderAction): boolean;
}

export const driverOrderStateMachine: DriverOrderStateMachine = Object.freeze({
  progression: DRIVER_STATUS_PROGRESSION,
  getAvailableActions,
  getPrimaryAction,
  nextStatus,
  getValidNextStatuses,
  validateTransition,
  validateAuthoritativeTransition,
  getDriverInstructions,
  getTransitionDescription,
  mapActionToTargetStatus,
  getRequiredConfirmation,
  getConfirmationForTarget,
  isTerminalStatus,
  canBeCancelledByDriver,
  allowsDriverActions,
  actionRequiresConfirmation,
});
