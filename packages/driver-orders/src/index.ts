/**
 * Driver order workflow: statuses, actions, the state machine that connects
 * them, proof-of-completion gates, and the coordinator that commits status
 * changes and reconciles them with realtime pushes.
 *
 * @example
 * ```typescript
 * import {
 *   createDriverOrderCoordinator,
 *   createGuardedOrderRepository,
 *   loadWorkflowConfig,
 * } from "@courierflow/driver-orders";
 *
 * const coordinator = createDriverOrderCoordinator({
 *   repository: createGuardedOrderRepository(httpRepository),
 *   config: loadWorkflowConfig(process.env),
 * });
 * ```
 *
 * @module @courierflow/driver-orders
 */

// Status vocabulary
export {
  DriverOrderStatus,
  DRIVER_STATUS_PROGRESSION,
  TERMINAL_DRIVER_STATUSES,
  ALL_DRIVER_STATUSES,
  isDriverOrderStatus,
  isTerminalStatus,
  progressionIndex,
  getStatusDisplayName,
  getTransitionDescription,
  toWireStatus,
  toLegacyOrderStatus,
  fromWireStatus,
} from "./status.js";

// Actions
export {
  DriverOrderAction,
  DRIVER_ACTION_METADATA,
  SECONDARY_ACTIONS,
  isDriverOrderAction,
  isSecondaryAction,
  getActionMetadata,
} from "./actions.js";
export type { DriverActionMetadata } from "./actions.js";

// State machine
export {
  driverOrderFSM,
  orderLifecycleFSM,
  driverOrderStateMachine,
  getAvailableActions,
  getPrimaryAction,
  nextStatus,
  getValidNextStatuses,
  validateTransition,
  validateAuthoritativeTransition,
  getDriverInstructions,
  mapActionToTargetStatus,
  getRequiredConfirmation,
  getConfirmationForTarget,
  canBeCancelledByDriver,
  allowsDriverActions,
  actionRequiresConfirmation,
} from "./stateMachine.js";
export type {
  ConfirmationKind,
  DriverOrderStateMachine,
  TransitionErrorCode,
  TransitionValidation,
} from "./stateMachine.js";

// Confirmation gate
export {
  ConfirmationInvariantError,
  DEFAULT_CONFIRMATION_LIMITS,
  confirmationRules,
  canSubmit,
  validateConfirmation,
  assertCanSubmit,
  exceedsPreferredAccuracy,
  requireProofFor,
  checkCommitProof,
} from "./confirmation.js";
export type {
  Confirmation,
  ConfirmationCheckOptions,
  ConfirmationErrorCode,
  ConfirmationLimits,
  DeliveryConfirmation,
  GeoLocation,
  PickupChecklist,
  PickupConfirmation,
} from "./confirmation.js";

// Normalization and order records
export { normalizeStatus, isResolved, NORMALIZE_LOG_SCOPE } from "./normalize.js";
export type { NormalizedStatus, NormalizeOptions } from "./normalize.js";
export { DriverOrderRecordSchema, parseDriverOrder } from "./order.js";
export type {
  DeliveryAddress,
  DriverOrder,
  DriverOrderRecord,
  OrderItem,
  OrderParseErrorCode,
  OrderParseResult,
  PartyRef,
} from "./order.js";

// Commit errors and repository
export {
  COMMIT_ERROR_POLICY,
  ALREADY_COMPLETED_MESSAGE,
  CONFLICT_MESSAGE,
  createCommitError,
  isCommitError,
  classifyCommitFailure,
  userMessageFor,
} from "./errors.js";
export type {
  CommitError,
  CommitErrorDetails,
  CommitErrorKind,
  CommitErrorPolicy,
} from "./errors.js";
export { createGuardedOrderRepository } from "./repository.js";
export type { CommitResult, GuardedRepositoryOptions, OrderRepository } from "./repository.js";

// Realtime
export type {
  OrderStatusEvent,
  OrderStatusListener,
  RealtimeFeed,
  Unsubscribe,
} from "./realtime.js";

// Configuration
export {
  WorkflowConfigSchema,
  WORKFLOW_ENV,
  DEFAULT_WORKFLOW_CONFIG,
  loadWorkflowConfig,
} from "./config.js";
export type { WorkflowConfig } from "./config.js";

// Coordinator
export * from "./coordinator/index.js";
