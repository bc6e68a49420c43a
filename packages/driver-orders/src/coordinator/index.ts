/**
 * @module @courierflow/driver-orders/coordinator
 */

export {
  DriverOrderCoordinator,
  createDriverOrderCoordinator,
  COORDINATOR_LOG_SCOPE,
} from "./DriverOrderCoordinator.js";
export type {
  ActionFailure,
  ActionOutcome,
  ActionRejectionCode,
  ActionSuccess,
  CoordinatorDependencies,
  OrderSnapshot,
  RemoteUpdateResult,
  SnapshotChange,
  SnapshotChangeReason,
  SnapshotListener,
} from "./types.js";
