/**
 * ## Driver Order Status Vocabulary
 *
 * The statuses a delivery moves through once a driver has accepted it,
 * in progression order, followed by the two failure exits.
 *
 * | Status | Wire value | Terminal |
 * |--------|------------|----------|
 * | `assigned` | `assigned` | |
 * | `onRouteToVendor` | `on_route_to_vendor` | |
 * | `arrivedAtVendor` | `arrived_at_vendor` | |
 * | `pickedUp` | `picked_up` | |
 * | `onRouteToCustomer` | `on_route_to_customer` | |
 * | `arrivedAtCustomer` | `arrived_at_customer` | |
 * | `delivered` | `delivered` | yes |
 * | `cancelled` | `cancelled` | yes |
 * | `failed` | `failed` | yes |
 */

export const DriverOrderStatus = {
  assigned: "assigned",
  onRouteToVendor: "onRouteToVendor",
  arrivedAtVendor: "arrivedAtVendor",
  pickedUp: "pickedUp",
  onRouteToCustomer: "onRouteToCustomer",
  arrivedAtCustomer: "arrivedAtCustomer",
  delivered: "delivered",
  cancelled: "cancelled",
  failed: "failed",
} as const;

export type DriverOrderStatus = (typeof DriverOrderStatus)[keyof typeof DriverOrderStatus];

/**
 * The forward chain, first to last. `cancelled` and `failed` sit outside it.
 */
export const DRIVER_STATUS_PROGRESSION: readonly DriverOrderStatus[] = Object.freeze([
  DriverOrderStatus.assigned,
  DriverOrderStatus.onRouteToVendor,
  DriverOrderStatus.arrivedAtVendor,
  DriverOrderStatus.pickedUp,
  DriverOrderStatus.onRouteToCustomer,
  DriverOrderStatus.arrivedAtCustomer,
  DriverOrderStatus.delivered,
]);

export const TERMINAL_DRIVER_STATUSES: readonly DriverOrderStatus[] = Object.freeze([
  DriverOrderStatus.delivered,
  DriverOrderStatus.cancelled,
  DriverOrderStatus.failed,
]);

export const ALL_DRIVER_STATUSES: readonly DriverOrderStatus[] = Object.freeze([
  ...DRIVER_STATUS_PROGRESSION,
  DriverOrderStatus.cancelled,
  DriverOrderStatus.failed,
]);

interface StatusMetadata {
  wireValue: string;
  displayName: string;
  /** History line recorded when an order enters this status */
  transitionDescription: string;
  /** Status understood by the older order-level status enum */
  legacyOrderStatus: string;
}

const STATUS_METADATA: Record<DriverOrderStatus, StatusMetadata> = {
  assigned: {
    wireValue: "assigned",
    displayName: "Assigned",
    transitionDescription: "Order assigned to driver",
    legacyOrderStatus: "confirmed",
  },
  onRouteToVendor: {
    wireValue: "on_route_to_vendor",
    displayName: "On Route to Restaurant",
    transitionDescription: "Driver started navigation to restaurant",
    legacyOrderStatus: "on_route_to_vendor",
  },
  arrivedAtVendor: {
    wireValue: "arrived_at_vendor",
    displayName: "Arrived at Restaurant",
    transitionDescription: "Driver arrived at restaurant",
    legacyOrderStatus: "arrived_at_vendor",
  },
  pickedUp: {
    wireValue: "picked_up",
    displayName: "Picked Up",
    transitionDescription: "Order picked up from restaurant",
    legacyOrderStatus: "out_for_delivery",
  },
  onRouteToCustomer: {
    wireValue: "on_route_to_customer",
    displayName: "On Route to Customer",
    transitionDescription: "Driver started delivery to customer",
    legacyOrderStatus: "out_for_delivery",
  },
  arrivedAtCustomer: {
    wireValue: "arrived_at_customer",
    displayName: "Arrived at Customer",
    transitionDescription: "Driver arrived at customer location",
    legacyOrderStatus: "out_for_delivery",
  },
  delivered: {
    wireValue: "delivered",
    displayName: "Delivered",
    transitionDescription: "Order delivered to customer",
    legacyOrderStatus: "delivered",
  },
  cancelled: {
    wireValue: "cancelled",
    displayName: "Cancelled",
    transitionDescription: "Order cancelled",
    legacyOrderStatus: "cancelled",
  },
  failed: {
    wireValue: "failed",
    displayName: "Failed",
    transitionDescription: "Order delivery failed",
    legacyOrderStatus: "cancelled",
  },
};

export function isDriverOrderStatus(value: string): value is DriverOrderStatus {
  return Object.hasOwn(STATUS_METADATA, value);
}

export function isTerminalStatus(status: DriverOrderStatus): boolean {
  return TERMINAL_DRIVER_STATUSES.includes(status);
}

/**
 * Position in the forward chain, or -1 for `cancelled` / `failed`.
 */
export function progressionIndex(status: DriverOrderStatus): number {
  return DRIVER_STATUS_PROGRESSION.indexOf(status);
}

export function getStatusDisplayName(status: DriverOrderStatus): string {
  return STATUS_METADATA[status].displayName;
}

export function getTransitionDescription(to: DriverOrderStatus): string {
  return STATUS_METADATA[to].transitionDescription;
}

export function toWireStatus(status: DriverOrderStatus): string {
  return STATUS_METADATA[status].wireValue;
}

/**
 * Map to the order-level status enum used by backends that predate the
 * driver workflow (several driver statuses collapse to `out_for_delivery`).
 */
export function toLegacyOrderStatus(status: DriverOrderStatus): string {
  return STATUS_METADATA[status].legacyOrderStatus;
}

/**
 * Reverse lookup from a wire value. Exact match only; see `normalizeStatus`
 * for lenient parsing of backend data.
 */
export function fromWireStatus(wireValue: string): DriverOrderStatus | null {
  for (const status of ALL_DRIVER_STATUSES) {
    if (STATUS_METADATA[status].wireValue === wireValue) return status;
  }
  return null;
}
