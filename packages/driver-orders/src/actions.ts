/**
 * ## Driver Actions
 *
 * What a driver can tap on an order card. Every action names exactly one
 * target status; `reportIssue` names `failed` but is never committed by the
 * driver (issue reports travel on their own channel and the backend decides).
 */

import { DriverOrderStatus } from "./status.js";

export const DriverOrderAction = {
  navigateToVendor: "navigateToVendor",
  arrivedAtVendor: "arrivedAtVendor",
  confirmPickup: "confirmPickup",
  navigateToCustomer: "navigateToCustomer",
  arrivedAtCustomer: "arrivedAtCustomer",
  confirmDeliveryWithPhoto: "confirmDeliveryWithPhoto",
  cancel: "cancel",
  reportIssue: "reportIssue",
} as const;

export type DriverOrderAction = (typeof DriverOrderAction)[keyof typeof DriverOrderAction];

export interface DriverActionMetadata {
  label: string;
  description: string;
  /** Material icon name */
  icon: string;
  targetStatus: DriverOrderStatus;
  isDangerous: boolean;
  requiresConfirmation: boolean;
}

export const DRIVER_ACTION_METADATA: Readonly<Record<DriverOrderAction, DriverActionMetadata>> = {
  navigateToVendor: {
    label: "Navigate to Restaurant",
    description: "Start GPS navigation to the restaurant",
    icon: "navigation",
    targetStatus: DriverOrderStatus.onRouteToVendor,
    isDangerous: false,
    requiresConfirmation: false,
  },
  arrivedAtVendor: {
    label: "Mark Arrived",
    description: "Mark as arrived at the restaurant",
    icon: "location_on",
    targetStatus: DriverOrderStatus.arrivedAtVendor,
    isDangerous: false,
    requiresConfirmation: false,
  },
  confirmPickup: {
    label: "Confirm Pickup",
    description: "Confirm order pickup with restaurant staff (mandatory)",
    icon: "check_circle",
    targetStatus: DriverOrderStatus.pickedUp,
    isDangerous: false,
    requiresConfirmation: true,
  },
  navigateToCustomer: {
    label: "Navigate to Customer",
    description: "Start GPS navigation to customer location",
    icon: "navigation",
    targetStatus: DriverOrderStatus.onRouteToCustomer,
    isDangerous: false,
    requiresConfirmation: false,
  },
  arrivedAtCustomer: {
    label: "Mark Arrived",
    description: "Mark as arrived at customer location",
    icon: "location_on",
    targetStatus: DriverOrderStatus.arrivedAtCustomer,
    isDangerous: false,
    requiresConfirmation: false,
  },
  confirmDeliveryWithPhoto: {
    label: "Complete Delivery",
    description: "Complete delivery with photo proof (mandatory)",
    icon: "camera_alt",
    targetStatus: DriverOrderStatus.delivered,
    isDangerous: false,
    requiresConfirmation: true,
  },
  cancel: {
    label: "Cancel Order",
    description: "Cancel this order",
    icon: "cancel",
    targetStatus: DriverOrderStatus.cancelled,
    isDangerous: true,
    requiresConfirmation: true,
  },
  reportIssue: {
    label: "Report Issue",
    description: "Report an issue with this order",
    icon: "report_problem",
    targetStatus: DriverOrderStatus.failed,
    isDangerous: true,
    requiresConfirmation: false,
  },
};

/** Actions that are offered alongside the primary action, never instead of it. */
export const SECONDARY_ACTIONS: readonly DriverOrderAction[] = [
  DriverOrderAction.reportIssue,
  DriverOrderAction.cancel,
];

export function isDriverOrderAction(value: string): value is DriverOrderAction {
  return Object.hasOwn(DRIVER_ACTION_METADATA, value);
}

export function isSecondaryAction(action: DriverOrderAction): boolean {
  return SECONDARY_ACTIONS.includes(action);
}

export function getActionMetadata(action: DriverOrderAction): DriverActionMetadata {
  return DRIVER_ACTION_METADATA[action];
}
