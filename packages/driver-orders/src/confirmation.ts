/**
 * ## Confirmation Gate - Proof Before Pickup and Delivery
 *
 * A driver cannot move an order to `pickedUp` or `delivered` without a
 * confirmation record. Delivery proof always needs a photo and a location
 * fix; pickup proof needs the record itself, and any photo or location it
 * carries must be well-formed.
 *
 * | Check | Question | Entry point |
 * |-------|----------|-------------|
 * | `canSubmit` | Are the mandatory fields filled in? | Submit button |
 * | `validateConfirmation` | Every rule, with limits | Coordinator, guarded repository |
 * | `assertCanSubmit` | Same, throwing | Callers that cannot continue |
 * | `requireProofFor` | Does this transition carry the right proof? | Commit paths |
 */

import {
  InvariantError,
  createInvariant,
  createInvariantSet,
  type InvariantResult,
  type InvariantSetResult,
  type InvariantViolation,
} from "@courierflow/core";
import { getConfirmationForTarget, type ConfirmationKind } from "./stateMachine.js";
import { getStatusDisplayName, type DriverOrderStatus } from "./status.js";

// ============================================================================
// Types
// ============================================================================

export interface GeoLocation {
  latitude: number;
  longitude: number;
  /** Horizontal accuracy radius in metres */
  accuracy: number;
}

export interface PickupChecklist {
  orderNumberMatches: boolean;
  itemsChecked: boolean;
  packagingIntact: boolean;
}

interface ConfirmationBase {
  orderId: string;
  confirmedAt: Date;
  /** Empty when no photo was taken */
  photoUrl: string;
  location: GeoLocation | null;
  /** Driver id */
  confirmedBy: string;
  recipientName?: string;
  notes?: string;
}

export interface PickupConfirmation extends ConfirmationBase {
  kind: "pickup";
  checklist?: PickupChecklist;
}

export interface DeliveryConfirmation extends ConfirmationBase {
  kind: "delivery";
}

export type Confirmation = PickupConfirmation | DeliveryConfirmation;

export interface ConfirmationLimits {
  /** Fixes less accurate than this are rejected */
  maxLocationAccuracyMeters: number;
  /** Fixes less accurate than this are accepted with a warning */
  preferredLocationAccuracyMeters: number;
}

export interface ConfirmationCheckOptions extends ConfirmationLimits {
  /** Order the proof must belong to */
  expectedOrderId?: string;
}

export const DEFAULT_CONFIRMATION_LIMITS: ConfirmationLimits = {
  maxLocationAccuracyMeters: 100,
  preferredLocationAccuracyMeters: 50,
};

export type ConfirmationErrorCode =
  | "ORDER_ID_REQUIRED"
  | "ORDER_MISMATCH"
  | "PHOTO_REQUIRED"
  | "LOCATION_REQUIRED"
  | "LOCATION_OUT_OF_RANGE"
  | "LOCATION_INACCURATE"
  | "PROOF_REQUIRED"
  | "PROOF_KIND_MISMATCH";

export const ConfirmationInvariantError =
  InvariantError.forContext<ConfirmationErrorCode>("Confirmation");

// ============================================================================
// Invariants
// ============================================================================

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function isInRange(location: GeoLocation): boolean {
  const { latitude, longitude, accuracy } = location;
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Number.isFinite(accuracy) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180 &&
    accuracy >= 0
  );
}

type Rule = [ConfirmationCheckOptions];

export const orderIdPresent = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "orderIdPresent",
    code: "ORDER_ID_REQUIRED",
    check: (confirmation) => !isBlank(confirmation.orderId),
    message: () => "Confirmation is missing its order id",
  },
  ConfirmationInvariantError
);

export const orderMatches = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "orderMatches",
    code: "ORDER_MISMATCH",
    check: (confirmation, options) =>
      options.expectedOrderId === undefined || confirmation.orderId === options.expectedOrderId,
    message: (confirmation, options) =>
      `Confirmation for order ${confirmation.orderId} cannot be used for order ${options.expectedOrderId ?? ""}`,
    context: (confirmation, options) => ({
      confirmationOrderId: confirmation.orderId,
      expectedOrderId: options.expectedOrderId,
    }),
  },
  ConfirmationInvariantError
);

export const photoPresent = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "photoPresent",
    code: "PHOTO_REQUIRED",
    check: (confirmation) => confirmation.kind === "pickup" || !isBlank(confirmation.photoUrl),
    message: () => "A photo of the delivered order is required",
  },
  ConfirmationInvariantError
);

export const locationPresent = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "locationPresent",
    code: "LOCATION_REQUIRED",
    check: (confirmation) => confirmation.kind === "pickup" || confirmation.location !== null,
    message: () => "A GPS location is required to complete delivery",
  },
  ConfirmationInvariantError
);

export const locationInRange = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "locationInRange",
    code: "LOCATION_OUT_OF_RANGE",
    check: (confirmation) => confirmation.location === null || isInRange(confirmation.location),
    message: (confirmation) =>
      `Location ${confirmation.location?.latitude ?? "?"}, ${confirmation.location?.longitude ?? "?"} is not a valid coordinate`,
  },
  ConfirmationInvariantError
);

export const locationAccurate = createInvariant<Confirmation, ConfirmationErrorCode, Rule>(
  {
    name: "locationAccurate",
    code: "LOCATION_INACCURATE",
    check: (confirmation, options) =>
      confirmation.location === null ||
      confirmation.location.accuracy <= options.maxLocationAccuracyMeters,
    message: (confirmation, options) =>
      `Location accuracy ${confirmation.location?.accuracy ?? "?"}m exceeds the ${options.maxLocationAccuracyMeters}m limit`,
    context: (confirmation, options) => ({
      accuracy: confirmation.location?.accuracy,
      maxLocationAccuracyMeters: options.maxLocationAccuracyMeters,
    }),
  },
  ConfirmationInvariantError
);

export const confirmationRules = createInvariantSet<Confirmation, ConfirmationErrorCode, Rule>([
  orderIdPresent,
  orderMatches,
  photoPresent,
  locationPresent,
  locationInRange,
  locationAccurate,
]);

const mandatoryFields = [orderIdPresent, photoPresent, locationPresent];

// ============================================================================
// Gate
// ============================================================================

/**
 * True when every mandatory field is populated. Limits are not applied here.
 */
export function canSubmit(confirmation: Confirmation | null | undefined): boolean {
  if (confirmation === null || confirmation === undefined) return false;
  return mandatoryFields.every((rule) => rule.check(confirmation, DEFAULT_CONFIRMATION_LIMITS));
}

export function validateConfirmation(
  confirmation: Confirmation,
  options: ConfirmationCheckOptions = DEFAULT_CONFIRMATION_LIMITS
): InvariantSetResult<ConfirmationErrorCode> {
  return confirmationRules.validateAll(confirmation, options);
}

/**
 * @throws ConfirmationInvariantError for the first rule that does not hold
 */
export function assertCanSubmit(
  confirmation: Confirmation,
  options: ConfirmationCheckOptions = DEFAULT_CONFIRMATION_LIMITS
): void {
  confirmationRules.assertAll(confirmation, options);
}

/**
 * Accepted, but less precise than the preferred fix.
 */
export function exceedsPreferredAccuracy(
  confirmation: Confirmation,
  limits: ConfirmationLimits
): boolean {
  return (
    confirmation.location !== null &&
    confirmation.location.accuracy > limits.preferredLocationAccuracyMeters
  );
}

function missingProof(
  from: DriverOrderStatus,
  to: DriverOrderStatus,
  proof: Confirmation | undefined
): InvariantViolation<ConfirmationErrorCode> | null {
  const needed: ConfirmationKind | null = getConfirmationForTarget(to);
  if (needed === null) return null;

  const context = { from, to, requiredProof: needed };
  if (proof === undefined) {
    return {
      code: "PROOF_REQUIRED",
      message: `Moving from ${getStatusDisplayName(from)} to ${getStatusDisplayName(to)} requires a ${needed} confirmation`,
      context,
    };
  }
  if (proof.kind !== needed) {
    return {
      code: "PROOF_KIND_MISMATCH",
      message: `Expected a ${needed} confirmation but received a ${proof.kind} confirmation`,
      context,
    };
  }
  return null;
}

/**
 * Check that a commit into `to` carries the kind of proof it needs.
 * Transitions that need no proof always pass.
 */
export function requireProofFor(
  from: DriverOrderStatus,
  to: DriverOrderStatus,
  proof: Confirmation | undefined
): InvariantResult<ConfirmationErrorCode> {
  const violation = missingProof(from, to, proof);
  return violation === null ? { valid: true } : { valid: false, ...violation };
}

/**
 * Everything a commit path checks about proof: presence and kind, then
 * every confirmation rule against the order being committed.
 */
export function checkCommitProof(
  orderId: string,
  from: DriverOrderStatus,
  to: DriverOrderStatus,
  proof: Confirmation | undefined,
  limits: ConfirmationLimits
): InvariantSetResult<ConfirmationErrorCode> {
  const violation = missingProof(from, to, proof);
  if (violation !== null) return { valid: false, violations: [violation] };
  if (proof === undefined) return { valid: true };
  return validateConfirmation(proof, { ...limits, expectedOrderId: orderId });
}
