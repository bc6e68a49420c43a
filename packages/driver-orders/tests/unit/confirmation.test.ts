/**
 * Unit tests for the confirmation gate.
 */
import { describe, it, expect } from "vitest";
import { InvariantError } from "@courierflow/core";
import {
  ConfirmationInvariantError,
  DEFAULT_CONFIRMATION_LIMITS,
  assertCanSubmit,
  canSubmit,
  checkCommitProof,
  exceedsPreferredAccuracy,
  requireProofFor,
  validateConfirmation,
} from "../../src/index.js";
import {
  TEST_LOCATION,
  createDeliveryConfirmation,
  createPickupConfirmation,
} from "../../src/testing/index.js";

describe("canSubmit", () => {
  it("accepts a delivery with photo and location", () => {
    expect(canSubmit(createDeliveryConfirmation())).toBe(true);
  });

  it("refuses a delivery without a photo", () => {
    expect(canSubmit(createDeliveryConfirmation({ photoUrl: "" }))).toBe(false);
    expect(canSubmit(createDeliveryConfirmation({ photoUrl: "   " }))).toBe(false);
  });

  it("refuses a delivery without a location", () => {
    expect(canSubmit(createDeliveryConfirmation({ location: null }))).toBe(false);
  });

  it("accepts a pickup record without photo or location", () => {
    expect(canSubmit(createPickupConfirmation())).toBe(true);
  });

  it("refuses a missing record", () => {
    expect(canSubmit(null)).toBe(false);
    expect(canSubmit(undefined)).toBe(false);
  });

  it("does not apply accuracy limits", () => {
    const blurry = createDeliveryConfirmation({ location: { ...TEST_LOCATION, accuracy: 500 } });
    expect(canSubmit(blurry)).toBe(true);
  });
});

describe("validateConfirmation", () => {
  it("passes a complete delivery", () => {
    expect(validateConfirmation(createDeliveryConfirmation())).toEqual({ valid: true });
  });

  it("collects every violation", () => {
    const result = validateConfirmation(
      createDeliveryConfirmation({ orderId: " ", photoUrl: "", location: null })
    );

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.violations.map((violation) => violation.code)).toEqual([
      "ORDER_ID_REQUIRED",
      "PHOTO_REQUIRED",
      "LOCATION_REQUIRED",
    ]);
  });

  it("rejects coordinates outside the globe", () => {
    const result = validateConfirmation(
      createDeliveryConfirmation({ location: { latitude: 91, longitude: 13.4, accuracy: 5 } })
    );

    expect(result).toEqual({
      valid: false,
      violations: [
        { code: "LOCATION_OUT_OF_RANGE", message: "Location 91, 13.4 is not a valid coordinate" },
      ],
    });
  });

  it("rejects fixes less accurate than the limit", () => {
    const result = validateConfirmation(
      createDeliveryConfirmation({ location: { ...TEST_LOCATION, accuracy: 150 } })
    );

    expect(result).toEqual({
      valid: false,
      violations: [
        {
          code: "LOCATION_INACCURATE",
          message: "Location accuracy 150m exceeds the 100m limit",
          context: { accuracy: 150, maxLocationAccuracyMeters: 100 },
        },
      ],
    });
  });

  it("checks a malformed pickup location too", () => {
    const result = validateConfirmation(
      createPickupConfirmation({ location: { latitude: 10, longitude: 200, accuracy: 5 } })
    );
    expect(result.valid).toBe(false);
  });

  it("rejects proof for another order", () => {
    const result = validateConfirmation(createDeliveryConfirmation(), {
      ...DEFAULT_CONFIRMATION_LIMITS,
      expectedOrderId: "ord-other",
    });

    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.violations[0].code).toBe("ORDER_MISMATCH");
  });
});

describe("assertCanSubmit", () => {
  it("throws a ConfirmationInvariantError for the first violation", () => {
    let caught: unknown;
    try {
      assertCanSubmit(createDeliveryConfirmation({ photoUrl: "", location: null }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfirmationInvariantError);
    expect(InvariantError.hasCode(caught, "PHOTO_REQUIRED")).toBe(true);
  });

  it("does nothing for a valid confirmation", () => {
    expect(() => assertCanSubmit(createDeliveryConfirmation())).not.toThrow();
  });
});

describe("exceedsPreferredAccuracy", () => {
  it("flags fixes between the preferred and maximum accuracy", () => {
    const fair = createDeliveryConfirmation({ location: { ...TEST_LOCATION, accuracy: 75 } });
    expect(exceedsPreferredAccuracy(fair, DEFAULT_CONFIRMATION_LIMITS)).toBe(true);
    expect(exceedsPreferredAccuracy(createDeliveryConfirmation(), DEFAULT_CONFIRMATION_LIMITS)).toBe(
      false
    );
  });
});

describe("requireProofFor", () => {
  it("requires a pickup confirmation to reach pickedUp", () => {
    expect(requireProofFor("arrivedAtVendor", "pickedUp", undefined)).toEqual({
      valid: false,
      code: "PROOF_REQUIRED",
      message: "Moving from Arrived at Restaurant to Picked Up requires a pickup confirmation",
      context: { from: "arrivedAtVendor", to: "pickedUp", requiredProof: "pickup" },
    });
  });

  it("rejects the wrong kind of proof", () => {
    expect(
      requireProofFor("arrivedAtCustomer", "delivered", createPickupConfirmation())
    ).toMatchObject({
      valid: false,
      code: "PROOF_KIND_MISMATCH",
      message: "Expected a delivery confirmation but received a pickup confirmation",
    });
  });

  it("passes transitions that need no proof", () => {
    expect(requireProofFor("assigned", "onRouteToVendor", undefined)).toEqual({ valid: true });
    expect(requireProofFor("pickedUp", "cancelled", undefined)).toEqual({ valid: true });
  });
});

describe("checkCommitProof", () => {
  it("reports missing proof as a single violation", () => {
    expect(
      checkCommitProof("ord-test-1", "arrivedAtCustomer", "delivered", undefined, DEFAULT_CONFIRMATION_LIMITS)
    ).toEqual({
      valid: false,
      violations: [
        {
          code: "PROOF_REQUIRED",
          message:
            "Moving from Arrived at Customer to Delivered requires a delivery confirmation",
          context: { from: "arrivedAtCustomer", to: "delivered", requiredProof: "delivery" },
        },
      ],
    });
  });

  it("validates the proof against the committed order", () => {
    const result = checkCommitProof(
      "ord-other",
      "arrivedAtCustomer",
      "delivered",
      createDeliveryConfirmation(),
      DEFAULT_CONFIRMATION_LIMITS
    );
    expect(result.valid).toBe(false);
  });

  it("passes complete proof", () => {
    expect(
      checkCommitProof(
        "ord-test-1",
        "arrivedAtVendor",
        "pickedUp",
        createPickupConfirmation(),
        DEFAULT_CONFIRMATION_LIMITS
      )
    ).toEqual({ valid: true });
  });
});
