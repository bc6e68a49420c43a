/**
 * Unit tests for outcome helpers and type guards.
 */
import { describe, it, expect } from "vitest";
import {
  success,
  rejected,
  failed,
  isSuccess,
  isRejected,
  isFailed,
  assertNever,
  type Outcome,
} from "../../src/index.js";

type Failure = { kind: "NetworkError"; retryable: boolean };

function describeOutcome(outcome: Outcome<{ status: string }, Failure>): string {
  switch (outcome.status) {
    case "success":
      return `now ${outcome.data.status}`;
    case "rejected":
      return `rejected: ${outcome.code}`;
    case "failed":
      return `failed: ${outcome.failure.kind}`;
    default:
      return assertNever(outcome);
  }
}

describe("outcome builders", () => {
  it("builds success outcomes", () => {
    expect(success({ status: "pickedUp" })).toEqual({
      status: "success",
      data: { status: "pickedUp" },
    });
  });

  it("omits context when not given", () => {
    expect(rejected("COMMIT_IN_PROGRESS", "busy")).toEqual({
      status: "rejected",
      code: "COMMIT_IN_PROGRESS",
      message: "busy",
    });
  });

  it("keeps context when given", () => {
    expect(failed("offline", { kind: "NetworkError", retryable: true }, { orderId: "o-1" })).toEqual({
      status: "failed",
      reason: "offline",
      failure: { kind: "NetworkError", retryable: true },
      context: { orderId: "o-1" },
    });
  });
});

describe("outcome guards", () => {
  const outcomes: Array<Outcome<{ status: string }, Failure>> = [
    success({ status: "delivered" }),
    rejected("SKIPPED_STEPS", "skipped"),
    failed("offline", { kind: "NetworkError", retryable: true }),
  ];

  it("narrows each variant", () => {
    expect(outcomes.map(isSuccess)).toEqual([true, false, false]);
    expect(outcomes.map(isRejected)).toEqual([false, true, false]);
    expect(outcomes.map(isFailed)).toEqual([false, false, true]);
  });

  it("supports exhaustive switches", () => {
    expect(outcomes.map(describeOutcome)).toEqual([
      "now delivered",
      "rejected: SKIPPED_STEPS",
      "failed: NetworkError",
    ]);
  });
});
