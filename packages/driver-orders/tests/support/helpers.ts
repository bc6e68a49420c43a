/**
 * Shared helpers for step definitions.
 *
 * Gherkin hands every parameter over as a string; these turn them back into
 * the workflow's types and fail the step on a typo.
 */
import {
  isDriverOrderAction,
  isDriverOrderStatus,
  type DriverOrderAction,
  type DriverOrderStatus,
} from "../../src/index.js";

export function toStatus(value: string): DriverOrderStatus {
  if (!isDriverOrderStatus(value)) {
    throw new Error(`Unknown driver order status "${value}" in feature file`);
  }
  return value;
}

export function toAction(value: string): DriverOrderAction {
  if (!isDriverOrderAction(value)) {
    throw new Error(`Unknown driver action "${value}" in feature file`);
  }
  return value;
}

/**
 * Clock for realtime pushes: each call is one minute after the previous one.
 */
export function createPushClock(start = "2026-03-02T12:00:00.000Z"): () => Date {
  let tick = 0;
  const base = new Date(start).getTime();
  return () => {
    tick += 1;
    return new Date(base + tick * 60_000);
  };
}
