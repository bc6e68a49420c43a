/**
 * Ambient building blocks shared by @courierflow packages: logging,
 * invariants, outcomes, IDs and configuration.
 *
 * @module @courierflow/core
 */

export type { UnknownRecord } from "./types.js";
export { assertNever } from "./types.js";

export * from "./logging/index.js";
export * from "./invariants/index.js";
export * from "./outcome/index.js";
export * from "./ids/index.js";
export * from "./config/index.js";
