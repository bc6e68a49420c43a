/**
 * Core Type Aliases
 *
 * Shared type definitions used throughout @courierflow packages.
 */

/**
 * Alias for Record<string, unknown>.
 *
 * Used for log data, error context and other structured payloads whose
 * shape is not known at compile time.
 */
export type UnknownRecord = Record<string, unknown>;

/**
 * Exhaustiveness check helper for switch statements on discriminated unions.
 *
 * @example
 * ```typescript
 * switch (outcome.status) {
 *   case "success":
 *     return "OK";
 *   case "rejected":
 *     return outcome.message;
 *   case "failed":
 *     return outcome.reason;
 *   default:
 *     return assertNever(outcome);
 * }
 * ```
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
