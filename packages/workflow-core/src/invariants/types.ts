/**
 * Types for the declarative invariant framework.
 *
 * An invariant is one named business rule with three entry points:
 *
 * ```typescript
 * photoPresent.check(proof);     // boolean
 * photoPresent.assert(proof);    // throws or void
 * photoPresent.validate(proof);  // InvariantResult
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { InvariantError } from "./InvariantError.js";

/**
 * Constructor shape returned by InvariantError.forContext().
 */
export type InvariantErrorConstructor<TCode extends string> = new (
  code: TCode,
  message: string,
  context?: UnknownRecord
) => InvariantError<TCode>;

/**
 * A single rule checked against a value.
 *
 * @typeParam TState - The value being validated
 * @typeParam TCode - The error code type
 * @typeParam TParams - Extra arguments the rule needs (limits, reference ids)
 */
export interface Invariant<TState, TCode extends string = string, TParams extends unknown[] = []> {
  readonly name: string;

  readonly code: TCode;

  check(state: TState, ...params: TParams): boolean;

  /**
   * @throws InvariantError if the rule does not hold
   */
  assert(state: TState, ...params: TParams): void;

  validate(state: TState, ...params: TParams): InvariantResult<TCode>;
}

export interface InvariantViolation<TCode extends string = string> {
  code: TCode;
  message: string;
  context?: UnknownRecord;
}

export type InvariantResult<TCode extends string = string> =
  | { valid: true }
  | ({ valid: false } & InvariantViolation<TCode>);

/**
 * Rules checked together, in declaration order.
 *
 * - `assertAll` throws on the first violation
 * - `validateAll` collects every violation
 */
export interface InvariantSet<TState, TCode extends string = string, TParams extends unknown[] = []> {
  readonly invariants: ReadonlyArray<Invariant<TState, TCode, TParams>>;

  /**
   * @throws InvariantError for the first rule that does not hold
   */
  assertAll(state: TState, ...params: TParams): void;

  checkAll(state: TState, ...params: TParams): boolean;

  validateAll(state: TState, ...params: TParams): InvariantSetResult<TCode>;
}

export type InvariantSetResult<TCode extends string = string> =
  | { valid: true }
  | { valid: false; violations: Array<InvariantViolation<TCode>> };
