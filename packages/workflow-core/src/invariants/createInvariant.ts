/**
 * ## Invariant Framework - Declarative Business Rules
 *
 * Builds an invariant with check(), assert() and validate() from a single
 * configuration object.
 *
 * @example
 * ```typescript
 * const accuracyWithinLimit = createInvariant<GeoLocation, ConfirmationErrorCode, [number]>(
 *   {
 *     name: "accuracyWithinLimit",
 *     code: "LOCATION_INACCURATE",
 *     check: (location, maxMeters) => location.accuracy <= maxMeters,
 *     message: (location, maxMeters) =>
 *       `Location accuracy ${location.accuracy}m exceeds ${maxMeters}m`,
 *   },
 *   ConfirmationInvariantError
 * );
 *
 * accuracyWithinLimit.assert(location, 100);
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Invariant, InvariantErrorConstructor, InvariantResult } from "./types.js";

export interface InvariantConfig<TState, TCode extends string, TParams extends unknown[] = []> {
  name: string;

  code: TCode;

  /**
   * Returns true when the rule holds.
   */
  check: (state: TState, ...params: TParams) => boolean;

  message: (state: TState, ...params: TParams) => string;

  context?: (state: TState, ...params: TParams) => UnknownRecord;
}

export function createInvariant<TState, TCode extends string, TParams extends unknown[] = []>(
  config: InvariantConfig<TState, TCode, TParams>,
  ErrorClass: InvariantErrorConstructor<TCode>
): Invariant<TState, TCode, TParams> {
  const { name, code, check, message, context } = config;

  return {
    name,
    code,

    check(state: TState, ...params: TParams): boolean {
      return check(state, ...params);
    },

    assert(state: TState, ...params: TParams): void {
      if (!check(state, ...params)) {
        throw new ErrorClass(code, message(state, ...params), context?.(state, ...params));
      }
    },

    validate(state: TState, ...params: TParams): InvariantResult<TCode> {
      if (check(state, ...params)) {
        return { valid: true };
      }

      const errorContext = context?.(state, ...params);
      if (errorContext !== undefined) {
        return { valid: false, code, message: message(state, ...params), context: errorContext };
      }
      return { valid: false, code, message: message(state, ...params) };
    },
  };
}
