/**
 * Group invariants so a value can be checked against all of them at once.
 *
 * @example
 * ```typescript
 * const deliveryProof = createInvariantSet([photoPresent, locationPresent, accuracyWithinLimit]);
 *
 * deliveryProof.assertAll(proof, limits);        // first violation throws
 * const result = deliveryProof.validateAll(proof, limits);
 * if (!result.valid) {
 *   showMissingProof(result.violations);
 * }
 * ```
 */

import type { Invariant, InvariantSet, InvariantSetResult, InvariantViolation } from "./types.js";

export function createInvariantSet<TState, TCode extends string, TParams extends unknown[] = []>(
  invariants: Array<Invariant<TState, TCode, TParams>>
): InvariantSet<TState, TCode, TParams> {
  const frozenInvariants = Object.freeze([...invariants]);

  return {
    invariants: frozenInvariants,

    checkAll(state: TState, ...params: TParams): boolean {
      return frozenInvariants.every((inv) => inv.check(state, ...params));
    },

    assertAll(state: TState, ...params: TParams): void {
      for (const inv of frozenInvariants) {
        inv.assert(state, ...params);
      }
    },

    validateAll(state: TState, ...params: TParams): InvariantSetResult<TCode> {
      const violations: Array<InvariantViolation<TCode>> = [];

      for (const inv of frozenInvariants) {
        const result = inv.validate(state, ...params);
        if (result.valid) continue;

        const violation: InvariantViolation<TCode> = { code: result.code, message: result.message };
        if (result.context !== undefined) {
          violation.context = result.context;
        }
        violations.push(violation);
      }

      return violations.length === 0 ? { valid: true } : { valid: false, violations };
    },
  };
}
