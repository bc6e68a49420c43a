/**
 * ## FSM Operations - Functional State Validation
 *
 * Standalone versions of the FSM instance methods, for callers that prefer
 * passing the machine as an argument (or passing checks around as callbacks).
 *
 * @example
 * ```typescript
 * import { canTransition, shortestPath } from "@courierflow/fsm";
 *
 * if (!canTransition(legFSM, leg.status, "delivered")) {
 *   const steps = shortestPath(legFSM, leg.status, "delivered");
 * }
 * ```
 */

import type { FSM } from "./types.js";

export function canTransition<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): boolean {
  return fsm.canTransition(from, to);
}

/**
 * @throws FSMTransitionError if transition is not allowed
 */
export function assertTransition<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): void {
  fsm.assertTransition(from, to);
}

export function validTransitions<TState extends string>(
  fsm: FSM<TState>,
  from: TState
): readonly TState[] {
  return fsm.validTransitions(from);
}

export function isTerminal<TState extends string>(fsm: FSM<TState>, state: TState): boolean {
  return fsm.isTerminal(state);
}

export function isValidState<TState extends string>(
  fsm: FSM<TState>,
  state: string
): state is TState {
  return fsm.isValidState(state);
}

export function shortestPath<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): readonly TState[] | null {
  return fsm.shortestPath(from, to);
}

/**
 * States strictly between `from` and `to` on the shortest path.
 *
 * Returns an empty array for direct transitions and `null` when `to`
 * is unreachable from `from`.
 *
 * @example
 * ```typescript
 * intermediateStates(legFSM, "assigned", "delivered"); // ["enRoute"]
 * ```
 */
export function intermediateStates<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): readonly TState[] | null {
  const path = fsm.shortestPath(from, to);
  if (path === null) return null;
  return path.slice(1, -1);
}

export function isReachable<TState extends string>(
  fsm: FSM<TState>,
  from: TState,
  to: TState
): boolean {
  return fsm.reachableFrom(from).has(to);
}
