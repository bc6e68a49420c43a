/**
 * ## defineFSM - Type-Safe State Machine Factory
 *
 * Builds an FSM from a definition with pre-computed lookup tables, so
 * membership checks are O(1) and path queries run a breadth-first search
 * over the transition map.
 *
 * | Method | Returns | Purpose |
 * |--------|---------|---------|
 * | `canTransition(from, to)` | `boolean` | Check if transition valid |
 * | `assertTransition(from, to)` | `void` | Throw if invalid |
 * | `validTransitions(from)` | `TState[]` | List valid targets |
 * | `isTerminal(state)` | `boolean` | Check for end state |
 * | `isValidState(state)` | `boolean` | Type guard for state |
 * | `shortestPath(from, to)` | `TState[] \| null` | Steps between two states |
 * | `reachableFrom(state)` | `Set<TState>` | Everything still reachable |
 *
 * @example
 * ```typescript
 * import { defineFSM } from "@courierflow/fsm";
 *
 * type Leg = "assigned" | "enRoute" | "delivered" | "cancelled";
 *
 * export const legFSM = defineFSM<Leg>({
 *   initial: "assigned",
 *   transitions: {
 *     assigned: ["enRoute", "cancelled"],
 *     enRoute: ["delivered", "cancelled"],
 *     delivered: [],
 *     cancelled: [],
 *   },
 * });
 *
 * legFSM.shortestPath("assigned", "delivered"); // ["assigned", "enRoute", "delivered"]
 * ```
 */

import type { FSM, FSMDefinition } from "./types.js";
import { FSMTransitionError } from "./types.js";

/**
 * Create a type-safe FSM from a definition. The transition rows are frozen,
 * so the lists handed out by `validTransitions` cannot be changed by callers.
 *
 * @typeParam TState - Union type of all valid states
 */
export function defineFSM<TState extends string>(definition: FSMDefinition<TState>): FSM<TState> {
  const states = Object.keys(definition.transitions).filter(
    (key): key is TState => key in definition.transitions
  );
  for (const state of states) {
    Object.freeze(definition.transitions[state]);
  }
  Object.freeze(states);
  const validStates = new Set<string>(states);

  const targetsOf = (from: TState): readonly TState[] => definition.transitions[from] ?? [];

  const fsm: FSM<TState> = {
    definition,
    initial: definition.initial,
    states,

    canTransition(from: TState, to: TState): boolean {
      return targetsOf(from).includes(to);
    },

    assertTransition(from: TState, to: TState): void {
      const allowed = targetsOf(from);
      if (!allowed.includes(to)) {
        throw new FSMTransitionError(from, to, allowed);
      }
    },

    validTransitions(from: TState): readonly TState[] {
      return targetsOf(from);
    },

    isTerminal(state: TState): boolean {
      return targetsOf(state).length === 0;
    },

    isValidState(state: string): state is TState {
      return validStates.has(state);
    },

    shortestPath(from: TState, to: TState): readonly TState[] | null {
      if (from === to) return [from];

      const previous = new Map<TState, TState>();
      const visited = new Set<TState>([from]);
      const queue: TState[] = [from];

      while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined) break;

        for (const next of targetsOf(current)) {
          if (visited.has(next)) continue;
          visited.add(next);
          previous.set(next, current);

          if (next === to) {
            const path: TState[] = [to];
            let step = previous.get(to);
            while (step !== undefined) {
              path.unshift(step);
              step = previous.get(step);
            }
            return path;
          }
          queue.push(next);
        }
      }

      return null;
    },

    reachableFrom(from: TState): ReadonlySet<TState> {
      const reached = new Set<TState>();
      const stack: TState[] = [...targetsOf(from)];

      while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined || reached.has(current)) continue;
        reached.add(current);
        stack.push(...targetsOf(current));
      }

      return reached;
    },
  };

  return fsm;
}
