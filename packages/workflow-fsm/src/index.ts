/**
 * Finite State Machine module for explicit workflow transitions.
 *
 * @example
 * ```typescript
 * import { defineFSM, canTransition, FSMTransitionError } from "@courierflow/fsm";
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
 * if (!canTransition(legFSM, leg.status, "enRoute")) {
 *   // reject the driver action
 * }
 * ```
 *
 * @module @courierflow/fsm
 */

// Types
export type { FSMDefinition, FSM } from "./types.js";
export { FSMTransitionError } from "./types.js";

// Factory
export { defineFSM } from "./defineFSM.js";

// Operations
export {
  canTransition,
  assertTransition,
  validTransitions,
  isTerminal,
  isValidState,
  shortestPath,
  intermediateStates,
  isReachable,
} from "./operations.js";
