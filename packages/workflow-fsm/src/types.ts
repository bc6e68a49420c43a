/**
 * ## FSM Types - Explicit Workflow Transitions
 *
 * A workflow FSM names every legal move between states up front, so callers
 * can ask "may this happen?" without touching any I/O.
 *
 * ### Core Types
 *
 * | Type | Purpose |
 * |------|---------|
 * | `FSMDefinition<TState>` | Configuration: initial state + transition map |
 * | `FSM<TState>` | Instance with validation and path queries |
 * | `FSMTransitionError` | Error thrown by `assertTransition` |
 *
 * ### Definition Structure
 *
 * ```typescript
 * {
 *   initial: "assigned",
 *   transitions: {
 *     assigned: ["enRoute", "cancelled"],
 *     enRoute: ["delivered", "cancelled"],
 *     delivered: [],   // terminal
 *     cancelled: [],   // terminal
 *   },
 * }
 * ```
 */

/**
 * FSM definition for a set of states with allowed transitions.
 *
 * @typeParam TState - Union type of all valid states (string literals)
 */
export interface FSMDefinition<TState extends string> {
  /**
   * The state a new entity starts in.
   */
  initial: TState;

  /**
   * Map of state → allowed target states.
   * Empty array = terminal state (no outgoing transitions).
   */
  transitions: Record<TState, readonly TState[]>;
}

/**
 * A complete FSM instance.
 *
 * Created by `defineFSM()`.
 *
 * @typeParam TState - Union type of all valid states
 */
export interface FSM<TState extends string> {
  readonly definition: FSMDefinition<TState>;

  readonly initial: TState;

  /**
   * All states declared in the definition, in declaration order.
   */
  readonly states: readonly TState[];

  canTransition(from: TState, to: TState): boolean;

  /**
   * @throws FSMTransitionError if the transition is not allowed
   */
  assertTransition(from: TState, to: TState): void;

  validTransitions(from: TState): readonly TState[];

  /**
   * True when the state has no outgoing transitions.
   */
  isTerminal(state: TState): boolean;

  isValidState(state: string): state is TState;

  /**
   * Shortest chain of transitions leading from `from` to `to`, both ends
   * included. Returns `null` when `to` cannot be reached.
   *
   * `shortestPath(s, s)` is `[s]`.
   */
  shortestPath(from: TState, to: TState): readonly TState[] | null;

  /**
   * Every state reachable from `from` through one or more transitions.
   */
  reachableFrom(from: TState): ReadonlySet<TState>;
}

/**
 * Error thrown when an invalid FSM transition is asserted.
 */
export class FSMTransitionError extends Error {
  readonly code = "FSM_INVALID_TRANSITION";
  readonly from: string;
  readonly to: string;
  readonly validTransitions: readonly string[];

  constructor(from: string, to: string, validTransitions: readonly string[]) {
    const validList =
      validTransitions.length > 0 ? validTransitions.join(", ") : "(none - terminal state)";
    super(`Invalid transition from "${from}" to "${to}". Valid transitions: ${validList}`);
    this.name = "FSMTransitionError";
    this.from = from;
    this.to = to;
    this.validTransitions = validTransitions;
    Object.setPrototypeOf(this, FSMTransitionError.prototype);
  }

  static isFSMTransitionError(error: unknown): error is FSMTransitionError {
    return error instanceof FSMTransitionError;
  }
}
