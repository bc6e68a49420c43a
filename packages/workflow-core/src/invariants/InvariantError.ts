import type { UnknownRecord } from "../types.js";

/**
 * Base error for domain rule violations.
 *
 * Each domain derives its own typed subclass with `forContext`, so callers
 * can narrow on both the class and the code.
 *
 * @example
 * ```typescript
 * type ConfirmationErrorCode = "PHOTO_REQUIRED" | "LOCATION_REQUIRED";
 *
 * const ConfirmationInvariantError =
 *   InvariantError.forContext<ConfirmationErrorCode>("Confirmation");
 *
 * throw new ConfirmationInvariantError("PHOTO_REQUIRED", "A delivery photo is required", {
 *   orderId,
 * });
 * ```
 */
export class InvariantError<TCode extends string = string> extends Error {
  public readonly code: TCode;

  // Declared only, so the field is not defined as undefined when omitted
  declare readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord) {
    super(message);
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "InvariantError";
  }

  /**
   * Create a named subclass for one domain.
   */
  static forContext<TCode extends string>(
    contextName: string
  ): new (code: TCode, message: string, context?: UnknownRecord) => InvariantError<TCode> {
    const ContextInvariantError = class extends InvariantError<TCode> {
      constructor(code: TCode, message: string, context?: UnknownRecord) {
        super(code, message, context);
        this.name = `${contextName}InvariantError`;
      }
    };

    Object.defineProperty(ContextInvariantError, "name", {
      value: `${contextName}InvariantError`,
      configurable: true,
    });

    return ContextInvariantError;
  }

  static isInvariantError(error: unknown): error is InvariantError {
    return error instanceof InvariantError;
  }

  static hasCode<T extends string>(error: unknown, code: T): error is InvariantError<T> {
    return InvariantError.isInvariantError(error) && error.code === code;
  }
}
