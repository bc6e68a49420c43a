/**
 * ## Commit Errors
 *
 * Why a status commit did not land, as a tagged value. Callers branch on
 * `kind` (or on the policy flags), never on message text.
 *
 * | Kind | Policy | Typical source |
 * |------|--------|----------------|
 * | `NetworkError` | retryable | Timeouts, dropped connections, 5xx |
 * | `AlreadyCompleted` | requiresRefresh | Commit on an order that is already terminal |
 * | `Conflict` | requiresRefresh | Another actor moved the order first (409) |
 * | `PermissionDenied` | fatal | 401 / 403 |
 * | `ValidationFailed` | fatal | Guarded repository refused the commit |
 * | `Unknown` | fatal | Anything else |
 */

import type { InvariantViolation, UnknownRecord } from "@courierflow/core";

export type CommitErrorKind =
  | "NetworkError"
  | "PermissionDenied"
  | "AlreadyCompleted"
  | "Conflict"
  | "ValidationFailed"
  | "Unknown";

export interface CommitErrorPolicy {
  /** Same request may succeed later */
  retryable: boolean;
  /** Local state is stale; re-fetch before doing anything else */
  requiresRefresh: boolean;
  /** Neither retrying nor refreshing will help */
  fatal: boolean;
}

export interface CommitError extends CommitErrorPolicy {
  kind: CommitErrorKind;
  message: string;
  statusCode?: number;
  violations?: InvariantViolation[];
  context?: UnknownRecord;
}

export const COMMIT_ERROR_POLICY: Readonly<Record<CommitErrorKind, CommitErrorPolicy>> = {
  NetworkError: { retryable: true, requiresRefresh: false, fatal: false },
  AlreadyCompleted: { retryable: false, requiresRefresh: true, fatal: false },
  Conflict: { retryable: false, requiresRefresh: true, fatal: false },
  PermissionDenied: { retryable: false, requiresRefresh: false, fatal: true },
  ValidationFailed: { retryable: false, requiresRefresh: false, fatal: true },
  Unknown: { retryable: false, requiresRefresh: false, fatal: true },
};

const COMMIT_ERROR_KINDS = new Set<string>(Object.keys(COMMIT_ERROR_POLICY));

/**
 * User-facing text for kinds that have a fixed message.
 */
export const ALREADY_COMPLETED_MESSAGE = "This order has already been completed";
export const CONFLICT_MESSAGE = "This order was updated elsewhere. Showing the latest status";

export interface CommitErrorDetails {
  statusCode?: number;
  violations?: InvariantViolation[];
  context?: UnknownRecord;
}

export function createCommitError(
  kind: CommitErrorKind,
  message: string,
  details: CommitErrorDetails = {}
): CommitError {
  return { kind, message, ...COMMIT_ERROR_POLICY[kind], ...details };
}

export function isCommitError(value: unknown): value is CommitError {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    typeof value.kind === "string" &&
    COMMIT_ERROR_KINDS.has(value.kind) &&
    "message" in value &&
    typeof value.message === "string"
  );
}

/**
 * Node and browser socket error codes that mean the request never got an answer.
 */
const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

function statusCodeOf(error: object): number | undefined {
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

function errorCodeOf(error: object): string | undefined {
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error && typeof error.cause === "object" && error.cause !== null) {
    return errorCodeOf(error.cause);
  }
  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unknown error";
}

function classifyStatusCode(statusCode: number): CommitErrorKind | null {
  if (statusCode === 401 || statusCode === 403) return "PermissionDenied";
  if (statusCode === 409) return "Conflict";
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) return "NetworkError";
  return null;
}

/**
 * Turn whatever a backend client threw into a `CommitError`.
 *
 * Commit errors pass through unchanged. Otherwise an HTTP-like `status` /
 * `statusCode` property decides, then a socket error `code` (also on
 * `cause`), and anything left is `Unknown`.
 */
export function classifyCommitFailure(error: unknown): CommitError {
  if (isCommitError(error)) return error;

  const message = messageOf(error);
  if (typeof error !== "object" || error === null) {
    return createCommitError("Unknown", message);
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    const kind = classifyStatusCode(statusCode);
    if (kind !== null) return createCommitError(kind, message, { statusCode });
    return createCommitError("Unknown", message, { statusCode });
  }

  const code = errorCodeOf(error);
  if (code !== undefined && NETWORK_ERROR_CODES.has(code)) {
    return createCommitError("NetworkError", message, { context: { code } });
  }

  return createCommitError("Unknown", message);
}

/**
 * Message to show the driver for a failed commit.
 */
export function userMessageFor(error: CommitError): string {
  switch (error.kind) {
    case "AlreadyCompleted":
      return ALREADY_COMPLETED_MESSAGE;
    case "Conflict":
      return CONFLICT_MESSAGE;
    case "NetworkError":
      return "Could not reach the server. Check your connection and try again";
    case "PermissionDenied":
      return "You are no longer assigned to this order";
    case "ValidationFailed":
    case "Unknown":
      return error.message;
  }
}
