import type { UnknownRecord } from "../types.js";

export interface ConfigIssue {
  /** Dotted path of the offending key, empty for object-level issues */
  path: string;
  message: string;
}

/**
 * Raised when configuration input does not satisfy its schema.
 */
export class ConfigError extends Error {
  readonly code = "CONFIG_INVALID";
  readonly issues: readonly ConfigIssue[];

  constructor(scope: string, issues: readonly ConfigIssue[]) {
    const detail = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join("; ");
    super(`Invalid ${scope} configuration: ${detail}`);
    this.name = "ConfigError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }

  toJSON(): UnknownRecord {
    return { name: this.name, code: this.code, issues: this.issues };
  }

  static isConfigError(error: unknown): error is ConfigError {
    return error instanceof ConfigError;
  }
}
