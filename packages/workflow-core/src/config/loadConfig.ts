/**
 * ## Configuration Loading
 *
 * Configuration is a zod schema plus a table mapping schema keys to
 * environment variable names. Values arrive as strings (or undefined) and
 * the schema coerces and defaults them.
 *
 * @example
 * ```typescript
 * const RetrySchema = z.object({
 *   attempts: z.coerce.number().int().positive().default(3),
 * });
 *
 * const config = loadConfigFromEnv("retry", RetrySchema, { attempts: "RETRY_ATTEMPTS" }, process.env);
 * ```
 */

import type { z } from "zod";
import { ConfigError, type ConfigIssue } from "./ConfigError.js";

export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Schema key → environment variable name.
 */
export type EnvMapping = Readonly<Record<string, string>>;

/**
 * Parse arbitrary input against a schema.
 *
 * @throws ConfigError listing every issue
 */
export function parseConfig<TSchema extends z.ZodType>(
  scope: string,
  schema: TSchema,
  input: unknown
): z.output<TSchema> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
  }));
  throw new ConfigError(scope, issues);
}

/**
 * Collect mapped environment variables and parse them.
 *
 * Empty strings are treated as unset so schema defaults apply.
 *
 * @throws ConfigError listing every issue
 */
export function loadConfigFromEnv<TSchema extends z.ZodType>(
  scope: string,
  schema: TSchema,
  mapping: EnvMapping,
  env: EnvSource
): z.output<TSchema> {
  const input: Record<string, string> = {};

  for (const [key, variable] of Object.entries(mapping)) {
    const raw = env[variable]?.trim();
    if (raw !== undefined && raw !== "") {
      input[key] = raw;
    }
  }

  return parseConfig(scope, schema, input);
}
