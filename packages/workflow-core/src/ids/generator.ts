/**
 * UUID v7 and prefixed ID generation.
 *
 * ID Format: {context}_{type}_{uuidv7}
 * Example: driver_commit_0190a7c4-1234-7abc-8def-1234567890ab
 *
 * Uses the `uuid` package for RFC 9562 UUID v7 generation, so IDs sort by
 * creation time.
 */
import { v7 as uuidv7 } from "uuid";

/**
 * Lowercase alphanumeric only; underscores delimit the parts.
 */
const VALID_ID_PART = /^[a-z0-9]+$/;

const MAX_ID_PART_LENGTH = 64;

function validateIdPart(part: string, name: string): void {
  if (!part) {
    throw new Error(`${name} cannot be empty`);
  }
  if (!VALID_ID_PART.test(part)) {
    throw new Error(
      `Invalid ${name}: "${part}". Must contain only lowercase letters and numbers.`
    );
  }
  if (part.length > MAX_ID_PART_LENGTH) {
    throw new Error(
      `${name} too long: "${part}" (${part.length} chars). Maximum is ${MAX_ID_PART_LENGTH}.`
    );
  }
}

/**
 * @throws Error if context or type contains invalid characters
 *
 * @example
 * ```typescript
 * generateId("driver", "commit"); // "driver_commit_0190a7c4-..."
 * generateId("driver_orders", "commit"); // throws
 * ```
 */
export function generateId(context: string, type: string): string {
  validateIdPart(context, "context");
  validateIdPart(type, "type");
  return `${context}_${type}_${uuidv7()}`;
}

/**
 * Split a prefixed ID into its parts, or null if it has fewer than three.
 */
export function parseId(id: string): { context: string; type: string; uuid: string } | null {
  const [context, type, ...uuidParts] = id.split("_");

  if (!context || !type || uuidParts.length === 0) {
    return null;
  }

  return { context, type, uuid: uuidParts.join("_") };
}
