/**
 * ## Status Normalization
 *
 * Backend records carry the status as a free string. Older records use the
 * order-level enum (`confirmed`, `out_for_delivery`, ...) instead of the
 * driver workflow statuses. `normalizeStatus` turns either into a
 * `DriverOrderStatus`, and refuses to guess when the string does not say
 * enough.
 *
 * | Input | Result kind |
 * |-------|-------------|
 * | `picked_up`, `pickedUp`, ` PICKED_UP ` | `recognized` |
 * | `out_for_delivery`, `confirmed`, `preparing`, `ready` | `legacy` |
 * | `pending` or unknown, driver assigned | `ambiguous` |
 * | unknown, no driver | `unrecognized` |
 */

import { createScopedLogger, type Logger } from "@courierflow/core";
import { ALL_DRIVER_STATUSES, DriverOrderStatus, toWireStatus } from "./status.js";

export type NormalizedStatus =
  | { kind: "recognized" | "legacy"; status: DriverOrderStatus }
  | { kind: "ambiguous" | "unrecognized"; raw: string; diagnostic: string };

export interface NormalizeOptions {
  assignedDriverId?: string | null;
  /** Defaults to a console logger scoped `DriverOrders:normalize` */
  logger?: Logger;
}

export const NORMALIZE_LOG_SCOPE = "DriverOrders:normalize";

const defaultLogger = createScopedLogger(NORMALIZE_LOG_SCOPE);

const LEGACY_STATUS_MAP: Readonly<Record<string, DriverOrderStatus>> = {
  out_for_delivery: DriverOrderStatus.pickedUp,
  confirmed: DriverOrderStatus.assigned,
  preparing: DriverOrderStatus.assigned,
  ready: DriverOrderStatus.assigned,
};

const KNOWN_STATUSES: ReadonlyMap<string, DriverOrderStatus> = new Map(
  ALL_DRIVER_STATUSES.flatMap((status) => [
    [toWireStatus(status), status] as const,
    [status.toLowerCase(), status] as const,
  ])
);

function lookupLegacy(key: string): DriverOrderStatus | undefined {
  return Object.hasOwn(LEGACY_STATUS_MAP, key) ? LEGACY_STATUS_MAP[key] : undefined;
}

export function normalizeStatus(raw: string, options: NormalizeOptions = {}): NormalizedStatus {
  const logger = options.logger ?? defaultLogger;
  const key = raw.trim().toLowerCase();

  const known = KNOWN_STATUSES.get(key);
  if (known !== undefined) {
    return { kind: "recognized", status: known };
  }

  const legacy = lookupLegacy(key);
  if (legacy !== undefined) {
    logger.debug("Mapped legacy order status", { raw, status: legacy });
    return { kind: "legacy", status: legacy };
  }

  const driverId = options.assignedDriverId ?? null;
  if (driverId !== null && driverId !== "") {
    const diagnostic =
      `Status "${raw}" does not identify a workflow step, but driver ${driverId} is assigned; ` +
      "refresh the order before acting on it";
    logger.warn("Ambiguous order status", { raw, assignedDriverId: driverId });
    return { kind: "ambiguous", raw, diagnostic };
  }

  const diagnostic = `Status "${raw}" is not a driver workflow status and no driver is assigned`;
  logger.warn("Unrecognized order status", { raw });
  return { kind: "unrecognized", raw, diagnostic };
}

export function isResolved(
  result: NormalizedStatus
): result is Extract<NormalizedStatus, { status: DriverOrderStatus }> {
  return result.kind === "recognized" || result.kind === "legacy";
}
