/**
 * ## Driver Order Entity
 *
 * The read-only view of an order a driver works on. Raw backend records are
 * parsed with zod and their status string goes through `normalizeStatus`;
 * a record whose status is ambiguous is rejected rather than guessed.
 */

import { z } from "zod";
import { assertNever, rejected, success, type Logger, type Outcome } from "@courierflow/core";
import { normalizeStatus } from "./normalize.js";
import type { DriverOrderStatus } from "./status.js";

const PartySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
});

const AddressSchema = z.object({
  street: z.string().min(1),
  city: z.string().min(1),
  postalCode: z.string().nullish(),
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
});

const OrderItemSchema = z.object({
  name: z.string().min(1),
  quantity: z.number().int().positive(),
  unitPrice: z.number().nonnegative(),
});

export const DriverOrderRecordSchema = z.object({
  id: z.string().min(1),
  orderNumber: z.string().min(1),
  status: z.string(),
  assignedDriverId: z.string().nullish(),
  vendor: PartySchema,
  customer: PartySchema,
  deliveryAddress: AddressSchema,
  subtotal: z.number().nonnegative(),
  deliveryFee: z.number().nonnegative(),
  total: z.number().nonnegative(),
  items: z.array(OrderItemSchema),
  createdAt: z.coerce.date(),
  estimatedDeliveryTime: z.coerce.date().nullish(),
  actualDeliveryTime: z.coerce.date().nullish(),
});

export type DriverOrderRecord = z.input<typeof DriverOrderRecordSchema>;

export interface PartyRef {
  id: string;
  name: string;
}

export interface DeliveryAddress {
  street: string;
  city: string;
  postalCode: string | null;
  latitude: number | null;
  longitude: number | null;
}

export interface OrderItem {
  name: string;
  quantity: number;
  unitPrice: number;
}

export interface DriverOrder {
  id: string;
  orderNumber: string;
  status: DriverOrderStatus;
  /** Status string as the backend sent it */
  rawStatus: string;
  assignedDriverId: string | null;
  vendor: PartyRef;
  customer: PartyRef;
  deliveryAddress: DeliveryAddress;
  subtotal: number;
  deliveryFee: number;
  total: number;
  items: OrderItem[];
  createdAt: Date;
  estimatedDeliveryTime: Date | null;
  actualDeliveryTime: Date | null;
}

export type OrderParseErrorCode = "INVALID_RECORD" | "AMBIGUOUS_STATUS" | "UNRECOGNIZED_STATUS";

export type OrderParseResult = Outcome<DriverOrder, never, OrderParseErrorCode>;

export function parseDriverOrder(input: unknown, logger?: Logger): OrderParseResult {
  const parsed = DriverOrderRecordSchema.safeParse(input);
  if (!parsed.success) {
    return rejected(
      "INVALID_RECORD",
      parsed.error.issues
        .map((issue) => `${issue.path.map(String).join(".")}: ${issue.message}`)
        .join("; ")
    );
  }

  const record = parsed.data;
  const assignedDriverId = record.assignedDriverId ?? null;
  const normalized = normalizeStatus(
    record.status,
    logger === undefined ? { assignedDriverId } : { assignedDriverId, logger }
  );

  switch (normalized.kind) {
    case "ambiguous":
      return rejected("AMBIGUOUS_STATUS", normalized.diagnostic, { orderId: record.id });
    case "unrecognized":
      return rejected("UNRECOGNIZED_STATUS", normalized.diagnostic, { orderId: record.id });
    case "recognized":
    case "legacy":
      return success({
        id: record.id,
        orderNumber: record.orderNumber,
        status: normalized.status,
        rawStatus: record.status,
        assignedDriverId,
        vendor: record.vendor,
        customer: record.customer,
        deliveryAddress: {
          street: record.deliveryAddress.street,
          city: record.deliveryAddress.city,
          postalCode: record.deliveryAddress.postalCode ?? null,
          latitude: record.deliveryAddress.latitude ?? null,
          longitude: record.deliveryAddress.longitude ?? null,
        },
        subtotal: record.subtotal,
        deliveryFee: record.deliveryFee,
        total: record.total,
        items: record.items,
        createdAt: record.createdAt,
        estimatedDeliveryTime: record.estimatedDeliveryTime ?? null,
        actualDeliveryTime: record.actualDeliveryTime ?? null,
      });
    default:
      return assertNever(normalized);
  }
}
