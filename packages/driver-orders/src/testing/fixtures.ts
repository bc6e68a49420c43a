/**
 * Test data builders. Every builder takes overrides so a test only spells
 * out the fields it cares about.
 */

import type {
  DeliveryConfirmation,
  GeoLocation,
  PickupConfirmation,
} from "../confirmation.js";
import type { DriverOrder, DriverOrderRecord } from "../order.js";
import { toWireStatus, type DriverOrderStatus } from "../status.js";

export const TEST_DRIVER_ID = "driver-test-1";

export const TEST_CONFIRMED_AT = new Date("2026-03-02T12:30:00.000Z");

export const TEST_LOCATION: GeoLocation = {
  latitude: 52.52,
  longitude: 13.405,
  accuracy: 12,
};

export function createTestOrder(overrides: Partial<DriverOrder> = {}): DriverOrder {
  const status: DriverOrderStatus = overrides.status ?? "assigned";
  return {
    id: "ord-test-1",
    orderNumber: "TST-1001",
    status,
    rawStatus: toWireStatus(status),
    assignedDriverId: TEST_DRIVER_ID,
    vendor: { id: "vendor-test-1", name: "Test Kitchen" },
    customer: { id: "customer-test-1", name: "Test Customer" },
    deliveryAddress: {
      street: "1 Example Street",
      city: "Testville",
      postalCode: "00000",
      latitude: 52.5,
      longitude: 13.4,
    },
    subtotal: 24,
    deliveryFee: 3.5,
    total: 27.5,
    items: [
      { name: "Noodle box", quantity: 2, unitPrice: 9 },
      { name: "Spring rolls", quantity: 1, unitPrice: 6 },
    ],
    createdAt: new Date("2026-03-02T12:00:00.000Z"),
    estimatedDeliveryTime: new Date("2026-03-02T12:45:00.000Z"),
    actualDeliveryTime: null,
    ...overrides,
  };
}

/**
 * A raw backend record as `parseDriverOrder` receives it.
 */
export function createTestOrderRecord(
  overrides: Partial<DriverOrderRecord> = {}
): DriverOrderRecord {
  return {
    id: "ord-test-1",
    orderNumber: "TST-1001",
    status: "assigned",
    assignedDriverId: TEST_DRIVER_ID,
    vendor: { id: "vendor-test-1", name: "Test Kitchen" },
    customer: { id: "customer-test-1", name: "Test Customer" },
    deliveryAddress: { street: "1 Example Street", city: "Testville" },
    subtotal: 24,
    deliveryFee: 3.5,
    total: 27.5,
    items: [{ name: "Noodle box", quantity: 2, unitPrice: 9 }],
    createdAt: "2026-03-02T12:00:00.000Z",
    ...overrides,
  };
}

export function createPickupConfirmation(
  overrides: Partial<PickupConfirmation> = {}
): PickupConfirmation {
  return {
    kind: "pickup",
    orderId: "ord-test-1",
    confirmedAt: TEST_CONFIRMED_AT,
    photoUrl: "",
    location: null,
    confirmedBy: TEST_DRIVER_ID,
    checklist: { orderNumberMatches: true, itemsChecked: true, packagingIntact: true },
    ...overrides,
  };
}

export function createDeliveryConfirmation(
  overrides: Partial<DeliveryConfirmation> = {}
): DeliveryConfirmation {
  return {
    kind: "delivery",
    orderId: "ord-test-1",
    confirmedAt: TEST_CONFIRMED_AT,
    photoUrl: "https://photos.example.test/ord-test-1.jpg",
    location: TEST_LOCATION,
    confirmedBy: TEST_DRIVER_ID,
    recipientName: "Test Customer",
    ...overrides,
  };
}
