/**
 * Realtime status feed contract.
 *
 * A feed delivers authoritative status changes pushed by the backend. Events
 * may be coalesced, so consecutive events for one order can skip statuses.
 */

import type { DriverOrderStatus } from "./status.js";

export interface OrderStatusEvent {
  orderId: string;
  status: DriverOrderStatus;
  /** Status string as the backend sent it, when it differed */
  rawStatus?: string;
  observedAt: Date;
}

export type OrderStatusListener = (event: OrderStatusEvent) => void;

export type Unsubscribe = () => void;

export interface RealtimeFeed {
  subscribe(listener: OrderStatusListener): Unsubscribe;
}
