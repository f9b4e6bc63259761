/**
 * Order and fill data models
 */

import type { Decimal } from '../utils/decimals';

export type OrderSide = 'buy' | 'sell';

export enum OrderStatus {
  PENDING = 'PENDING',
  OPEN = 'OPEN',
  PARTIALLY_FILLED = 'PARTIALLY_FILLED',
  FILLED = 'FILLED',
  CANCELED = 'CANCELED'
}

export const TERMINAL_STATUSES: ReadonlySet<OrderStatus> = new Set([
  OrderStatus.FILLED,
  OrderStatus.CANCELED
]);

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export const MAX_CLIENT_ORDER_ID_LENGTH = 36;

/**
 * Immutable record of one execution against an order. Venue order ids are
 * only unique within a market; fills are keyed by (market, orderId,
 * sequenceMarker) and a replayed key is never applied twice.
 */
export interface Fill {
  market: string;
  orderId: string;
  filledSize: Decimal;
  price: Decimal;
  sequenceMarker: string;
  observedAt: Date;
}

export interface Order {
  orderId: string;
  clientOrderId: string;
  sourceOrderId?: string;
  market: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  remainingSize: Decimal;
  filledSize: Decimal;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
  lastSequenceMarker?: string;
}

export type OrderSnapshot = Readonly<Order>;
