/**
 * Canonical feed events produced by the EventNormalizer
 */

import type { Decimal } from '../utils/decimals';
import type { OrderSide } from './Order';

export interface OrderOpenedEvent {
  kind: 'OrderOpened';
  market: string;
  orderId: string;
  owner: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  clientOrderId?: string;
  txHash?: string;
  observedAt: Date;
}

export interface FilledEvent {
  kind: 'Filled';
  market: string;
  orderId: string;
  maker: string;
  side: OrderSide;
  price: Decimal;
  filledSize: Decimal;
  sequenceMarker: string;
  clientOrderId?: string;
  txHash?: string;
  observedAt: Date;
}

export interface OrdersClosedEvent {
  kind: 'OrdersClosed';
  market: string;
  orderIds: string[];
  owner: string;
  sequenceMarker?: string;
  observedAt: Date;
}

export type DomainEvent = OrderOpenedEvent | FilledEvent | OrdersClosedEvent;
