/**
 * Mirror submissions, retry bookkeeping and circuit state
 */

import type { Decimal } from '../utils/decimals';
import type { OrderSide } from './Order';

export interface MirrorAction {
  clientOrderId: string;
  sourceOrderId: string;
  market: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
  createdAt: Date;
}

export type ErrorClassification = 'retriable' | 'permanent';

export interface RetryItem {
  action: MirrorAction;
  attemptCount: number;
  nextRetryAt: number;
  lastErrorKind: string;
  lastError: string;
  classification: ErrorClassification;
  createdAt: number;
  inFlight: boolean;
}

export interface DeadLetterRecord {
  action: MirrorAction;
  attempts: number;
  lastError: string;
  lastErrorKind: string;
  reason: string;
  timestamp: Date;
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}
