/**
 * Position models for per-market exposure and PnL
 */

import type { Decimal } from '../utils/decimals';

/**
 * signedSize > 0 is long, < 0 short, 0 flat. averageEntryPrice is only
 * defined while the position is open.
 */
export interface Position {
  market: string;
  signedSize: Decimal;
  averageEntryPrice?: Decimal;
  realizedPnl: Decimal;
  lastPrice?: Decimal;
  updatedAt: Date;
}

export type PositionSnapshot = Readonly<Position>;

export interface PositionDelta {
  market: string;
  previousSize: Decimal;
  newSize: Decimal;
  averageEntryPrice?: Decimal;
  realizedPnl: Decimal;
  flipped: boolean;
}

export interface PortfolioSnapshot {
  positions: PositionSnapshot[];
  totalExposure: Decimal;
  totalRealizedPnl: Decimal;
  takenAt: Date;
}

export interface BalanceSnapshot {
  asset: string;
  available: Decimal;
}
