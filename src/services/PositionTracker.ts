/**
 * Position Tracker
 * Aggregates confirmed fills into per-market positions with average entry,
 * realized and unrealized PnL, and portfolio exposure
 */

import type { Logger } from 'winston';
import type { OrderSide } from '../models/Order';
import type { PortfolioSnapshot, Position, PositionDelta, PositionSnapshot } from '../models/Position';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { Decimal, ZERO, notional } from '../utils/decimals';

function freeze(position: Position): PositionSnapshot {
  return Object.freeze({ ...position });
}

/**
 * Position Tracker class. The only writer of Position state.
 */
export class PositionTracker {
  private positions: Map<string, Position> = new Map();

  constructor(
    private logger: Logger,
    private clock: () => number = Date.now
  ) {}

  /**
   * Applies a confirmed fill. Three cases: the fill extends the position (or
   * opens it from flat), reduces it, or closes it and opens the opposite side.
   */
  applyFill(market: string, side: OrderSide, size: Decimal, price: Decimal): PositionDelta {
    if (size.lte(0) || price.lte(0)) {
      throw new ApplicationError(
        'fill size and price must be positive',
        'INVALID_FILL',
        ErrorCategory.RECONCILIATION,
        ErrorSeverity.HIGH,
        {
          operation: 'applyFill',
          component: 'PositionTracker',
          market,
          timestamp: new Date(this.clock()),
          metadata: { size: size.toString(), price: price.toString() }
        }
      );
    }

    const key = market.toLowerCase();
    const position = this.positions.get(key) ?? this.emptyPosition(key);
    const previousSize = position.signedSize;
    const signedFill = side === 'buy' ? size : size.neg();
    const newSize = previousSize.plus(signedFill);

    let realized = ZERO;
    let flipped = false;

    if (previousSize.isZero() || previousSize.isNegative() === signedFill.isNegative()) {
      // Same direction: weighted average entry
      const previousAverage = position.averageEntryPrice ?? ZERO;
      position.averageEntryPrice = previousSize
        .abs()
        .mul(previousAverage)
        .plus(size.mul(price))
        .div(newSize.abs());
    } else {
      const entry = position.averageEntryPrice ?? price;
      const direction = previousSize.isPositive() ? 1 : -1;
      const closedSize = Decimal.min(size, previousSize.abs());
      realized = closedSize.mul(price.minus(entry)).mul(direction);

      if (newSize.isZero()) {
        position.averageEntryPrice = undefined;
      } else if (newSize.isPositive() !== previousSize.isPositive()) {
        // Flip: the remainder opens fresh at the fill price
        flipped = true;
        position.averageEntryPrice = price;
      }
    }

    position.signedSize = newSize;
    position.realizedPnl = position.realizedPnl.plus(realized);
    position.lastPrice = price;
    position.updatedAt = new Date(this.clock());
    this.positions.set(key, position);

    this.logger.debug('Position updated', {
      market: key,
      side,
      size: size.toString(),
      price: price.toString(),
      previousSize: previousSize.toString(),
      newSize: newSize.toString(),
      realized: realized.toString(),
      flipped
    });

    return {
      market: key,
      previousSize,
      newSize,
      averageEntryPrice: position.averageEntryPrice,
      realizedPnl: realized,
      flipped
    };
  }

  /**
   * Updates the mark used for exposure; never touches size or PnL
   */
  markPrice(market: string, price: Decimal): void {
    const position = this.positions.get(market.toLowerCase());
    if (position) {
      position.lastPrice = price;
      position.updatedAt = new Date(this.clock());
    }
  }

  unrealizedPnl(market: string, mark: Decimal): Decimal {
    const position = this.positions.get(market.toLowerCase());
    if (!position || position.signedSize.isZero() || !position.averageEntryPrice) {
      return ZERO;
    }
    return position.signedSize.mul(mark.minus(position.averageEntryPrice));
  }

  marketExposure(market: string): Decimal {
    const position = this.positions.get(market.toLowerCase());
    if (!position || !position.lastPrice) {
      return ZERO;
    }
    return notional(position.signedSize, position.lastPrice);
  }

  /**
   * Σ |signedSize| × lastPrice over all markets
   */
  totalExposure(): Decimal {
    let total = ZERO;
    for (const market of this.positions.keys()) {
      total = total.plus(this.marketExposure(market));
    }
    return total;
  }

  totalRealizedPnl(): Decimal {
    let total = ZERO;
    for (const position of this.positions.values()) {
      total = total.plus(position.realizedPnl);
    }
    return total;
  }

  getPosition(market: string): PositionSnapshot | undefined {
    const position = this.positions.get(market.toLowerCase());
    return position ? freeze(position) : undefined;
  }

  snapshot(): PortfolioSnapshot {
    return {
      positions: Array.from(this.positions.values()).map(freeze),
      totalExposure: this.totalExposure(),
      totalRealizedPnl: this.totalRealizedPnl(),
      takenAt: new Date(this.clock())
    };
  }

  private emptyPosition(market: string): Position {
    return {
      market,
      signedSize: ZERO,
      realizedPnl: ZERO,
      updatedAt: new Date(this.clock())
    };
  }
}
