/**
 * Position Sizer
 * Turns a source order into the mirror order's size and price
 */

import type { Logger } from 'winston';
import type { SizingConfig } from '../config/ConfigurationManager';
import type { OrderSide } from '../models/Order';
import { Decimal, ZERO, minDecimal, roundToTick } from '../utils/decimals';

export interface SizingRequest {
  market: string;
  side: OrderSide;
  sourceSize: Decimal;
  price: Decimal;
  availableBalance: Decimal;
  /** Current signed position in the market; the part of the order that reduces it needs no margin. */
  currentPosition?: Decimal;
}

export type SizingResult =
  | { status: 'sized'; size: Decimal; price: Decimal }
  | { status: 'skipped'; reason: string };

export class PositionSizer {
  constructor(
    private config: SizingConfig,
    private logger: Logger,
    private marginRatio: Decimal = new Decimal(1)
  ) {}

  /**
   * source × copyRatio, capped at maxOrderSize, fitted to the balance, rounded
   * down to sizeTick and checked against minOrderSize. A skip is logged with its reason.
   */
  calculate(request: SizingRequest): SizingResult {
    const result = this.size(request);
    if (result.status === 'skipped') {
      this.logger.info('Mirror order skipped', {
        market: request.market,
        side: request.side,
        sourceSize: request.sourceSize.toString(),
        reason: result.reason
      });
    }
    return result;
  }

  /** Buys round down to the price tick, sells round up. */
  alignPrice(price: Decimal, side: OrderSide): Decimal {
    if (!this.config.priceTick) {
      return price;
    }
    return roundToTick(price, this.config.priceTick, side === 'buy' ? 'round_down' : 'round_up');
  }

  private size(request: SizingRequest): SizingResult {
    const { sourceSize, side, availableBalance } = request;
    if (sourceSize.lte(0)) {
      return { status: 'skipped', reason: `source size ${sourceSize.toString()} is not positive` };
    }

    const price = this.alignPrice(request.price, side);
    if (price.lte(0)) {
      return { status: 'skipped', reason: `price ${request.price.toString()} rounds to zero` };
    }

    let target = sourceSize.mul(this.config.copyRatio);

    if (this.config.maxOrderSize) {
      target = minDecimal(target, this.config.maxOrderSize);
    }

    const current = request.currentPosition ?? ZERO;
    const reducing = current.isZero() || current.isPositive() === (side === 'buy')
      ? ZERO
      : minDecimal(target, current.abs());
    const increasing = target.minus(reducing);
    const requiredMargin = increasing.mul(price).mul(this.marginRatio);

    if (requiredMargin.gt(availableBalance)) {
      if (!this.config.respectBalance) {
        return {
          status: 'skipped',
          reason: `insufficient balance: requires ${requiredMargin.toString()}, available ${availableBalance.toString()}`
        };
      }
      const affordable = Decimal.max(availableBalance, 0).div(price.mul(this.marginRatio));
      target = reducing.plus(minDecimal(increasing, affordable));
    }

    if (this.config.sizeTick) {
      target = roundToTick(target, this.config.sizeTick, 'round_down');
    }

    const { minOrderSize } = this.config;
    if (minOrderSize && target.lt(minOrderSize)) {
      if (!this.config.enforceMinimum) {
        return {
          status: 'skipped',
          reason: `size ${target.toString()} below minimum order size ${minOrderSize.toString()}`
        };
      }
      target = minOrderSize;
    }

    if (target.lte(0)) {
      return { status: 'skipped', reason: 'size rounds to zero' };
    }

    return { status: 'sized', size: target, price };
  }
}
