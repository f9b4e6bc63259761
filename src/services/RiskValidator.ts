/**
 * Risk Validator
 * Pure accept/reject of a proposed mirror action against position and balance snapshots
 */

import type { RiskConfig } from '../config/ConfigurationManager';
import type { MirrorAction } from '../models/MirrorAction';
import type { BalanceSnapshot, PortfolioSnapshot } from '../models/Position';
import { Decimal, ZERO, notional } from '../utils/decimals';

export type RiskRule = 'balance' | 'size' | 'exposure' | 'concentration';

export type RiskDecision =
  | { accepted: true; exposureDelta: Decimal }
  | { accepted: false; rule: RiskRule; reason: string };

interface ActionImpact {
  currentSize: Decimal;
  resultingSize: Decimal;
  increasingSize: Decimal;
  marketExposure: Decimal;
  exposureDelta: Decimal;
}

function reject(rule: RiskRule, reason: string): RiskDecision {
  return { accepted: false, rule, reason };
}

export class RiskValidator {
  constructor(private config: RiskConfig) {}

  /**
   * Checks run in a fixed order and the first failure wins: balance, size,
   * aggregate exposure, then concentration. Actions that only reduce a
   * position are never blocked by the exposure checks.
   */
  validate(action: MirrorAction, portfolio: PortfolioSnapshot, balance: BalanceSnapshot): RiskDecision {
    const impact = this.impactOf(action, portfolio);

    const balanceCheck = this.checkBalance(action, impact, balance);
    if (balanceCheck) return balanceCheck;

    const sizeCheck = this.checkSize(action, impact);
    if (sizeCheck) return sizeCheck;

    if (impact.exposureDelta.lte(0)) {
      return { accepted: true, exposureDelta: impact.exposureDelta };
    }

    const projectedTotal = portfolio.totalExposure.plus(impact.exposureDelta);
    if (projectedTotal.gt(this.config.maxTotalExposure)) {
      return reject(
        'exposure',
        `exposure limit exceeded: would reach ${projectedTotal.toString()}/${this.config.maxTotalExposure.toString()}`
      );
    }

    const { maxMarketConcentration } = this.config;
    if (maxMarketConcentration && projectedTotal.gt(0)) {
      const concentration = impact.marketExposure.plus(impact.exposureDelta).div(projectedTotal);
      if (concentration.gt(maxMarketConcentration)) {
        return reject(
          'concentration',
          `concentration limit exceeded: ${action.market} would hold ${concentration.toDecimalPlaces(4).toString()} of exposure, max ${maxMarketConcentration.toString()}`
        );
      }
    }

    return { accepted: true, exposureDelta: impact.exposureDelta };
  }

  private checkBalance(action: MirrorAction, impact: ActionImpact, balance: BalanceSnapshot): RiskDecision | undefined {
    const { minBalance, marginRatio } = this.config;
    if (minBalance && balance.available.lt(minBalance)) {
      return reject(
        'balance',
        `balance below minimum: ${balance.available.toString()} ${balance.asset} < ${minBalance.toString()}`
      );
    }

    // Reducing portions need no margin
    const requiredMargin = notional(impact.increasingSize, action.price).mul(marginRatio);
    if (requiredMargin.gt(balance.available)) {
      return reject(
        'balance',
        `insufficient balance: requires ${requiredMargin.toString()} ${balance.asset}, available ${balance.available.toString()}`
      );
    }

    return undefined;
  }

  private checkSize(action: MirrorAction, impact: ActionImpact): RiskDecision | undefined {
    if (action.size.lt(this.config.minOrderSize)) {
      return reject(
        'size',
        `order size ${action.size.toString()} below minimum ${this.config.minOrderSize.toString()}`
      );
    }

    if (impact.increasingSize.gt(0)) {
      const resultingNotional = notional(impact.resultingSize, action.price);
      if (resultingNotional.gt(this.config.maxPositionSize)) {
        return reject(
          'size',
          `position limit exceeded: would reach ${resultingNotional.toString()}/${this.config.maxPositionSize.toString()}`
        );
      }
    }

    return undefined;
  }

  /**
   * Splits the action into the part that reduces the current position and the
   * part that opens or extends one. After the fill the market is valued at the
   * action price, which is how PositionTracker marks it.
   */
  private impactOf(action: MirrorAction, portfolio: PortfolioSnapshot): ActionImpact {
    const market = action.market.toLowerCase();
    const position = portfolio.positions.find(candidate => candidate.market === market);
    const currentSize = position?.signedSize ?? ZERO;
    const signedAction = action.side === 'buy' ? action.size : action.size.neg();
    const resultingSize = currentSize.plus(signedAction);

    const sameDirection = currentSize.isZero() || currentSize.isNegative() === signedAction.isNegative();
    const increasingSize = sameDirection
      ? action.size
      : action.size.minus(currentSize.abs()).clampedTo(0, action.size);

    const marketExposure = position?.lastPrice ? notional(currentSize, position.lastPrice) : ZERO;
    const exposureDelta = increasingSize.isZero()
      ? notional(resultingSize, action.price).minus(marketExposure).clampedTo(marketExposure.neg(), 0)
      : notional(resultingSize, action.price).minus(marketExposure);

    return { currentSize, resultingSize, increasingSize, marketExposure, exposureDelta };
  }
}
