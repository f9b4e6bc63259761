import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Decimal } from '../utils/decimals';
import type { DecimalInput } from '../utils/decimals';
import { RiskValidator } from './RiskValidator';
import type { RiskConfig } from '../config/ConfigurationManager';
import type { MirrorAction } from '../models/MirrorAction';
import type { BalanceSnapshot, PortfolioSnapshot, PositionSnapshot } from '../models/Position';

const d = (value: DecimalInput) => new Decimal(value);

const baseConfig: RiskConfig = {
  minOrderSize: d(1),
  maxPositionSize: d(5000),
  maxTotalExposure: d(5000),
  marginRatio: d(1)
};

function action(overrides: Partial<MirrorAction> = {}): MirrorAction {
  return {
    clientOrderId: 'client-1',
    sourceOrderId: '1',
    market: '0xb',
    side: 'buy',
    price: d(100),
    size: d(10),
    createdAt: new Date(0),
    ...overrides
  };
}

function position(market: string, signedSize: DecimalInput, lastPrice: DecimalInput): PositionSnapshot {
  return {
    market,
    signedSize: d(signedSize),
    averageEntryPrice: d(lastPrice),
    realizedPnl: d(0),
    lastPrice: d(lastPrice),
    updatedAt: new Date(0)
  };
}

function portfolio(...positions: PositionSnapshot[]): PortfolioSnapshot {
  const totalExposure = positions.reduce(
    (sum, p) => sum.plus(p.signedSize.abs().mul(p.lastPrice ?? 0)),
    d(0)
  );
  return { positions, totalExposure, totalRealizedPnl: d(0), takenAt: new Date(0) };
}

const richBalance: BalanceSnapshot = { asset: 'USDC', available: d(1_000_000) };

describe('RiskValidator', () => {
  describe('Aggregate exposure', () => {
    it('should reject an action that takes total exposure over the ceiling', () => {
      const validator = new RiskValidator(baseConfig);
      const decision = validator.validate(action(), portfolio(position('0xa', 45, 100)), richBalance);

      expect(decision).toEqual({
        accepted: false,
        rule: 'exposure',
        reason: 'exposure limit exceeded: would reach 5500/5000'
      });
    });

    it('should accept a reduction in a market that is already over the limit', () => {
      const validator = new RiskValidator(baseConfig);
      const decision = validator.validate(
        action({ market: '0xa', side: 'sell' }),
        portfolio(position('0xa', 60, 100)),
        richBalance
      );

      expect(decision.accepted).toBe(true);
      if (decision.accepted) {
        expect(decision.exposureDelta.toString()).toBe('-1000');
      }
    });

    it('should accept an action that lands exactly on the ceiling', () => {
      const validator = new RiskValidator(baseConfig);
      const decision = validator.validate(action(), portfolio(position('0xa', 40, 100)), richBalance);

      expect(decision.accepted).toBe(true);
    });
  });

  describe('Balance', () => {
    it('should reject when margin on the increasing part exceeds the balance', () => {
      const validator = new RiskValidator({ ...baseConfig, marginRatio: d('0.5') });
      const decision = validator.validate(action(), portfolio(), { asset: 'USDC', available: d(400) });

      expect(decision).toEqual({
        accepted: false,
        rule: 'balance',
        reason: 'insufficient balance: requires 500 USDC, available 400'
      });
    });

    it('should require margin only on the part of a flip that opens the new side', () => {
      const validator = new RiskValidator(baseConfig);
      const decision = validator.validate(
        action({ market: '0xa', side: 'sell', size: d(15) }),
        portfolio(position('0xa', 10, 100)),
        { asset: 'USDC', available: d(500) }
      );

      expect(decision.accepted).toBe(true);
    });

    it('should require no margin for a pure reduction', () => {
      const validator = new RiskValidator(baseConfig);
      const decision = validator.validate(
        action({ market: '0xa', side: 'sell', size: d(5) }),
        portfolio(position('0xa', 10, 100)),
        { asset: 'USDC', available: d(0) }
      );

      expect(decision.accepted).toBe(true);
    });

    it('should enforce the minimum balance floor first', () => {
      const validator = new RiskValidator({ ...baseConfig, minBalance: d(100), minOrderSize: d(50) });
      const decision = validator.validate(action(), portfolio(), { asset: 'USDC', available: d(99) });

      expect(decision).toEqual({
        accepted: false,
        rule: 'balance',
        reason: 'balance below minimum: 99 USDC < 100'
      });
    });
  });

  describe('Size', () => {
    it('should reject orders below the minimum size', () => {
      const validator = new RiskValidator({ ...baseConfig, minOrderSize: d(20) });
      const decision = validator.validate(action(), portfolio(), richBalance);

      expect(decision).toEqual({ accepted: false, rule: 'size', reason: 'order size 10 below minimum 20' });
    });

    it('should reject a resulting position over the per-market limit', () => {
      const validator = new RiskValidator({ ...baseConfig, maxPositionSize: d(1500), maxTotalExposure: d(100000) });
      const decision = validator.validate(
        action({ market: '0xa' }),
        portfolio(position('0xa', 10, 100)),
        richBalance
      );

      expect(decision).toEqual({
        accepted: false,
        rule: 'size',
        reason: 'position limit exceeded: would reach 2000/1500'
      });
    });

    it('should check balance before size', () => {
      const validator = new RiskValidator({ ...baseConfig, minOrderSize: d(20) });
      const decision = validator.validate(action(), portfolio(), { asset: 'USDC', available: d(1) });

      expect(decision.accepted === false && decision.rule).toBe('balance');
    });
  });

  describe('Concentration', () => {
    it('should reject an action that concentrates exposure in one market', () => {
      const validator = new RiskValidator({
        ...baseConfig,
        maxTotalExposure: d(100000),
        maxMarketConcentration: d('0.5')
      });
      const decision = validator.validate(
        action({ market: '0xa' }),
        portfolio(position('0xa', 10, 100), position('0xc', 10, 100)),
        richBalance
      );

      expect(decision).toEqual({
        accepted: false,
        rule: 'concentration',
        reason: 'concentration limit exceeded: 0xa would hold 0.6667 of exposure, max 0.5'
      });
    });

    it('should allow reductions regardless of concentration', () => {
      const validator = new RiskValidator({ ...baseConfig, maxMarketConcentration: d('0.1') });
      const decision = validator.validate(
        action({ market: '0xa', side: 'sell', size: d(2) }),
        portfolio(position('0xa', 10, 100)),
        richBalance
      );

      expect(decision.accepted).toBe(true);
    });
  });

  describe('Property-Based Tests', () => {
    it('should never reject a pure reduction on exposure or concentration grounds', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: 1000 }),
          fc.integer({ min: 1, max: 1000 }),
          fc.integer({ min: 1, max: 500 }),
          fc.integer({ min: 1, max: 500 }),
          (held, reduceBy, lastPrice, actionPrice) => {
            const size = Math.min(held, reduceBy);
            const validator = new RiskValidator({
              ...baseConfig,
              minOrderSize: d(0),
              maxTotalExposure: d(1),
              maxMarketConcentration: d('0.01')
            });
            const decision = validator.validate(
              action({ market: '0xa', side: 'sell', size: d(size), price: d(actionPrice) }),
              portfolio(position('0xa', held, lastPrice), position('0xz', 1, 1)),
              richBalance
            );

            expect(decision.accepted).toBe(true);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should have no side effects on the snapshots it reads', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 100 }), size => {
          const validator = new RiskValidator(baseConfig);
          const snapshot = portfolio(position('0xa', 10, 100));
          const before = snapshot.totalExposure.toString();

          validator.validate(action({ size: d(size) }), snapshot, richBalance);

          expect(snapshot.totalExposure.toString()).toBe(before);
          expect(snapshot.positions[0].signedSize.toString()).toBe('10');
        }),
        { numRuns: 50 }
      );
    });
  });
});
