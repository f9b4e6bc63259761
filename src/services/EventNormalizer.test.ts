import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { EventNormalizer } from './EventNormalizer';
import type { NormalizeResult } from './EventNormalizer';
import type { DomainEvent } from '../models/DomainEvent';
import { NormalizationError } from '../utils/ErrorHandler';
import { createLogger } from '../utils/logger';

const MARKET = '0xmarket';
const NOW = 1_700_000_000_000;

function expectEvent(result: NormalizeResult): DomainEvent {
  if (result.status !== 'event') {
    throw new Error(`expected an event, got ${result.status}`);
  }
  return result.event;
}

function expectInvalid(result: NormalizeResult): NormalizationError {
  if (result.status !== 'invalid') {
    throw new Error(`expected invalid, got ${result.status}`);
  }
  return result.error;
}

describe('EventNormalizer', () => {
  let normalizer: EventNormalizer;

  beforeEach(() => {
    normalizer = new EventNormalizer(['0xMARKET'], createLogger({ silent: true }), () => NOW);
  });

  describe('OrderCreated', () => {
    it('should produce an OrderOpened event with decimal fields', () => {
      const event = expectEvent(normalizer.normalize({
        type: 'OrderCreated',
        market_address: '0xMarket',
        order_id: 42,
        owner: '0xSource',
        price: '100.5',
        size: 3,
        is_buy: true,
        cloid: 'abc',
        trigger_time: 1_700_000_000
      }));

      expect(event.kind).toBe('OrderOpened');
      if (event.kind !== 'OrderOpened') return;
      expect(event.market).toBe(MARKET);
      expect(event.orderId).toBe('42');
      expect(event.owner).toBe('0xsource');
      expect(event.side).toBe('buy');
      expect(event.price.toString()).toBe('100.5');
      expect(event.size.toString()).toBe('3');
      expect(event.clientOrderId).toBe('abc');
      expect(event.observedAt.getTime()).toBe(1_700_000_000_000);
    });

    it('should map is_buy false to a sell and default observedAt to the clock', () => {
      const event = expectEvent(normalizer.normalize({
        type: 'OrderCreated',
        market_address: MARKET,
        order_id: '7',
        owner: '0xsource',
        price: 2,
        size: '1',
        is_buy: false
      }));

      expect(event.kind === 'OrderOpened' && event.side).toBe('sell');
      expect(event.observedAt.getTime()).toBe(NOW);
    });

    it('should reject a non-positive price', () => {
      const error = expectInvalid(normalizer.normalize({
        type: 'OrderCreated',
        market_address: MARKET,
        order_id: 1,
        owner: '0xsource',
        price: '0',
        size: '1',
        is_buy: true
      }));

      expect(error.message).toBe('malformed OrderCreated payload');
      expect(error.issues.map(issue => issue.path.join('.'))).toEqual(['price']);
    });

    it('should reject a client order id longer than 36 characters', () => {
      const error = expectInvalid(normalizer.normalize({
        type: 'OrderCreated',
        market_address: MARKET,
        order_id: 1,
        owner: '0xsource',
        price: '1',
        size: '1',
        is_buy: true,
        cloid: 'x'.repeat(37)
      }));

      expect(error.issues.map(issue => issue.path.join('.'))).toEqual(['cloid']);
    });
  });

  describe('Trade', () => {
    const trade = {
      type: 'Trade',
      market_address: MARKET,
      orderid: '1001',
      makeraddress: '0xMirror',
      isbuy: true,
      price: '99',
      filledsize: '0.25'
    };

    it('should use an explicit sequence as the marker', () => {
      const event = expectEvent(normalizer.normalize({ ...trade, sequence: 17 }));

      expect(event.kind).toBe('Filled');
      if (event.kind !== 'Filled') return;
      expect(event.sequenceMarker).toBe('17');
      expect(event.maker).toBe('0xmirror');
      expect(event.filledSize.toString()).toBe('0.25');
      expect(event.observedAt.getTime()).toBe(NOW);
    });

    it('should join block number and log index', () => {
      const event = expectEvent(normalizer.normalize({ ...trade, block_number: 500, log_index: 3 }));

      expect(event.kind === 'Filled' && event.sequenceMarker).toBe('500:3');
    });

    it('should default a missing log index to zero', () => {
      const event = expectEvent(normalizer.normalize({ ...trade, block_number: 500 }));

      expect(event.kind === 'Filled' && event.sequenceMarker).toBe('500:0');
    });

    it('should reject a trade with no sequence marker', () => {
      const error = expectInvalid(normalizer.normalize(trade));

      expect(error.issues.map(issue => issue.message)).toEqual(['Trade requires a sequence or block_number']);
    });

    it('should reject a zero fill size', () => {
      const error = expectInvalid(normalizer.normalize({ ...trade, sequence: 1, filledsize: 0 }));

      expect(error.issues.map(issue => issue.path.join('.'))).toEqual(['filledsize']);
      expect(error.context.kind).toBe('Trade');
    });
  });

  describe('OrdersCanceled', () => {
    it('should produce OrdersClosed with string ids', () => {
      const event = expectEvent(normalizer.normalize({
        type: 'OrdersCanceled',
        market_address: MARKET,
        order_ids: [1, '2'],
        maker_address: '0xSource',
        sequence: 'abc'
      }));

      expect(event).toEqual({
        kind: 'OrdersClosed',
        market: MARKET,
        orderIds: ['1', '2'],
        owner: '0xsource',
        sequenceMarker: 'abc',
        observedAt: new Date(NOW)
      });
    });

    it('should reject an empty id list', () => {
      const error = expectInvalid(normalizer.normalize({
        type: 'OrdersCanceled',
        market_address: MARKET,
        order_ids: [],
        owner: '0xsource'
      }));

      expect(error.issues.map(issue => issue.path.join('.'))).toEqual(['order_ids']);
    });

    it('should reject a cancellation without an owner', () => {
      const error = expectInvalid(normalizer.normalize({
        type: 'OrdersCanceled',
        market_address: MARKET,
        order_ids: [1]
      }));

      expect(error.issues.map(issue => issue.message)).toEqual(['OrdersCanceled requires an owner or maker_address']);
    });
  });

  describe('Envelope handling', () => {
    it('should drop events for unsubscribed markets', () => {
      const result = normalizer.normalize({ type: 'Trade', market_address: '0xOTHER' });

      expect(result).toEqual({ status: 'dropped', reason: 'market 0xother is not subscribed' });
    });

    it('should report unknown event types', () => {
      const error = expectInvalid(normalizer.normalize({ type: 'Deposit', market_address: MARKET }));

      expect(error).toBeInstanceOf(NormalizationError);
      expect(error.message).toBe('unknown event type: Deposit');
      expect(error.code).toBe('MALFORMED_PAYLOAD');
    });

    it('should report payloads without a type and keep the raw payload', () => {
      const raw = { market_address: MARKET };
      const error = expectInvalid(normalizer.normalize(raw));

      expect(error.message).toBe('payload has no event type');
      expect(error.raw).toBe(raw);
    });
  });

  describe('Property-Based Tests', () => {
    it('should never throw for arbitrary input', () => {
      fc.assert(
        fc.property(fc.anything(), raw => {
          const result = normalizer.normalize(raw);
          expect(['event', 'dropped', 'invalid']).toContain(result.status);
        }),
        { numRuns: 200 }
      );
    });

    it('should accept any positive decimal string as a fill size', () => {
      fc.assert(
        fc.property(fc.integer({ min: 1, max: 1_000_000 }), fc.integer({ min: 0, max: 6 }), (units, scale) => {
          const size = (units / 10 ** scale).toFixed(scale);
          const event = expectEvent(normalizer.normalize({
            type: 'Trade',
            market_address: MARKET,
            orderid: 1,
            makeraddress: '0xm',
            isbuy: false,
            price: '1',
            filledsize: size,
            sequence: 1
          }));

          expect(event.kind === 'Filled' && event.filledSize.gt(0)).toBe(true);
        }),
        { numRuns: 100 }
      );
    });
  });
});
