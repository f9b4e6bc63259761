/**
 * Event Normalizer
 * Validates raw feed payloads and turns them into canonical domain events
 */

import type { Logger } from 'winston';
import { z } from 'zod';
import type { DomainEvent } from '../models/DomainEvent';
import { NormalizationError } from '../utils/ErrorHandler';
import { addressField, integerIdField, positiveDecimal } from '../utils/schemas';
import { MAX_CLIENT_ORDER_ID_LENGTH } from '../models/Order';

const sequenceField = () =>
  z.union([z.number().int().nonnegative().transform(value => value.toString()), z.string().trim().min(1)]);

const blockField = () => z.number().int().nonnegative();

const OrderCreatedSchema = z.object({
  type: z.literal('OrderCreated'),
  market_address: addressField(),
  order_id: integerIdField(),
  owner: addressField(),
  price: positiveDecimal(),
  size: positiveDecimal(),
  is_buy: z.boolean(),
  cloid: z.string().min(1).max(MAX_CLIENT_ORDER_ID_LENGTH).optional(),
  transaction_hash: z.string().optional(),
  trigger_time: z.number().int().nonnegative().optional()
});

const TradeSchema = z
  .object({
    type: z.literal('Trade'),
    market_address: addressField(),
    orderid: integerIdField(),
    makeraddress: addressField(),
    isbuy: z.boolean(),
    price: positiveDecimal(),
    filledsize: positiveDecimal(),
    cloid: z.string().min(1).max(MAX_CLIENT_ORDER_ID_LENGTH).optional(),
    transaction_hash: z.string().optional(),
    sequence: sequenceField().optional(),
    block_number: blockField().optional(),
    log_index: blockField().optional()
  })
  .refine(trade => trade.sequence !== undefined || trade.block_number !== undefined, {
    message: 'Trade requires a sequence or block_number',
    path: ['sequence']
  });

const OrdersCanceledSchema = z
  .object({
    type: z.literal('OrdersCanceled'),
    market_address: addressField(),
    order_ids: z.array(integerIdField()).min(1),
    owner: addressField().optional(),
    maker_address: addressField().optional(),
    sequence: sequenceField().optional(),
    block_number: blockField().optional(),
    log_index: blockField().optional()
  })
  .refine(cancel => cancel.owner !== undefined || cancel.maker_address !== undefined, {
    message: 'OrdersCanceled requires an owner or maker_address',
    path: ['owner']
  });

const EnvelopeSchema = z
  .object({
    type: z.string(),
    market_address: z.string().optional()
  })
  .passthrough();

export const RAW_EVENT_TYPES = ['OrderCreated', 'Trade', 'OrdersCanceled'] as const;
export type RawEventType = (typeof RAW_EVENT_TYPES)[number];

export type NormalizeResult =
  | { status: 'event'; event: DomainEvent }
  | { status: 'dropped'; reason: string }
  | { status: 'invalid'; error: NormalizationError };

function sequenceMarker(sequence?: string, blockNumber?: number, logIndex?: number): string | undefined {
  if (sequence !== undefined) {
    return sequence;
  }
  if (blockNumber !== undefined) {
    return `${blockNumber}:${logIndex ?? 0}`;
  }
  return undefined;
}

/**
 * Stateless apart from the subscription set. Never throws for bad input:
 * malformed payloads come back as `invalid` results for the caller to record.
 */
export class EventNormalizer {
  private readonly markets: Set<string>;

  constructor(
    markets: string[],
    private logger: Logger,
    private clock: () => number = Date.now
  ) {
    this.markets = new Set(markets.map(market => market.toLowerCase()));
  }

  isSubscribed(market: string): boolean {
    return this.markets.has(market.toLowerCase());
  }

  normalize(raw: unknown): NormalizeResult {
    const envelope = EnvelopeSchema.safeParse(raw);
    if (!envelope.success) {
      return this.invalid('payload has no event type', raw, envelope.error.issues);
    }

    const { type, market_address: market } = envelope.data;
    if (!this.isKnownType(type)) {
      return this.invalid(`unknown event type: ${type}`, raw, [], type);
    }

    // Unsubscribed markets are dropped before full validation
    if (market !== undefined && !this.isSubscribed(market)) {
      const reason = `market ${market.toLowerCase()} is not subscribed`;
      this.logger.debug('Dropping event for unsubscribed market', { market, kind: type });
      return { status: 'dropped', reason };
    }

    switch (type) {
      case 'OrderCreated':
        return this.normalizeOrderCreated(raw);
      case 'Trade':
        return this.normalizeTrade(raw);
      case 'OrdersCanceled':
        return this.normalizeOrdersCanceled(raw);
    }
  }

  private normalizeOrderCreated(raw: unknown): NormalizeResult {
    const parsed = OrderCreatedSchema.safeParse(raw);
    if (!parsed.success) {
      return this.invalid('malformed OrderCreated payload', raw, parsed.error.issues, 'OrderCreated');
    }

    const data = parsed.data;
    return {
      status: 'event',
      event: {
        kind: 'OrderOpened',
        market: data.market_address,
        orderId: data.order_id,
        owner: data.owner,
        side: data.is_buy ? 'buy' : 'sell',
        price: data.price,
        size: data.size,
        clientOrderId: data.cloid,
        txHash: data.transaction_hash,
        observedAt: data.trigger_time !== undefined ? new Date(data.trigger_time * 1000) : new Date(this.clock())
      }
    };
  }

  private normalizeTrade(raw: unknown): NormalizeResult {
    const parsed = TradeSchema.safeParse(raw);
    if (!parsed.success) {
      return this.invalid('malformed Trade payload', raw, parsed.error.issues, 'Trade');
    }

    const data = parsed.data;
    const marker = sequenceMarker(data.sequence, data.block_number, data.log_index);
    if (marker === undefined) {
      return this.invalid('Trade has no sequence marker', raw, [], 'Trade');
    }

    return {
      status: 'event',
      event: {
        kind: 'Filled',
        market: data.market_address,
        orderId: data.orderid,
        maker: data.makeraddress,
        side: data.isbuy ? 'buy' : 'sell',
        price: data.price,
        filledSize: data.filledsize,
        sequenceMarker: marker,
        clientOrderId: data.cloid,
        txHash: data.transaction_hash,
        observedAt: new Date(this.clock())
      }
    };
  }

  private normalizeOrdersCanceled(raw: unknown): NormalizeResult {
    const parsed = OrdersCanceledSchema.safeParse(raw);
    if (!parsed.success) {
      return this.invalid('malformed OrdersCanceled payload', raw, parsed.error.issues, 'OrdersCanceled');
    }

    const data = parsed.data;
    const owner = data.owner ?? data.maker_address;
    if (owner === undefined) {
      return this.invalid('OrdersCanceled has no owner', raw, [], 'OrdersCanceled');
    }

    return {
      status: 'event',
      event: {
        kind: 'OrdersClosed',
        market: data.market_address,
        orderIds: data.order_ids,
        owner,
        sequenceMarker: sequenceMarker(data.sequence, data.block_number, data.log_index),
        observedAt: new Date(this.clock())
      }
    };
  }

  private isKnownType(type: string): type is RawEventType {
    return RAW_EVENT_TYPES.some(known => known === type);
  }

  private invalid(message: string, raw: unknown, issues: z.ZodIssue[], kind?: string): NormalizeResult {
    return { status: 'invalid', error: new NormalizationError(message, raw, issues, kind) };
  }
}
