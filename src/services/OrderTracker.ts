/**
 * Order Tracker
 * Per-order lifecycle for the mirror wallet's orders, source-to-mirror identity
 * mapping and idempotent fill application
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'winston';
import { MAX_CLIENT_ORDER_ID_LENGTH, OrderStatus, isTerminal } from '../models/Order';
import type { Fill, Order, OrderSide, OrderSnapshot } from '../models/Order';
import { ApplicationError, DuplicateOrderError, ErrorCategory, ErrorSeverity } from '../utils/ErrorHandler';
import { Decimal, ZERO, minDecimal } from '../utils/decimals';
import { RecentKeySet } from '../utils/RecentKeySet';

export interface RegisterOrderParams {
  orderId: string;
  clientOrderId?: string;
  sourceOrderId?: string;
  market: string;
  side: OrderSide;
  price: Decimal;
  size: Decimal;
}

export interface OrderTrackerConfig {
  recentFillCapacity: number;
}

export type FillOutcome =
  | { status: 'applied'; order: OrderSnapshot; appliedSize: Decimal; capped: boolean }
  | { status: 'duplicate'; orderId: string }
  | { status: 'terminal'; order: OrderSnapshot }
  | { status: 'unknown'; orderId: string };

export type CancelOutcome =
  | { status: 'canceled'; order: OrderSnapshot }
  | { status: 'already_terminal'; order: OrderSnapshot }
  | { status: 'unknown'; orderId: string };

function orderKey(market: string, orderId: string): string {
  return `${market.toLowerCase()}:${orderId}`;
}

function freeze(order: Order): OrderSnapshot {
  return Object.freeze({ ...order });
}

/**
 * Venue order ids are only unique per market, so every lookup takes the market.
 */
export class OrderTracker {
  private orders: Map<string, Order> = new Map();
  private byClientOrderId: Map<string, string> = new Map();
  private bySourceOrderId: Map<string, string> = new Map();
  private recentFills: RecentKeySet;

  constructor(
    private logger: Logger,
    config: OrderTrackerConfig = { recentFillCapacity: 10000 },
    private clock: () => number = Date.now
  ) {
    this.recentFills = new RecentKeySet(config.recentFillCapacity);
  }

  /**
   * Starts tracking a submitted order in PENDING
   */
  register(params: RegisterOrderParams): OrderSnapshot {
    const market = params.market.toLowerCase();
    const key = orderKey(market, params.orderId);
    const clientOrderId = params.clientOrderId ?? randomUUID();
    const context = {
      operation: 'register',
      component: 'OrderTracker',
      market,
      orderId: params.orderId,
      clientOrderId,
      timestamp: new Date(this.clock())
    };

    if (clientOrderId.length === 0 || clientOrderId.length > MAX_CLIENT_ORDER_ID_LENGTH) {
      throw new ApplicationError(
        `client order id must be 1-${MAX_CLIENT_ORDER_ID_LENGTH} characters`,
        'INVALID_ORDER',
        ErrorCategory.VALIDATION,
        ErrorSeverity.MEDIUM,
        context
      );
    }
    if (params.size.lte(0) || params.price.lte(0)) {
      throw new ApplicationError(
        'order size and price must be positive',
        'INVALID_ORDER',
        ErrorCategory.VALIDATION,
        ErrorSeverity.MEDIUM,
        context
      );
    }
    if (this.orders.has(key)) {
      throw new DuplicateOrderError(`order ${params.orderId} is already registered on ${market}`, context);
    }
    if (this.byClientOrderId.has(clientOrderId)) {
      throw new DuplicateOrderError(`client order id ${clientOrderId} is already registered`, context);
    }

    const now = new Date(this.clock());
    const order: Order = {
      orderId: params.orderId,
      clientOrderId,
      sourceOrderId: params.sourceOrderId,
      market,
      side: params.side,
      price: params.price,
      size: params.size,
      remainingSize: params.size,
      filledSize: ZERO,
      status: OrderStatus.PENDING,
      createdAt: now,
      updatedAt: now
    };

    this.orders.set(key, order);
    this.byClientOrderId.set(clientOrderId, key);
    if (params.sourceOrderId !== undefined) {
      this.bySourceOrderId.set(orderKey(market, params.sourceOrderId), key);
    }

    this.logger.info('Order registered', {
      market,
      orderId: order.orderId,
      clientOrderId,
      sourceOrderId: order.sourceOrderId,
      side: order.side,
      size: order.size.toString(),
      price: order.price.toString()
    });

    return freeze(order);
  }

  /**
   * PENDING → OPEN once the venue's own open event for the order is seen
   */
  acknowledge(market: string, orderId: string): OrderSnapshot | undefined {
    const order = this.orders.get(orderKey(market, orderId));
    if (!order) {
      this.logger.debug('Acknowledgement for untracked order', { market, orderId });
      return undefined;
    }

    if (order.status !== OrderStatus.PENDING) {
      this.logger.debug('Acknowledgement ignored', { market, orderId, status: order.status });
      return freeze(order);
    }

    order.status = OrderStatus.OPEN;
    order.updatedAt = new Date(this.clock());
    return freeze(order);
  }

  /**
   * Applies a fill at most once per (market, orderId, sequenceMarker). An
   * overrun is capped to the remaining size.
   */
  applyFill(fill: Fill): FillOutcome {
    const key = orderKey(fill.market, fill.orderId);
    const order = this.orders.get(key);
    const meta = { market: fill.market, orderId: fill.orderId, sequenceMarker: fill.sequenceMarker };

    if (!order) {
      this.logger.debug('Fill for untracked order', meta);
      return { status: 'unknown', orderId: fill.orderId };
    }

    if (!this.recentFills.add(`${key}|${fill.sequenceMarker}`)) {
      this.logger.debug('Duplicate fill ignored', meta);
      return { status: 'duplicate', orderId: fill.orderId };
    }

    if (isTerminal(order.status)) {
      this.logger.warn('Fill for terminal order discarded', {
        ...meta,
        status: order.status,
        filledSize: fill.filledSize.toString()
      });
      return { status: 'terminal', order: freeze(order) };
    }

    const appliedSize = minDecimal(fill.filledSize, order.remainingSize);
    const capped = appliedSize.lt(fill.filledSize);
    if (capped) {
      this.logger.warn('Fill exceeds remaining size, capping', {
        ...meta,
        reported: fill.filledSize.toString(),
        remaining: order.remainingSize.toString()
      });
    }

    order.remainingSize = order.remainingSize.minus(appliedSize);
    order.filledSize = order.filledSize.plus(appliedSize);
    order.status = order.remainingSize.isZero() ? OrderStatus.FILLED : OrderStatus.PARTIALLY_FILLED;
    order.lastSequenceMarker = fill.sequenceMarker;
    order.updatedAt = new Date(this.clock());

    return { status: 'applied', order: freeze(order), appliedSize, capped };
  }

  /**
   * Confirmed cancellation. Freezes remainingSize; terminal orders are left as they are.
   */
  applyCancel(market: string, orderId: string, sequenceMarker?: string): CancelOutcome {
    const order = this.orders.get(orderKey(market, orderId));
    if (!order) {
      this.logger.debug('Cancel for untracked order', { market, orderId });
      return { status: 'unknown', orderId };
    }

    if (isTerminal(order.status)) {
      this.logger.debug('Cancel for terminal order ignored', { market, orderId, status: order.status });
      return { status: 'already_terminal', order: freeze(order) };
    }

    order.status = OrderStatus.CANCELED;
    order.lastSequenceMarker = sequenceMarker ?? order.lastSequenceMarker;
    order.updatedAt = new Date(this.clock());
    this.logger.info('Order canceled', {
      market: order.market,
      orderId,
      clientOrderId: order.clientOrderId,
      remainingSize: order.remainingSize.toString()
    });

    return { status: 'canceled', order: freeze(order) };
  }

  get(market: string, orderId: string): OrderSnapshot | undefined {
    const order = this.orders.get(orderKey(market, orderId));
    return order ? freeze(order) : undefined;
  }

  isTracked(market: string, orderId: string): boolean {
    return this.orders.has(orderKey(market, orderId));
  }

  findByClientOrderId(clientOrderId: string): OrderSnapshot | undefined {
    const key = this.byClientOrderId.get(clientOrderId);
    const order = key ? this.orders.get(key) : undefined;
    return order ? freeze(order) : undefined;
  }

  /**
   * Resolves the mirror order registered for a source order
   */
  findBySourceOrderId(market: string, sourceOrderId: string): OrderSnapshot | undefined {
    const key = this.bySourceOrderId.get(orderKey(market, sourceOrderId));
    const order = key ? this.orders.get(key) : undefined;
    return order ? freeze(order) : undefined;
  }

  getOpenOrders(market?: string): OrderSnapshot[] {
    const wanted = market?.toLowerCase();
    return Array.from(this.orders.values())
      .filter(order => !isTerminal(order.status) && (wanted === undefined || order.market === wanted))
      .map(freeze);
  }

  snapshot(): OrderSnapshot[] {
    return Array.from(this.orders.values()).map(freeze);
  }

  /**
   * Filled fraction of the order, 0 to 1
   */
  getFillRate(market: string, orderId: string): Decimal | undefined {
    const order = this.orders.get(orderKey(market, orderId));
    return order ? order.filledSize.div(order.size) : undefined;
  }

  /**
   * Forgets terminal orders last updated more than olderThanMs ago
   */
  cleanupTerminalOrders(olderThanMs: number): number {
    const cutoff = this.clock() - olderThanMs;
    let removed = 0;

    for (const [key, order] of this.orders) {
      if (isTerminal(order.status) && order.updatedAt.getTime() < cutoff) {
        this.orders.delete(key);
        this.byClientOrderId.delete(order.clientOrderId);
        if (order.sourceOrderId !== undefined) {
          this.bySourceOrderId.delete(orderKey(order.market, order.sourceOrderId));
        }
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug('Terminal orders cleaned up', { removed, remaining: this.orders.size });
    }
    return removed;
  }

  get size(): number {
    return this.orders.size;
  }
}
