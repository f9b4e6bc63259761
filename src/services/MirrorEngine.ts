/**
 * Mirror Engine
 * Routes normalized feed events to the trackers, sizes and validates mirror
 * orders, and hands submissions to the RetryCoordinator. Events for one market
 * are handled strictly in arrival order; different markets run concurrently.
 */

import { randomUUID } from 'crypto';
import type { Decimal } from '../utils/decimals';
import type { Logger } from 'winston';
import type { MirrorConfig } from '../config/ConfigurationManager';
import type { IBalanceSource, IExecutionClient } from '../connectors/ExecutionClient';
import type { IFeedSource } from '../connectors/FeedSource';
import type { DomainEvent, FilledEvent, OrderOpenedEvent, OrdersClosedEvent } from '../models/DomainEvent';
import type { CircuitState, DeadLetterRecord, MirrorAction, RetryItem } from '../models/MirrorAction';
import { isTerminal } from '../models/Order';
import type { OrderSnapshot } from '../models/Order';
import type { PositionDelta, PositionSnapshot } from '../models/Position';
import { CircuitBreaker } from '../utils/CircuitBreaker';
import { ErrorHandler, UnknownOrderWarning, ValidationRejection } from '../utils/ErrorHandler';
import type { ErrorContext } from '../utils/ErrorHandler';
import { componentLogger } from '../utils/logger';
import { RecentKeySet } from '../utils/RecentKeySet';
import { AuditService } from './AuditService';
import { EventNormalizer } from './EventNormalizer';
import { OrderTracker } from './OrderTracker';
import type { CancelOutcome, FillOutcome } from './OrderTracker';
import { PositionSizer } from './PositionSizer';
import { PositionTracker } from './PositionTracker';
import { RetryCoordinator } from './RetryCoordinator';
import type { RetryStatistics, SubmissionResult } from './RetryCoordinator';
import { RiskValidator } from './RiskValidator';
import type { RiskRule } from './RiskValidator';

export type HandleOutcome =
  | { status: 'invalid'; reason: string }
  | { status: 'dropped'; reason: string }
  | { status: 'ignored'; reason: string }
  | { status: 'acknowledged'; orderId: string; tracked: boolean }
  | { status: 'skipped'; reason: string }
  | { status: 'risk_rejected'; rule: RiskRule; reason: string }
  | { status: 'mirrored'; result: SubmissionResult }
  | { status: 'fill'; outcome: FillOutcome; delta?: PositionDelta }
  | {
      status: 'closed';
      canceled: string[];
      withdrawn: string[];
      cancelRequested: string[];
      unknown: string[];
    }
  | { status: 'failed'; reason: string };

export interface EngineStatistics {
  eventsReceived: number;
  eventsInvalid: number;
  eventsDropped: number;
  ordersMirrored: number;
  sizingSkipped: number;
  riskRejected: number;
  fillsApplied: number;
  duplicateFills: number;
  lateFills: number;
  unknownOrders: number;
  cancelsApplied: number;
  cancelRequests: number;
  failures: number;
}

export interface EngineSnapshot {
  positions: PositionSnapshot[];
  totalExposure: Decimal;
  totalRealizedPnl: Decimal;
  openOrders: OrderSnapshot[];
  circuitState: CircuitState;
  retry: RetryStatistics;
  statistics: EngineStatistics;
  errors: Record<string, number>;
  takenAt: Date;
}

export interface ShutdownReport {
  pending: RetryItem[];
  deadLetters: DeadLetterRecord[];
}

export interface MirrorEngineDependencies {
  executionClient: IExecutionClient;
  balanceSource: IBalanceSource;
  logger: Logger;
  auditService?: AuditService;
  errorHandler?: ErrorHandler;
  clock?: () => number;
  clientOrderIds?: () => string;
}

export class MirrorEngine {
  private readonly normalizer: EventNormalizer;
  private readonly orders: OrderTracker;
  private readonly positions: PositionTracker;
  private readonly sizer: PositionSizer;
  private readonly validator: RiskValidator;
  private readonly breaker: CircuitBreaker;
  private readonly coordinator: RetryCoordinator;
  private readonly auditService: AuditService;
  private readonly errorHandler: ErrorHandler;
  private readonly executionClient: IExecutionClient;
  private readonly balanceSource: IBalanceSource;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly nextClientOrderId: () => string;

  private readonly sources: Set<string>;
  private readonly seenSourceOrders: RecentKeySet;
  private chains: Map<string, Promise<void>> = new Map();
  private feedSource?: IFeedSource;
  private retryTimer?: NodeJS.Timeout;
  private cleanupTimer?: NodeJS.Timeout;
  private accepting: boolean = true;

  private stats: EngineStatistics = {
    eventsReceived: 0,
    eventsInvalid: 0,
    eventsDropped: 0,
    ordersMirrored: 0,
    sizingSkipped: 0,
    riskRejected: 0,
    fillsApplied: 0,
    duplicateFills: 0,
    lateFills: 0,
    unknownOrders: 0,
    cancelsApplied: 0,
    cancelRequests: 0,
    failures: 0
  };

  constructor(
    private config: MirrorConfig,
    deps: MirrorEngineDependencies
  ) {
    this.executionClient = deps.executionClient;
    this.balanceSource = deps.balanceSource;
    this.clock = deps.clock ?? Date.now;
    this.nextClientOrderId = deps.clientOrderIds ?? randomUUID;
    this.logger = componentLogger(deps.logger, 'MirrorEngine');
    this.errorHandler = deps.errorHandler ?? new ErrorHandler(componentLogger(deps.logger, 'ErrorHandler'));
    this.auditService = deps.auditService ?? new AuditService(undefined, this.clock);

    this.sources = new Set(config.wallets.sources);
    this.seenSourceOrders = new RecentKeySet(config.tracking.recentFillCapacity);

    this.normalizer = new EventNormalizer(config.markets, componentLogger(deps.logger, 'EventNormalizer'), this.clock);
    this.orders = new OrderTracker(
      componentLogger(deps.logger, 'OrderTracker'),
      { recentFillCapacity: config.tracking.recentFillCapacity },
      this.clock
    );
    this.positions = new PositionTracker(componentLogger(deps.logger, 'PositionTracker'), this.clock);
    this.sizer = new PositionSizer(config.sizing, componentLogger(deps.logger, 'PositionSizer'), config.risk.marginRatio);
    this.validator = new RiskValidator(config.risk);
    this.breaker = new CircuitBreaker(config.circuitBreaker, this.clock);
    this.coordinator = new RetryCoordinator(config.retry, {
      executionClient: this.executionClient,
      breaker: this.breaker,
      errorHandler: this.errorHandler,
      auditService: this.auditService,
      logger: componentLogger(deps.logger, 'RetryCoordinator'),
      clock: this.clock,
      recentKeyCapacity: config.tracking.recentFillCapacity
    });
  }

  /**
   * Subscribes to the feed for the configured markets
   */
  async connect(feed: IFeedSource): Promise<void> {
    this.feedSource = feed;
    await feed.subscribe(this.config.markets, raw => {
      this.handle(raw).catch(error => this.errorHandler.record(error, this.context('handle')));
    });
    this.logger.info('Feed connected', { markets: this.config.markets });
  }

  /**
   * Schedules retry processing and terminal-order cleanup
   */
  start(): void {
    if (this.retryTimer) {
      return;
    }

    this.retryTimer = setInterval(() => {
      this.processRetries().catch(error => this.errorHandler.record(error, this.context('processRetries')));
    }, this.config.retry.processIntervalMs);

    this.cleanupTimer = setInterval(() => this.cleanupTerminalOrders(), this.config.tracking.cleanupIntervalMs);

    this.logger.info('Mirror engine started', {
      sources: this.config.wallets.sources,
      mirror: this.config.wallets.mirror,
      markets: this.config.markets
    });
  }

  /**
   * Normalizes one raw payload and processes it on its market's queue.
   * Never rejects: every failure is recorded and reported as an outcome.
   */
  async handle(raw: unknown): Promise<HandleOutcome> {
    if (!this.accepting) {
      return { status: 'ignored', reason: 'engine is shutting down' };
    }
    this.stats.eventsReceived++;

    const normalized = this.normalizer.normalize(raw);
    if (normalized.status === 'invalid') {
      this.stats.eventsInvalid++;
      this.errorHandler.record(normalized.error, {
        ...normalized.error.context,
        metadata: {
          payload: raw,
          issues: normalized.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        }
      });
      return { status: 'invalid', reason: normalized.error.message };
    }

    if (normalized.status === 'dropped') {
      this.stats.eventsDropped++;
      return { status: 'dropped', reason: normalized.reason };
    }

    const { event } = normalized;
    return this.enqueue(event.market, () => this.process(event));
  }

  /**
   * Re-submits due retries, each on its own market's queue
   */
  processRetries(now: number = this.clock()): Promise<SubmissionResult[]> {
    return this.coordinator.processDueRetries(now, (item, attempt) =>
      this.enqueue(item.action.market, async () => {
        const result = await attempt();
        await this.afterSubmission(result);
        return result;
      })
    );
  }

  cleanupTerminalOrders(): number {
    const removed = this.orders.cleanupTerminalOrders(this.config.tracking.terminalOrderTtlMs);
    if (removed > 0) {
      this.logger.info('Terminal orders removed', { removed });
    }
    return removed;
  }

  snapshot(): EngineSnapshot {
    const portfolio = this.positions.snapshot();
    const errors: Record<string, number> = {};
    for (const [key, metric] of this.errorHandler.getErrorMetrics()) {
      errors[key] = metric.count;
    }

    return {
      positions: portfolio.positions,
      totalExposure: portfolio.totalExposure,
      totalRealizedPnl: portfolio.totalRealizedPnl,
      openOrders: this.orders.getOpenOrders(),
      circuitState: this.breaker.getState(),
      retry: this.coordinator.statistics(),
      statistics: { ...this.stats },
      errors,
      takenAt: new Date(this.clock())
    };
  }

  getOrder(market: string, orderId: string): OrderSnapshot | undefined {
    return this.orders.get(market, orderId);
  }

  /**
   * Stops accepting events, lets every market queue finish, and returns what
   * is still queued for retry without submitting it
   */
  async shutdown(): Promise<ShutdownReport> {
    this.accepting = false;
    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = undefined;
    }
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }

    if (this.feedSource) {
      await this.feedSource.unsubscribe();
      this.feedSource = undefined;
    }

    while (this.chains.size > 0) {
      await Promise.all(Array.from(this.chains.values()));
    }

    const pending = this.coordinator.drain();
    const deadLetters = this.coordinator.deadLetters();
    const openOrders = this.orders.getOpenOrders().length;

    this.auditService.record('ENGINE_SHUTDOWN', {
      pending: pending.length,
      deadLetters: deadLetters.length,
      openOrders
    });
    this.logger.info('Mirror engine stopped', {
      pending: pending.length,
      deadLetters: deadLetters.length,
      openOrders
    });

    return { pending, deadLetters };
  }

  private enqueue<T>(market: string, task: () => Promise<T>): Promise<T> {
    const previous = this.chains.get(market) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run.then(
      () => this.release(market, tail),
      () => this.release(market, tail)
    );
    this.chains.set(market, tail);
    return run;
  }

  private release(market: string, tail: Promise<void>): void {
    if (this.chains.get(market) === tail) {
      this.chains.delete(market);
    }
  }

  private async process(event: DomainEvent): Promise<HandleOutcome> {
    try {
      switch (event.kind) {
        case 'OrderOpened':
          return await this.onOrderOpened(event);
        case 'Filled':
          return this.onFilled(event);
        case 'OrdersClosed':
          return await this.onOrdersClosed(event);
      }
    } catch (error) {
      this.stats.failures++;
      const appError = this.errorHandler.record(error, this.context(event.kind, event.market, {
        orderId: 'orderId' in event ? event.orderId : undefined,
        kind: event.kind
      }));
      return { status: 'failed', reason: appError.message };
    }
  }

  private async onOrderOpened(event: OrderOpenedEvent): Promise<HandleOutcome> {
    const { market, orderId, owner } = event;

    if (owner === this.config.wallets.mirror) {
      const order = this.orders.acknowledge(market, orderId);
      if (!order) {
        this.recordUnknownOrder(market, orderId, 'OrderOpened');
      }
      return { status: 'acknowledged', orderId, tracked: order !== undefined };
    }

    if (!this.sources.has(owner)) {
      return { status: 'ignored', reason: `owner ${owner} is not a source wallet` };
    }

    const sourceKey = `${market}:${orderId}`;
    if (this.seenSourceOrders.has(sourceKey)) {
      this.logger.debug('Source order already handled', { market, orderId });
      return { status: 'ignored', reason: `source order ${orderId} was already handled` };
    }

    // A failed balance read leaves the order unseen so a redelivery is mirrored
    const available = await this.balanceSource.currentBalance(this.config.collateralAsset);
    this.seenSourceOrders.add(sourceKey);
    const sizing = this.sizer.calculate({
      market,
      side: event.side,
      sourceSize: event.size,
      price: event.price,
      availableBalance: available,
      currentPosition: this.positions.getPosition(market)?.signedSize
    });
    if (sizing.status === 'skipped') {
      this.stats.sizingSkipped++;
      return { status: 'skipped', reason: sizing.reason };
    }

    const action: MirrorAction = {
      clientOrderId: this.nextClientOrderId(),
      sourceOrderId: orderId,
      market,
      side: event.side,
      price: sizing.price,
      size: sizing.size,
      createdAt: new Date(this.clock())
    };

    const decision = this.validator.validate(action, this.positions.snapshot(), {
      asset: this.config.collateralAsset,
      available
    });
    if (!decision.accepted) {
      this.stats.riskRejected++;
      const context = this.context('validate', market, {
        clientOrderId: action.clientOrderId,
        kind: decision.rule,
        metadata: { sourceOrderId: orderId }
      });
      this.errorHandler.record(new ValidationRejection(decision.rule, decision.reason, context), context);
      this.auditService.record(
        'RISK_REJECTION',
        {
          sourceOrderId: orderId,
          clientOrderId: action.clientOrderId,
          rule: decision.rule,
          reason: decision.reason,
          side: action.side,
          price: action.price.toString(),
          size: action.size.toString()
        },
        market
      );
      return { status: 'risk_rejected', rule: decision.rule, reason: decision.reason };
    }

    const result = await this.coordinator.submit(action);
    await this.afterSubmission(result);
    return { status: 'mirrored', result };
  }

  private onFilled(event: FilledEvent): HandleOutcome {
    const { market, orderId } = event;
    const outcome = this.orders.applyFill({
      market,
      orderId,
      filledSize: event.filledSize,
      price: event.price,
      sequenceMarker: event.sequenceMarker,
      observedAt: event.observedAt
    });

    switch (outcome.status) {
      case 'applied': {
        const delta = this.positions.applyFill(market, outcome.order.side, outcome.appliedSize, event.price);
        this.stats.fillsApplied++;
        if (outcome.capped) {
          this.auditService.record(
            'SIZE_OVERRUN',
            {
              orderId,
              sequenceMarker: event.sequenceMarker,
              reported: event.filledSize.toString(),
              applied: outcome.appliedSize.toString()
            },
            market
          );
        }
        this.logger.info('Fill applied', {
          market,
          orderId,
          clientOrderId: outcome.order.clientOrderId,
          appliedSize: outcome.appliedSize.toString(),
          status: outcome.order.status,
          position: delta.newSize.toString()
        });
        return { status: 'fill', outcome, delta };
      }

      case 'duplicate':
        this.stats.duplicateFills++;
        return { status: 'fill', outcome };

      case 'terminal':
        this.stats.lateFills++;
        this.auditService.record(
          'LATE_FILL_DISCARDED',
          {
            orderId,
            status: outcome.order.status,
            sequenceMarker: event.sequenceMarker,
            filledSize: event.filledSize.toString(),
            price: event.price.toString()
          },
          market
        );
        return { status: 'fill', outcome };

      case 'unknown':
        // Fills on other makers' orders still move the mark
        this.positions.markPrice(market, event.price);
        if (event.maker === this.config.wallets.mirror) {
          this.recordUnknownOrder(market, orderId, 'Filled');
        }
        return { status: 'fill', outcome };
    }
  }

  private async onOrdersClosed(event: OrdersClosedEvent): Promise<HandleOutcome> {
    const { market, owner } = event;
    const canceled: string[] = [];
    const withdrawn: string[] = [];
    const cancelRequested: string[] = [];
    const unknown: string[] = [];

    for (const orderId of event.orderIds) {
      if (this.orders.isTracked(market, orderId)) {
        const outcome: CancelOutcome = this.orders.applyCancel(market, orderId, event.sequenceMarker);
        if (outcome.status === 'canceled') {
          this.stats.cancelsApplied++;
          canceled.push(orderId);
        }
        continue;
      }

      if (!this.sources.has(owner)) {
        if (owner === this.config.wallets.mirror) {
          this.recordUnknownOrder(market, orderId, 'OrdersClosed');
        }
        unknown.push(orderId);
        continue;
      }

      // A late OrderOpened for a closed source order must not be mirrored
      this.seenSourceOrders.add(`${market}:${orderId}`);

      const queued = this.coordinator.findBySourceOrderId(market, orderId);
      if (queued && this.coordinator.withdraw(queued.action.clientOrderId)) {
        withdrawn.push(orderId);
      }

      const mirror = this.orders.findBySourceOrderId(market, orderId);
      if (mirror && !isTerminal(mirror.status)) {
        cancelRequested.push(mirror.orderId);
      }
    }

    if (cancelRequested.length > 0) {
      await this.requestCancel(market, cancelRequested, 'source order closed');
    }

    return { status: 'closed', canceled, withdrawn, cancelRequested, unknown };
  }

  /**
   * Registers a landed submission. One whose source was closed meanwhile is
   * cancelled at the venue straight away.
   */
  private async afterSubmission(result: SubmissionResult): Promise<void> {
    if (result.status !== 'submitted') {
      return;
    }

    const { action, orderId } = result;
    try {
      this.orders.register({
        orderId,
        clientOrderId: action.clientOrderId,
        sourceOrderId: action.sourceOrderId,
        market: action.market,
        side: action.side,
        price: action.price,
        size: action.size
      });
      this.stats.ordersMirrored++;
    } catch (error) {
      this.stats.failures++;
      this.errorHandler.record(
        error,
        this.context('register', action.market, { orderId, clientOrderId: action.clientOrderId })
      );
      return;
    }

    if (result.withdrawn) {
      await this.requestCancel(action.market, [orderId], 'source order closed before submission completed');
    }
  }

  private async requestCancel(market: string, orderIds: string[], reason: string): Promise<void> {
    this.stats.cancelRequests++;
    try {
      await this.executionClient.cancelOrders(market, orderIds);
      this.auditService.record('CANCEL_REQUESTED', { orderIds, reason }, market);
      this.logger.info('Cancel requested', { market, orderIds, reason });
    } catch (error) {
      this.auditService.record(
        'CANCEL_REQUEST_FAILED',
        { orderIds, reason, error: error instanceof Error ? error.message : String(error) },
        market
      );
      this.errorHandler.record(error, this.context('cancelOrders', market, { metadata: { orderIds } }));
    }
  }

  private recordUnknownOrder(market: string, orderId: string, kind: string): void {
    this.stats.unknownOrders++;
    const context = this.context(kind, market, { orderId, kind });
    this.errorHandler.record(new UnknownOrderWarning(orderId, context), context);
  }

  private context(
    operation: string,
    market?: string,
    extra: Partial<Omit<ErrorContext, 'operation' | 'component' | 'market' | 'timestamp'>> = {}
  ): ErrorContext {
    return {
      operation,
      component: 'MirrorEngine',
      market,
      timestamp: new Date(this.clock()),
      ...extra
    };
  }
}
