/**
 * Retry Coordinator
 * Submits mirror actions, classifies failures, retries retriable ones with
 * exponential backoff and dead-letters what it cannot deliver
 */

import type { Logger } from 'winston';
import type { RetryConfig } from '../config/ConfigurationManager';
import { ExecutionError } from '../connectors/ExecutionClient';
import type { IExecutionClient } from '../connectors/ExecutionClient';
import { CircuitState } from '../models/MirrorAction';
import type { DeadLetterRecord, ErrorClassification, MirrorAction, RetryItem } from '../models/MirrorAction';
import type { CircuitBreaker, CircuitPermit } from '../utils/CircuitBreaker';
import {
  ErrorHandler,
  PermanentSubmissionError,
  RetriableSubmissionError
} from '../utils/ErrorHandler';
import type { ErrorContext } from '../utils/ErrorHandler';
import { RecentKeySet } from '../utils/RecentKeySet';
import type { AuditService } from './AuditService';

/** Venue rejection codes that signal congestion rather than a bad order. */
export const RETRIABLE_REJECTIONS: ReadonlySet<string> = new Set([
  'VENUE_BUSY',
  'RATE_LIMITED',
  'NONCE_CONFLICT',
  'UNDERPRICED'
]);

export interface ClassifiedError {
  classification: ErrorClassification;
  kind: string;
  message: string;
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ExecutionError) {
    const retriable =
      error.kind === 'network' ||
      error.kind === 'timeout' ||
      (error.reasonCode !== undefined && RETRIABLE_REJECTIONS.has(error.reasonCode));
    return {
      classification: retriable ? 'retriable' : 'permanent',
      kind: error.label,
      message: error.message
    };
  }

  return {
    classification: 'permanent',
    kind: 'unexpected',
    message: error instanceof Error ? error.message : String(error)
  };
}

export type SubmissionResult =
  | { status: 'submitted'; action: MirrorAction; orderId: string; attempts: number; withdrawn: boolean }
  | { status: 'superseded'; action: MirrorAction }
  | { status: 'circuit_open'; action: MirrorAction }
  | { status: 'queued'; action: MirrorAction; attemptCount: number; nextRetryAt: number; errorKind: string }
  | { status: 'dead_lettered'; action: MirrorAction; record: DeadLetterRecord }
  | { status: 'rejected'; action: MirrorAction; errorKind: string; reason: string };

export interface RetryStatistics {
  submitted: number;
  retriesAttempted: number;
  pending: number;
  inFlight: number;
  deadLettered: number;
  rejected: number;
  superseded: number;
  circuitOpenRejections: number;
}

/**
 * Runs one retry attempt. The default runs it directly; the engine passes one
 * that places the attempt on the action's market queue.
 */
export type RetryRunner = (item: RetryItem, attempt: () => Promise<SubmissionResult>) => Promise<SubmissionResult>;

const runDirectly: RetryRunner = (_item, attempt) => attempt();

export interface RetryCoordinatorDependencies {
  executionClient: IExecutionClient;
  breaker: CircuitBreaker;
  errorHandler: ErrorHandler;
  auditService: AuditService;
  logger: Logger;
  clock?: () => number;
  /** How many withdrawn client order ids are remembered. Defaults to 10000. */
  recentKeyCapacity?: number;
}

export class RetryCoordinator {
  private queue: Map<string, RetryItem> = new Map();
  private deadLetterLog: DeadLetterRecord[] = [];
  private readonly withdrawn: RecentKeySet;
  private stats = {
    submitted: 0,
    retriesAttempted: 0,
    rejected: 0,
    superseded: 0,
    circuitOpenRejections: 0
  };

  private readonly executionClient: IExecutionClient;
  private readonly breaker: CircuitBreaker;
  private readonly errorHandler: ErrorHandler;
  private readonly auditService: AuditService;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private config: RetryConfig, deps: RetryCoordinatorDependencies) {
    this.executionClient = deps.executionClient;
    this.breaker = deps.breaker;
    this.errorHandler = deps.errorHandler;
    this.auditService = deps.auditService;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.withdrawn = new RecentKeySet(deps.recentKeyCapacity ?? 10000);

    this.breaker.onStateChange((from, to, failuresInWindow) => {
      const meta = { from, to, failuresInWindow };
      if (to === CircuitState.OPEN) {
        this.logger.error('Circuit breaker opened, venue submissions suspended', meta);
      } else {
        this.logger.info('Circuit breaker state changed', meta);
      }
      this.auditService.record('CIRCUIT_STATE_CHANGED', meta);
    });
  }

  /**
   * baseDelayMs × multiplier^attemptCount, capped at maxDelayMs
   */
  calculateBackoff(attemptCount: number): number {
    const delay = this.config.baseDelayMs * Math.pow(this.config.backoffMultiplier, attemptCount);
    return Math.min(delay, this.config.maxDelayMs);
  }

  /**
   * First submission of an action
   */
  async submit(action: MirrorAction): Promise<SubmissionResult> {
    if (this.withdrawn.has(action.clientOrderId)) {
      return this.supersede(action);
    }

    const permit = this.breaker.tryAcquire();
    if (!permit) {
      this.stats.circuitOpenRejections++;
      this.logger.warn('Circuit open, submission not attempted', {
        market: action.market,
        clientOrderId: action.clientOrderId
      });
      return { status: 'circuit_open', action };
    }

    try {
      const orderId = await this.dispatch(action);
      return this.onSuccess(action, orderId, 1, permit);
    } catch (error) {
      return this.onFailure(action, error, undefined, permit);
    }
  }

  /**
   * Re-submits every due item that is not already in flight
   */
  async processDueRetries(now: number = this.clock(), runner: RetryRunner = runDirectly): Promise<SubmissionResult[]> {
    const due = Array.from(this.queue.values()).filter(item => !item.inFlight && item.nextRetryAt <= now);
    for (const item of due) {
      item.inFlight = true;
    }

    return Promise.all(due.map(item => runner(item, () => this.retry(item))));
  }

  /**
   * Marks an action as no longer wanted. A queued item is dropped at once;
   * one in flight is reported with `withdrawn: true` when it lands.
   */
  withdraw(clientOrderId: string): boolean {
    this.withdrawn.add(clientOrderId);

    const item = this.queue.get(clientOrderId);
    if (item && !item.inFlight) {
      this.queue.delete(clientOrderId);
      this.stats.superseded++;
      this.logger.info('Queued submission withdrawn', {
        market: item.action.market,
        clientOrderId
      });
      return true;
    }
    return item !== undefined;
  }

  isWithdrawn(clientOrderId: string): boolean {
    return this.withdrawn.has(clientOrderId);
  }

  /**
   * Finds the queued action mirroring a source order
   */
  findBySourceOrderId(market: string, sourceOrderId: string): RetryItem | undefined {
    const wanted = market.toLowerCase();
    for (const item of this.queue.values()) {
      if (item.action.market === wanted && item.action.sourceOrderId === sourceOrderId) {
        return { ...item };
      }
    }
    return undefined;
  }

  pendingItems(): RetryItem[] {
    return Array.from(this.queue.values()).map(item => ({ ...item }));
  }

  deadLetters(): DeadLetterRecord[] {
    return [...this.deadLetterLog];
  }

  /**
   * Empties the queue without submitting anything and returns what was in it
   */
  drain(): RetryItem[] {
    const items = this.pendingItems();
    this.queue.clear();
    if (items.length > 0) {
      this.logger.warn('Retry queue drained', { pending: items.length });
    }
    return items;
  }

  statistics(): RetryStatistics {
    const items = Array.from(this.queue.values());
    return {
      ...this.stats,
      pending: items.length,
      inFlight: items.filter(item => item.inFlight).length,
      deadLettered: this.deadLetterLog.length
    };
  }

  private async retry(item: RetryItem): Promise<SubmissionResult> {
    const { action } = item;

    if (this.withdrawn.has(action.clientOrderId)) {
      this.queue.delete(action.clientOrderId);
      return this.supersede(action);
    }

    const permit = this.breaker.tryAcquire();
    if (!permit) {
      // Stays queued until the breaker admits it
      item.inFlight = false;
      return { status: 'circuit_open', action };
    }

    this.stats.retriesAttempted++;
    this.logger.info('Retrying submission', {
      market: action.market,
      clientOrderId: action.clientOrderId,
      attemptCount: item.attemptCount
    });

    try {
      const orderId = await this.dispatch(action);
      this.queue.delete(action.clientOrderId);
      return this.onSuccess(action, orderId, item.attemptCount + 2, permit);
    } catch (error) {
      return this.onFailure(action, error, item, permit);
    }
  }

  private dispatch(action: MirrorAction): Promise<string> {
    return this.executionClient.submitOrder({
      market: action.market,
      side: action.side,
      price: action.price,
      size: action.size,
      clientOrderId: action.clientOrderId
    });
  }

  private onSuccess(action: MirrorAction, orderId: string, attempts: number, permit: CircuitPermit): SubmissionResult {
    this.breaker.recordSuccess(permit);
    this.stats.submitted++;

    const withdrawn = this.withdrawn.has(action.clientOrderId);
    this.logger.info('Mirror order submitted', {
      market: action.market,
      orderId,
      clientOrderId: action.clientOrderId,
      attempts,
      withdrawn
    });
    this.auditService.record(
      'ORDER_SUBMITTED',
      {
        orderId,
        clientOrderId: action.clientOrderId,
        sourceOrderId: action.sourceOrderId,
        side: action.side,
        price: action.price.toString(),
        size: action.size.toString(),
        attempts
      },
      action.market
    );

    return { status: 'submitted', action, orderId, attempts, withdrawn };
  }

  /**
   * `item` is undefined for a first submission
   */
  private onFailure(
    action: MirrorAction,
    error: unknown,
    item: RetryItem | undefined,
    permit: CircuitPermit
  ): SubmissionResult {
    const classified = classifyError(error);
    const context = this.errorContext(action, classified.kind, item);
    const originalError = error instanceof Error ? error : undefined;

    if (classified.classification === 'permanent') {
      this.breaker.releaseTrial(permit);
      this.queue.delete(action.clientOrderId);
      this.stats.rejected++;
      this.errorHandler.record(
        new PermanentSubmissionError(classified.message, classified.kind, context, originalError),
        context
      );
      this.auditService.record(
        'SUBMISSION_REJECTED',
        {
          clientOrderId: action.clientOrderId,
          sourceOrderId: action.sourceOrderId,
          errorKind: classified.kind,
          reason: classified.message
        },
        action.market
      );
      return { status: 'rejected', action, errorKind: classified.kind, reason: classified.message };
    }

    this.breaker.recordFailure(permit);
    this.errorHandler.record(
      new RetriableSubmissionError(classified.message, classified.kind, context, originalError),
      context
    );

    if (this.withdrawn.has(action.clientOrderId)) {
      this.queue.delete(action.clientOrderId);
      return this.supersede(action);
    }

    const attemptCount = item ? item.attemptCount + 1 : 0;
    const exhausted = item ? attemptCount >= this.config.maxAttempts : this.config.maxAttempts === 0;
    if (exhausted) {
      this.queue.delete(action.clientOrderId);
      return this.deadLetter(action, attemptCount, classified);
    }

    const now = this.clock();
    const nextRetryAt = now + this.calculateBackoff(attemptCount);
    this.queue.set(action.clientOrderId, {
      action,
      attemptCount,
      nextRetryAt,
      lastErrorKind: classified.kind,
      lastError: classified.message,
      classification: 'retriable',
      createdAt: item?.createdAt ?? now,
      inFlight: false
    });

    return { status: 'queued', action, attemptCount, nextRetryAt, errorKind: classified.kind };
  }

  private deadLetter(action: MirrorAction, retries: number, classified: ClassifiedError): SubmissionResult {
    const record: DeadLetterRecord = {
      action,
      attempts: retries + 1,
      lastError: classified.message,
      lastErrorKind: classified.kind,
      reason: `retries exhausted after ${retries + 1} attempts: ${classified.kind}`,
      timestamp: new Date(this.clock())
    };

    this.deadLetterLog.push(record);
    this.auditService.recordDeadLetter(record);
    this.logger.error('Submission dead-lettered', {
      market: action.market,
      clientOrderId: action.clientOrderId,
      kind: classified.kind,
      attempts: record.attempts,
      reason: record.reason
    });

    return { status: 'dead_lettered', action, record };
  }

  private supersede(action: MirrorAction): SubmissionResult {
    this.stats.superseded++;
    this.logger.info('Submission superseded before dispatch', {
      market: action.market,
      clientOrderId: action.clientOrderId
    });
    return { status: 'superseded', action };
  }

  private errorContext(action: MirrorAction, kind: string, item: RetryItem | undefined): ErrorContext {
    return {
      operation: item ? 'retry' : 'submit',
      component: 'RetryCoordinator',
      market: action.market,
      clientOrderId: action.clientOrderId,
      kind,
      timestamp: new Date(this.clock()),
      metadata: { attemptCount: item?.attemptCount ?? 0 }
    };
  }
}
