import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { Decimal } from '../utils/decimals';
import { RetryCoordinator, classifyError } from './RetryCoordinator';
import type { SubmissionResult } from './RetryCoordinator';
import { AuditService } from './AuditService';
import { ExecutionError } from '../connectors/ExecutionClient';
import type { IExecutionClient, SubmitOrderParams } from '../connectors/ExecutionClient';
import { CircuitState } from '../models/MirrorAction';
import type { MirrorAction } from '../models/MirrorAction';
import type { RetryConfig } from '../config/ConfigurationManager';
import { CircuitBreaker } from '../utils/CircuitBreaker';
import { ErrorCategory, ErrorHandler } from '../utils/ErrorHandler';
import { createLogger } from '../utils/logger';

type Outcome = string | Error | Promise<string>;

/**
 * Scripted execution client: each submission consumes the next outcome
 */
class MockExecutionClient implements IExecutionClient {
  public submissions: SubmitOrderParams[] = [];
  public cancellations: Array<{ market: string; orderIds: string[] }> = [];
  private outcomes: Outcome[] = [];

  script(...outcomes: Outcome[]): void {
    this.outcomes.push(...outcomes);
  }

  async submitOrder(params: SubmitOrderParams): Promise<string> {
    this.submissions.push(params);
    const outcome = this.outcomes.shift();
    if (outcome === undefined) {
      throw new Error('no scripted outcome');
    }
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  async cancelOrders(market: string, orderIds: string[]): Promise<void> {
    this.cancellations.push({ market, orderIds });
  }
}

const retryConfig: RetryConfig = {
  baseDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  maxAttempts: 3,
  processIntervalMs: 500
};

function action(id: string, sourceOrderId: string = `src-${id}`): MirrorAction {
  return {
    clientOrderId: id,
    sourceOrderId,
    market: '0xmarket',
    side: 'buy',
    price: new Decimal(100),
    size: new Decimal(1),
    createdAt: new Date(0)
  };
}

function assertStatus<S extends SubmissionResult['status']>(
  result: SubmissionResult,
  status: S
): asserts result is Extract<SubmissionResult, { status: S }> {
  if (result.status !== status) {
    throw new Error(`expected ${status}, got ${result.status}`);
  }
}

describe('RetryCoordinator', () => {
  let now: number;
  let client: MockExecutionClient;
  let breaker: CircuitBreaker;
  let errorHandler: ErrorHandler;
  let auditService: AuditService;
  let coordinator: RetryCoordinator;

  function build(config: RetryConfig = retryConfig): RetryCoordinator {
    const logger = createLogger({ silent: true });
    return new RetryCoordinator(config, {
      executionClient: client,
      breaker,
      errorHandler,
      auditService,
      logger,
      clock: () => now
    });
  }

  beforeEach(() => {
    now = 0;
    client = new MockExecutionClient();
    breaker = new CircuitBreaker({ failureThreshold: 10, windowMs: 60000, cooldownMs: 300000 }, () => now);
    errorHandler = new ErrorHandler(createLogger({ silent: true }));
    auditService = new AuditService(Buffer.from('test-secret'), () => now);
    coordinator = build();
  });

  describe('Classification', () => {
    it('should treat network, timeout and congestion rejections as retriable', () => {
      expect(classifyError(ExecutionError.network('reset')).classification).toBe('retriable');
      expect(classifyError(ExecutionError.timeout('slow')).classification).toBe('retriable');
      expect(classifyError(ExecutionError.rejected('RATE_LIMITED', 'slow down')).classification).toBe('retriable');
    });

    it('should treat other rejections and foreign errors as permanent', () => {
      expect(classifyError(ExecutionError.rejected('INVALID_ORDER', 'bad tick'))).toEqual({
        classification: 'permanent',
        kind: 'rejected:INVALID_ORDER',
        message: 'bad tick'
      });
      expect(classifyError(new TypeError('boom'))).toEqual({
        classification: 'permanent',
        kind: 'unexpected',
        message: 'boom'
      });
    });
  });

  describe('Backoff', () => {
    it('should double from the base delay and cap at the maximum', () => {
      expect(coordinator.calculateBackoff(0)).toBe(1000);
      expect(coordinator.calculateBackoff(1)).toBe(2000);
      expect(coordinator.calculateBackoff(2)).toBe(4000);
      expect(coordinator.calculateBackoff(10)).toBe(30000);
    });

    it('should never exceed the cap and never shrink', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 40 }), attempt => {
          const delay = coordinator.calculateBackoff(attempt);
          expect(delay).toBeLessThanOrEqual(30000);
          expect(coordinator.calculateBackoff(attempt + 1)).toBeGreaterThanOrEqual(delay);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('Submission', () => {
    it('should return the venue order id on success', async () => {
      client.script('501');
      const result = await coordinator.submit(action('c1'));
      assertStatus(result, 'submitted');

      expect(result.orderId).toBe('501');
      expect(result.attempts).toBe(1);
      expect(result.withdrawn).toBe(false);
      expect(client.submissions[0].clientOrderId).toBe('c1');
      expect(auditService.countByType('ORDER_SUBMITTED')).toBe(1);
    });

    it('should queue a retriable failure with the first backoff', async () => {
      client.script(ExecutionError.network('reset'));
      const result = await coordinator.submit(action('c1'));
      assertStatus(result, 'queued');

      expect(result.attemptCount).toBe(0);
      expect(result.nextRetryAt).toBe(1000);
      expect(result.errorKind).toBe('network');
      expect(coordinator.pendingItems()).toHaveLength(1);
      expect(errorHandler.getErrorCount(ErrorCategory.SUBMISSION, 'SUBMISSION_RETRIABLE')).toBe(1);
    });

    it('should reject permanent failures without queueing or tripping the breaker', async () => {
      client.script(ExecutionError.rejected('INSUFFICIENT_BALANCE', 'not enough collateral'));
      const result = await coordinator.submit(action('c1'));

      expect(result).toEqual({
        status: 'rejected',
        action: action('c1'),
        errorKind: 'rejected:INSUFFICIENT_BALANCE',
        reason: 'not enough collateral'
      });
      expect(coordinator.pendingItems()).toHaveLength(0);
      expect(breaker.getStatus().failuresInWindow).toBe(0);
      expect(errorHandler.getErrorCount(ErrorCategory.SUBMISSION, 'SUBMISSION_PERMANENT')).toBe(1);
      expect(auditService.countByType('SUBMISSION_REJECTED')).toBe(1);
    });

    it('should dead-letter at once when no retries are allowed', async () => {
      coordinator = build({ ...retryConfig, maxAttempts: 0 });
      client.script(ExecutionError.timeout('slow'));

      const result = await coordinator.submit(action('c1'));
      assertStatus(result, 'dead_lettered');
      expect(result.record.attempts).toBe(1);
      expect(result.record.reason).toBe('retries exhausted after 1 attempts: timeout');
    });
  });

  describe('Retries', () => {
    it('should retry after 1, 2 and 4 seconds and then dead-letter', async () => {
      client.script(
        ExecutionError.network('down'),
        ExecutionError.network('down'),
        ExecutionError.network('down'),
        ExecutionError.network('down')
      );
      await coordinator.submit(action('c1'));

      expect(await coordinator.processDueRetries(999)).toEqual([]);

      now = 1000;
      const first = (await coordinator.processDueRetries())[0];
      assertStatus(first, 'queued');
      expect(first.attemptCount).toBe(1);
      expect(first.nextRetryAt).toBe(3000);

      now = 3000;
      const second = (await coordinator.processDueRetries())[0];
      assertStatus(second, 'queued');
      expect(second.attemptCount).toBe(2);
      expect(second.nextRetryAt).toBe(7000);

      now = 7000;
      const last = (await coordinator.processDueRetries())[0];
      assertStatus(last, 'dead_lettered');
      expect(last.record.attempts).toBe(4);
      expect(last.record.lastErrorKind).toBe('network');
      expect(last.record.reason).toBe('retries exhausted after 4 attempts: network');

      expect(client.submissions).toHaveLength(4);
      expect(coordinator.pendingItems()).toHaveLength(0);
      expect(coordinator.deadLetters()).toHaveLength(1);
      expect(auditService.countByType('DEAD_LETTER')).toBe(1);
      expect(coordinator.statistics().retriesAttempted).toBe(3);
    });

    it('should report the attempt count when a retry succeeds', async () => {
      client.script(ExecutionError.network('down'), '777');
      await coordinator.submit(action('c1'));

      now = 1000;
      const result = (await coordinator.processDueRetries())[0];
      assertStatus(result, 'submitted');
      expect(result.orderId).toBe('777');
      expect(result.attempts).toBe(2);
      expect(coordinator.pendingItems()).toHaveLength(0);
    });

    it('should keep one attempt in flight per item', async () => {
      let resolveSubmission: (orderId: string) => void = () => undefined;
      client.script(
        ExecutionError.network('down'),
        new Promise<string>(resolve => {
          resolveSubmission = resolve;
        })
      );
      await coordinator.submit(action('c1'));

      now = 1000;
      const firstPass = coordinator.processDueRetries();
      expect(await coordinator.processDueRetries()).toEqual([]);
      expect(coordinator.statistics().inFlight).toBe(1);

      resolveSubmission('888');
      const results = await firstPass;
      const landed = results[0];
      assertStatus(landed, 'submitted');
      expect(landed.orderId).toBe('888');
      expect(client.submissions).toHaveLength(2);
    });

    it('should drop a withdrawn queued item before dispatch', async () => {
      client.script(ExecutionError.network('down'));
      await coordinator.submit(action('c1'));

      expect(coordinator.withdraw('c1')).toBe(true);
      now = 1000;

      expect(await coordinator.processDueRetries()).toEqual([]);
      expect(client.submissions).toHaveLength(1);
      expect(coordinator.statistics().superseded).toBe(1);
    });

    it('should supersede an item withdrawn while waiting for its turn', async () => {
      client.script(ExecutionError.network('down'));
      await coordinator.submit(action('c1'));

      now = 1000;
      const results = await coordinator.processDueRetries(now, (item, attempt) => {
        coordinator.withdraw(item.action.clientOrderId);
        return attempt();
      });

      expect(results[0].status).toBe('superseded');
      expect(coordinator.pendingItems()).toHaveLength(0);
      expect(client.submissions).toHaveLength(1);
    });

    it('should supersede a first submission that was withdrawn beforehand', async () => {
      coordinator.withdraw('c1');

      expect((await coordinator.submit(action('c1'))).status).toBe('superseded');
      expect(client.submissions).toHaveLength(0);
    });

    it('should remember only as many withdrawals as configured', () => {
      const small = new RetryCoordinator(retryConfig, {
        executionClient: client,
        breaker,
        errorHandler,
        auditService,
        logger: createLogger({ silent: true }),
        clock: () => now,
        recentKeyCapacity: 1
      });

      small.withdraw('c1');
      small.withdraw('c2');

      expect(small.isWithdrawn('c1')).toBe(false);
      expect(small.isWithdrawn('c2')).toBe(true);
    });

    it('should find a queued action by its source order', async () => {
      client.script(ExecutionError.network('down'));
      await coordinator.submit(action('c1', '900'));

      expect(coordinator.findBySourceOrderId('0xMARKET', '900')?.action.clientOrderId).toBe('c1');
      expect(coordinator.findBySourceOrderId('0xmarket', '901')).toBeUndefined();
    });

    it('should drain the queue without submitting', async () => {
      client.script(ExecutionError.network('down'), ExecutionError.network('down'));
      await coordinator.submit(action('c1'));
      await coordinator.submit(action('c2'));

      const drained = coordinator.drain();

      expect(drained.map(item => item.action.clientOrderId)).toEqual(['c1', 'c2']);
      expect(coordinator.statistics().pending).toBe(0);
      now = 10_000;
      expect(await coordinator.processDueRetries()).toEqual([]);
      expect(client.submissions).toHaveLength(2);
    });
  });

  describe('Circuit breaker', () => {
    async function tripBreaker(): Promise<void> {
      for (let i = 0; i < 10; i++) {
        client.script(ExecutionError.network('down'));
        await coordinator.submit(action(`trip-${i}`));
      }
    }

    it('should open after 10 retriable failures in the window and fail fast', async () => {
      await tripBreaker();

      expect(breaker.getState()).toBe(CircuitState.OPEN);
      const result = await coordinator.submit(action('c-next'));

      expect(result.status).toBe('circuit_open');
      expect(client.submissions).toHaveLength(10);
      expect(coordinator.statistics().circuitOpenRejections).toBe(1);
      expect(auditService.countByType('CIRCUIT_STATE_CHANGED')).toBe(1);
    });

    it('should hold queued retries while open', async () => {
      await tripBreaker();
      now = 1000;

      const results = await coordinator.processDueRetries();

      expect(results.every(result => result.status === 'circuit_open')).toBe(true);
      expect(coordinator.pendingItems()).toHaveLength(10);
      expect(coordinator.pendingItems().every(item => !item.inFlight)).toBe(true);
      expect(client.submissions).toHaveLength(10);
    });

    it('should close after a successful half-open trial', async () => {
      await tripBreaker();
      now = 300_000;
      client.script('901');

      const result = await coordinator.submit(action('c-trial'));

      expect(result.status).toBe('submitted');
      expect(breaker.getState()).toBe(CircuitState.CLOSED);
    });

    it('should reopen after a failed half-open trial', async () => {
      await tripBreaker();
      now = 300_000;
      client.script(ExecutionError.timeout('still down'));

      await coordinator.submit(action('c-trial'));

      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(breaker.getStatus().openedAt).toBe(300_000);
    });

    it('should stay open when a submission sent before the trip lands afterwards', async () => {
      let resolveSubmission: (orderId: string) => void = () => undefined;
      client.script(
        new Promise<string>(resolve => {
          resolveSubmission = resolve;
        })
      );
      const slow = coordinator.submit(action('c-slow'));
      await tripBreaker();

      resolveSubmission('950');
      const result = await slow;

      assertStatus(result, 'submitted');
      expect(result.orderId).toBe('950');
      expect(breaker.getState()).toBe(CircuitState.OPEN);
      expect(coordinator.statistics().circuitOpenRejections).toBe(0);
      expect((await coordinator.submit(action('c-next'))).status).toBe('circuit_open');
    });

    it('should free the half-open trial after a permanent rejection', async () => {
      await tripBreaker();
      now = 300_000;
      client.script(ExecutionError.rejected('INVALID_ORDER', 'bad size'), '902');

      expect((await coordinator.submit(action('c-trial'))).status).toBe('rejected');
      expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);
      expect((await coordinator.submit(action('c-next'))).status).toBe('submitted');
    });
  });
});
