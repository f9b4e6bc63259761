/**
 * Process-wide fail-fast guard for venue submissions
 */

import { CircuitState } from '../models/MirrorAction';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  windowMs: number;
  cooldownMs: number;
}

export interface CircuitBreakerStatus {
  state: CircuitState;
  failuresInWindow: number;
  openedAt?: number;
  trialInFlight: boolean;
}

export type CircuitStateListener = (from: CircuitState, to: CircuitState, failuresInWindow: number) => void;

/**
 * Permission for one venue call. Its outcome only counts against the breaker
 * generation it was issued in; the generation advances every time the breaker
 * opens, so calls already in flight at that moment report into the void.
 */
export interface CircuitPermit {
  readonly generation: number;
  readonly trial: boolean;
}

/**
 * Rolling-window breaker. Failures inside windowMs reaching failureThreshold
 * open it; after cooldownMs it admits exactly one trial call (HALF_OPEN).
 * Only the trial's outcome can close or reopen it.
 *
 * All state lives on this instance and every method runs to completion on the
 * event loop, so callers on different markets never observe a torn update.
 */
export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private generation: number = 0;
  private failureTimestamps: number[] = [];
  private openedAt?: number;
  private trialInFlight: boolean = false;
  private listeners: CircuitStateListener[] = [];

  constructor(
    private config: CircuitBreakerConfig,
    private clock: () => number = Date.now
  ) {}

  onStateChange(listener: CircuitStateListener): void {
    this.listeners.push(listener);
  }

  getState(): CircuitState {
    this.refresh();
    return this.state;
  }

  /**
   * Asks permission for one venue call. In HALF_OPEN only the first caller
   * gets it until that trial reports back.
   */
  tryAcquire(): CircuitPermit | undefined {
    this.refresh();

    switch (this.state) {
      case CircuitState.CLOSED:
        return { generation: this.generation, trial: false };

      case CircuitState.OPEN:
        return undefined;

      case CircuitState.HALF_OPEN:
        if (this.trialInFlight) {
          return undefined;
        }
        this.trialInFlight = true;
        return { generation: this.generation, trial: true };

      default:
        return undefined;
    }
  }

  recordSuccess(permit: CircuitPermit): void {
    if (this.isStale(permit)) {
      return;
    }

    this.failureTimestamps = [];
    if (permit.trial) {
      this.trialInFlight = false;
      this.openedAt = undefined;
      this.transition(CircuitState.CLOSED);
    }
  }

  recordFailure(permit: CircuitPermit): void {
    if (this.isStale(permit)) {
      return;
    }

    const now = this.clock();
    this.pruneFailures(now);
    this.failureTimestamps.push(now);

    if (permit.trial) {
      this.trialInFlight = false;
      this.open(now);
      return;
    }

    if (this.failureTimestamps.length >= this.config.failureThreshold) {
      this.open(now);
    }
  }

  /**
   * Ends a trial whose outcome says nothing about venue health (e.g. the
   * action was withdrawn or the venue rejected its parameters).
   */
  releaseTrial(permit: CircuitPermit): void {
    if (permit.trial && !this.isStale(permit)) {
      this.trialInFlight = false;
    }
  }

  getStatus(): CircuitBreakerStatus {
    this.refresh();
    this.pruneFailures(this.clock());
    return {
      state: this.state,
      failuresInWindow: this.failureTimestamps.length,
      openedAt: this.openedAt,
      trialInFlight: this.trialInFlight
    };
  }

  private isStale(permit: CircuitPermit): boolean {
    this.refresh();
    if (permit.generation !== this.generation) {
      return true;
    }
    if (permit.trial) {
      return this.state !== CircuitState.HALF_OPEN || !this.trialInFlight;
    }
    return this.state !== CircuitState.CLOSED;
  }

  private open(now: number): void {
    this.generation++;
    this.openedAt = now;
    this.transition(CircuitState.OPEN);
  }

  private refresh(): void {
    if (this.state === CircuitState.OPEN && this.openedAt !== undefined) {
      if (this.clock() - this.openedAt >= this.config.cooldownMs) {
        this.trialInFlight = false;
        this.transition(CircuitState.HALF_OPEN);
      }
    }
  }

  private pruneFailures(now: number): void {
    const cutoff = now - this.config.windowMs;
    this.failureTimestamps = this.failureTimestamps.filter(ts => ts > cutoff);
  }

  private transition(to: CircuitState): void {
    const from = this.state;
    if (from === to) {
      return;
    }
    this.state = to;
    for (const listener of this.listeners) {
      listener(from, to, this.failureTimestamps.length);
    }
  }
}
