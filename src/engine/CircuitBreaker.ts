/**
 * CircuitBreaker - Gates calls to one protected resource
 *
 * CLOSED counts failures and trips to OPEN at the failure threshold. OPEN
 * rejects until the open duration has elapsed; the next query then moves the
 * breaker to HALF_OPEN, which admits a bounded number of concurrent probes.
 * Enough probe successes close the breaker, any probe failure re-opens it.
 * With a backoff multiplier, each trip before the next recovery stays OPEN
 * longer, up to `maxOpenDurationMs`.
 *
 * Transitions are evaluated lazily when the breaker is queried or an outcome
 * is recorded. Nothing runs on a timer, so an idle OPEN breaker reports OPEN
 * until someone asks again.
 *
 * Every decision below runs synchronously, so no other caller can interleave
 * with it on the event loop. The protected operation is awaited outside those
 * sections.
 */

import { EventEmitter } from 'eventemitter3';
import { createCircuitBreakerConfig, CircuitBreakerConfigInput } from '../config/schema.js';
import { CallTimeoutError, CircuitOpenError } from '../errors/BreakerErrors.js';
import { Logger } from '../logging/Logger.js';
import {
  CircuitBreakerConfig,
  CircuitBreakerEvents,
  CircuitBreakerStats,
  CircuitState,
  CircuitType,
  StateChangeEvent,
} from '../types/breaker.js';
import { Clock, SystemClock } from '../utils/time/Clock.js';

export interface CircuitBreakerOptions {
  type?: CircuitType;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Admission ticket for one call; ties the outcome to the phase it was admitted in
 */
interface CallPermit {
  generation: number;
  probe: boolean;
}

type Outcome = 'success' | 'failure';

export class CircuitBreaker extends EventEmitter<CircuitBreakerEvents> {
  readonly name: string;
  readonly type: CircuitType;
  readonly config: CircuitBreakerConfig;

  private state: CircuitState = CircuitState.CLOSED;
  private failureCount: number = 0;
  private successCount: number = 0;
  private halfOpenInFlight: number = 0;
  private openedAt: number | null = null;
  private currentOpenDurationMs: number;
  private backoffCount: number = 0;
  /** Bumped on every transition; outcomes from an older generation are stale */
  private generation: number = 0;

  private totalCalls: number = 0;
  private successfulCalls: number = 0;
  private failedCalls: number = 0;
  private rejectedCalls: number = 0;
  private tripCount: number = 0;
  private lastFailureAt: number | null = null;
  private lastTripAt: number | null = null;
  private lastRecoveryAt: number | null = null;

  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(
    name: string,
    config: CircuitBreakerConfig | CircuitBreakerConfigInput = {},
    options: CircuitBreakerOptions = {},
  ) {
    super();
    this.name = name;
    this.type = options.type ?? CircuitType.GENERIC;
    this.config = createCircuitBreakerConfig(config);
    this.currentOpenDurationMs = this.config.openDurationMs;
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? Logger.getInstance();

    this.logger.debug('Circuit breaker initialized', undefined, {
      name,
      type: this.type,
      ...this.config,
    });
  }

  /**
   * Whether a call may proceed now. May move OPEN to HALF_OPEN once the open
   * duration has elapsed; never changes counters.
   */
  allow(): boolean {
    this.refreshState();

    switch (this.state) {
      case CircuitState.CLOSED:
        return true;
      case CircuitState.HALF_OPEN:
        return this.halfOpenInFlight < this.config.maxHalfOpenCalls;
      case CircuitState.OPEN:
        return false;
    }
  }

  /**
   * Run an operation under breaker protection.
   * Rejects with CircuitOpenError without running it when the breaker refuses;
   * otherwise records the outcome and returns or re-throws the operation's own
   * result unchanged.
   */
  async call<T>(operation: () => Promise<T> | T): Promise<T> {
    const permit = this.admit();

    let result: T;
    try {
      result = await this.runWithTimeout(operation);
    } catch (error) {
      this.settle(permit, 'failure');
      this.logger.warn('Circuit breaker call failed', undefined, {
        name: this.name,
        state: this.state,
        failureCount: this.failureCount,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.settle(permit, 'success');
    return result;
  }

  /**
   * Record a success that did not go through call(), e.g. a risk check passing
   */
  recordSuccess(): void {
    this.refreshState();
    this.applyOutcome('success');
  }

  /**
   * Record a failure that did not go through call(), e.g. a risk limit breach
   */
  recordFailure(): void {
    this.refreshState();
    this.applyOutcome('failure');
  }

  /**
   * Operator trip; the open duration starts now. No-op while already OPEN.
   */
  forceOpen(): void {
    this.refreshState();
    if (this.state === CircuitState.OPEN) {
      this.logger.debug('Circuit breaker already open', undefined, { name: this.name });
      return;
    }

    this.logger.warn('Circuit breaker force opened', undefined, { name: this.name });
    this.transition(CircuitState.OPEN);
  }

  /**
   * Operator recovery; lifetime metrics are kept
   */
  forceClose(): void {
    this.logger.info('Circuit breaker force closed', undefined, { name: this.name });
    this.transition(CircuitState.CLOSED);
  }

  /**
   * Back to CLOSED with every counter and metric zeroed
   */
  reset(): void {
    const previous = this.state;
    this.transition(CircuitState.CLOSED);

    this.totalCalls = 0;
    this.successfulCalls = 0;
    this.failedCalls = 0;
    this.rejectedCalls = 0;
    this.tripCount = 0;
    this.lastFailureAt = null;
    this.lastTripAt = null;
    this.lastRecoveryAt = null;

    this.logger.info('Circuit breaker reset', undefined, { name: this.name, previousState: previous });
  }

  getState(): CircuitState {
    return this.state;
  }

  isClosed(): boolean {
    return this.state === CircuitState.CLOSED;
  }

  isOpen(): boolean {
    return this.state === CircuitState.OPEN;
  }

  isHalfOpen(): boolean {
    return this.state === CircuitState.HALF_OPEN;
  }

  getStats(): CircuitBreakerStats {
    return {
      name: this.name,
      type: this.type,
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      halfOpenInFlight: this.halfOpenInFlight,
      openedAt: this.openedAt,
      currentOpenDurationMs: this.currentOpenDurationMs,
      totalCalls: this.totalCalls,
      successfulCalls: this.successfulCalls,
      failedCalls: this.failedCalls,
      rejectedCalls: this.rejectedCalls,
      tripCount: this.tripCount,
      lastFailureAt: this.lastFailureAt,
      lastTripAt: this.lastTripAt,
      lastRecoveryAt: this.lastRecoveryAt,
    };
  }

  /**
   * Time left before an OPEN breaker admits probes (ms); 0 in any other state
   */
  getTimeUntilHalfOpen(): number {
    if (this.state !== CircuitState.OPEN || this.openedAt === null) {
      return 0;
    }
    return Math.max(0, this.openedAt + this.currentOpenDurationMs - this.clock.now());
  }

  private admit(): CallPermit {
    if (!this.allow()) {
      this.rejectedCalls++;
      this.logger.debug('Circuit breaker rejected call', undefined, {
        name: this.name,
        state: this.state,
        halfOpenInFlight: this.halfOpenInFlight,
      });
      throw new CircuitOpenError(this.name, this.state, this.getStats());
    }

    this.totalCalls++;
    const probe = this.state === CircuitState.HALF_OPEN;
    if (probe) {
      this.halfOpenInFlight++;
    }
    return { generation: this.generation, probe };
  }

  private settle(permit: CallPermit, outcome: Outcome): void {
    const now = this.clock.now();
    if (outcome === 'success') {
      this.successfulCalls++;
    } else {
      this.failedCalls++;
      this.lastFailureAt = now;
    }

    if (permit.generation !== this.generation) {
      this.logger.debug('Ignoring outcome admitted before the last transition', undefined, {
        name: this.name,
        outcome,
        state: this.state,
      });
      return;
    }

    if (permit.probe) {
      this.halfOpenInFlight = Math.max(0, this.halfOpenInFlight - 1);
    }
    this.applyOutcome(outcome);
  }

  private refreshState(): void {
    if (
      this.state === CircuitState.OPEN &&
      this.openedAt !== null &&
      this.clock.now() - this.openedAt >= this.currentOpenDurationMs
    ) {
      this.transition(CircuitState.HALF_OPEN);
    }
  }

  private applyOutcome(outcome: Outcome): void {
    switch (this.state) {
      case CircuitState.CLOSED:
        if (outcome === 'success') {
          this.failureCount = 0;
          return;
        }
        this.failureCount++;
        this.lastFailureAt = this.clock.now();
        if (this.failureCount >= this.config.failureThreshold) {
          this.transition(CircuitState.OPEN);
        }
        return;

      case CircuitState.HALF_OPEN:
        if (outcome === 'failure') {
          this.lastFailureAt = this.clock.now();
          this.transition(CircuitState.OPEN);
          return;
        }
        this.successCount++;
        if (this.successCount >= this.config.successThreshold) {
          this.transition(CircuitState.CLOSED);
        }
        return;

      case CircuitState.OPEN:
        return;
    }
  }

  /**
   * Single transition point: resets phase counters and stamps timestamps
   */
  private transition(to: CircuitState): void {
    const from = this.state;
    const now = this.clock.now();

    this.state = to;
    this.failureCount = 0;
    this.successCount = 0;
    this.halfOpenInFlight = 0;
    this.generation++;

    if (to === CircuitState.OPEN && from !== CircuitState.OPEN) {
      this.openedAt = now;
      this.tripCount++;
      this.lastTripAt = now;
      this.currentOpenDurationMs = this.nextOpenDuration();
    } else if (to === CircuitState.CLOSED) {
      this.openedAt = null;
      this.backoffCount = 0;
      this.currentOpenDurationMs = this.config.openDurationMs;
      if (from !== CircuitState.CLOSED) {
        this.lastRecoveryAt = now;
      }
    }

    if (from === to) return;

    const event: StateChangeEvent = { name: this.name, type: this.type, from, to, at: now };
    if (to === CircuitState.OPEN) {
      this.logger.warn('Circuit breaker transitioned to OPEN', undefined, {
        name: this.name,
        previousState: from,
        openDurationMs: this.currentOpenDurationMs,
      });
    } else {
      this.logger.info(`Circuit breaker transitioned to ${to.toUpperCase()}`, undefined, {
        name: this.name,
        previousState: from,
      });
    }

    this.notify('stateChange', event);
    if (to === CircuitState.OPEN) {
      this.notify('trip', event);
    } else if (to === CircuitState.CLOSED) {
      this.notify('recover', event);
    }
  }

  /**
   * Open duration for the trip being entered; grows per trip since the last close
   */
  private nextOpenDuration(): number {
    const { openDurationMs, backoffMultiplier, maxOpenDurationMs } = this.config;
    if (backoffMultiplier === undefined) {
      return openDurationMs;
    }

    const grown = openDurationMs * backoffMultiplier ** this.backoffCount;
    this.backoffCount++;
    return Math.min(grown, maxOpenDurationMs ?? Number.POSITIVE_INFINITY);
  }

  private notify(eventName: keyof CircuitBreakerEvents, event: StateChangeEvent): void {
    try {
      this.emit(eventName, event);
    } catch (error) {
      this.logger.error(
        `Circuit breaker ${eventName} listener failed`,
        error instanceof Error ? error : new Error(String(error)),
        undefined,
        { name: this.name },
      );
    }
  }

  private runWithTimeout<T>(operation: () => Promise<T> | T): Promise<T> {
    const timeoutMs = this.config.callTimeoutMs;
    const pending = new Promise<T>((resolve) => resolve(operation()));
    if (timeoutMs === undefined) {
      return pending;
    }

    return new Promise<T>((resolve, reject) => {
      const timer = this.clock.setTimeout(() => {
        reject(new CallTimeoutError(this.name, timeoutMs));
      }, timeoutMs);

      pending.then(
        (value) => {
          this.clock.clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          this.clock.clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
