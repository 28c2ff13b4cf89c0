/**
 * CircuitBreakerManager - Named registry of breakers
 *
 * An explicit instance owned by the embedding application; there is no
 * process-wide registry. Registration is a single synchronous section, so
 * callers racing to create the same name always receive the same breaker.
 * The manager never holds anything while a breaker decides, so the two
 * never wait on each other.
 */

import { CircuitBreakerConfigInput } from '../config/schema.js';
import { BreakerNotFoundError } from '../errors/BreakerErrors.js';
import { Logger } from '../logging/Logger.js';
import {
  BreakerSystemStatus,
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
  CircuitType,
} from '../types/breaker.js';
import { Clock, SystemClock } from '../utils/time/Clock.js';
import { CircuitBreaker } from './CircuitBreaker.js';

export interface CircuitBreakerManagerOptions {
  clock?: Clock;
  logger?: Logger;
}

export class CircuitBreakerManager {
  private readonly breakers: Map<string, CircuitBreaker> = new Map();
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: CircuitBreakerManagerOptions = {}) {
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? Logger.getInstance();
  }

  /**
   * Registered breaker for `name`, created on first use.
   * Config and type only apply to the first registration.
   */
  getOrCreate(
    name: string,
    config: CircuitBreakerConfig | CircuitBreakerConfigInput = {},
    type: CircuitType = CircuitType.GENERIC,
  ): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) {
      return existing;
    }

    const breaker = new CircuitBreaker(name, config, {
      type,
      clock: this.clock,
      logger: this.logger,
    });
    this.breakers.set(name, breaker);

    this.logger.info('Registered circuit breaker', undefined, { name, type });
    return breaker;
  }

  get(name: string): CircuitBreaker {
    const breaker = this.breakers.get(name);
    if (!breaker) {
      throw new BreakerNotFoundError(name);
    }
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  names(): string[] {
    return Array.from(this.breakers.keys());
  }

  remove(name: string): boolean {
    const removed = this.breakers.delete(name);
    if (removed) {
      this.logger.info('Removed circuit breaker', undefined, { name });
    }
    return removed;
  }

  /**
   * Operational recovery: force the breaker back to CLOSED with zeroed counters
   */
  reset(name: string): void {
    this.get(name).reset();
  }

  resetAll(): void {
    for (const breaker of this.breakers.values()) {
      breaker.reset();
    }
    this.logger.info('All circuit breakers reset', undefined, { count: this.breakers.size });
  }

  /**
   * Current state of every breaker. Reads only; pending time-based
   * transitions are not applied.
   */
  statusSnapshot(): Record<string, CircuitState> {
    const snapshot: Record<string, CircuitState> = {};
    for (const [name, breaker] of this.breakers) {
      snapshot[name] = breaker.getState();
    }
    return snapshot;
  }

  openBreakers(): string[] {
    return this.names().filter((name) => this.get(name).isOpen());
  }

  anyOpen(): boolean {
    return this.openBreakers().length > 0;
  }

  systemStatus(): BreakerSystemStatus {
    const breakers: Record<string, CircuitBreakerStats> = {};
    let open = 0;
    let halfOpen = 0;

    for (const [name, breaker] of this.breakers) {
      const stats = breaker.getStats();
      breakers[name] = stats;
      if (stats.state === CircuitState.OPEN) open++;
      if (stats.state === CircuitState.HALF_OPEN) halfOpen++;
    }

    return {
      total: this.breakers.size,
      open,
      halfOpen,
      closed: this.breakers.size - open - halfOpen,
      breakers,
    };
  }
}
