/**
 * TradingCircuitBreakers - Halts trading when portfolio risk limits are breached
 *
 * One breaker per risk dimension (drawdown, daily loss, volatility, order
 * rate, connection). Each evaluation pulls a snapshot from the
 * PortfolioProvider and feeds every snapshot dimension's breaker a synthetic
 * outcome: a breach is a failure, a reading within bounds is a success. A
 * dimension therefore trips on the first breach and recovers after its
 * cooldown once enough in-bounds snapshots have been seen.
 *
 * The connection dimension is fed by the trading system's broker/API calls
 * instead, and trips after `connectionFailureThreshold` consecutive failures.
 * Volatility and connection cooldowns back off on repeated trips.
 */

import { EventEmitter } from 'eventemitter3';
import {
  createTradingBreakerConfig,
  parsePortfolioSnapshot,
  TradingBreakerConfigInput,
} from '../config/schema.js';
import { Logger } from '../logging/Logger.js';
import { CircuitBreakerConfig, CircuitState, CircuitType } from '../types/breaker.js';
import {
  BackoffDimension,
  DimensionReading,
  PortfolioEvaluation,
  PortfolioProvider,
  PortfolioSnapshot,
  RISK_DIMENSIONS,
  RiskDimension,
  TradingBreakerConfig,
  TradingBreakerStatus,
  TradingCircuitBreakersEvents,
} from '../types/portfolio.js';
import { Clock, SystemClock, TimerHandle } from '../utils/time/Clock.js';
import { CircuitBreaker } from './CircuitBreaker.js';
import { CircuitBreakerManager } from './CircuitBreakerManager.js';

export interface TradingCircuitBreakersOptions {
  clock?: Clock;
  logger?: Logger;
}

export function breakerNameFor(dimension: RiskDimension): string {
  return `trading:${dimension}`;
}

export class TradingCircuitBreakers extends EventEmitter<TradingCircuitBreakersEvents> {
  readonly config: TradingBreakerConfig;

  private readonly manager: CircuitBreakerManager;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private lastSnapshot: PortfolioSnapshot | null = null;
  private readonly lastBreach: Map<RiskDimension, string> = new Map();

  private monitorHandle: TimerHandle | null = null;
  private pendingEvaluation: Promise<void> | null = null;

  constructor(
    private readonly portfolio: PortfolioProvider,
    config: TradingBreakerConfig | TradingBreakerConfigInput = {},
    options: TradingCircuitBreakersOptions = {},
  ) {
    super();
    this.config = createTradingBreakerConfig(config);
    this.clock = options.clock ?? new SystemClock();
    this.logger = options.logger ?? Logger.getInstance();
    this.manager = new CircuitBreakerManager({ clock: this.clock, logger: this.logger });

    for (const dimension of RISK_DIMENSIONS) {
      const connection = dimension === RiskDimension.CONNECTION;
      this.manager.getOrCreate(
        breakerNameFor(dimension),
        {
          failureThreshold: connection ? this.config.connectionFailureThreshold : 1,
          successThreshold: this.config.recoverySuccesses,
          openDurationMs: this.config.cooldownMs[dimension],
          maxHalfOpenCalls: 1,
          ...this.backoffFor(dimension),
        },
        connection ? CircuitType.CONNECTION_FAILURE : CircuitType.TRADING_RISK,
      );
    }

    this.logger.info('Trading circuit breakers initialized', undefined, {
      maxDrawdownPct: this.config.maxDrawdownPct,
      maxDailyLoss: this.config.maxDailyLoss,
      maxVolatility: this.config.maxVolatility,
      maxOrderRate: this.config.maxOrderRate,
    });
  }

  /**
   * Pull one snapshot and record a breach or a pass on every dimension.
   * A provider failure or malformed snapshot rejects before any breaker changes.
   */
  async evaluatePortfolio(): Promise<PortfolioEvaluation> {
    const snapshot = parsePortfolioSnapshot(await this.portfolio.getSnapshot());

    const breached: RiskDimension[] = [];
    const warnings: RiskDimension[] = [];

    for (const reading of this.readingsFor(snapshot)) {
      const breaker = this.breakerFor(reading.dimension);

      if (reading.value > reading.threshold) {
        breached.push(reading.dimension);
        this.recordBreach(breaker, reading, snapshot);
        continue;
      }

      this.recordPass(breaker, reading.dimension);

      if (reading.value >= reading.threshold * this.config.warningRatio) {
        warnings.push(reading.dimension);
        this.logger.warn('Risk dimension approaching limit', undefined, { ...reading });
        this.notify('warning', () => this.emit('warning', reading));
      }
    }

    this.lastSnapshot = snapshot;

    return {
      snapshot,
      breached,
      warnings,
      allowTrade: this.allowTrade(),
      evaluatedAt: this.clock.now(),
    };
  }

  /**
   * Record a failed broker/API call against the connection dimension
   */
  recordConnectionFailure(error: Error | string): void {
    const message = error instanceof Error ? error.message : error;
    const breaker = this.breakerFor(RiskDimension.CONNECTION);
    const tripsBefore = breaker.getStats().tripCount;

    breaker.recordFailure();

    if (breaker.getStats().tripCount > tripsBefore) {
      this.announceTrip(RiskDimension.CONNECTION, `connection failure: ${message}`, this.lastSnapshot);
    }
  }

  /**
   * Record a successful broker/API call against the connection dimension
   */
  recordConnectionSuccess(): void {
    this.recordPass(this.breakerFor(RiskDimension.CONNECTION), RiskDimension.CONNECTION);
  }

  /**
   * Gate consulted before submitting an order
   */
  allowTrade(): boolean {
    return RISK_DIMENSIONS.every((dimension) => this.breakerFor(dimension).allow());
  }

  /**
   * Dimensions whose breaker is currently OPEN
   */
  activeTrips(): Set<RiskDimension> {
    return new Set(
      RISK_DIMENSIONS.filter((dimension) => {
        const breaker = this.breakerFor(dimension);
        return !breaker.allow() && breaker.isOpen();
      }),
    );
  }

  blockingReasons(): string[] {
    const reasons: string[] = [];

    for (const dimension of RISK_DIMENSIONS) {
      const breaker = this.breakerFor(dimension);
      if (breaker.allow()) continue;

      const detail = this.lastBreach.get(dimension) ?? 'opened by operator';
      reasons.push(
        `${dimension}: ${breaker.getState()} (${detail}; trips: ${breaker.getStats().tripCount})`,
      );
    }

    return reasons;
  }

  getStatus(): TradingBreakerStatus {
    const blocking = RISK_DIMENSIONS.filter((dimension) => !this.breakerFor(dimension).allow());
    const recovering = RISK_DIMENSIONS.filter((dimension) =>
      this.breakerFor(dimension).isHalfOpen(),
    );
    const stateOf = (dimension: RiskDimension): CircuitState =>
      this.breakerFor(dimension).getState();

    return {
      timestamp: this.clock.now(),
      canTrade: blocking.length === 0,
      blocking,
      recovering,
      states: {
        [RiskDimension.DRAWDOWN]: stateOf(RiskDimension.DRAWDOWN),
        [RiskDimension.DAILY_LOSS]: stateOf(RiskDimension.DAILY_LOSS),
        [RiskDimension.VOLATILITY]: stateOf(RiskDimension.VOLATILITY),
        [RiskDimension.ORDER_RATE]: stateOf(RiskDimension.ORDER_RATE),
        [RiskDimension.CONNECTION]: stateOf(RiskDimension.CONNECTION),
      },
      lastSnapshot: this.lastSnapshot,
    };
  }

  breakerFor(dimension: RiskDimension): CircuitBreaker {
    return this.manager.get(breakerNameFor(dimension));
  }

  getManager(): CircuitBreakerManager {
    return this.manager;
  }

  resetDimension(dimension: RiskDimension): void {
    this.manager.reset(breakerNameFor(dimension));
    this.lastBreach.delete(dimension);
    this.logger.info('Trading breaker reset', undefined, { dimension });
  }

  resetAll(): void {
    this.manager.resetAll();
    this.lastBreach.clear();
  }

  /**
   * Evaluate the portfolio every `checkIntervalMs` until stopped.
   * A new evaluation is skipped while the previous one is still running.
   */
  startMonitoring(): void {
    if (this.monitorHandle !== null) {
      this.logger.warn('Trading breaker monitoring already active');
      return;
    }

    this.monitorHandle = this.clock.setInterval(
      () => this.runScheduledEvaluation(),
      this.config.checkIntervalMs,
    );
    this.logger.info('Trading breaker monitoring started', undefined, {
      checkIntervalMs: this.config.checkIntervalMs,
    });
  }

  /**
   * Stop scheduling evaluations and wait for one already running
   */
  async stopMonitoring(): Promise<void> {
    if (this.monitorHandle !== null) {
      this.clock.clearInterval(this.monitorHandle);
      this.monitorHandle = null;
      this.logger.info('Trading breaker monitoring stopped');
    }
    await this.pendingEvaluation;
  }

  isMonitoring(): boolean {
    return this.monitorHandle !== null;
  }

  private runScheduledEvaluation(): void {
    if (this.pendingEvaluation) {
      this.logger.debug('Skipping evaluation, previous one still running');
      return;
    }

    this.pendingEvaluation = this.evaluatePortfolio()
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error(
            'Portfolio evaluation failed',
            error instanceof Error ? error : new Error(String(error)),
          );
        },
      )
      .finally(() => {
        this.pendingEvaluation = null;
      });
  }

  private readingsFor(snapshot: PortfolioSnapshot): DimensionReading[] {
    return [
      {
        dimension: RiskDimension.DRAWDOWN,
        value: snapshot.drawdownPct,
        threshold: this.config.maxDrawdownPct,
      },
      {
        dimension: RiskDimension.DAILY_LOSS,
        value: Math.max(0, -snapshot.dailyPnl),
        threshold: this.config.maxDailyLoss,
      },
      {
        dimension: RiskDimension.VOLATILITY,
        value: snapshot.volatility,
        threshold: this.config.maxVolatility,
      },
      {
        dimension: RiskDimension.ORDER_RATE,
        value: snapshot.orderRate,
        threshold: this.config.maxOrderRate,
      },
    ];
  }

  private recordBreach(
    breaker: CircuitBreaker,
    reading: DimensionReading,
    snapshot: PortfolioSnapshot,
  ): void {
    const reason = `${reading.dimension} ${reading.value} exceeds limit ${reading.threshold}`;
    const tripsBefore = breaker.getStats().tripCount;

    breaker.recordFailure();

    if (breaker.getStats().tripCount > tripsBefore) {
      this.announceTrip(reading.dimension, reason, snapshot);
    }
  }

  private announceTrip(
    dimension: RiskDimension,
    reason: string,
    snapshot: PortfolioSnapshot | null,
  ): void {
    this.lastBreach.set(dimension, reason);
    this.logger.warn('Trading breaker tripped', undefined, {
      dimension,
      reason,
      cooldownMs: this.breakerFor(dimension).getStats().currentOpenDurationMs,
    });
    this.notify('trip', () => this.emit('trip', { dimension, reason, snapshot }));
  }

  private recordPass(breaker: CircuitBreaker, dimension: RiskDimension): void {
    const wasClosed = breaker.isClosed();

    breaker.recordSuccess();

    if (!wasClosed && breaker.isClosed()) {
      this.lastBreach.delete(dimension);
      this.logger.info('Trading breaker recovered', undefined, { dimension });
      this.notify('recover', () => this.emit('recover', { dimension }));
    }
  }

  private backoffFor(
    dimension: RiskDimension,
  ): Pick<CircuitBreakerConfig, 'backoffMultiplier' | 'maxOpenDurationMs'> {
    if (!isBackoffDimension(dimension)) {
      return {};
    }
    return {
      backoffMultiplier: this.config.backoffMultiplier,
      maxOpenDurationMs: this.config.maxCooldownMs[dimension],
    };
  }

  /**
   * Listener failures are logged; they never interrupt an evaluation
   */
  private notify(eventName: keyof TradingCircuitBreakersEvents, dispatch: () => void): void {
    try {
      dispatch();
    } catch (error) {
      this.logger.error(
        `Trading breaker ${eventName} listener failed`,
        error instanceof Error ? error : new Error(String(error)),
      );
    }
  }
}

function isBackoffDimension(dimension: RiskDimension): dimension is BackoffDimension {
  return dimension === RiskDimension.VOLATILITY || dimension === RiskDimension.CONNECTION;
}
