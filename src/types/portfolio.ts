/**
 * Trading Risk Types
 * Portfolio data supplied by the trading system and the risk dimensions it is checked against
 */

import type { CircuitState } from './breaker.js';

/**
 * Risk dimension guarded by its own breaker
 */
export enum RiskDimension {
  DRAWDOWN = 'drawdown',
  DAILY_LOSS = 'daily-loss',
  VOLATILITY = 'volatility',
  ORDER_RATE = 'order-rate',
  /** Fed by broker/API call outcomes rather than portfolio snapshots */
  CONNECTION = 'connection',
}

export const RISK_DIMENSIONS: readonly RiskDimension[] = [
  RiskDimension.DRAWDOWN,
  RiskDimension.DAILY_LOSS,
  RiskDimension.VOLATILITY,
  RiskDimension.ORDER_RATE,
  RiskDimension.CONNECTION,
];

/**
 * Dimensions whose cooldown grows on repeated trips
 */
export type BackoffDimension = RiskDimension.VOLATILITY | RiskDimension.CONNECTION;

/**
 * Point-in-time risk data
 */
export interface PortfolioSnapshot {
  /** Total portfolio value */
  readonly value: number;
  /** Decline from the prior peak, in percent (12 = 12%) */
  readonly drawdownPct: number;
  /** Profit or loss since the start of the trading day */
  readonly dailyPnl: number;
  /** Current volatility measure */
  readonly volatility: number;
  /** Orders per minute */
  readonly orderRate: number;
}

/**
 * Source of live portfolio metrics, owned by the embedding trading system
 */
export interface PortfolioProvider {
  getSnapshot(): Promise<PortfolioSnapshot>;
}

export interface TradingBreakerConfig {
  /** Drawdown above this percentage trips (10 = 10%) */
  readonly maxDrawdownPct: number;
  /** A daily loss larger than this amount trips */
  readonly maxDailyLoss: number;
  /** Volatility above this value trips */
  readonly maxVolatility: number;
  /** Orders per minute above this value trips */
  readonly maxOrderRate: number;
  /** Fraction of a threshold at which a warning is raised */
  readonly warningRatio: number;
  /** In-bounds evaluations needed in HALF_OPEN before a dimension closes */
  readonly recoverySuccesses: number;
  /** Time a tripped dimension stays OPEN (ms) */
  readonly cooldownMs: Readonly<Record<RiskDimension, number>>;
  /** Cooldown growth factor per consecutive trip of a backoff dimension */
  readonly backoffMultiplier: number;
  /** Ceiling for a backed-off cooldown (ms) */
  readonly maxCooldownMs: Readonly<Record<BackoffDimension, number>>;
  /** Consecutive connection failures before the connection dimension trips */
  readonly connectionFailureThreshold: number;
  /** Interval between evaluations while monitoring (ms) */
  readonly checkIntervalMs: number;
}

export interface DimensionReading {
  dimension: RiskDimension;
  value: number;
  threshold: number;
}

export interface PortfolioEvaluation {
  snapshot: PortfolioSnapshot;
  breached: RiskDimension[];
  warnings: RiskDimension[];
  allowTrade: boolean;
  evaluatedAt: number;
}

export interface TradingBreakerStatus {
  timestamp: number;
  canTrade: boolean;
  blocking: RiskDimension[];
  recovering: RiskDimension[];
  states: Record<RiskDimension, CircuitState>;
  lastSnapshot: PortfolioSnapshot | null;
}

export interface TradingTripEvent {
  dimension: RiskDimension;
  reason: string;
  /** Snapshot that breached; latest known snapshot for a connection trip */
  snapshot: PortfolioSnapshot | null;
}

export interface TradingRecoverEvent {
  dimension: RiskDimension;
}

export interface TradingCircuitBreakersEvents {
  trip: [TradingTripEvent];
  recover: [TradingRecoverEvent];
  warning: [DimensionReading];
}
