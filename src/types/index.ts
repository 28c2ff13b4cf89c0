/**
 * Types - Barrel Export
 */

export {
  CircuitState,
  CircuitType,
  CircuitBreakerConfig,
  CircuitBreakerStats,
  StateChangeEvent,
  CircuitBreakerEvents,
  BreakerSystemStatus,
} from './breaker.js';

export {
  RiskDimension,
  RISK_DIMENSIONS,
  BackoffDimension,
  PortfolioSnapshot,
  PortfolioProvider,
  TradingBreakerConfig,
  DimensionReading,
  PortfolioEvaluation,
  TradingBreakerStatus,
  TradingTripEvent,
  TradingRecoverEvent,
  TradingCircuitBreakersEvents,
} from './portfolio.js';
