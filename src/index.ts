/**
 * Circuit breakers for protected dependencies and trading risk limits
 */

export * from './engine/index.js';
export * from './types/index.js';
export * from './config/index.js';
export {
  BreakerError,
  BreakerErrorCode,
  CircuitOpenError,
  BreakerNotFoundError,
  BreakerConfigError,
  CallTimeoutError,
  SnapshotValidationError,
} from './errors/BreakerErrors.js';
export { Logger, LogLevel, LogEntry, LoggerConfig, LogMetadata } from './logging/Logger.js';
export { Clock, SystemClock, ManualClock, TimerHandle } from './utils/time/Clock.js';
