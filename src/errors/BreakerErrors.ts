/**
 * Error taxonomy for the breaker subsystem
 *
 * Every error raised by the subsystem itself extends BreakerError. Errors thrown
 * by a protected operation are never wrapped: they reach the caller unchanged.
 */

import type { CircuitBreakerStats, CircuitState } from '../types/breaker.js';

export enum BreakerErrorCode {
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  BREAKER_NOT_FOUND = 'BREAKER_NOT_FOUND',
  INVALID_CONFIG = 'INVALID_CONFIG',
  CALL_TIMEOUT = 'CALL_TIMEOUT',
  INVALID_SNAPSHOT = 'INVALID_SNAPSHOT',
}

export class BreakerError extends Error {
  public readonly code: BreakerErrorCode;
  public readonly context?: Record<string, unknown>;
  public readonly timestamp: number;

  constructor(code: BreakerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'BreakerError';
    this.code = code;
    this.context = context;
    this.timestamp = Date.now();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

/**
 * The call was rejected without running the operation: the breaker is OPEN,
 * or HALF_OPEN with every probe slot taken. Callers may retry later.
 */
export class CircuitOpenError extends BreakerError {
  constructor(
    public readonly breakerName: string,
    public readonly state: CircuitState,
    public readonly stats: CircuitBreakerStats,
  ) {
    super(BreakerErrorCode.CIRCUIT_OPEN, `Circuit breaker '${breakerName}' is ${state}`, {
      breakerName,
      state,
      openedAt: stats.openedAt,
    });
    this.name = 'CircuitOpenError';
  }
}

export class BreakerNotFoundError extends BreakerError {
  constructor(public readonly breakerName: string) {
    super(BreakerErrorCode.BREAKER_NOT_FOUND, `Circuit breaker '${breakerName}' is not registered`, {
      breakerName,
    });
    this.name = 'BreakerNotFoundError';
  }
}

export class BreakerConfigError extends BreakerError {
  constructor(
    public readonly subject: string,
    public readonly issues: string[],
  ) {
    super(BreakerErrorCode.INVALID_CONFIG, `Invalid ${subject}: ${issues.join('; ')}`, {
      subject,
      issues,
    });
    this.name = 'BreakerConfigError';
  }
}

export class CallTimeoutError extends BreakerError {
  constructor(
    public readonly breakerName: string,
    public readonly timeoutMs: number,
  ) {
    super(
      BreakerErrorCode.CALL_TIMEOUT,
      `Call through circuit breaker '${breakerName}' timed out after ${timeoutMs}ms`,
      { breakerName, timeoutMs },
    );
    this.name = 'CallTimeoutError';
  }
}

export class SnapshotValidationError extends BreakerError {
  constructor(public readonly issues: string[]) {
    super(BreakerErrorCode.INVALID_SNAPSHOT, `Invalid portfolio snapshot: ${issues.join('; ')}`, {
      issues,
    });
    this.name = 'SnapshotValidationError';
  }
}
