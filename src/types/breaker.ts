/**
 * Circuit Breaker Types
 * Lifecycle phases, policy and diagnostics for a single breaker
 */

/**
 * Breaker lifecycle phase
 */
export enum CircuitState {
  /** Calls flow through; failures are counted */
  CLOSED = 'closed',
  /** Calls are rejected until the open duration elapses */
  OPEN = 'open',
  /** A limited number of probe calls test recovery */
  HALF_OPEN = 'half-open',
}

/**
 * Classification tag; does not alter transition rules
 */
export enum CircuitType {
  GENERIC = 'generic',
  LATENCY = 'latency',
  TRADING_RISK = 'trading-risk',
  CONNECTION_FAILURE = 'connection-failure',
}

/**
 * Breaker policy, validated and frozen at construction
 */
export interface CircuitBreakerConfig {
  /** Failures in CLOSED before tripping */
  readonly failureThreshold: number;
  /** Probe successes in HALF_OPEN before closing */
  readonly successThreshold: number;
  /** Time spent OPEN before probes are admitted (ms) */
  readonly openDurationMs: number;
  /** Concurrent probes admitted while HALF_OPEN */
  readonly maxHalfOpenCalls: number;
  /** Calls still pending after this long count as failed (ms) */
  readonly callTimeoutMs?: number;
  /** Each consecutive trip multiplies the open duration by this factor */
  readonly backoffMultiplier?: number;
  /** Upper bound for the backed-off open duration (ms) */
  readonly maxOpenDurationMs?: number;
}

export interface CircuitBreakerStats {
  name: string;
  type: CircuitType;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  halfOpenInFlight: number;
  openedAt: number | null;
  /** Open duration in force for the current or next trip (ms) */
  currentOpenDurationMs: number;
  totalCalls: number;
  successfulCalls: number;
  failedCalls: number;
  rejectedCalls: number;
  tripCount: number;
  lastFailureAt: number | null;
  lastTripAt: number | null;
  lastRecoveryAt: number | null;
}

export interface StateChangeEvent {
  name: string;
  type: CircuitType;
  from: CircuitState;
  to: CircuitState;
  at: number;
}

export interface CircuitBreakerEvents {
  stateChange: [StateChangeEvent];
  trip: [StateChangeEvent];
  recover: [StateChangeEvent];
}

/**
 * Aggregate view across a manager's breakers
 */
export interface BreakerSystemStatus {
  total: number;
  open: number;
  halfOpen: number;
  closed: number;
  breakers: Record<string, CircuitBreakerStats>;
}
