/**
 * Default breaker policies for common dependency kinds
 */
export const CircuitBreakerDefaults = {
  /**
   * HTTP services
   */
  http: {
    failureThreshold: 5,
    successThreshold: 2,
    openDurationMs: 30000, // 30 seconds
    maxHalfOpenCalls: 3,
    callTimeoutMs: 10000, // 10 seconds
  },

  /**
   * Database services
   */
  database: {
    failureThreshold: 3,
    successThreshold: 2,
    openDurationMs: 60000, // 1 minute
    maxHalfOpenCalls: 2,
    callTimeoutMs: 5000, // 5 seconds
  },

  /**
   * Cache services (Redis)
   */
  cache: {
    failureThreshold: 10,
    successThreshold: 3,
    openDurationMs: 15000, // 15 seconds
    maxHalfOpenCalls: 5,
    callTimeoutMs: 2000, // 2 seconds
  },

  /**
   * External APIs, brokers and exchanges
   */
  externalApi: {
    failureThreshold: 3,
    successThreshold: 2,
    openDurationMs: 120000, // 2 minutes
    maxHalfOpenCalls: 2,
    callTimeoutMs: 15000, // 15 seconds
  },
} as const;
