import { z } from 'zod';
import { BreakerConfigError, SnapshotValidationError } from '../errors/BreakerErrors.js';
import type { CircuitBreakerConfig } from '../types/breaker.js';
import {
  PortfolioSnapshot,
  RiskDimension,
  TradingBreakerConfig,
} from '../types/portfolio.js';

// Circuit Breaker Config
export const CircuitBreakerConfigSchema = z
  .object({
    failureThreshold: z.number().int().positive().default(5),
    successThreshold: z.number().int().positive().default(3),
    openDurationMs: z.number().positive().default(60000),
    maxHalfOpenCalls: z.number().int().min(1).default(1),
    callTimeoutMs: z.number().positive().optional(),
    backoffMultiplier: z.number().min(1).optional(),
    maxOpenDurationMs: z.number().positive().optional(),
  })
  .refine(
    (config) =>
      config.maxOpenDurationMs === undefined || config.maxOpenDurationMs >= config.openDurationMs,
    { message: 'must not be below openDurationMs', path: ['maxOpenDurationMs'] },
  );

export type CircuitBreakerConfigInput = z.input<typeof CircuitBreakerConfigSchema>;

// Trading Breaker Config
export const TradingBreakerConfigSchema = z
  .object({
    maxDrawdownPct: z.number().positive().max(100).default(10),
    maxDailyLoss: z.number().positive().default(5000),
    maxVolatility: z.number().positive().default(3),
    maxOrderRate: z.number().positive().default(10),
    warningRatio: z.number().gt(0).lt(1).default(0.75),
    recoverySuccesses: z.number().int().positive().default(2),
    cooldownMs: z
      .object({
        [RiskDimension.DRAWDOWN]: z.number().positive().default(86400000),
        [RiskDimension.DAILY_LOSS]: z.number().positive().default(300000),
        [RiskDimension.VOLATILITY]: z.number().positive().default(300000),
        [RiskDimension.ORDER_RATE]: z.number().positive().default(60000),
        [RiskDimension.CONNECTION]: z.number().positive().default(30000),
      })
      .default({}),
    // Volatility and connection trips back off; the other dimensions keep a fixed cooldown
    backoffMultiplier: z.number().min(1).default(2),
    maxCooldownMs: z
      .object({
        [RiskDimension.VOLATILITY]: z.number().positive().default(3600000),
        [RiskDimension.CONNECTION]: z.number().positive().default(300000),
      })
      .default({}),
    connectionFailureThreshold: z.number().int().positive().default(3),
    checkIntervalMs: z.number().int().positive().default(1000),
  })
  .superRefine((config, ctx) => {
    for (const dimension of [RiskDimension.VOLATILITY, RiskDimension.CONNECTION] as const) {
      if (config.maxCooldownMs[dimension] < config.cooldownMs[dimension]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `must not be below cooldownMs.${dimension}`,
          path: ['maxCooldownMs', dimension],
        });
      }
    }
  });

export type TradingBreakerConfigInput = z.input<typeof TradingBreakerConfigSchema>;

// Portfolio Snapshot
export const PortfolioSnapshotSchema = z.object({
  value: z.number().finite().nonnegative(),
  drawdownPct: z.number().finite().nonnegative(),
  dailyPnl: z.number().finite(),
  volatility: z.number().finite().nonnegative(),
  orderRate: z.number().finite().nonnegative(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

/**
 * Validate breaker policy, filling defaults. Throws BreakerConfigError on invalid input.
 */
export function createCircuitBreakerConfig(
  input: CircuitBreakerConfigInput = {},
): CircuitBreakerConfig {
  const result = CircuitBreakerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new BreakerConfigError('circuit breaker config', formatIssues(result.error));
  }
  return Object.freeze({ ...result.data });
}

export function createTradingBreakerConfig(
  input: TradingBreakerConfigInput = {},
): TradingBreakerConfig {
  const result = TradingBreakerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new BreakerConfigError('trading breaker config', formatIssues(result.error));
  }
  return Object.freeze({
    ...result.data,
    cooldownMs: Object.freeze({ ...result.data.cooldownMs }),
    maxCooldownMs: Object.freeze({ ...result.data.maxCooldownMs }),
  });
}

export function parsePortfolioSnapshot(input: unknown): PortfolioSnapshot {
  const result = PortfolioSnapshotSchema.safeParse(input);
  if (!result.success) {
    throw new SnapshotValidationError(formatIssues(result.error));
  }
  return Object.freeze({ ...result.data });
}
