import { RiskDimension, TradingBreakerConfig } from '../types/portfolio.js';
import { createTradingBreakerConfig, TradingBreakerConfigInput } from './schema.js';

const COOLDOWN_ENV: Record<RiskDimension, string> = {
  [RiskDimension.DRAWDOWN]: 'BREAKER_COOLDOWN_DRAWDOWN_MS',
  [RiskDimension.DAILY_LOSS]: 'BREAKER_COOLDOWN_DAILY_LOSS_MS',
  [RiskDimension.VOLATILITY]: 'BREAKER_COOLDOWN_VOLATILITY_MS',
  [RiskDimension.ORDER_RATE]: 'BREAKER_COOLDOWN_ORDER_RATE_MS',
  [RiskDimension.CONNECTION]: 'BREAKER_COOLDOWN_CONNECTION_MS',
};

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

/**
 * Collect trading breaker settings present in the environment.
 * Unset variables are left out so schema defaults apply.
 */
export function loadTradingBreakerConfigFromEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): TradingBreakerConfigInput {
  const input: TradingBreakerConfigInput = {
    maxDrawdownPct: readNumber(env, 'BREAKER_MAX_DRAWDOWN_PCT'),
    maxDailyLoss: readNumber(env, 'BREAKER_MAX_DAILY_LOSS'),
    maxVolatility: readNumber(env, 'BREAKER_MAX_VOLATILITY'),
    maxOrderRate: readNumber(env, 'BREAKER_MAX_ORDER_RATE'),
    warningRatio: readNumber(env, 'BREAKER_WARNING_RATIO'),
    recoverySuccesses: readNumber(env, 'BREAKER_RECOVERY_SUCCESSES'),
    backoffMultiplier: readNumber(env, 'BREAKER_BACKOFF_MULTIPLIER'),
    connectionFailureThreshold: readNumber(env, 'BREAKER_CONNECTION_FAILURE_THRESHOLD'),
    checkIntervalMs: readNumber(env, 'BREAKER_CHECK_INTERVAL_MS'),
  };

  const cooldownMs: Partial<Record<RiskDimension, number>> = {};
  for (const [dimension, key] of Object.entries(COOLDOWN_ENV)) {
    const value = readNumber(env, key);
    if (value !== undefined && isRiskDimension(dimension)) {
      cooldownMs[dimension] = value;
    }
  }
  if (Object.keys(cooldownMs).length > 0) {
    input.cooldownMs = cooldownMs;
  }

  return input;
}

/**
 * Environment settings over explicit overrides over schema defaults, validated.
 */
export function loadTradingBreakerConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: TradingBreakerConfigInput = {},
): TradingBreakerConfig {
  const fromEnv = loadTradingBreakerConfigFromEnvironment(env);
  const merged: TradingBreakerConfigInput = { ...overrides };

  for (const [key, value] of Object.entries(fromEnv)) {
    if (value === undefined || key === 'cooldownMs') continue;
    Object.assign(merged, { [key]: value });
  }
  if (fromEnv.cooldownMs) {
    merged.cooldownMs = { ...overrides.cooldownMs, ...fromEnv.cooldownMs };
  }

  return createTradingBreakerConfig(merged);
}

function isRiskDimension(value: string): value is RiskDimension {
  return Object.values<string>(RiskDimension).includes(value);
}
