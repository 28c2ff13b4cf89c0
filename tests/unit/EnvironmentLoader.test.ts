import {
  loadTradingBreakerConfig,
  loadTradingBreakerConfigFromEnvironment,
} from '../../src/config/EnvironmentLoader.js';
import { BreakerConfigError } from '../../src/errors/BreakerErrors.js';
import { RiskDimension } from '../../src/types/portfolio.js';

describe('EnvironmentLoader', () => {
  describe('loadTradingBreakerConfigFromEnvironment', () => {
    it('should leave unset and blank variables out', () => {
      const input = loadTradingBreakerConfigFromEnvironment({ BREAKER_MAX_VOLATILITY: '  ' });

      expect(input.maxVolatility).toBeUndefined();
      expect(input.cooldownMs).toBeUndefined();
    });

    it('should read thresholds and cooldowns', () => {
      const input = loadTradingBreakerConfigFromEnvironment({
        BREAKER_MAX_DRAWDOWN_PCT: '15',
        BREAKER_WARNING_RATIO: '0.9',
        BREAKER_COOLDOWN_DAILY_LOSS_MS: '120000',
        BREAKER_COOLDOWN_CONNECTION_MS: '45000',
        BREAKER_BACKOFF_MULTIPLIER: '1.5',
        BREAKER_CONNECTION_FAILURE_THRESHOLD: '5',
      });

      expect(input.maxDrawdownPct).toBe(15);
      expect(input.warningRatio).toBe(0.9);
      expect(input.backoffMultiplier).toBe(1.5);
      expect(input.connectionFailureThreshold).toBe(5);
      expect(input.cooldownMs).toEqual({ 'daily-loss': 120000, connection: 45000 });
    });
  });

  describe('loadTradingBreakerConfig', () => {
    it('should fall back to defaults with an empty environment', () => {
      const config = loadTradingBreakerConfig({});

      expect(config.maxDrawdownPct).toBe(10);
      expect(config.checkIntervalMs).toBe(1000);
    });

    it('should let the environment win over overrides', () => {
      const config = loadTradingBreakerConfig(
        { BREAKER_MAX_DRAWDOWN_PCT: '15', BREAKER_COOLDOWN_ORDER_RATE_MS: '30000' },
        { maxDrawdownPct: 20, maxOrderRate: 5, cooldownMs: { drawdown: 3600000, 'order-rate': 1000 } },
      );

      expect(config.maxDrawdownPct).toBe(15);
      expect(config.maxOrderRate).toBe(5);
      expect(config.cooldownMs[RiskDimension.DRAWDOWN]).toBe(3600000);
      expect(config.cooldownMs[RiskDimension.ORDER_RATE]).toBe(30000);
      expect(config.cooldownMs[RiskDimension.VOLATILITY]).toBe(300000);
    });

    it('should reject a non-numeric value', () => {
      expect(() => loadTradingBreakerConfig({ BREAKER_MAX_ORDER_RATE: 'fast' })).toThrow(
        BreakerConfigError,
      );
    });

    it('should reject a fractional recovery count', () => {
      expect(() => loadTradingBreakerConfig({ BREAKER_RECOVERY_SUCCESSES: '1.5' })).toThrow(
        /recoverySuccesses/,
      );
    });
  });
});
