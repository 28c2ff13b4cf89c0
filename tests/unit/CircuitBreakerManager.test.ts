/**
 * Unit Tests for CircuitBreakerManager
 */

import { CircuitBreakerDefaults } from '../../src/config/defaults.js';
import { CircuitBreakerManager } from '../../src/engine/CircuitBreakerManager.js';
import { BreakerNotFoundError } from '../../src/errors/BreakerErrors.js';
import { CircuitState, CircuitType } from '../../src/types/breaker.js';
import { ManualClock } from '../../src/utils/time/Clock.js';
import { createSilentLogger } from '../mocks/portfolio.js';

describe('CircuitBreakerManager', () => {
  let clock: ManualClock;
  let manager: CircuitBreakerManager;

  beforeEach(() => {
    clock = new ManualClock(0);
    manager = new CircuitBreakerManager({ clock, logger: createSilentLogger() });
  });

  describe('getOrCreate', () => {
    it('should return the same breaker for the same name', () => {
      const first = manager.getOrCreate('postgres', CircuitBreakerDefaults.database);
      const second = manager.getOrCreate('postgres', { failureThreshold: 99 });

      expect(second).toBe(first);
      expect(second.config.failureThreshold).toBe(3);
      expect(manager.names()).toEqual(['postgres']);
    });

    it('should hand every concurrent caller the same breaker', async () => {
      const breakers = await Promise.all(
        Array.from({ length: 10 }, async () =>
          manager.getOrCreate('orders-api', CircuitBreakerDefaults.externalApi),
        ),
      );

      expect(new Set(breakers).size).toBe(1);
      expect(manager.names()).toHaveLength(1);
    });

    it('should record the breaker type and share the clock', () => {
      const breaker = manager.getOrCreate('quotes', { openDurationMs: 1000 }, CircuitType.LATENCY);
      breaker.forceOpen();
      clock.advance(1000);

      expect(breaker.type).toBe(CircuitType.LATENCY);
      expect(breaker.allow()).toBe(true);
    });
  });

  describe('lookup', () => {
    it('should throw BreakerNotFoundError for an unknown name', () => {
      expect(() => manager.get('missing')).toThrow(BreakerNotFoundError);
      expect(() => manager.get('missing')).toThrow("Circuit breaker 'missing' is not registered");
    });

    it('should report registration and removal', () => {
      manager.getOrCreate('a');

      expect(manager.has('a')).toBe(true);
      expect(manager.remove('a')).toBe(true);
      expect(manager.remove('a')).toBe(false);
      expect(manager.has('a')).toBe(false);
    });
  });

  describe('reset', () => {
    it('should reset a named breaker to CLOSED', () => {
      const breaker = manager.getOrCreate('broker', { failureThreshold: 1 });
      breaker.recordFailure();

      manager.reset('broker');

      expect(breaker.getState()).toBe(CircuitState.CLOSED);
      expect(breaker.getStats().tripCount).toBe(0);
    });

    it('should throw when resetting an unknown breaker', () => {
      expect(() => manager.reset('ghost')).toThrow(BreakerNotFoundError);
    });

    it('should reset every breaker', () => {
      manager.getOrCreate('a').forceOpen();
      manager.getOrCreate('b').forceOpen();

      manager.resetAll();

      expect(manager.anyOpen()).toBe(false);
    });
  });

  describe('status', () => {
    beforeEach(() => {
      manager.getOrCreate('a', { openDurationMs: 500 }).forceOpen();
      manager.getOrCreate('b');
    });

    it('should snapshot every breaker state', () => {
      expect(manager.statusSnapshot()).toEqual({
        a: CircuitState.OPEN,
        b: CircuitState.CLOSED,
      });
    });

    it('should not apply pending transitions when taking a snapshot', () => {
      clock.advance(500);

      expect(manager.statusSnapshot().a).toBe(CircuitState.OPEN);
      expect(manager.get('a').allow()).toBe(true);
      expect(manager.statusSnapshot().a).toBe(CircuitState.HALF_OPEN);
    });

    it('should list open breakers', () => {
      expect(manager.openBreakers()).toEqual(['a']);
      expect(manager.anyOpen()).toBe(true);
    });

    it('should summarize the whole system', () => {
      manager.getOrCreate('c', { openDurationMs: 100 }).forceOpen();
      clock.advance(100);
      manager.get('c').allow();

      const status = manager.systemStatus();

      expect(status.total).toBe(3);
      expect(status.open).toBe(1);
      expect(status.halfOpen).toBe(1);
      expect(status.closed).toBe(1);
      expect(status.breakers.a.tripCount).toBe(1);
      expect(status.breakers.c.state).toBe(CircuitState.HALF_OPEN);
    });
  });
});
