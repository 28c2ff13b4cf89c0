/**
 * Property-based tests for breaker state transitions
 *
 * Replays arbitrary outcome sequences against a breaker and against a plain
 * counting model, and checks risk readings against their limits.
 */

import * as fc from 'fast-check';
import { CircuitBreaker } from '../../src/engine/CircuitBreaker.js';
import { TradingCircuitBreakers } from '../../src/engine/TradingCircuitBreakers.js';
import { CircuitState } from '../../src/types/breaker.js';
import { RiskDimension } from '../../src/types/portfolio.js';
import { ManualClock } from '../../src/utils/time/Clock.js';
import { createSilentLogger, StubPortfolioProvider } from '../mocks/portfolio.js';

const logger = createSilentLogger('property');

function createBreaker(failureThreshold: number, successThreshold: number = 1): CircuitBreaker {
  return new CircuitBreaker(
    'property',
    { failureThreshold, successThreshold, openDurationMs: 1000 },
    { clock: new ManualClock(0), logger },
  );
}

describe('CircuitBreaker properties', () => {
  it('stays CLOSED for fewer consecutive failures than the threshold', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 50 }).chain((threshold) =>
          fc.tuple(fc.constant(threshold), fc.integer({ min: 0, max: threshold - 1 })),
        ),
        ([threshold, failures]) => {
          const breaker = createBreaker(threshold);
          for (let i = 0; i < failures; i++) breaker.recordFailure();

          expect(breaker.getState()).toBe(CircuitState.CLOSED);
          expect(breaker.getStats().failureCount).toBe(failures);
        },
      ),
    );
  });

  it('trips exactly once when consecutive failures reach the threshold', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 50 }), fc.integer({ min: 0, max: 20 }), (threshold, extra) => {
        const breaker = createBreaker(threshold);
        for (let i = 0; i < threshold + extra; i++) breaker.recordFailure();

        expect(breaker.getState()).toBe(CircuitState.OPEN);
        expect(breaker.getStats().tripCount).toBe(1);
      }),
    );
  });

  it('matches a consecutive-failure counting model for any outcome sequence', () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 6 }), fc.array(fc.boolean(), { maxLength: 60 }), (threshold, outcomes) => {
        const breaker = createBreaker(threshold);
        let consecutive = 0;
        let open = false;

        for (const success of outcomes) {
          if (success) breaker.recordSuccess();
          else breaker.recordFailure();

          if (open) continue;
          consecutive = success ? 0 : consecutive + 1;
          open = consecutive >= threshold;
        }

        expect(breaker.isOpen()).toBe(open);
        expect(breaker.getStats().tripCount).toBe(open ? 1 : 0);
      }),
    );
  });

  it('never admits more concurrent probes than maxHalfOpenCalls', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 5 }), fc.integer({ min: 1, max: 12 }), async (maxHalfOpenCalls, attempts) => {
        const clock = new ManualClock(0);
        const breaker = new CircuitBreaker(
          'probes',
          { failureThreshold: 1, successThreshold: 10, openDurationMs: 1000, maxHalfOpenCalls },
          { clock, logger },
        );
        breaker.recordFailure();
        clock.advance(1000);

        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
          release = resolve;
        });
        const calls = Array.from({ length: attempts }, () => breaker.call(() => gate));

        expect(breaker.getStats().halfOpenInFlight).toBe(Math.min(attempts, maxHalfOpenCalls));

        release();
        const results = await Promise.allSettled(calls);
        const admitted = results.filter((result) => result.status === 'fulfilled').length;
        expect(admitted).toBe(Math.min(attempts, maxHalfOpenCalls));
      }),
    );
  });
});

describe('TradingCircuitBreakers properties', () => {
  it('breaches drawdown exactly when it exceeds the limit', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.double({ min: 0, max: 100, noNaN: true }),
        fc.double({ min: 1, max: 50, noNaN: true }),
        async (drawdownPct, maxDrawdownPct) => {
          const portfolio = new StubPortfolioProvider({ drawdownPct });
          const trading = new TradingCircuitBreakers(
            portfolio,
            { maxDrawdownPct },
            { clock: new ManualClock(0), logger },
          );

          const evaluation = await trading.evaluatePortfolio();

          expect(evaluation.breached.includes(RiskDimension.DRAWDOWN)).toBe(drawdownPct > maxDrawdownPct);
          expect(evaluation.allowTrade).toBe(drawdownPct <= maxDrawdownPct);
        },
      ),
    );
  });
});
