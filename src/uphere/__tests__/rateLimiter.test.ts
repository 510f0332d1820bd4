import { describe, expect, it } from 'vitest';

import { InvalidArgumentError } from '../../errors';
import { deferred } from '../../__tests__/support/fakeUpstream';
import { ManualClock } from '../../__tests__/support/manualClock';
import type { Clock } from '../clock';
import { RateLimiter } from '../rateLimiter';

describe('RateLimiter', () => {
  it('grants the first acquisition immediately', async () => {
    const clock = new ManualClock(5_000);
    const limiter = new RateLimiter(1, clock);

    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.lastGrant).toBe(5_000);
  });

  it.each([0.5, 1, 2, 4, 5, 10, 20])(
    'spaces consecutive grants at least 1/R apart for R = %s',
    async (rate) => {
      const clock = new ManualClock();
      const limiter = new RateLimiter(rate, clock);
      const grants: number[] = [];

      for (let i = 0; i < 5; i++) {
        await limiter.acquire();
        grants.push(limiter.lastGrant ?? Number.NaN);
      }

      for (let i = 1; i < grants.length; i++) {
        expect(grants[i] - grants[i - 1]).toBeGreaterThanOrEqual(1000 / rate);
      }
    }
  );

  it('does not wait when the interval already elapsed', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(1, clock);

    await limiter.acquire();
    clock.advance(1_500);
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.lastGrant).toBe(1_500);
  });

  it('reports the remaining wait without blocking', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(2, clock);

    expect(limiter.timeUntilNextAllowed()).toBe(0);
    await limiter.acquire();
    expect(limiter.timeUntilNextAllowed()).toBe(500);
    clock.advance(200);
    expect(limiter.timeUntilNextAllowed()).toBe(300);
    clock.advance(1_000);
    expect(limiter.timeUntilNextAllowed()).toBe(0);
  });

  it('applies a new rate from the next acquisition on', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(1, clock);

    await limiter.acquire();
    limiter.setRate(4);

    expect(limiter.rate).toBe(4);
    expect(limiter.minIntervalMs).toBe(250);
    expect(limiter.timeUntilNextAllowed()).toBe(250);

    await limiter.acquire();
    expect(clock.sleeps).toEqual([250]);
  });

  it('serialises concurrent callers so they never fire together', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(2, clock);

    await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(clock.sleeps).toEqual([500, 500]);
    expect(limiter.lastGrant).toBe(1_000);
  });

  it('rejects an aborted acquisition without stamping a grant', async () => {
    const clock = new ManualClock();
    const limiter = new RateLimiter(1, clock);
    const controller = new AbortController();

    await limiter.acquire();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
    expect(limiter.lastGrant).toBe(0);

    await limiter.acquire();
    expect(clock.sleeps).toEqual([1_000]);
    expect(limiter.lastGrant).toBe(1_000);
  });

  it('rejects a queued acquisition as soon as its signal aborts', async () => {
    const clock = new ManualClock();
    const gate = deferred<void>();
    const gatedClock: Clock = {
      now: () => clock.now(),
      sleep: async (ms) => {
        await gate.promise;
        clock.advance(ms);
      }
    };
    const limiter = new RateLimiter(1, gatedClock);
    const controller = new AbortController();

    await limiter.acquire();
    const waiting = limiter.acquire();
    const queued = limiter.acquire(controller.signal);
    controller.abort();

    await expect(queued).rejects.toMatchObject({ name: 'AbortError' });
    expect(limiter.lastGrant).toBe(0);

    gate.resolve();
    await waiting;
    expect(limiter.lastGrant).toBe(1_000);

    await limiter.acquire();
    expect(limiter.lastGrant).toBe(2_000);
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])('refuses a rate of %s', (rate) => {
    expect(() => new RateLimiter(rate)).toThrow(InvalidArgumentError);
    expect(() => new RateLimiter(1).setRate(rate)).toThrow(InvalidArgumentError);
  });
});
