import { describe, expect, it } from 'vitest';

import { RateLimiter } from '../../src/ratelimit/rate-limiter';
import { FakeClock } from '../helpers/fake-clock';

describe('RateLimiter', () => {
  it('spaces twenty concurrent acquisitions at least 100ms apart', async () => {
    const clock = new FakeClock(0, false);
    const limiter = new RateLimiter({ minIntervalMs: 100, clock });

    const dispatches = await Promise.all(Array.from({ length: 20 }, () => limiter.acquire()));

    expect(dispatches).toEqual(Array.from({ length: 20 }, (_, index) => index * 100));
    expect(dispatches[19] - dispatches[0]).toBeGreaterThanOrEqual(1900);
    expect(clock.sleeps).toEqual(Array.from({ length: 19 }, (_, index) => (index + 1) * 100));
  });

  it('does not wait when the previous slot is already in the past', async () => {
    const clock = new FakeClock(0, false);
    const limiter = new RateLimiter({ minIntervalMs: 100, clock });

    expect(limiter.reserveSlot()).toBe(0);
    clock.advance(250);
    expect(limiter.reserveSlot()).toBe(0);
    expect(limiter.nextAllowedTime).toBe(350);
  });

  it('never moves the next slot backwards', () => {
    const clock = new FakeClock(1000, false);
    const limiter = new RateLimiter({ minIntervalMs: 100, clock });

    limiter.reserveSlot();
    limiter.reserveSlot();
    const before = limiter.nextAllowedTime;
    clock.advance(-500);
    limiter.reserveSlot();

    expect(before).toBe(1200);
    expect(limiter.nextAllowedTime).toBe(1300);
  });

  it('defaults to ten requests per second', () => {
    expect(new RateLimiter().interval).toBe(100);
  });

  it('rejects a wait when its signal is aborted', async () => {
    const clock = new FakeClock(0, false);
    const limiter = new RateLimiter({ minIntervalMs: 100, clock });
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await limiter.acquire(controller.signal);
    await expect(limiter.acquire(controller.signal)).rejects.toThrow('stop');
  });
});
