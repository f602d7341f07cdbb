import { systemClock, type Clock } from '../utils/clock';

export const DEFAULT_MIN_INTERVAL_MS = 100;

export interface RateLimiterOptions {
  minIntervalMs?: number;
  clock?: Clock;
}

interface Reservation {
  waitMs: number;
  dispatchAt: number;
}

// nextAllowedAt only changes inside reserve(), which never awaits. Callers sleep outside it.
export class RateLimiter {
  private nextAllowedAt = 0;
  private readonly minIntervalMs: number;
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS);
    this.clock = options.clock ?? systemClock;
  }

  get interval(): number {
    return this.minIntervalMs;
  }

  get nextAllowedTime(): number {
    return this.nextAllowedAt;
  }

  private reserve(): Reservation {
    const now = this.clock.now();
    const dispatchAt = Math.max(this.nextAllowedAt, now);
    this.nextAllowedAt = dispatchAt + this.minIntervalMs;
    return { waitMs: dispatchAt - now, dispatchAt };
  }

  reserveSlot(): number {
    return this.reserve().waitMs;
  }

  async acquire(signal?: AbortSignal): Promise<number> {
    const { waitMs, dispatchAt } = this.reserve();
    if (waitMs > 0) {
      await this.clock.sleep(waitMs, signal);
    }
    return dispatchAt;
  }
}
