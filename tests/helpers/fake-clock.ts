import type { Clock } from '../../src/utils/clock';

/**
 * Virtual time. With `autoAdvance` every sleep moves the clock forward by
 * its duration and resolves on the next microtask.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 0, private readonly autoAdvance = true) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    if (this.autoAdvance && ms > 0) {
      this.current += ms;
    }
    await Promise.resolve();
  }
}
