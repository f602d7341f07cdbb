import type { Clock } from '../../utils/clock';
import { systemClock } from '../../utils/clock';
import { globToRegExp } from '../keys';
import type { CacheStore } from '../types';

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

export class MemoryCacheStore implements CacheStore {
  readonly name = 'memory';
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly clock: Pick<Clock, 'now'> = systemClock) {}

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= this.clock.now();
  }

  private liveKeys(): string[] {
    const keys: string[] = [];
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        continue;
      }
      keys.push(key);
    }
    return keys;
  }

  async ping(): Promise<void> {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const expiresAt = ttlSeconds > 0 ? this.clock.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async keys(pattern: string): Promise<string[]> {
    const matcher = globToRegExp(pattern);
    return this.liveKeys().filter((key) => matcher.test(key));
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const matches = await this.keys(pattern);
    for (const key of matches) {
      this.entries.delete(key);
    }
    return matches.length;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
