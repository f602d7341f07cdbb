import { Redis } from 'ioredis';

import { describeError, Logger } from '../../utils/logger';
import type { CacheStore } from '../types';

const SCAN_COUNT = 200;
const UNLINK_CHUNK = 500;
const MAX_RECONNECTS = 5;

interface RedisCacheStoreDependencies {
  logger: Logger;
  client: string | Redis;
}

export class RedisCacheStore implements CacheStore {
  readonly name = 'redis';
  private readonly client: Redis;
  private readonly logger: Logger;
  private connectionErrorLogged = false;

  constructor(deps: RedisCacheStoreDependencies) {
    this.logger = deps.logger.child({ component: 'redis' });
    this.client =
      typeof deps.client === 'string'
        ? new Redis(deps.client, {
            lazyConnect: true,
            enableOfflineQueue: false,
            maxRetriesPerRequest: 1,
            retryStrategy: (times) => (times > MAX_RECONNECTS ? null : Math.min(times * 200, 2000))
          })
        : deps.client;

    // One line per outage; ioredis emits an error for every reconnect attempt.
    this.client.on('error', (error: unknown) => {
      if (this.connectionErrorLogged) {
        return;
      }
      this.connectionErrorLogged = true;
      this.logger.debug('Redis connection error', { error: describeError(error) });
    });
    this.client.on('ready', () => {
      this.connectionErrorLogged = false;
    });
  }

  // A failed ping disconnects, which stops ioredis from reconnecting.
  async ping(): Promise<void> {
    try {
      if (this.client.status === 'wait') {
        await this.client.connect();
      }
      await this.client.ping();
    } catch (error) {
      this.client.disconnect();
      throw error;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (ttlSeconds > 0) {
      await this.client.set(key, value, 'EX', ttlSeconds);
      return;
    }
    await this.client.set(key, value);
  }

  keys(pattern: string): Promise<string[]> {
    return new Promise((resolveKeys, rejectKeys) => {
      const found: string[] = [];
      const stream = this.client.scanStream({ match: pattern, count: SCAN_COUNT });
      stream.on('data', (batch: string[]) => {
        found.push(...batch);
      });
      stream.on('end', () => resolveKeys(Array.from(new Set(found))));
      stream.on('error', rejectKeys);
    });
  }

  async deleteByPattern(pattern: string): Promise<number> {
    const keys = await this.keys(pattern);
    let deleted = 0;
    for (let index = 0; index < keys.length; index += UNLINK_CHUNK) {
      deleted += await this.client.unlink(...keys.slice(index, index + UNLINK_CHUNK));
    }
    return deleted;
  }

  async close(): Promise<void> {
    if (this.client.status === 'ready') {
      await this.client.quit();
      return;
    }
    this.client.disconnect();
  }
}
