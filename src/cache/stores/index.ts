import type { CacheBackend, CacheConfig } from '../../config';
import type { Clock } from '../../utils/clock';
import type { Logger } from '../../utils/logger';
import type { CacheStore } from '../types';
import { MemoryCacheStore } from './memory-store';
import { RedisCacheStore } from './redis-store';
import { SqliteCacheStore } from './sqlite-store';

export const DEFAULT_REDIS_URL = 'redis://127.0.0.1:6379';

interface CreateCacheStoreOptions {
  config: CacheConfig;
  logger: Logger;
  backend?: CacheBackend;
  redisUrl?: string;
  clock?: Pick<Clock, 'now'>;
}

export async function createCacheStore(options: CreateCacheStoreOptions): Promise<CacheStore | null> {
  const backend = options.backend ?? options.config.backend;
  switch (backend) {
    case 'redis':
      return new RedisCacheStore({ logger: options.logger, client: options.redisUrl ?? DEFAULT_REDIS_URL });
    case 'sqlite':
      return SqliteCacheStore.initialize(options.config.sqlite_file, options.clock);
    case 'memory':
      return new MemoryCacheStore(options.clock);
    case 'none':
      return null;
  }
}

export { MemoryCacheStore, RedisCacheStore, SqliteCacheStore };
