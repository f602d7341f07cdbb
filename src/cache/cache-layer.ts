import type { CacheConfig } from '../config';
import { describeError, Logger } from '../utils/logger';
import { buildCacheKey, namespaceOf } from './keys';
import type {
  CacheEnvelope,
  CacheParams,
  CacheQueryType,
  CacheStats,
  CacheStore,
  GetOrFetchOptions,
  InvalidateOptions
} from './types';

const DEFAULT_TTL_SECONDS = 1800;

interface CacheLayerDependencies {
  logger: Logger;
  store: CacheStore | null;
  config: CacheConfig;
}

function parseEnvelope<T>(raw: string): CacheEnvelope<T> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || !('data' in parsed) || !('cachedAt' in parsed)) {
    return null;
  }
  return parsed as CacheEnvelope<T>;
}

export class CacheLayer {
  private readonly logger: Logger;
  private degraded = false;
  private hits = 0;
  private misses = 0;
  private errors = 0;

  constructor(private readonly deps: CacheLayerDependencies) {
    this.logger = deps.logger.child({ component: 'cache' });
  }

  get enabled(): boolean {
    return this.deps.store !== null && !this.degraded;
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  private get namespace(): string {
    return namespaceOf(this.deps.config.prefix, this.deps.config.version);
  }

  async initialize(): Promise<void> {
    const { store } = this.deps;
    if (!store) {
      this.logger.info('Cache disabled');
      return;
    }
    try {
      await store.ping();
      this.logger.info('Cache store ready', { store: store.name, version: this.deps.config.version });
    } catch (error) {
      this.degraded = true;
      this.logger.warn('Cache store unavailable, continuing without cache', {
        store: store.name,
        error: describeError(error)
      });
    }
  }

  buildKey(queryType: CacheQueryType, params: CacheParams): string {
    return buildCacheKey(this.deps.config.prefix, this.deps.config.version, queryType, params);
  }

  ttlFor(queryType: CacheQueryType): number {
    const ttls: Partial<Record<string, number>> = this.deps.config.ttl_seconds;
    return ttls[queryType] ?? ttls.default ?? DEFAULT_TTL_SECONDS;
  }

  private async read<T>(store: CacheStore, key: string): Promise<CacheEnvelope<T> | null> {
    try {
      const raw = await store.get(key);
      if (raw === null) {
        return null;
      }
      const envelope = parseEnvelope<T>(raw);
      if (!envelope) {
        this.logger.warn('Discarding unreadable cache entry', { key });
      }
      return envelope;
    } catch (error) {
      this.errors += 1;
      this.logger.warn('Cache read failed', { key, error: describeError(error) });
      return null;
    }
  }

  private async write<T>(store: CacheStore, key: string, envelope: CacheEnvelope<T>): Promise<void> {
    try {
      await store.set(key, JSON.stringify(envelope), envelope.ttl);
    } catch (error) {
      this.errors += 1;
      this.logger.warn('Cache write failed', { key, error: describeError(error) });
    }
  }

  async getOrFetch<T>(
    queryType: CacheQueryType,
    params: CacheParams,
    fetchFn: () => Promise<T>,
    options: GetOrFetchOptions<T> = {}
  ): Promise<T> {
    const { store } = this.deps;
    if (!store || this.degraded) {
      return fetchFn();
    }

    const key = this.buildKey(queryType, params);
    const cached = await this.read<T>(store, key);
    if (cached) {
      this.hits += 1;
      this.logger.debug('Cache hit', { key, cachedAt: cached.cachedAt });
      return cached.data;
    }

    this.misses += 1;
    this.logger.debug('Cache miss', { key });
    const value = await fetchFn();
    if (options.shouldCache && !options.shouldCache(value)) {
      return value;
    }

    const ttl = options.ttlSeconds ?? this.ttlFor(queryType);
    await this.write(store, key, {
      data: value,
      cachedAt: new Date().toISOString(),
      dataType: queryType,
      ttl
    });
    return value;
  }

  async invalidate(options: InvalidateOptions = {}): Promise<number> {
    const { store } = this.deps;
    if (!store || this.degraded) {
      return 0;
    }

    let pattern = `${this.namespace}*`;
    if (options.pattern) {
      pattern = `${this.namespace}${options.pattern}`;
    } else if (options.queryType) {
      pattern = `${this.namespace}${options.queryType}:*`;
    }

    try {
      const deleted = await store.deleteByPattern(pattern);
      this.logger.info('Cache invalidated', { pattern, deleted });
      return deleted;
    } catch (error) {
      this.errors += 1;
      this.logger.warn('Cache invalidation failed', { pattern, error: describeError(error) });
      return 0;
    }
  }

  async stats(): Promise<CacheStats> {
    const { store } = this.deps;
    const stats: CacheStats = {
      enabled: this.enabled,
      degraded: this.degraded,
      store: store?.name ?? null,
      version: this.deps.config.version,
      totalKeys: 0,
      dataTypes: {},
      hits: this.hits,
      misses: this.misses,
      errors: this.errors
    };
    if (!store || this.degraded) {
      return stats;
    }

    try {
      const keys = await store.keys(`${this.namespace}*`);
      stats.totalKeys = keys.length;
      for (const key of keys) {
        const dataType = key.slice(this.namespace.length).split(':', 1)[0] ?? 'unknown';
        stats.dataTypes[dataType] = (stats.dataTypes[dataType] ?? 0) + 1;
      }
    } catch (error) {
      this.errors += 1;
      stats.errors = this.errors;
      this.logger.warn('Cache stats unavailable', { error: describeError(error) });
    }
    return stats;
  }

  async close(): Promise<void> {
    if (!this.deps.store) {
      return;
    }
    try {
      await this.deps.store.close();
    } catch (error) {
      this.logger.warn('Cache store did not close cleanly', { error: describeError(error) });
    }
  }
}
