export { CacheLayer } from './cache-layer';
export { buildCacheKey, fingerprintParams, globToRegExp, namespaceOf, normalizeParams } from './keys';
export { createCacheStore, DEFAULT_REDIS_URL, MemoryCacheStore, RedisCacheStore, SqliteCacheStore } from './stores';
export type {
  CacheEnvelope,
  CacheParams,
  CacheParamValue,
  CacheQueryType,
  CacheStats,
  CacheStore,
  GetOrFetchOptions,
  InvalidateOptions
} from './types';
