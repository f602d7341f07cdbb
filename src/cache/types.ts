import type { QueryKind } from '../fetch/types';

export type CacheParamValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | CacheParamValue[]
  | { [key: string]: CacheParamValue };

export type CacheParams = Record<string, CacheParamValue>;

export type CacheQueryType = QueryKind | (string & {});

export interface CacheEnvelope<T> {
  data: T;
  cachedAt: string;
  dataType: string;
  ttl: number;
}

// Patterns are globs over full keys. Expired entries never come back from get or keys.
export interface CacheStore {
  readonly name: string;
  ping(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  keys(pattern: string): Promise<string[]>;
  deleteByPattern(pattern: string): Promise<number>;
  close(): Promise<void>;
}

export interface GetOrFetchOptions<T> {
  ttlSeconds?: number;
  shouldCache?: (value: T) => boolean;
}

export interface InvalidateOptions {
  queryType?: CacheQueryType;
  pattern?: string;
}

export interface CacheStats {
  enabled: boolean;
  degraded: boolean;
  store: string | null;
  version: string;
  totalKeys: number;
  dataTypes: Record<string, number>;
  hits: number;
  misses: number;
  errors: number;
}
