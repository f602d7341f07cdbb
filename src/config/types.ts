import type { QueryKind } from '../fetch/types';

export interface ProviderConfig {
  base_url: string;
  default_market: string;
  engines: Record<string, number>;
  competitor_discovery_limit: number;
}

export interface RateLimitConfig {
  min_interval_ms: number;
  max_attempts: number;
  backoff_base_ms: number;
  backoff_cap_ms: number;
  backoff_jitter_ms: number;
}

export interface PollingConfig {
  interval_ms: number;
  task_timeout_ms: number;
}

export interface FetchConfig {
  query_timeout_ms: number;
  batch_deadline_ms: number;
}

export type CacheBackend = 'redis' | 'sqlite' | 'memory' | 'none';

export type CacheTtlConfig = Record<QueryKind | 'default', number>;

export interface CacheConfig {
  backend: CacheBackend;
  prefix: string;
  version: string;
  sqlite_file: string;
  ttl_seconds: CacheTtlConfig;
}

export interface AnalysisConfig {
  min_history: number;
  medium_z: number;
  high_z: number;
  top_n: number;
}

export type KeywordPriority = 'high' | 'medium' | 'low';
export type CheckFrequency = 'daily' | 'weekly' | 'monthly';

export interface KeywordsConfig {
  default_priority: KeywordPriority;
  check_frequency: CheckFrequency;
}

export interface PathsConfig {
  data_dir: string;
  outputs_dir: string;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  format: 'json' | 'pretty';
}

export interface ExporterConfig {
  enabled: boolean;
  output_basename: string;
  write_csv: boolean;
}

export interface Settings {
  provider: ProviderConfig;
  rate_limit: RateLimitConfig;
  polling: PollingConfig;
  fetch: FetchConfig;
  cache: CacheConfig;
  analysis: AnalysisConfig;
  keywords: KeywordsConfig;
  paths: PathsConfig;
  logging: LoggingConfig;
  exporter: ExporterConfig;
}

export interface EnvConfig {
  serankingApiKey?: string;
  redisUrl?: string;
  cacheBackend?: CacheBackend;
}
