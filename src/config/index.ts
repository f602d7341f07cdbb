export { loadSettings, resetSettingsCache } from './settings';
export { loadEnvConfig } from './env';
export type {
  Settings,
  ProviderConfig,
  RateLimitConfig,
  PollingConfig,
  FetchConfig,
  CacheBackend,
  CacheConfig,
  CacheTtlConfig,
  AnalysisConfig,
  KeywordPriority,
  CheckFrequency,
  KeywordsConfig,
  PathsConfig,
  LoggingConfig,
  ExporterConfig,
  EnvConfig
} from './types';
