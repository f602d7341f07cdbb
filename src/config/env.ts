import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import type { CacheBackend, EnvConfig } from './types';

const CACHE_BACKENDS: readonly CacheBackend[] = ['redis', 'sqlite', 'memory', 'none'];

let cachedEnv: EnvConfig | null = null;

function parseCacheBackend(value: string | undefined): CacheBackend | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return CACHE_BACKENDS.find((backend) => backend === normalized);
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = {
    serankingApiKey: process.env.SERANKING_API_KEY,
    redisUrl: process.env.REDIS_URL,
    cacheBackend: parseCacheBackend(process.env.CACHE_BACKEND)
  };

  return cachedEnv;
}
