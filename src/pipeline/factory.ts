import { AnomalyDetector, thresholdsFromConfig } from '../analysis/anomaly-detector';
import { CacheLayer } from '../cache/cache-layer';
import { createCacheStore } from '../cache/stores';
import type { CacheStore } from '../cache/types';
import type { EnvConfig, FetchConfig, PollingConfig, Settings } from '../config';
import { FetchOrchestrator } from '../fetch/orchestrator';
import { ProviderQueryExecutor } from '../fetch/provider-executor';
import { RankingProviderClient } from '../provider/client';
import { backoffPolicyFromConfig } from '../ratelimit/backoff';
import { RateLimiter } from '../ratelimit/rate-limiter';
import { systemClock, type Clock } from '../utils/clock';
import { describeError, Logger } from '../utils/logger';
import { RankingPipeline } from './ranking-pipeline';

export interface PipelineOverrides {
  fetchImpl?: typeof fetch;
  clock?: Clock;
  random?: () => number;
  store?: CacheStore | null;
  now?: () => Date;
}

export interface PipelineRuntime {
  pipeline: RankingPipeline;
  cache: CacheLayer;
  limiter: RateLimiter;
  close(): Promise<void>;
}

async function resolveStore(
  settings: Settings,
  env: EnvConfig,
  logger: Logger,
  overrides: PipelineOverrides,
  clock: Clock
): Promise<CacheStore | null> {
  if (overrides.store !== undefined) {
    return overrides.store;
  }
  try {
    return await createCacheStore({
      config: settings.cache,
      logger,
      backend: env.cacheBackend,
      redisUrl: env.redisUrl,
      clock
    });
  } catch (error) {
    logger.warn('Cache store could not be opened; running without cache', {
      backend: env.cacheBackend ?? settings.cache.backend,
      error: describeError(error)
    });
    return null;
  }
}

// Share of the query timeout kept for task submission, retries and the last poll.
const QUERY_HEADROOM_RATIO = 0.1;

// Keeps a stuck keyword's own timeout ahead of the whole query's.
export function fitPollingToQueryBudget(polling: PollingConfig, fetchConfig: FetchConfig): PollingConfig {
  const budgetMs = Math.floor(fetchConfig.query_timeout_ms * (1 - QUERY_HEADROOM_RATIO));
  if (polling.task_timeout_ms <= budgetMs) {
    return polling;
  }
  return { ...polling, task_timeout_ms: budgetMs };
}

export async function createPipeline(
  settings: Settings,
  env: EnvConfig,
  logger: Logger,
  overrides: PipelineOverrides = {}
): Promise<PipelineRuntime> {
  if (!env.serankingApiKey) {
    throw new Error('SERANKING_API_KEY is not set');
  }

  const clock = overrides.clock ?? systemClock;
  const polling = fitPollingToQueryBudget(settings.polling, settings.fetch);
  if (polling.task_timeout_ms !== settings.polling.task_timeout_ms) {
    logger.warn('SERP task timeout lowered to fit the query timeout', {
      configuredMs: settings.polling.task_timeout_ms,
      effectiveMs: polling.task_timeout_ms,
      queryTimeoutMs: settings.fetch.query_timeout_ms
    });
  }

  const limiter = new RateLimiter({ minIntervalMs: settings.rate_limit.min_interval_ms, clock });
  const client = new RankingProviderClient({
    logger,
    apiKey: env.serankingApiKey,
    config: settings.provider,
    polling,
    limiter,
    backoff: backoffPolicyFromConfig(settings.rate_limit),
    clock,
    fetchImpl: overrides.fetchImpl,
    random: overrides.random
  });

  const store = await resolveStore(settings, env, logger, overrides, clock);
  const cache = new CacheLayer({ logger, store, config: settings.cache });
  await cache.initialize();

  const orchestrator = new FetchOrchestrator({
    logger,
    executor: new ProviderQueryExecutor({ client, cache }),
    config: settings.fetch
  });

  const pipeline = new RankingPipeline({
    logger,
    orchestrator,
    detector: new AnomalyDetector(thresholdsFromConfig(settings.analysis)),
    settings,
    now: overrides.now
  });

  return {
    pipeline,
    cache,
    limiter,
    close: () => cache.close()
  };
}
