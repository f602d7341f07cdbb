import { describe, expect, it } from 'vitest';

import { CacheLayer } from '../../src/cache/cache-layer';
import { MemoryCacheStore } from '../../src/cache/stores/memory-store';
import { ProviderQueryExecutor } from '../../src/fetch/provider-executor';
import type { QueryDescriptor } from '../../src/fetch/types';
import { RankingProviderClient } from '../../src/provider/client';
import { RateLimiter } from '../../src/ratelimit/rate-limiter';
import { createTestLogger, createTestSettings } from '../helpers/context';
import { FakeClock } from '../helpers/fake-clock';
import { createFakeFetch, serpHandler, type FakeHandler } from '../helpers/fake-fetch';

const serp = serpHandler({
  results: {
    'good keyword': [{ position: 2, url: 'https://example.co.uk/' }],
    'slow keyword': null
  }
});

const handler: FakeHandler = (request) => {
  if (request.url.pathname.endsWith('/keywords/export')) {
    return { body: [{ keyword: 'good keyword', is_data_found: true, volume: 10, cpc: 0.1 }] };
  }
  return serp(request);
};

function createExecutor() {
  const settings = createTestSettings();
  const logger = createTestLogger();
  const clock = new FakeClock();
  const { fetchImpl, requests } = createFakeFetch(handler);
  const client = new RankingProviderClient({
    logger,
    apiKey: 'test-secret',
    config: settings.provider,
    polling: { interval_ms: 1000, task_timeout_ms: 2000 },
    limiter: new RateLimiter({ clock }),
    clock,
    fetchImpl
  });
  const cache = new CacheLayer({ logger, store: new MemoryCacheStore(clock), config: settings.cache });
  return { executor: new ProviderQueryExecutor({ client, cache }), cache, requests };
}

const submissions = (requests: ReturnType<typeof createFakeFetch>['requests']) =>
  requests.filter((request) => request.url.pathname.endsWith('/serp/tasks') && request.method === 'POST').length;

describe('ProviderQueryExecutor', () => {
  it('does not cache rankings with failed keywords', async () => {
    const { executor, requests } = createExecutor();
    const query: QueryDescriptor = {
      id: 'rankings',
      kind: 'rankings',
      query: { keywords: ['good keyword', 'slow keyword'], domain: 'example.co.uk', market: 'uk' }
    };

    const first = await executor.execute(query, new AbortController().signal);
    await executor.execute(query, new AbortController().signal);

    expect(first.kind === 'rankings' && first.data.failures.map((failure) => failure.code)).toEqual(['timeout']);
    expect(submissions(requests)).toBe(2);
  });

  it('caches complete results', async () => {
    const { executor, requests } = createExecutor();
    const query: QueryDescriptor = { id: 'metrics', kind: 'keyword_metrics', keywords: ['good keyword'], market: 'uk' };

    const first = await executor.execute(query, new AbortController().signal);
    const second = await executor.execute(query, new AbortController().signal);

    expect(second).toEqual(first);
    expect(requests.filter((request) => request.url.pathname.endsWith('/keywords/export'))).toHaveLength(1);
  });

  it('does not cache competitors the caller named without figures', async () => {
    const { executor, cache } = createExecutor();
    const query: QueryDescriptor = {
      id: 'competitorSummary',
      kind: 'competitor_summary',
      domain: 'example.co.uk',
      competitors: ['rival.com'],
      market: 'uk'
    };

    const outcome = await executor.execute(query, new AbortController().signal);

    expect(outcome.kind === 'competitor_summary' && outcome.data.competitors).toEqual([
      { domain: 'rival.com', commonKeywords: null, totalKeywords: null, trafficSum: null, priceSum: null }
    ]);
    expect((await cache.stats()).totalKeys).toBe(0);
  });
});
