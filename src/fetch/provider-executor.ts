import type { CacheLayer } from '../cache/cache-layer';
import type { RankingProviderClient } from '../provider/client';
import { uniqueKeywords, normalizeDomain } from '../utils/text';
import type { QueryDescriptor, QueryExecutor, QueryResult } from './types';

interface ProviderQueryExecutorDependencies {
  client: RankingProviderClient;
  cache: CacheLayer;
}

const withoutFailures = (result: { failures: unknown[] }): boolean => result.failures.length === 0;

export class ProviderQueryExecutor implements QueryExecutor {
  constructor(private readonly deps: ProviderQueryExecutorDependencies) {}

  async execute(query: QueryDescriptor, signal: AbortSignal): Promise<QueryResult> {
    const { client, cache } = this.deps;

    switch (query.kind) {
      case 'rankings': {
        const { keywords, domain, market } = query.query;
        const data = await cache.getOrFetch(
          'rankings',
          { keywords: uniqueKeywords(keywords), domain: normalizeDomain(domain), market },
          () => client.fetchRankings(query.query, signal),
          { shouldCache: withoutFailures }
        );
        return { kind: 'rankings', data };
      }
      case 'competitor_rankings': {
        const data = await cache.getOrFetch(
          'competitor_rankings',
          {
            keywords: uniqueKeywords(query.keywords),
            competitors: query.competitors.map(normalizeDomain),
            market: query.market
          },
          () => client.fetchCompetitorRankings(query.keywords, query.competitors, query.market, signal),
          { shouldCache: withoutFailures }
        );
        return { kind: 'competitor_rankings', data };
      }
      case 'keyword_metrics': {
        const data = await cache.getOrFetch(
          'keyword_metrics',
          { keywords: uniqueKeywords(query.keywords), market: query.market },
          () => client.fetchKeywordMetrics(query.keywords, query.market, signal)
        );
        return { kind: 'keyword_metrics', data };
      }
      case 'competitor_summary': {
        const data = await cache.getOrFetch(
          'competitor_summary',
          {
            domain: normalizeDomain(query.domain),
            competitors: query.competitors.map(normalizeDomain),
            market: query.market
          },
          () => client.fetchCompetitorSummary(query.domain, query.competitors, query.market, signal),
          { shouldCache: (summary) => summary.autoDiscovered }
        );
        return { kind: 'competitor_summary', data };
      }
      case 'backlinks': {
        const data = await cache.getOrFetch(
          'backlinks',
          { domain: normalizeDomain(query.domain) },
          () => client.fetchBacklinksSummary(query.domain, signal)
        );
        return { kind: 'backlinks', data };
      }
    }
  }
}
