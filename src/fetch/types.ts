import type { FailureCode, FetchFailure } from '../provider/errors';
import type {
  BacklinksSummaryResult,
  CompetitorRankingsResult,
  CompetitorSummaryResult,
  KeywordMetricsResult,
  RankingQuery,
  RankingsResult
} from '../provider/types';

export type QueryKind = 'rankings' | 'competitor_rankings' | 'keyword_metrics' | 'competitor_summary' | 'backlinks';

export const QUERY_KINDS: readonly QueryKind[] = [
  'rankings',
  'competitor_rankings',
  'keyword_metrics',
  'competitor_summary',
  'backlinks'
];

interface QueryBase {
  id: string;
}

export interface RankingsQueryDescriptor extends QueryBase {
  kind: 'rankings';
  query: RankingQuery;
}

export interface CompetitorRankingsQueryDescriptor extends QueryBase {
  kind: 'competitor_rankings';
  keywords: string[];
  competitors: string[];
  market: string;
}

export interface KeywordMetricsQueryDescriptor extends QueryBase {
  kind: 'keyword_metrics';
  keywords: string[];
  market: string;
}

export interface CompetitorSummaryQueryDescriptor extends QueryBase {
  kind: 'competitor_summary';
  domain: string;
  competitors: string[];
  market: string;
}

export interface BacklinksQueryDescriptor extends QueryBase {
  kind: 'backlinks';
  domain: string;
}

export type QueryDescriptor =
  | RankingsQueryDescriptor
  | CompetitorRankingsQueryDescriptor
  | KeywordMetricsQueryDescriptor
  | CompetitorSummaryQueryDescriptor
  | BacklinksQueryDescriptor;

export interface QueryResultMap {
  rankings: RankingsResult;
  competitor_rankings: CompetitorRankingsResult;
  keyword_metrics: KeywordMetricsResult;
  competitor_summary: CompetitorSummaryResult;
  backlinks: BacklinksSummaryResult;
}

export type QueryResult = {
  [K in QueryKind]: { kind: K; data: QueryResultMap[K] };
}[QueryKind];

export type FulfilledOutcome = QueryResult & {
  status: 'fulfilled';
  id: string;
  durationMs: number;
};

export interface FailedOutcome {
  status: 'failed';
  id: string;
  kind: QueryKind;
  failure: FetchFailure;
  durationMs: number;
}

export type FetchOutcome = FulfilledOutcome | FailedOutcome;

export interface FetchAllOptions {
  deadlineMs?: number;
}

export interface QueryExecutor {
  execute(query: QueryDescriptor, signal: AbortSignal): Promise<QueryResult>;
}

export type { FailureCode, FetchFailure };
