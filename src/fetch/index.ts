export { FetchOrchestrator } from './orchestrator';
export { ProviderQueryExecutor } from './provider-executor';
export { QUERY_KINDS } from './types';
export type {
  BacklinksQueryDescriptor,
  CompetitorRankingsQueryDescriptor,
  CompetitorSummaryQueryDescriptor,
  FailedOutcome,
  FetchAllOptions,
  FetchOutcome,
  FulfilledOutcome,
  KeywordMetricsQueryDescriptor,
  QueryDescriptor,
  QueryExecutor,
  QueryKind,
  QueryResult,
  QueryResultMap,
  RankingsQueryDescriptor
} from './types';
