export { RankingProviderClient, DEFAULT_BASE_URL } from './client';
export type { RankingProviderClientDependencies } from './client';
export * from './errors';
export { UNRANKED, isRanked, isTerminalTaskState } from './types';
export type {
  Position,
  RankingQuery,
  RankingRecord,
  KeywordFailure,
  RankingsResult,
  CompetitorRankingsResult,
  KeywordMetrics,
  KeywordMetricsResult,
  CompetitorSummaryEntry,
  CompetitorSummaryResult,
  BacklinksSummaryResult,
  SerpResultItem,
  SerpTaskState,
  SerpTaskStatus,
  SerpTaskSubmission,
  TerminalSerpTaskState
} from './types';
