import type { FailureCode } from './errors';

export const UNRANKED = 'unranked' as const;

export type Position = number | typeof UNRANKED;

export function isRanked(position: Position): position is number {
  return position !== UNRANKED;
}

export interface RankingQuery {
  keywords: string[];
  domain: string;
  market: string;
}

export interface RankingRecord {
  keyword: string;
  domain: string;
  position: Position;
  searchVolume: number | null;
  costPerClick: number | null;
  difficulty: number | null;
  url: string | null;
  title: string | null;
  observedAt: string;
}

export interface KeywordFailure {
  keyword: string;
  code: FailureCode;
  message: string;
}

export interface RankingsResult {
  records: RankingRecord[];
  failures: KeywordFailure[];
}

export interface CompetitorRankingsResult {
  competitors: string[];
  records: RankingRecord[];
  failures: KeywordFailure[];
}

export interface KeywordMetrics {
  keyword: string;
  searchVolume: number;
  costPerClick: number;
  difficulty: number | null;
  competition: number | null;
  competitionIndex: number | null;
}

export interface KeywordMetricsResult {
  metrics: KeywordMetrics[];
  missing: string[];
}

export interface CompetitorSummaryEntry {
  domain: string;
  // null when the caller named the competitor and it was not looked up.
  commonKeywords: number | null;
  totalKeywords: number | null;
  trafficSum: number | null;
  priceSum: number | null;
}

export interface CompetitorSummaryResult {
  autoDiscovered: boolean;
  competitors: CompetitorSummaryEntry[];
}

export interface BacklinksSummaryResult {
  target: string;
  backlinks: number;
  refDomains: number;
  dofollowBacklinks: number;
  nofollowBacklinks: number;
  domainInlinkRank: number | null;
}

export interface SerpTaskSubmission {
  keyword: string;
  taskId: string;
}

export interface SerpResultItem {
  position: number;
  url: string;
  title: string | null;
}

export type SerpTaskStatus =
  | { state: 'processing' }
  | { state: 'ready'; items: SerpResultItem[] }
  | { state: 'unknown'; status: string };

// submitted -> polling -> ready | failed | timed_out
export type SerpTaskState =
  | { phase: 'submitted'; keyword: string; taskId: string }
  | { phase: 'polling'; keyword: string; taskId: string; attempts: number }
  | { phase: 'ready'; keyword: string; items: SerpResultItem[]; attempts: number }
  | { phase: 'failed'; keyword: string; code: FailureCode; message: string }
  | { phase: 'timed_out'; keyword: string; attempts: number; elapsedMs: number };

export type TerminalSerpTaskState = Extract<SerpTaskState, { phase: 'ready' | 'failed' | 'timed_out' }>;

export function isTerminalTaskState(state: SerpTaskState): state is TerminalSerpTaskState {
  return state.phase === 'ready' || state.phase === 'failed' || state.phase === 'timed_out';
}
