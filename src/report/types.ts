import type { Anomaly, KeywordTransitionEvent, TopNChanges } from '../analysis/types';
import type { FetchFailure } from '../provider/errors';
import type {
  BacklinksSummaryResult,
  CompetitorRankingsResult,
  CompetitorSummaryResult,
  KeywordMetricsResult,
  RankingsResult
} from '../provider/types';

export type ReportSection<T> =
  | { status: 'ok'; data: T }
  | { status: 'failed'; failure: FetchFailure }
  | { status: 'not_requested' };

export type SectionName = 'rankings' | 'competitorRankings' | 'metrics' | 'competitorSummary' | 'backlinks';

export const SECTION_NAMES: readonly SectionName[] = [
  'rankings',
  'competitorRankings',
  'metrics',
  'competitorSummary',
  'backlinks'
];

export interface KeywordSelection {
  selected: string[];
  skipped: string[];
  fellBack: boolean;
}

export interface ReportSections {
  rankings: ReportSection<RankingsResult>;
  competitorRankings: ReportSection<CompetitorRankingsResult>;
  metrics: ReportSection<KeywordMetricsResult>;
  competitorSummary: ReportSection<CompetitorSummaryResult>;
  backlinks: ReportSection<BacklinksSummaryResult>;
}

export interface ReportInput extends Partial<ReportSections> {
  domain: string;
  market: string;
  keywords: KeywordSelection;
  anomalies?: Anomaly[];
  transitions?: KeywordTransitionEvent[];
  topNChanges?: TopNChanges | null;
  generatedAt?: string;
}

export interface ReportSummary {
  totalKeywords: number;
  rankedKeywords: number;
  page1Keywords: number;
  visibilityScore: number;
  averagePosition: number | null;
  failedKeywords: number;
  anomalies: { total: number; high: number; medium: number };
  transitions: { entered: number; exited: number };
  failedSections: SectionName[];
}

export interface EnrichedReport extends ReportSections {
  domain: string;
  market: string;
  generatedAt: string;
  keywords: KeywordSelection;
  anomalies: Anomaly[];
  transitions: KeywordTransitionEvent[];
  topNChanges: TopNChanges | null;
  summary: ReportSummary;
}
