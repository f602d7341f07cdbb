import { keywordKey } from '../analysis/history';
import type { Anomaly, KeywordTransitionEvent } from '../analysis/types';
import { isRanked } from '../provider/types';
import type { KeywordMetrics, KeywordMetricsResult, RankingRecord, RankingsResult } from '../provider/types';
import { mean, roundTo, sum } from '../utils/stats';
import { SECTION_NAMES } from './types';
import type { EnrichedReport, ReportInput, ReportSection, ReportSections, ReportSummary, SectionName } from './types';

const PAGE_ONE = 10;
const NOT_REQUESTED = { status: 'not_requested' } as const;

export function positionScore(position: number): number {
  if (position > PAGE_ONE) {
    return 0;
  }
  return Math.max(0, 100 - (position - 1) * 10);
}

export function visibilityScore(records: readonly RankingRecord[]): number {
  if (records.length === 0) {
    return 0;
  }
  const scores = records.map((record) => (isRanked(record.position) ? positionScore(record.position) : 0));
  return roundTo(sum(scores) / records.length, 1);
}

function enrichRecord(record: RankingRecord, metrics: Map<string, KeywordMetrics>): RankingRecord {
  const match = metrics.get(keywordKey(record.keyword));
  if (!match) {
    return record;
  }
  return {
    ...record,
    searchVolume: record.searchVolume ?? match.searchVolume,
    costPerClick: record.costPerClick ?? match.costPerClick,
    difficulty: record.difficulty ?? match.difficulty
  };
}

function enrichRankings(
  rankings: ReportSection<RankingsResult>,
  metrics: ReportSection<KeywordMetricsResult>
): ReportSection<RankingsResult> {
  if (rankings.status !== 'ok' || metrics.status !== 'ok') {
    return rankings;
  }
  const byKeyword = new Map(metrics.data.metrics.map((entry): [string, KeywordMetrics] => [keywordKey(entry.keyword), entry]));
  return {
    status: 'ok',
    data: {
      ...rankings.data,
      records: rankings.data.records.map((record) => enrichRecord(record, byKeyword))
    }
  };
}

function summarize(
  sections: ReportSections,
  anomalies: readonly Anomaly[],
  transitions: readonly KeywordTransitionEvent[]
): ReportSummary {
  const records = sections.rankings.status === 'ok' ? sections.rankings.data.records : [];
  const positions = records.map((record) => record.position).filter(isRanked);
  const failedSections: SectionName[] = SECTION_NAMES.filter((name) => sections[name].status === 'failed');
  const averagePosition = mean(positions);

  return {
    totalKeywords: records.length,
    rankedKeywords: positions.length,
    page1Keywords: positions.filter((position) => position <= PAGE_ONE).length,
    visibilityScore: visibilityScore(records),
    averagePosition: averagePosition === null ? null : roundTo(averagePosition, 1),
    failedKeywords: sections.rankings.status === 'ok' ? sections.rankings.data.failures.length : 0,
    anomalies: {
      total: anomalies.length,
      high: anomalies.filter((anomaly) => anomaly.severity === 'high').length,
      medium: anomalies.filter((anomaly) => anomaly.severity === 'medium').length
    },
    transitions: {
      entered: transitions.filter((event) => event.direction === 'entered_top_n').length,
      exited: transitions.filter((event) => event.direction === 'exited_top_n').length
    },
    failedSections
  };
}

export function assemble(input: ReportInput): EnrichedReport {
  const metrics = input.metrics ?? NOT_REQUESTED;
  const sections: ReportSections = {
    rankings: enrichRankings(input.rankings ?? NOT_REQUESTED, metrics),
    competitorRankings: input.competitorRankings ?? NOT_REQUESTED,
    metrics,
    competitorSummary: input.competitorSummary ?? NOT_REQUESTED,
    backlinks: input.backlinks ?? NOT_REQUESTED
  };
  const anomalies = input.anomalies ?? [];
  const transitions = input.transitions ?? [];

  return {
    domain: input.domain,
    market: input.market,
    generatedAt: input.generatedAt ?? new Date().toISOString(),
    keywords: input.keywords,
    ...sections,
    anomalies,
    transitions,
    topNChanges: input.topNChanges ?? null,
    summary: summarize(sections, anomalies, transitions)
  };
}
