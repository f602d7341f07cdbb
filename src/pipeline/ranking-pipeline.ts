import type { AnomalyDetector } from '../analysis/anomaly-detector';
import { classifyTopNChanges, trackAll } from '../analysis/transition-tracker';
import type { Anomaly, KeywordTransitionEvent, TopNChanges } from '../analysis/types';
import type { AnalysisConfig, KeywordsConfig, ProviderConfig } from '../config';
import type { FetchOrchestrator } from '../fetch/orchestrator';
import type { FetchOutcome, FulfilledOutcome, QueryDescriptor } from '../fetch/types';
import { selectKeywordsForRun } from '../keywords/priority-filter';
import { assemble } from '../report/aggregator';
import { SECTION_NAMES } from '../report/types';
import type { EnrichedReport, ReportSection, SectionName } from '../report/types';
import { Logger } from '../utils/logger';
import { normalizeDomain, uniqueKeywords } from '../utils/text';
import type { RunRequest } from './request';

export interface RankingPipelineDependencies {
  logger: Logger;
  orchestrator: FetchOrchestrator;
  detector: AnomalyDetector;
  settings: {
    provider: ProviderConfig;
    analysis: AnalysisConfig;
    keywords: KeywordsConfig;
  };
  now?: () => Date;
}

function toSection<T>(
  outcome: FetchOutcome | undefined,
  pick: (result: FulfilledOutcome) => T | null
): ReportSection<T> {
  if (!outcome) {
    return { status: 'not_requested' };
  }
  if (outcome.status === 'failed') {
    return { status: 'failed', failure: outcome.failure };
  }
  const data = pick(outcome);
  if (data === null) {
    return { status: 'failed', failure: { code: 'unknown', message: `Unexpected ${outcome.kind} result` } };
  }
  return { status: 'ok', data };
}

export class RankingPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: RankingPipelineDependencies) {
    this.logger = deps.logger.child({ component: 'pipeline' });
  }

  private buildQueries(
    request: RunRequest,
    domain: string,
    keywords: string[],
    market: string
  ): QueryDescriptor[] {
    const include = new Set<SectionName>(request.include ?? SECTION_NAMES);
    const competitors = (request.competitors ?? []).map(normalizeDomain).filter(Boolean);
    const queries: QueryDescriptor[] = [];

    if (include.has('rankings')) {
      queries.push({ id: 'rankings', kind: 'rankings', query: { keywords, domain, market } });
    }
    if (include.has('competitorRankings') && competitors.length > 0) {
      queries.push({ id: 'competitorRankings', kind: 'competitor_rankings', keywords, competitors, market });
    }
    if (include.has('metrics')) {
      queries.push({ id: 'metrics', kind: 'keyword_metrics', keywords, market });
    }
    if (include.has('competitorSummary')) {
      queries.push({ id: 'competitorSummary', kind: 'competitor_summary', domain, competitors, market });
    }
    if (include.has('backlinks')) {
      queries.push({ id: 'backlinks', kind: 'backlinks', domain });
    }

    return queries;
  }

  async run(request: RunRequest): Promise<EnrichedReport> {
    const { settings } = this.deps;
    const startedAt = Date.now();
    const domain = normalizeDomain(request.domain);
    const market = (request.market ?? settings.provider.default_market).toLowerCase();
    const topN = request.topN ?? settings.analysis.top_n;
    const history = request.history ?? [];

    const selection = selectKeywordsForRun(
      uniqueKeywords(request.keywords),
      request.keywordPriorities,
      request.checkFrequency ?? settings.keywords.check_frequency,
      settings.keywords.default_priority
    );
    if (selection.fellBack) {
      this.logger.info('No keywords matched the check frequency; running all keywords', {
        frequency: request.checkFrequency ?? settings.keywords.check_frequency
      });
    }

    const queries = this.buildQueries(request, domain, selection.selected, market);
    this.logger.info('Starting ranking cycle', {
      domain,
      market,
      keywords: selection.selected.length,
      skipped: selection.skipped.length,
      queries: queries.map((query) => query.id)
    });

    const outcomes = await this.deps.orchestrator.fetchAll(queries, { deadlineMs: request.deadlineMs });

    const rankings = toSection(outcomes.get('rankings'), (result) => (result.kind === 'rankings' ? result.data : null));
    let anomalies: Anomaly[] = [];
    let transitions: KeywordTransitionEvent[] = [];
    let topNChanges: TopNChanges | null = null;
    if (rankings.status === 'ok') {
      const records = rankings.data.records;
      anomalies = this.deps.detector.detectAll(history, records);
      transitions = trackAll(history, records, topN);
      topNChanges = classifyTopNChanges(history, records, topN);
    }

    const report = assemble({
      domain,
      market,
      keywords: selection,
      rankings,
      competitorRankings: toSection(outcomes.get('competitorRankings'), (result) =>
        result.kind === 'competitor_rankings' ? result.data : null
      ),
      metrics: toSection(outcomes.get('metrics'), (result) => (result.kind === 'keyword_metrics' ? result.data : null)),
      competitorSummary: toSection(outcomes.get('competitorSummary'), (result) =>
        result.kind === 'competitor_summary' ? result.data : null
      ),
      backlinks: toSection(outcomes.get('backlinks'), (result) => (result.kind === 'backlinks' ? result.data : null)),
      anomalies,
      transitions,
      topNChanges,
      generatedAt: (this.deps.now ? this.deps.now() : new Date()).toISOString()
    });

    this.logger.info('Ranking cycle complete', {
      domain,
      page1Keywords: report.summary.page1Keywords,
      visibilityScore: report.summary.visibilityScore,
      anomalies: report.summary.anomalies.total,
      failedSections: report.summary.failedSections,
      durationMs: Date.now() - startedAt
    });

    return report;
  }
}
