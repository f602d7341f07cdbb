import { MalformedResponseError } from './errors';
import type {
  BacklinksSummaryResult,
  CompetitorSummaryEntry,
  KeywordMetrics,
  SerpResultItem,
  SerpTaskStatus,
  SerpTaskSubmission
} from './types';

type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: JsonRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

// The API sends several numeric fields as strings ("0.42", "1200").
export function readNumber(record: JsonRecord, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number.parseFloat(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function readCount(record: JsonRecord, key: string): number {
  return readNumber(record, key) ?? 0;
}

function expectArray(payload: unknown, context: string): unknown[] {
  if (!Array.isArray(payload)) {
    throw new MalformedResponseError(`Expected an array from ${context}`);
  }
  return payload;
}

export function parseTaskSubmissions(payload: unknown): SerpTaskSubmission[] {
  const entries = expectArray(payload, 'SERP task submission');
  const submissions: SerpTaskSubmission[] = [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    const keyword = readString(entry, 'query');
    const taskId = readString(entry, 'task_id');
    if (!keyword || !taskId) {
      continue;
    }
    submissions.push({ keyword, taskId });
  }

  return submissions;
}

function parseSerpItem(entry: unknown): SerpResultItem | null {
  if (!isRecord(entry)) {
    return null;
  }
  const position = readNumber(entry, 'position');
  const url = readString(entry, 'url');
  if (position === null || !Number.isInteger(position) || position < 1 || !url) {
    return null;
  }
  return { position, url, title: readString(entry, 'title') };
}

export function parseTaskStatus(payload: unknown): SerpTaskStatus {
  if (!isRecord(payload)) {
    throw new MalformedResponseError('Expected an object from SERP task status');
  }

  if ('results' in payload) {
    const results = expectArray(payload.results, 'SERP task results');
    const items = results
      .map(parseSerpItem)
      .filter((item): item is SerpResultItem => item !== null)
      .sort((a, b) => a.position - b.position);
    return { state: 'ready', items };
  }

  const status = readString(payload, 'status') ?? 'missing';
  if (status === 'processing') {
    return { state: 'processing' };
  }
  return { state: 'unknown', status };
}

export function parseKeywordExport(payload: unknown): KeywordMetrics[] {
  const rows = expectArray(payload, 'keyword export');
  const metrics: KeywordMetrics[] = [];

  for (const row of rows) {
    if (!isRecord(row) || row.is_data_found !== true) {
      continue;
    }
    const keyword = readString(row, 'keyword');
    if (!keyword) {
      continue;
    }
    const competition = readNumber(row, 'competition');
    metrics.push({
      keyword,
      searchVolume: readCount(row, 'volume'),
      costPerClick: readCount(row, 'cpc'),
      difficulty: readNumber(row, 'difficulty'),
      competition,
      competitionIndex: competition === null ? null : Math.trunc(competition * 100)
    });
  }

  return metrics;
}

export function parseCompetitors(payload: unknown, limit: number): CompetitorSummaryEntry[] {
  const rows = expectArray(payload, 'domain competitors');
  const competitors: CompetitorSummaryEntry[] = [];

  for (const row of rows) {
    if (competitors.length >= limit) {
      break;
    }
    if (!isRecord(row)) {
      continue;
    }
    const domain = readString(row, 'domain');
    if (!domain) {
      continue;
    }
    competitors.push({
      domain,
      commonKeywords: readCount(row, 'common_keywords'),
      totalKeywords: readCount(row, 'total_keywords'),
      trafficSum: readCount(row, 'traffic_sum'),
      priceSum: readCount(row, 'price_sum')
    });
  }

  return competitors;
}

export function parseBacklinksSummary(payload: unknown, target: string): BacklinksSummaryResult {
  if (!isRecord(payload)) {
    throw new MalformedResponseError('Expected an object from backlinks summary');
  }
  const summary = expectArray(payload.summary, 'backlinks summary');
  const first = summary.find(isRecord);
  if (!first) {
    throw new MalformedResponseError('No backlinks data returned');
  }

  return {
    target: readString(first, 'target') ?? target,
    backlinks: readCount(first, 'backlinks'),
    refDomains: readCount(first, 'refdomains'),
    dofollowBacklinks: readCount(first, 'dofollow_backlinks'),
    nofollowBacklinks: readCount(first, 'nofollow_backlinks'),
    domainInlinkRank: readNumber(first, 'domain_inlink_rank')
  };
}
