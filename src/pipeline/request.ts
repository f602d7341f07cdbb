import type { HistoryPoint } from '../analysis/types';
import type { CheckFrequency, KeywordPriority } from '../config';
import { isCheckFrequency, isKeywordPriority } from '../keywords/priority-filter';
import { isRecord } from '../provider/parsers';
import { UNRANKED, type Position } from '../provider/types';
import { SECTION_NAMES, type SectionName } from '../report/types';

export interface RunRequest {
  domain: string;
  keywords: string[];
  competitors?: string[];
  market?: string;
  history?: HistoryPoint[];
  keywordPriorities?: Record<string, KeywordPriority>;
  checkFrequency?: CheckFrequency;
  include?: SectionName[];
  topN?: number;
  deadlineMs?: number;
}

export class RequestValidationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid run request: ${issues.join('; ')}`);
    this.name = 'RequestValidationError';
  }
}

function isSectionName(value: unknown): value is SectionName {
  return SECTION_NAMES.some((name) => name === value);
}

function readStringList(value: unknown, field: string, issues: string[]): string[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
    issues.push(`${field} must be an array of strings`);
    return undefined;
  }
  return value;
}

function readPositiveNumber(value: unknown, field: string, issues: string[]): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    issues.push(`${field} must be a positive number`);
    return undefined;
  }
  return value;
}

// null and missing positions arrive from stores that never saw the keyword rank.
function readPosition(value: unknown): Position | undefined {
  if (value === null || value === UNRANKED) {
    return UNRANKED;
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 1) {
    return value;
  }
  return undefined;
}

function readHistory(value: unknown, issues: string[]): HistoryPoint[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    issues.push('history must be an array');
    return undefined;
  }

  const points: HistoryPoint[] = [];
  value.forEach((entry, index) => {
    if (!isRecord(entry) || typeof entry.keyword !== 'string') {
      issues.push(`history[${index}] needs a keyword`);
      return;
    }
    const position = readPosition(entry.position);
    if (position === undefined) {
      issues.push(`history[${index}].position must be a positive integer, "unranked" or null`);
      return;
    }
    const observedAt = typeof entry.observedAt === 'string' ? entry.observedAt : '';
    points.push({ keyword: entry.keyword, position, observedAt });
  });
  return points;
}

function readPriorities(value: unknown, issues: string[]): Record<string, KeywordPriority> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    issues.push('keywordPriorities must be an object');
    return undefined;
  }
  const priorities: Record<string, KeywordPriority> = {};
  for (const [keyword, priority] of Object.entries(value)) {
    if (!isKeywordPriority(priority)) {
      issues.push(`keywordPriorities["${keyword}"] must be high, medium or low`);
      continue;
    }
    priorities[keyword] = priority;
  }
  return priorities;
}

export function parseRunRequest(payload: unknown): RunRequest {
  if (!isRecord(payload)) {
    throw new RequestValidationError(['request must be a JSON object']);
  }

  const issues: string[] = [];
  const domain = typeof payload.domain === 'string' ? payload.domain.trim() : '';
  if (!domain) {
    issues.push('domain is required');
  }

  const keywords = readStringList(payload.keywords, 'keywords', issues) ?? [];
  if (payload.keywords === undefined || keywords.length === 0) {
    issues.push('keywords must list at least one keyword');
  }

  let market: string | undefined;
  if (payload.market !== undefined) {
    if (typeof payload.market === 'string' && payload.market.trim()) {
      market = payload.market.trim().toLowerCase();
    } else {
      issues.push('market must be a non-empty string');
    }
  }

  let checkFrequency: CheckFrequency | undefined;
  if (payload.checkFrequency !== undefined) {
    if (isCheckFrequency(payload.checkFrequency)) {
      checkFrequency = payload.checkFrequency;
    } else {
      issues.push('checkFrequency must be daily, weekly or monthly');
    }
  }

  let include: SectionName[] | undefined;
  if (payload.include !== undefined) {
    if (Array.isArray(payload.include) && payload.include.every(isSectionName)) {
      include = payload.include;
    } else {
      issues.push(`include may only contain ${SECTION_NAMES.join(', ')}`);
    }
  }

  const request: RunRequest = {
    domain,
    keywords,
    competitors: readStringList(payload.competitors, 'competitors', issues),
    market,
    history: readHistory(payload.history, issues),
    keywordPriorities: readPriorities(payload.keywordPriorities, issues),
    checkFrequency,
    include,
    topN: readPositiveNumber(payload.topN, 'topN', issues),
    deadlineMs: readPositiveNumber(payload.deadlineMs, 'deadlineMs', issues)
  };

  if (issues.length > 0) {
    throw new RequestValidationError(issues);
  }
  return request;
}
