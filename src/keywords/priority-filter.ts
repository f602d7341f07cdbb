import type { CheckFrequency, KeywordPriority } from '../config';
import type { KeywordSelection } from '../report/types';
import { normalizeKeyword } from '../utils/text';

const INCLUDED_PRIORITIES: Record<CheckFrequency, ReadonlySet<KeywordPriority>> = {
  daily: new Set<KeywordPriority>(['high', 'medium', 'low']),
  weekly: new Set<KeywordPriority>(['high', 'medium']),
  monthly: new Set<KeywordPriority>(['high'])
};

export function isKeywordPriority(value: unknown): value is KeywordPriority {
  return value === 'high' || value === 'medium' || value === 'low';
}

export function isCheckFrequency(value: unknown): value is CheckFrequency {
  return value === 'daily' || value === 'weekly' || value === 'monthly';
}

function indexPriorities(priorities: Record<string, KeywordPriority>): Map<string, KeywordPriority> {
  const indexed = new Map<string, KeywordPriority>();
  for (const [keyword, priority] of Object.entries(priorities)) {
    const normalized = normalizeKeyword(keyword);
    if (normalized) {
      indexed.set(normalized, priority);
    }
  }
  return indexed;
}

export function selectKeywordsForRun(
  keywords: readonly string[],
  priorities: Record<string, KeywordPriority> = {},
  frequency: CheckFrequency = 'daily',
  defaultPriority: KeywordPriority = 'medium'
): KeywordSelection {
  const included = INCLUDED_PRIORITIES[frequency];
  const byKeyword = indexPriorities(priorities);
  const selected: string[] = [];
  const skipped: string[] = [];

  for (const keyword of keywords) {
    const priority = byKeyword.get(normalizeKeyword(keyword) ?? keyword) ?? defaultPriority;
    if (included.has(priority)) {
      selected.push(keyword);
    } else {
      skipped.push(keyword);
    }
  }

  if (selected.length === 0 && keywords.length > 0) {
    return { selected: [...keywords], skipped: [], fellBack: true };
  }
  return { selected, skipped, fellBack: false };
}
