import type { Position } from '../provider/types';
import { normalizeKeyword } from '../utils/text';
import type { HistoryPoint } from './types';

export function keywordKey(keyword: string): string {
  return normalizeKeyword(keyword) ?? keyword;
}

export function groupHistory(history: readonly HistoryPoint[]): Map<string, HistoryPoint[]> {
  const grouped = new Map<string, HistoryPoint[]>();
  for (const point of history) {
    const key = keywordKey(point.keyword);
    const bucket = grouped.get(key);
    if (bucket) {
      bucket.push(point);
    } else {
      grouped.set(key, [point]);
    }
  }
  return grouped;
}

export function latestPosition(points: readonly HistoryPoint[] | undefined): Position | null {
  if (!points || points.length === 0) {
    return null;
  }
  return points[points.length - 1]?.position ?? null;
}
