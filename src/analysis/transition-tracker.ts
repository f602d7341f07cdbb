import type { Position } from '../provider/types';
import { isRanked } from '../provider/types';
import { groupHistory, keywordKey, latestPosition } from './history';
import type { HistoryPoint, KeywordTransitionEvent, Observation, PositionMove, TopNChanges, TransitionEvent } from './types';

export const DEFAULT_TOP_N = 10;

export function isInTopN(position: Position, n: number = DEFAULT_TOP_N): boolean {
  return isRanked(position) && position <= n;
}

// A null previous was never observed, so there is nothing to cross from.
export function track(previous: Position | null, current: Position, n: number = DEFAULT_TOP_N): TransitionEvent | null {
  if (previous === null) {
    return null;
  }
  const wasIn = isInTopN(previous, n);
  const isIn = isInTopN(current, n);
  if (!wasIn && isIn) {
    return { direction: 'entered_top_n', previousPosition: previous, currentPosition: current, threshold: n };
  }
  if (wasIn && !isIn) {
    return { direction: 'exited_top_n', previousPosition: previous, currentPosition: current, threshold: n };
  }
  return null;
}

export function trackAll(
  history: readonly HistoryPoint[],
  observations: readonly Observation[],
  n: number = DEFAULT_TOP_N
): KeywordTransitionEvent[] {
  const grouped = groupHistory(history);
  const events: KeywordTransitionEvent[] = [];
  for (const observation of observations) {
    const previous = latestPosition(grouped.get(keywordKey(observation.keyword)));
    const event = track(previous, observation.position, n);
    if (event) {
      events.push({ keyword: observation.keyword, ...event });
    }
  }
  return events;
}

export function classifyTopNChanges(
  history: readonly HistoryPoint[],
  observations: readonly Observation[],
  n: number = DEFAULT_TOP_N
): TopNChanges {
  const grouped = groupHistory(history);
  const changes: TopNChanges = { threshold: n, entered: [], exited: [], improved: [], declined: [] };

  for (const observation of observations) {
    const previousPosition = latestPosition(grouped.get(keywordKey(observation.keyword)));
    const currentPosition = observation.position;
    const move: PositionMove = { keyword: observation.keyword, previousPosition, currentPosition };

    const event = track(previousPosition, currentPosition, n);
    if (event?.direction === 'entered_top_n') {
      changes.entered.push(move);
    } else if (event?.direction === 'exited_top_n') {
      changes.exited.push(move);
    } else if (
      previousPosition !== null &&
      isRanked(previousPosition) &&
      isRanked(currentPosition) &&
      isInTopN(previousPosition, n) &&
      isInTopN(currentPosition, n)
    ) {
      if (currentPosition < previousPosition) {
        changes.improved.push(move);
      } else if (currentPosition > previousPosition) {
        changes.declined.push(move);
      }
    }
  }

  return changes;
}
