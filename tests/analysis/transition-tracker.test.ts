import { describe, expect, it } from 'vitest';

import { classifyTopNChanges, track, trackAll } from '../../src/analysis/transition-tracker';
import type { HistoryPoint } from '../../src/analysis/types';
import type { Position } from '../../src/provider/types';

const point = (keyword: string, position: Position, observedAt = '2026-03-01'): HistoryPoint => ({
  keyword,
  position,
  observedAt
});

describe('track', () => {
  it('detects entering the top 10', () => {
    expect(track(15, 8)).toEqual({
      direction: 'entered_top_n',
      previousPosition: 15,
      currentPosition: 8,
      threshold: 10
    });
  });

  it('detects leaving the top 10', () => {
    expect(track(5, 15)).toEqual({
      direction: 'exited_top_n',
      previousPosition: 5,
      currentPosition: 15,
      threshold: 10
    });
  });

  it('ignores a first observation', () => {
    expect(track(null, 3)).toBeNull();
    expect(track(null, 30)).toBeNull();
  });

  it('treats unranked as outside the top N', () => {
    expect(track('unranked', 4)?.direction).toBe('entered_top_n');
    expect(track(4, 'unranked')?.direction).toBe('exited_top_n');
    expect(track('unranked', 'unranked')).toBeNull();
  });

  it('respects the boundary and custom thresholds', () => {
    expect(track(10, 11)?.direction).toBe('exited_top_n');
    expect(track(11, 10)?.direction).toBe('entered_top_n');
    expect(track(3, 7)).toBeNull();
    expect(track(15, 8, 5)).toBeNull();
    expect(track(8, 2, 3)).toMatchObject({ direction: 'entered_top_n', threshold: 3 });
  });
});

describe('trackAll', () => {
  it('compares each record with its latest history point', () => {
    const history = [
      point('running shoes', 4, '2026-03-01'),
      point('running shoes', 15, '2026-03-02'),
      point('trail shoes', 3)
    ];

    expect(
      trackAll(history, [
        { keyword: 'Running Shoes', position: 8 },
        { keyword: 'trail shoes', position: 5 },
        { keyword: 'new keyword', position: 1 }
      ])
    ).toEqual([
      { keyword: 'Running Shoes', direction: 'entered_top_n', previousPosition: 15, currentPosition: 8, threshold: 10 }
    ]);
  });
});

describe('classifyTopNChanges', () => {
  it('splits records into entered, exited, improved and declined', () => {
    const history = [point('a', 12), point('b', 4), point('c', 6), point('d', 3), point('f', 20)];

    const changes = classifyTopNChanges(history, [
      { keyword: 'a', position: 9 },
      { keyword: 'b', position: 'unranked' },
      { keyword: 'c', position: 2 },
      { keyword: 'd', position: 8 },
      { keyword: 'e', position: 1 },
      { keyword: 'f', position: 14 }
    ]);

    expect(changes).toEqual({
      threshold: 10,
      entered: [{ keyword: 'a', previousPosition: 12, currentPosition: 9 }],
      exited: [{ keyword: 'b', previousPosition: 4, currentPosition: 'unranked' }],
      improved: [{ keyword: 'c', previousPosition: 6, currentPosition: 2 }],
      declined: [{ keyword: 'd', previousPosition: 3, currentPosition: 8 }]
    });
  });
});
