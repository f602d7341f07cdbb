import { describe, expect, it } from 'vitest';

import { AnomalyDetector, classifySeverity } from '../../src/analysis/anomaly-detector';
import type { HistoryPoint } from '../../src/analysis/types';
import type { Position } from '../../src/provider/types';

function history(keyword: string, positions: Position[]): HistoryPoint[] {
  return positions.map((position, index) => ({
    keyword,
    position,
    observedAt: `2026-03-${String(index + 1).padStart(2, '0')}`
  }));
}

const steady = history('running shoes', [20, 22, 21, 23, 20, 21, 22]);

describe('AnomalyDetector', () => {
  const detector = new AnomalyDetector();

  it('flags a sharp drop as a high severity decline', () => {
    expect(detector.detect(steady, { keyword: 'running shoes', position: 35 })).toEqual({
      keyword: 'running shoes',
      currentPosition: 35,
      expectedPosition: 21.3,
      zScore: 13.31,
      deviation: 13.7,
      severity: 'high',
      changeType: 'decline',
      previousPosition: 22,
      change: -13
    });
  });

  it('flags a moderate gain as a medium severity improvement', () => {
    expect(detector.detect(steady, { keyword: 'running shoes', position: 19 })).toEqual({
      keyword: 'running shoes',
      currentPosition: 19,
      expectedPosition: 21.3,
      zScore: -2.22,
      deviation: -2.3,
      severity: 'medium',
      changeType: 'improvement',
      previousPosition: 22,
      change: 3
    });
  });

  it('needs seven ranked observations', () => {
    const short = history('running shoes', [20, 22, 21, 23, 20, 21]);
    expect(detector.detect(short, { keyword: 'running shoes', position: 50 })).toBeNull();

    const withGaps = history('running shoes', [20, 22, 'unranked', 23, 20, 21, 22]);
    expect(detector.detect(withGaps, { keyword: 'running shoes', position: 50 })).toBeNull();
  });

  it('returns null for a flat history', () => {
    const flat = history('running shoes', [5, 5, 5, 5, 5, 5, 5]);
    expect(detector.detect(flat, { keyword: 'running shoes', position: 9 })).toBeNull();
  });

  it('returns null for ordinary movement and for unranked observations', () => {
    expect(detector.detect(steady, { keyword: 'running shoes', position: 21 })).toBeNull();
    expect(detector.detect(steady, { keyword: 'running shoes', position: 'unranked' })).toBeNull();
  });

  it('only compares against the same keyword, ignoring case and spacing', () => {
    const mixed = [...history('Running  Shoes', [20, 22, 21, 23, 20, 21, 22]), ...history('trail shoes', [80])];

    expect(detector.detect(mixed, { keyword: 'running shoes', position: 35 })?.severity).toBe('high');
    expect(detector.detect(mixed, { keyword: 'trail shoes', position: 1 })).toBeNull();
  });

  it('reports the latest observation even when it was unranked', () => {
    const endsUnranked = [...steady, ...history('running shoes', ['unranked'])];

    expect(detector.detect(endsUnranked, { keyword: 'running shoes', position: 35 })).toMatchObject({
      previousPosition: 'unranked',
      change: null
    });
  });

  it('orders anomalies across keywords by the size of the z-score', () => {
    const combined = [...steady, ...history('trail shoes', [20, 22, 21, 23, 20, 21, 22])];

    const anomalies = detector.detectAll(combined, [
      { keyword: 'trail shoes', position: 19 },
      { keyword: 'running shoes', position: 35 },
      { keyword: 'new keyword', position: 1 }
    ]);

    expect(anomalies.map((anomaly) => [anomaly.keyword, anomaly.severity])).toEqual([
      ['running shoes', 'high'],
      ['trail shoes', 'medium']
    ]);
  });

  it('accepts custom thresholds', () => {
    const strict = new AnomalyDetector({ minHistory: 3, highZ: 2 });
    const threePoints = history('running shoes', [10, 12, 11]);

    expect(strict.detect(threePoints, { keyword: 'running shoes', position: 13 })?.severity).toBe('high');
  });
});

describe('classifySeverity', () => {
  it('uses 2 and 3 standard deviations as boundaries', () => {
    expect(classifySeverity(1.99)).toBe('none');
    expect(classifySeverity(2)).toBe('medium');
    expect(classifySeverity(-2.99)).toBe('medium');
    expect(classifySeverity(3)).toBe('high');
    expect(classifySeverity(-4.5)).toBe('high');
  });
});
