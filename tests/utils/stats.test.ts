import { describe, expect, it } from 'vitest';

import { mean, populationStandardDeviation, roundTo, zScore } from '../../src/utils/stats';

describe('stats helpers', () => {
  it('computes the population standard deviation', () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5);
    expect(populationStandardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
    expect(populationStandardDeviation([])).toBeNull();
  });

  it('has no z-score without spread', () => {
    expect(zScore(9, 5, 2)).toBe(2);
    expect(zScore(9, 5, 0)).toBeNull();
  });

  it('rounds halves up', () => {
    expect(roundTo(21.25, 1)).toBe(21.3);
    expect(roundTo(42.5, 0)).toBe(43);
  });
});
