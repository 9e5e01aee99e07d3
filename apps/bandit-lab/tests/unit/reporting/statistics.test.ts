/**
 * Reward Statistics Tests
 */

import {
  cumulativeRegret,
  cumulativeRewards,
  logCumulativeRewards,
  totalReward,
} from '../../../src/reporting/statistics';

describe('statistics', () => {
  it('should sum the rewards', () => {
    expect(totalReward([1, 4, 4])).toBe(9);
    expect(totalReward([])).toBe(0);
  });

  it('should build the running sum', () => {
    expect(cumulativeRewards([1, 4, 4, 2])).toEqual([1, 5, 9, 11]);
    expect(cumulativeRewards([])).toEqual([]);
  });

  it('should take the natural log of the running sum', () => {
    const curve = logCumulativeRewards([1, Math.E - 1, 0]);

    expect(curve[0]).toBe(0);
    expect(curve[1]).toBeCloseTo(1, 10);
    expect(curve[2]).toBeCloseTo(1, 10);
  });

  it('should map a zero running sum to -Infinity', () => {
    expect(logCumulativeRewards([0, 1])).toEqual([Number.NEGATIVE_INFINITY, 0]);
  });

  it('should measure regret against the best arm', () => {
    expect(cumulativeRegret([1, 2, 3, 4], [1, 4, 4])).toBe(3);
    expect(cumulativeRegret([1, 2, 3, 4], [1, 1, 1])).toBe(9);
    expect(cumulativeRegret([1, 2, 3, 4], [4, 4])).toBe(0);
  });
});
