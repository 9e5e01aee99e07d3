/**
 * ArmSet Tests
 */

import { argmax, bestMean, createArmSet } from '../../../src/bandit/arm-set';
import { InvalidConfigurationError } from '../../../src/utils/errors';

describe('createArmSet', () => {
  it('should return a frozen copy of the means', () => {
    const means = [0.5, 1.5];
    const arms = createArmSet(means);
    means[0] = 9;

    expect(arms).toEqual([0.5, 1.5]);
    expect(Object.isFrozen(arms)).toBe(true);
  });

  it('should accept a single arm', () => {
    expect(createArmSet([3])).toEqual([3]);
  });

  it('should reject no arms', () => {
    expect(() => createArmSet([])).toThrow(InvalidConfigurationError);
  });

  it('should name the offending arm', () => {
    expect(() => createArmSet([1, Number.NaN])).toThrow('True mean of arm 1 must be a finite number');
  });
});

describe('argmax', () => {
  it('should return the index of the largest value', () => {
    expect(argmax([0.1, 0.7, 0.3])).toBe(1);
  });

  it('should prefer the first of several maxima', () => {
    expect(argmax([2, 5, 5, 1, 5])).toBe(1);
    expect(argmax([0, 0, 0])).toBe(0);
  });

  it('should handle negative values', () => {
    expect(argmax([-3, -1, -2])).toBe(1);
  });
});

describe('bestMean', () => {
  it('should return the largest true mean', () => {
    expect(bestMean(createArmSet([1, 4, 2]))).toBe(4);
    expect(bestMean(createArmSet([-3, -1, -2]))).toBe(-1);
  });

  it('should handle very large arm sets', () => {
    const means = Array.from({ length: 200000 }, (_, i) => i % 1000);
    means[123456] = 5000;

    expect(bestMean(createArmSet(means))).toBe(5000);
  });
});
