import { ArmSet } from './types';
import { InvalidConfigurationError } from '../utils/errors';

/**
 * Validate and freeze a copy of the true means
 */
export function createArmSet(trueMeans: readonly number[]): ArmSet {
  if (trueMeans.length < 1) {
    throw new InvalidConfigurationError('At least one arm is required', { numArms: trueMeans.length });
  }

  trueMeans.forEach((mean, index) => {
    if (!Number.isFinite(mean)) {
      throw new InvalidConfigurationError(`True mean of arm ${index} must be a finite number`, { index, mean });
    }
  });

  return Object.freeze([...trueMeans]);
}

export function bestMean(arms: ArmSet): number {
  return arms.reduce((best, mean) => (mean > best ? mean : best), Number.NEGATIVE_INFINITY);
}

/**
 * Index of the first maximal value
 */
export function argmax(values: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}
