import { ArmSet, RewardModel } from './types';
import { RandomSource } from '../utils/random';

/**
 * Default observation: the arm pays exactly its true mean on every pull
 */
export const trueMeanRewardModel: RewardModel = {
  name: 'true-mean',
  observe(armIndex: number, trueMeans: ArmSet): number {
    return trueMeans[armIndex];
  },
};

/**
 * Stochastic observation: pays 1 with probability equal to the arm's true
 * mean (clamped to [0, 1]) and 0 otherwise.
 */
export function bernoulliRewardModel(random: RandomSource): RewardModel {
  return {
    name: 'bernoulli',
    observe(armIndex: number, trueMeans: ArmSet): number {
      const p = Math.max(0, Math.min(1, trueMeans[armIndex]));
      return random() < p ? 1 : 0;
    },
  };
}
