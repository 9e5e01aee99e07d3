import { ArmSet } from '../bandit/types';
import { bestMean } from '../bandit/arm-set';

export function totalReward(rewards: readonly number[]): number {
  return rewards.reduce((sum, reward) => sum + reward, 0);
}

/**
 * Running sum of rewards, one entry per trial
 */
export function cumulativeRewards(rewards: readonly number[]): number[] {
  const curve: number[] = [];
  let running = 0;
  for (const reward of rewards) {
    running += reward;
    curve.push(running);
  }
  return curve;
}

/**
 * Natural log of the running sum. A zero sum maps to -Infinity, a negative
 * one to NaN.
 */
export function logCumulativeRewards(rewards: readonly number[]): number[] {
  return cumulativeRewards(rewards).map((value) => Math.log(value));
}

/**
 * Reward the best arm would have paid over the run minus the reward obtained
 */
export function cumulativeRegret(trueMeans: ArmSet, rewards: readonly number[]): number {
  return bestMean(trueMeans) * rewards.length - totalReward(rewards);
}
