/**
 * Base Policy
 *
 * State common to every policy: the bound arm set, a running mean estimate
 * and a pull count per arm, plus the random source used for selection.
 */

import { ArmSet, Policy, PolicyName, PolicySummary } from '../types';
import { bestMean, createArmSet } from '../arm-set';
import { InvalidArmIndexError } from '../../utils/errors';
import { RandomSource, createRandomSource } from '../../utils/random';

export interface PolicyOptions {
  random?: RandomSource;
  seed?: string;
}

export abstract class BasePolicy implements Policy {
  abstract readonly name: PolicyName;

  protected readonly trueMeans: ArmSet;
  protected readonly estimatedMeans: number[];
  protected readonly actionCounts: number[];
  protected readonly random: RandomSource;

  constructor(trueMeans: readonly number[], options: PolicyOptions = {}) {
    this.trueMeans = createArmSet(trueMeans);
    this.estimatedMeans = new Array<number>(this.trueMeans.length).fill(0);
    this.actionCounts = new Array<number>(this.trueMeans.length).fill(0);
    this.random = options.random ?? createRandomSource(options.seed);
  }

  get numArms(): number {
    return this.trueMeans.length;
  }

  abstract select(): number;

  abstract update(armIndex: number, reward: number): void;

  abstract report(): PolicySummary;

  abstract describe(): string;

  getTrueMeans(): number[] {
    return [...this.trueMeans];
  }

  getEstimatedMeans(): number[] {
    return [...this.estimatedMeans];
  }

  getActionCounts(): number[] {
    return [...this.actionCounts];
  }

  protected assertArm(armIndex: number): void {
    if (!Number.isInteger(armIndex) || armIndex < 0 || armIndex >= this.numArms) {
      throw new InvalidArmIndexError(armIndex, this.numArms);
    }
  }

  /**
   * Count the pull and fold the reward into the running mean
   */
  protected recordPull(armIndex: number, reward: number): number {
    this.actionCounts[armIndex]++;
    const n = this.actionCounts[armIndex];
    this.estimatedMeans[armIndex] += (reward - this.estimatedMeans[armIndex]) / n;
    return n;
  }

  protected summarize(avgReward: number): PolicySummary {
    const avgRegret = bestMean(this.trueMeans) - avgReward;
    return {
      name: this.name,
      avgReward,
      avgRegret,
      formatted: `${this.name} Results: Average Reward=${avgReward.toFixed(2)}, Average Regret=${avgRegret.toFixed(2)}`,
    };
  }
}
