import { BasePolicy, PolicyOptions } from './base-policy';
import { PolicySummary } from '../types';
import { argmax } from '../arm-set';
import { InvalidConfigurationError } from '../../utils/errors';
import { randomInt } from '../../utils/random';

export const DEFAULT_EPSILON = 0.2;

/**
 * Explores a uniformly random arm with probability epsilon and otherwise
 * exploits the arm with the highest sample-mean value.
 */
export class EpsilonGreedyPolicy extends BasePolicy {
  readonly name = 'EpsilonGreedy' as const;
  readonly epsilon: number;
  private readonly actionValues: number[];

  constructor(trueMeans: readonly number[], epsilon: number = DEFAULT_EPSILON, options: PolicyOptions = {}) {
    super(trueMeans, options);
    if (!Number.isFinite(epsilon) || epsilon < 0 || epsilon > 1) {
      throw new InvalidConfigurationError(`Epsilon must be between 0 and 1, got ${epsilon}`, { epsilon });
    }
    this.epsilon = epsilon;
    this.actionValues = new Array<number>(this.numArms).fill(0);
  }

  shouldExplore(): boolean {
    return this.random() < this.epsilon;
  }

  select(): number {
    if (this.shouldExplore()) {
      return randomInt(this.random, this.numArms);
    }
    return argmax(this.actionValues);
  }

  update(armIndex: number, reward: number): void {
    this.assertArm(armIndex);
    const n = this.recordPull(armIndex, reward);
    this.actionValues[armIndex] += (reward - this.actionValues[armIndex]) / n;
  }

  /**
   * Unweighted mean of the per-arm values; untried arms count as 0
   */
  report(): PolicySummary {
    const total = this.actionValues.reduce((sum, value) => sum + value, 0);
    return this.summarize(total / this.numArms);
  }

  describe(): string {
    return `EpsilonGreedy Bandit with epsilon=${this.epsilon}`;
  }

  getActionValues(): number[] {
    return [...this.actionValues];
  }
}
