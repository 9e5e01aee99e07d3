import { BasePolicy, PolicyOptions } from './base-policy';
import { PolicySummary } from '../types';
import { argmax } from '../arm-set';
import { sampleBeta } from '../../utils/random';

/**
 * Beta-Bernoulli Thompson sampling.
 *
 * Each arm holds a Beta(alpha, beta) belief starting at Beta(1, 1). Only a
 * reward of exactly 1 counts as a success; every other value, including
 * non-binary rewards, is recorded as a failure.
 */
export class ThompsonSamplingPolicy extends BasePolicy {
  readonly name = 'ThompsonSampling' as const;
  private readonly alpha: number[];
  private readonly beta: number[];

  constructor(trueMeans: readonly number[], options: PolicyOptions = {}) {
    super(trueMeans, options);
    this.alpha = new Array<number>(this.numArms).fill(1);
    this.beta = new Array<number>(this.numArms).fill(1);
  }

  select(): number {
    const samples = this.alpha.map((a, i) => sampleBeta(this.random, a, this.beta[i]));
    return argmax(samples);
  }

  update(armIndex: number, reward: number): void {
    this.assertArm(armIndex);
    this.recordPull(armIndex, reward);

    if (reward === 1) {
      this.alpha[armIndex]++;
    } else {
      this.beta[armIndex]++;
    }
  }

  report(): PolicySummary {
    const alphaSum = this.alpha.reduce((sum, a) => sum + a, 0);
    const betaSum = this.beta.reduce((sum, b) => sum + b, 0);
    return this.summarize(alphaSum / (alphaSum + betaSum));
  }

  describe(): string {
    return 'ThompsonSampling Bandit';
  }

  getAlpha(): number[] {
    return [...this.alpha];
  }

  getBeta(): number[] {
    return [...this.beta];
  }
}
