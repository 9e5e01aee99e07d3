/**
 * Experiment Runner
 *
 * Drives a policy through select -> observe -> update for a fixed number of
 * trials. Trials run strictly in order since each choice depends on every
 * earlier outcome.
 */

import { ExperimentResult, Policy, RewardModel } from './types';
import { trueMeanRewardModel } from './reward-model';
import { InvalidConfigurationError } from '../utils/errors';
import { Logger, createLogger } from '../utils/logger';
import { CONFIG } from '../utils/config';

export interface ExperimentRunnerOptions {
  rewardModel?: RewardModel;
  progressInterval?: number;
  logger?: Logger;
}

export class ExperimentRunner {
  private readonly rewardModel: RewardModel;
  private readonly progressInterval: number;
  private readonly logger: Logger;

  constructor(options: ExperimentRunnerOptions = {}) {
    this.rewardModel = options.rewardModel ?? trueMeanRewardModel;
    this.progressInterval = options.progressInterval ?? CONFIG.experiment.progressInterval;
    this.logger = options.logger ?? createLogger('ExperimentRunner');
  }

  /**
   * Observed reward per trial, in trial order
   */
  run(policy: Policy, numTrials: number): number[] {
    return this.runDetailed(policy, numTrials).rewards;
  }

  runDetailed(policy: Policy, numTrials: number): ExperimentResult {
    if (!Number.isInteger(numTrials) || numTrials <= 0) {
      throw new InvalidConfigurationError(`Number of trials must be a positive integer, got ${numTrials}`, { numTrials });
    }

    const startTime = Date.now();
    const trueMeans = policy.getTrueMeans();
    const rewards: number[] = [];
    const arms: number[] = [];

    this.logger.debug('Starting experiment', {
      policy: policy.describe(),
      rewardModel: this.rewardModel.name,
      numTrials,
    });

    for (let trial = 1; trial <= numTrials; trial++) {
      const arm = policy.select();
      const reward = this.rewardModel.observe(arm, trueMeans);
      policy.update(arm, reward);

      arms.push(arm);
      rewards.push(reward);

      if (this.progressInterval > 0 && trial % this.progressInterval === 0) {
        this.logger.debug(`Trial ${trial}/${numTrials}`, { actionCounts: policy.getActionCounts() });
      }
    }

    const summary = policy.report();
    const durationMs = Date.now() - startTime;

    this.logger.info(summary.formatted, { trials: numTrials, durationMs });

    return {
      policy: policy.name,
      description: policy.describe(),
      rewards,
      arms,
      actionCounts: policy.getActionCounts(),
      summary,
      durationMs,
    };
  }
}
