/**
 * Bandit Lab - Policy Comparison
 *
 * Runs epsilon-greedy and Thompson sampling over the same arms and hands
 * both reward sequences to the reporter.
 */

import { EpsilonGreedyPolicy } from '../bandit/policies/epsilon-greedy';
import { ThompsonSamplingPolicy } from '../bandit/policies/thompson-sampling';
import { ExperimentRunner } from '../bandit/experiment-runner';
import { ExperimentResult, Policy, PolicyName } from '../bandit/types';
import { ComparisonReport, Reporter, summaryLines } from '../reporting/reporter';
import { PolicyRun } from '../reporting/reward-table';
import { CONFIG, ExperimentSettings, getConfig } from '../utils/config';
import { createLogger } from '../utils/logger';

const logger = createLogger('Comparison');

export const ALGORITHM_LABELS: Record<PolicyName, string> = {
  EpsilonGreedy: 'Epsilon-Greedy',
  ThompsonSampling: 'Thompson Sampling',
};

export interface ComparisonOptions extends Partial<ExperimentSettings> {
  /** Skip writing the CSV when false */
  persist?: boolean;
  runner?: ExperimentRunner;
  reporter?: Reporter;
}

export interface ComparisonResult {
  report: ComparisonReport;
  experiments: ExperimentResult[];
}

/**
 * Environment settings are read only when the caller leaves a field out.
 * Passing `seed: undefined` explicitly requests an unseeded run.
 */
export function runComparison(options: ComparisonOptions = {}): ComparisonResult {
  let environment: ExperimentSettings | undefined;
  const defaults = (): ExperimentSettings => {
    if (environment === undefined) {
      environment = getConfig();
    }
    return environment;
  };

  const settings: ExperimentSettings = {
    trueMeans: options.trueMeans ?? defaults().trueMeans,
    epsilon: options.epsilon ?? defaults().epsilon,
    numTrials: options.numTrials ?? defaults().numTrials,
    progressInterval: options.progressInterval ?? CONFIG.experiment.progressInterval,
    seed: 'seed' in options ? options.seed : defaults().seed,
    csvPath: options.csvPath ?? (options.persist === false ? CONFIG.output.csvPath : defaults().csvPath),
  };

  const runner = options.runner ?? new ExperimentRunner({ progressInterval: settings.progressInterval });
  const reporter = options.reporter ?? new Reporter();

  const streamSeed = (name: PolicyName): string | undefined =>
    settings.seed === undefined ? undefined : `${settings.seed}:${name}`;

  const policies: Policy[] = [
    new EpsilonGreedyPolicy(settings.trueMeans, settings.epsilon, { seed: streamSeed('EpsilonGreedy') }),
    new ThompsonSamplingPolicy(settings.trueMeans, { seed: streamSeed('ThompsonSampling') }),
  ];

  logger.info('Running policy comparison', {
    trueMeans: settings.trueMeans,
    numTrials: settings.numTrials,
    seeded: settings.seed !== undefined,
  });

  const experiments = policies.map((policy) => runner.runDetailed(policy, settings.numTrials));

  const runs: PolicyRun[] = experiments.map((experiment) => ({
    name: experiment.policy,
    label: ALGORITHM_LABELS[experiment.policy],
    rewards: experiment.rewards,
  }));

  let report = reporter.compare(settings.trueMeans, runs);
  if (options.persist !== false) {
    report = reporter.persist(report, settings.csvPath);
  }

  logger.debug('Comparison totals', summaryLines(report));

  return { report, experiments };
}
