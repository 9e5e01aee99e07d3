export { BasePolicy, PolicyOptions } from './policies/base-policy';
export { EpsilonGreedyPolicy, DEFAULT_EPSILON } from './policies/epsilon-greedy';
export { ThompsonSamplingPolicy } from './policies/thompson-sampling';
export { ExperimentRunner, ExperimentRunnerOptions } from './experiment-runner';
export { trueMeanRewardModel, bernoulliRewardModel } from './reward-model';
export { createArmSet, bestMean, argmax } from './arm-set';

export * from './types';
