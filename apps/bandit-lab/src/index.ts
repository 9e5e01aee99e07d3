export * from './bandit';
export * from './reporting';
export { runComparison, ALGORITHM_LABELS, ComparisonOptions, ComparisonResult } from './cli/comparison';
export { createRandomSource, sampleBeta, sampleGamma, RandomSource } from './utils/random';
export * from './utils/errors';
export { getConfig, CONFIG, ExperimentSettings } from './utils/config';
export { Logger, LogLevel, createLogger } from './utils/logger';
