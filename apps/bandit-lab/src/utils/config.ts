/**
 * Bandit Lab Configuration
 *
 * Central configuration for experiment defaults, output and logging.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

dotenv.config();

const DEFAULT_TRUE_MEANS: readonly number[] = [1, 2, 3, 4];

/**
 * Main configuration object
 */
export const CONFIG = {
  /**
   * Experiment defaults
   */
  experiment: {
    trueMeans: DEFAULT_TRUE_MEANS,
    epsilon: 0.2,            // Exploration probability for epsilon-greedy (0 to 1)
    numTrials: 20000,        // Trials per policy in a comparison run
    progressInterval: 5000,  // Trials between debug progress lines
  },

  /**
   * Report output
   */
  output: {
    csvPath: 'bandit_rewards.csv',
    chartWidth: 60,          // Columns used by the terminal charts
    chartHeight: 12,         // Rows used by the terminal charts
  },

  /**
   * Logging Configuration
   */
  logging: {
    level: process.env.LOG_LEVEL || 'info',  // Log level: debug, info, warn, error
    pretty: process.env.NODE_ENV !== 'production',  // Pretty print logs in dev
  },
} as const;

const commaSeparatedNumbers = z
  .string()
  .transform((raw) => raw.split(',').map((part) => part.trim()))
  .pipe(z.array(z.string().min(1, 'Arm means must not contain empty entries')))
  .transform((parts) => parts.map(Number));

/**
 * Environment overrides, validated before they reach the experiment
 */
const envSchema = z.object({
  BANDIT_TRUE_MEANS: commaSeparatedNumbers
    .pipe(z.array(z.number().finite()).min(1))
    .optional(),
  BANDIT_EPSILON: z.coerce.number().min(0).max(1).optional(),
  BANDIT_NUM_TRIALS: z.coerce.number().int().positive().optional(),
  BANDIT_SEED: z.string().min(1).optional(),
  BANDIT_OUTPUT_PATH: z.string().min(1).optional(),
});

export interface ExperimentSettings {
  trueMeans: number[];
  epsilon: number;
  numTrials: number;
  progressInterval: number;
  seed?: string;
  csvPath: string;
}

/**
 * Resolve experiment settings from defaults and environment variables.
 * Empty variables count as unset.
 */
export const getConfig = (env: NodeJS.ProcessEnv = process.env): ExperimentSettings => {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    throw new ConfigurationError('Invalid bandit environment configuration', parsed.error.flatten().fieldErrors);
  }

  const overrides = parsed.data;

  return {
    trueMeans: overrides.BANDIT_TRUE_MEANS ?? [...CONFIG.experiment.trueMeans],
    epsilon: overrides.BANDIT_EPSILON ?? CONFIG.experiment.epsilon,
    numTrials: overrides.BANDIT_NUM_TRIALS ?? CONFIG.experiment.numTrials,
    progressInterval: CONFIG.experiment.progressInterval,
    seed: overrides.BANDIT_SEED,
    csvPath: overrides.BANDIT_OUTPUT_PATH ?? CONFIG.output.csvPath,
  };
};
