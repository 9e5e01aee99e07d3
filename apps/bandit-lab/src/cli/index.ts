#!/usr/bin/env node

/**
 * Bandit Lab CLI - Entry Point
 *
 * Compares epsilon-greedy and Thompson sampling with the configured settings.
 */

import chalk from 'chalk';
import ora from 'ora';
import { runComparison } from './comparison';
import { displayWelcome } from './display/welcome';
import { displayRewardCharts, displaySummary } from './display/summary';
import { getConfig } from '../utils/config';
import { handleError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('CLI');

function main(): void {
  const settings = getConfig();
  displayWelcome(settings);

  const spinner = ora(`Running ${settings.numTrials} trials per policy...`).start();
  try {
    const { report, experiments } = runComparison(settings);
    spinner.succeed(chalk.green('✓ Experiments complete'));

    displaySummary(report, experiments);
    displayRewardCharts(report);
  } catch (error) {
    spinner.fail(chalk.red('Comparison failed'));
    throw error;
  }
}

try {
  main();
} catch (error) {
  const appError = handleError(error);
  logger.error('Bandit comparison failed', appError, appError.details);
  process.exit(1);
}
