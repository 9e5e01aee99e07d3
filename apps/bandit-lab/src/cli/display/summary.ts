/**
 * Bandit Lab CLI - Comparison Summary
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import { ComparisonReport, summaryLines } from '../../reporting/reporter';
import { ExperimentResult } from '../../bandit/types';
import { CONFIG } from '../../utils/config';
import { ChartSeries, displayChart } from './chart';

const CHART_SYMBOLS = ['●', '◆', '▲', '■'];

/**
 * Policy results and cumulative totals as a table
 */
export function displaySummary(report: ComparisonReport, experiments: readonly ExperimentResult[]): void {
  console.log(chalk.gray('\n┌' + '─'.repeat(68) + '┐'));
  console.log(chalk.bold('  🎰 Policy Comparison:\n'));

  const table = new Table({
    head: [
      chalk.white.bold('Algorithm'),
      chalk.white.bold('Trials'),
      chalk.white.bold('Cum. Reward'),
      chalk.white.bold('Cum. Regret'),
      chalk.white.bold('Avg Reward'),
      chalk.white.bold('Avg Regret'),
    ],
    colWidths: [20, 9, 13, 13, 12, 12],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  report.runs.forEach((run, i) => {
    const summary = experiments[i]?.summary;
    table.push([
      chalk.cyan(run.label),
      run.trials.toString(),
      run.cumulativeReward.toString(),
      formatRegret(run.cumulativeRegret),
      summary ? summary.avgReward.toFixed(2) : '-',
      summary ? summary.avgRegret.toFixed(2) : '-',
    ]);
  });

  console.log(table.toString());

  console.log('');
  for (const line of summaryLines(report)) {
    console.log(chalk.white(`   ${line}`));
  }

  console.log('');
  for (const experiment of experiments) {
    console.log(chalk.white(`   ${experiment.summary.formatted}`));
    console.log(chalk.gray(`   Pulls per arm: [${experiment.actionCounts.join(', ')}]`));
  }

  if (report.csvPath) {
    console.log(chalk.gray(`\n   Rewards stored in ${report.csvPath}`));
  }

  console.log(chalk.gray('\n└' + '─'.repeat(68) + '┘'));
}

/**
 * Cumulative reward, linear and log scale
 */
export function displayRewardCharts(report: ComparisonReport): void {
  const trials = Math.max(0, ...report.runs.map((run) => run.trials));
  const options = { width: CONFIG.output.chartWidth, height: CONFIG.output.chartHeight };

  const linear: ChartSeries[] = report.runs.map((run, i) => ({
    label: run.label,
    values: run.curve,
    symbol: CHART_SYMBOLS[i % CHART_SYMBOLS.length],
  }));
  const logScale: ChartSeries[] = report.runs.map((run, i) => ({
    label: `${run.label} (log scale)`,
    values: run.logCurve,
    symbol: CHART_SYMBOLS[i % CHART_SYMBOLS.length],
  }));

  displayChart('Cumulative Reward', linear, options, trials);
  displayChart('Cumulative Reward (log scale)', logScale, options, trials);
}

function formatRegret(regret: number): string {
  return regret > 0 ? chalk.red(regret.toString()) : chalk.green(regret.toString());
}
