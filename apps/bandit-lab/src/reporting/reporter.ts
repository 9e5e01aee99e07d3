/**
 * Reporter
 *
 * Turns the flat reward sequences of one or more runs into comparison
 * statistics and persists the per-trial table.
 */

import { ArmSet } from '../bandit/types';
import { createArmSet } from '../bandit/arm-set';
import { cumulativeRegret, cumulativeRewards, logCumulativeRewards, totalReward } from './statistics';
import { PolicyRun, RewardRow, buildRewardTable, writeRewardsCsv } from './reward-table';
import { Logger, createLogger } from '../utils/logger';

export interface RunStatistics {
  name: string;
  label: string;
  trials: number;
  cumulativeReward: number;
  cumulativeRegret: number;
  curve: number[];
  logCurve: number[];
}

export interface ComparisonReport {
  trueMeans: number[];
  runs: RunStatistics[];
  rows: RewardRow[];
  csvPath?: string;
}

export class Reporter {
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('Reporter')) {
    this.logger = logger;
  }

  compare(trueMeans: ArmSet, runs: readonly PolicyRun[]): ComparisonReport {
    const arms = createArmSet(trueMeans);
    const stats = runs.map((run): RunStatistics => ({
      name: run.name,
      label: run.label,
      trials: run.rewards.length,
      cumulativeReward: totalReward(run.rewards),
      cumulativeRegret: cumulativeRegret(arms, run.rewards),
      curve: cumulativeRewards(run.rewards),
      logCurve: logCumulativeRewards(run.rewards),
    }));

    return {
      trueMeans: [...arms],
      runs: stats,
      rows: buildRewardTable(runs),
    };
  }

  /**
   * Write the report's reward table, overwriting filePath
   */
  persist(report: ComparisonReport, filePath: string): ComparisonReport {
    const csvPath = writeRewardsCsv(filePath, report.rows);
    this.logger.info(`Stored ${report.rows.length} reward rows`, { csvPath });
    return { ...report, csvPath };
  }
}

/**
 * Cumulative reward and regret lines, rewards first
 */
export function summaryLines(report: ComparisonReport): string[] {
  return [
    ...report.runs.map((run) => `Cumulative Reward - ${run.label}: ${run.cumulativeReward}`),
    ...report.runs.map((run) => `Cumulative Regret - ${run.label}: ${run.cumulativeRegret}`),
  ];
}
