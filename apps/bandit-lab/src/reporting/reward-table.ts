/**
 * Row-per-trial reward table and its CSV persistence
 */

import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { ReportPersistenceError } from '../utils/errors';

export interface PolicyRun {
  /** Policy name, e.g. EpsilonGreedy */
  name: string;
  /** Human-readable algorithm label, e.g. Epsilon-Greedy */
  label: string;
  rewards: number[];
}

export interface RewardRow {
  Bandit: string;
  Reward: number;
  Algorithm: string;
}

export const REWARD_COLUMNS: readonly (keyof RewardRow)[] = ['Bandit', 'Reward', 'Algorithm'];

/**
 * One row per trial per run, runs kept in the order given
 */
export function buildRewardTable(runs: readonly PolicyRun[]): RewardRow[] {
  return runs.flatMap((run) =>
    run.rewards.map((reward) => ({ Bandit: run.name, Reward: reward, Algorithm: run.label }))
  );
}

export function formatRewardCsv(rows: readonly RewardRow[]): string {
  return stringify([...rows], {
    header: true,
    columns: [...REWARD_COLUMNS],
  });
}

/**
 * Write the table, replacing any file already at filePath
 */
export function writeRewardsCsv(filePath: string, rows: readonly RewardRow[]): string {
  const resolved = path.resolve(filePath);
  try {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    fs.writeFileSync(resolved, formatRewardCsv(rows), 'utf-8');
  } catch (error) {
    throw new ReportPersistenceError(resolved, error);
  }
  return resolved;
}
