export { Reporter, ComparisonReport, RunStatistics, summaryLines } from './reporter';
export {
  PolicyRun,
  RewardRow,
  REWARD_COLUMNS,
  buildRewardTable,
  formatRewardCsv,
  writeRewardsCsv,
} from './reward-table';
export { cumulativeRewards, logCumulativeRewards, cumulativeRegret, totalReward } from './statistics';
