/**
 * Ordered true mean reward per arm, K >= 1
 */
export type ArmSet = readonly number[];

export type PolicyName = 'EpsilonGreedy' | 'ThompsonSampling';

export interface PolicySummary {
  name: PolicyName;
  avgReward: number;
  avgRegret: number;
  formatted: string;
}

/**
 * Capability set shared by every arm-selection policy
 */
export interface Policy {
  readonly name: PolicyName;
  readonly numArms: number;
  select(): number;
  update(armIndex: number, reward: number): void;
  report(): PolicySummary;
  describe(): string;
  getTrueMeans(): number[];
  getEstimatedMeans(): number[];
  getActionCounts(): number[];
}

/**
 * Produces the observed reward for a pulled arm
 */
export interface RewardModel {
  readonly name: string;
  observe(armIndex: number, trueMeans: ArmSet): number;
}

export interface ExperimentResult {
  policy: PolicyName;
  description: string;
  rewards: number[];
  arms: number[];
  actionCounts: number[];
  summary: PolicySummary;
  durationMs: number;
}
