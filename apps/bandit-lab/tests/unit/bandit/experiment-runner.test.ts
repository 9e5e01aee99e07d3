/**
 * ExperimentRunner Tests
 */

import { ExperimentRunner } from '../../../src/bandit/experiment-runner';
import { EpsilonGreedyPolicy } from '../../../src/bandit/policies/epsilon-greedy';
import { ThompsonSamplingPolicy } from '../../../src/bandit/policies/thompson-sampling';
import { bernoulliRewardModel, trueMeanRewardModel } from '../../../src/bandit/reward-model';
import { Policy } from '../../../src/bandit/types';
import { InvalidConfigurationError } from '../../../src/utils/errors';
import { LogLevel, createLogger } from '../../../src/utils/logger';
import { createRandomSource } from '../../../src/utils/random';

function scriptedPolicy(trueMeans: number[], picks: number[]): jest.Mocked<Policy> {
  const queue = [...picks];
  return {
    name: 'EpsilonGreedy',
    numArms: trueMeans.length,
    select: jest.fn(() => {
      const next = queue.shift();
      if (next === undefined) {
        throw new Error('script exhausted');
      }
      return next;
    }),
    update: jest.fn(),
    report: jest.fn(() => ({ name: 'EpsilonGreedy' as const, avgReward: 0, avgRegret: 0, formatted: 'scripted' })),
    describe: jest.fn(() => 'scripted policy'),
    getTrueMeans: jest.fn(() => [...trueMeans]),
    getEstimatedMeans: jest.fn(() => trueMeans.map(() => 0)),
    getActionCounts: jest.fn(() => trueMeans.map(() => 0)),
  };
}

describe('ExperimentRunner', () => {
  let runner: ExperimentRunner;

  beforeEach(() => {
    runner = new ExperimentRunner({ progressInterval: 0 });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('run', () => {
    it('should select, observe and update once per trial in order', () => {
      const policy = scriptedPolicy([1, 2, 3, 4], [2, 0, 3]);

      const rewards = runner.run(policy, 3);

      expect(rewards).toEqual([3, 1, 4]);
      expect(policy.select).toHaveBeenCalledTimes(3);
      expect(policy.update.mock.calls).toEqual([[2, 3], [0, 1], [3, 4]]);
    });

    it('should lock a greedy policy onto the first arm it rewards', () => {
      const policy = new EpsilonGreedyPolicy([1, 2, 3, 4], 0);

      const rewards = runner.run(policy, 100);

      expect(rewards).toHaveLength(100);
      expect(rewards.every((reward) => reward === 1)).toBe(true);
      expect(policy.getActionCounts()).toEqual([100, 0, 0, 0]);
      expect(policy.getActionValues()).toEqual([1, 0, 0, 0]);
    });

    it('should settle an exploring policy on the best arm once it is found', () => {
      const policy = new EpsilonGreedyPolicy([1, 2, 3, 4], 0.2, { seed: 'settle-test' });

      const rewards = runner.run(policy, 2000);
      const counts = policy.getActionCounts();

      expect(rewards.every((reward) => [1, 2, 3, 4].includes(reward))).toBe(true);
      expect(counts[3]).toBeGreaterThan(0);
      expect(policy.getActionValues()[3]).toBe(4);
      expect(counts[3]).toBe(Math.max(...counts));
    });

    it('should feed Thompson sampling only the arm means as rewards', () => {
      const policy = new ThompsonSamplingPolicy([0, 1], { seed: 'thompson-run' });

      const rewards = runner.run(policy, 500);
      const counts = policy.getActionCounts();

      expect(rewards).toHaveLength(500);
      expect(policy.getAlpha()).toEqual([1, 1 + counts[1]]);
      expect(policy.getBeta()).toEqual([1 + counts[0], 1]);
      expect(rewards.reduce((sum, r) => sum + r, 0)).toBe(counts[1]);
    });

    it.each([0, -5, 2.5, Number.NaN])('should reject %p trials', (numTrials) => {
      const policy = new EpsilonGreedyPolicy([1, 2]);

      expect(() => runner.run(policy, numTrials)).toThrow(InvalidConfigurationError);
      expect(policy.getActionCounts()).toEqual([0, 0]);
    });
  });

  describe('runDetailed', () => {
    it('should return arms, counts and the final summary', () => {
      const policy = new EpsilonGreedyPolicy([1, 2, 3, 4], 0);

      const result = runner.runDetailed(policy, 10);

      expect(result.policy).toBe('EpsilonGreedy');
      expect(result.description).toBe('EpsilonGreedy Bandit with epsilon=0');
      expect(result.arms).toEqual(new Array(10).fill(0));
      expect(result.rewards).toEqual(new Array(10).fill(1));
      expect(result.actionCounts).toEqual([10, 0, 0, 0]);
      expect(result.summary).toEqual(policy.report());
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should log progress at the configured interval', () => {
      const debugSpy = jest.spyOn(console, 'debug').mockImplementation();
      jest.spyOn(console, 'info').mockImplementation();
      const logger = createLogger('RunnerTest');
      logger.setLevel(LogLevel.DEBUG);
      const verboseRunner = new ExperimentRunner({ progressInterval: 10, logger });

      verboseRunner.run(new EpsilonGreedyPolicy([1, 2], 0), 30);

      const progress = debugSpy.mock.calls
        .map(([line]) => String(line))
        .filter((line) => line.includes('Trial '));
      expect(progress).toHaveLength(3);
      expect(progress[0]).toContain('Trial 10/30');
      expect(progress[2]).toContain('Trial 30/30');
    });
  });

  describe('reward models', () => {
    it('should default to the true mean of the pulled arm', () => {
      expect(trueMeanRewardModel.observe(2, [5, 6, 7])).toBe(7);
    });

    it('should draw Bernoulli rewards against the clamped mean', () => {
      const model = bernoulliRewardModel(() => 0.3);

      expect(model.observe(0, [0.5, 0.2, 4, -1])).toBe(1);
      expect(model.observe(1, [0.5, 0.2, 4, -1])).toBe(0);
      expect(model.observe(2, [0.5, 0.2, 4, -1])).toBe(1);
      expect(model.observe(3, [0.5, 0.2, 4, -1])).toBe(0);
    });

    it('should use an injected reward model', () => {
      const stochastic = new ExperimentRunner({
        progressInterval: 0,
        rewardModel: bernoulliRewardModel(createRandomSource('bernoulli-run')),
      });
      const policy = new ThompsonSamplingPolicy([0.2, 0.8], { seed: 'bernoulli-policy' });

      const rewards = stochastic.run(policy, 300);

      expect(rewards.every((reward) => reward === 0 || reward === 1)).toBe(true);
      const alpha = policy.getAlpha();
      expect(alpha[0] + alpha[1] - 2).toBe(rewards.filter((r) => r === 1).length);
    });
  });
});
