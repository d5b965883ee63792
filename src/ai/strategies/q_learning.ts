import { z } from 'zod';

import { serializeBoard, validateBoard } from '../../core/board';
import { ConfigValidationError, PersistenceResult } from '../../core/errors';
import { createRandom, pickRandom, RandomSource } from '../../core/random';
import { Board, Move, MOVES, MoveScores } from '../../core/types';
import { DEFAULT_Q_LEARNING, QLearningSettings } from '../../config/settings';
import { GameEnvironment } from '../../training/environment';
import { readJsonFile, writeJsonFile } from '../../training/persistence';
import { QTable } from '../../training/q_table';
import { RewardFunction, shapedReward } from '../../training/reward';
import { Logger, silentLogger } from '../../util/log';
import {
  BaseStrategy,
  createMoveScores,
  parseStrategyConfig,
  StrategyCategory,
  StrategyDefinition,
  StrategyMetadata,
  StrategyParameters,
  TrainingOptions,
  TrainingOutcome,
} from '../strategy';

export const MODEL_FORMAT = 'q-learning/1';

/** Episode rewards kept for `trainingProgress().recentRewards`. */
const RECENT_REWARD_WINDOW = 100;

const DEFAULT_TRAINING_EPISODES = 1000;
const DEFAULT_PROGRESS_INTERVAL = 100;

const probability = z.number().min(0).max(1);

const qLearningShape = {
  learningRate: z.number().gt(0).max(1),
  discountFactor: probability,
  epsilon: probability,
  epsilonDecay: z.number().gt(0).max(1),
  minEpsilon: probability,
  maxSteps: z.number().int().positive(),
};

export const qLearningConfigSchema = z
  .object(qLearningShape)
  .partial()
  .strict();

const actionValuesSchema = z.array(z.number().finite()).length(MOVES.length);

export const qLearningModelSchema = z.object({
  format: z.literal(MODEL_FORMAT),
  qTable: z.record(actionValuesSchema),
  config: z.object(qLearningShape).refine((config) => config.minEpsilon <= config.epsilon, {
    message: 'minEpsilon must not exceed epsilon',
    path: ['minEpsilon'],
  }),
  trainingEpisodes: z.number().int().min(0),
  isTrained: z.boolean(),
  epsilon: probability,
  recentRewards: z.array(z.number().finite()).default([]),
});

export type QLearningModel = z.infer<typeof qLearningModelSchema>;

export type QLearningConfig = QLearningSettings;

export interface QLearningOptions {
  random?: RandomSource;
  reward?: RewardFunction;
  logger?: Logger;
}

export interface TrainingProgress {
  trainingEpisodes: number;
  isTrained: boolean;
  epsilon: number;
  qTableSize: number;
  recentRewards: number[];
}

function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Tabular epsilon-greedy Q-learning. The state key is the exact board
 * serialization, so the table only generalizes to boards it has seen.
 */
export class QLearningStrategy extends BaseStrategy {
  private config: QLearningConfig;
  private qTable = new QTable();
  private epsilon: number;
  private trainingEpisodes = 0;
  private recentRewards: number[] = [];
  private trained = false;
  private readonly random: RandomSource;
  private readonly reward: RewardFunction;
  private readonly logger: Logger;

  constructor(config: Partial<QLearningConfig> = {}, options: QLearningOptions = {}) {
    super();
    const parsed = parseStrategyConfig(qLearningConfigSchema, config, 'Q-Learning');
    this.config = { ...DEFAULT_Q_LEARNING, ...parsed };
    if (this.config.minEpsilon > this.config.epsilon) {
      throw new ConfigValidationError('Invalid configuration for Q-Learning', [
        `minEpsilon (${this.config.minEpsilon}) must not exceed epsilon (${this.config.epsilon})`,
      ]);
    }
    this.epsilon = this.config.epsilon;
    this.random = options.random ?? createRandom();
    this.reward = options.reward ?? shapedReward;
    this.logger = options.logger ?? silentLogger;
  }

  protected describe(): StrategyMetadata {
    return {
      name: 'Q-Learning',
      version: '1.0',
      author: 'Engine maintainers',
      description: 'Tabular Q-learning over exact board states',
      category: StrategyCategory.REINFORCEMENT_LEARNING,
      parameters: { ...this.config },
      trainingRequired: true,
    };
  }

  /**
   * Argmax of the learned values for this exact board. An unseen board has
   * all-zero values, so the first move in canonical order wins.
   */
  nextMove(board: Board): Move {
    return this.qTable.bestMove(serializeBoard(validateBoard(board)));
  }

  moveScores(board: Board): MoveScores {
    const key = serializeBoard(validateBoard(board));
    return createMoveScores((move) => this.qTable.value(key, move));
  }

  train(_data?: unknown, options: TrainingOptions = {}): TrainingOutcome {
    const episodes = options.episodes ?? DEFAULT_TRAINING_EPISODES;
    const maxSteps = options.maxSteps ?? this.config.maxSteps;
    const progressInterval = options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL;
    const logger = options.logger ?? this.logger;
    const random = options.seed !== undefined ? createRandom(options.seed) : this.random;
    const environment = new GameEnvironment({ random, reward: this.reward });
    const { learningRate, discountFactor, minEpsilon, epsilonDecay } = this.config;

    const episodeRewards: number[] = [];
    const episodeLengths: number[] = [];
    const highestTiles: number[] = [];
    let maxHighestTile = 0;

    logger.info('training started', { episodes, maxSteps, epsilon: this.epsilon });

    for (let episode = 0; episode < episodes; episode += 1) {
      environment.reset();
      let totalReward = 0;
      let steps = 0;

      while (!environment.done && steps < maxSteps) {
        const stateKey = serializeBoard(environment.board);
        const action =
          random() < this.epsilon
            ? pickRandom(environment.validActions(), random) ?? Move.Up
            : this.qTable.bestMove(stateKey);

        const result = environment.step(action);
        const nextKey = serializeBoard(result.info.board);
        const nextMax = result.done ? 0 : this.qTable.maxValue(nextKey);
        const current = this.qTable.value(stateKey, action);
        this.qTable.set(
          stateKey,
          action,
          current + learningRate * (result.reward + discountFactor * nextMax - current),
        );

        totalReward += result.reward;
        steps += 1;
      }

      const highestTile = environment.state().highestTile;
      episodeRewards.push(totalReward);
      episodeLengths.push(steps);
      highestTiles.push(highestTile);
      maxHighestTile = Math.max(maxHighestTile, highestTile);

      this.epsilon = Math.max(minEpsilon, this.epsilon * epsilonDecay);

      options.onEpisode?.({
        episode,
        totalReward,
        steps,
        score: environment.score,
        highestTile,
        epsilon: this.epsilon,
      });

      if (progressInterval > 0 && episode % progressInterval === 0) {
        logger.info('training progress', {
          episode,
          averageReward: mean(episodeRewards.slice(-progressInterval)),
          averageHighestTile: mean(highestTiles.slice(-progressInterval)),
          epsilon: this.epsilon,
        });
      }
    }

    this.trainingEpisodes += episodes;
    this.recentRewards = [...this.recentRewards, ...episodeRewards.slice(-RECENT_REWARD_WINDOW)].slice(
      -RECENT_REWARD_WINDOW,
    );
    this.trained = true;

    const summary = {
      episodesTrained: episodes,
      totalEpisodes: this.trainingEpisodes,
      averageReward: mean(episodeRewards),
      averageEpisodeLength: mean(episodeLengths),
      averageHighestTile: mean(highestTiles),
      maxHighestTile,
      finalEpsilon: this.epsilon,
      modelSize: this.qTable.size,
      converged: this.epsilon <= minEpsilon,
    };
    logger.info('training completed', { ...summary });
    return { supported: true, summary };
  }

  save(path: string): PersistenceResult {
    const model: QLearningModel = {
      format: MODEL_FORMAT,
      qTable: this.qTable.toJSON(),
      config: { ...this.config },
      trainingEpisodes: this.trainingEpisodes,
      isTrained: this.trained,
      epsilon: this.epsilon,
      recentRewards: [...this.recentRewards],
    };
    const result = writeJsonFile(path, model);
    if (result.ok) {
      this.logger.info('model saved', { path: result.path, states: this.qTable.size });
    } else {
      this.logger.error('model save failed', { path, message: result.message });
    }
    return result;
  }

  /**
   * Replaces the table, configuration and progress with the file's. On any
   * failure the current state is left untouched.
   */
  load(path: string): PersistenceResult {
    const result = readJsonFile(path, qLearningModelSchema);
    if (!result.ok) {
      this.logger.warn('model load failed', { path, reason: result.reason, message: result.message });
      return { ok: false, reason: result.reason, message: result.message };
    }
    const model = result.data;
    this.qTable = QTable.fromJSON(model.qTable);
    this.config = { ...model.config };
    this.trainingEpisodes = model.trainingEpisodes;
    this.trained = model.isTrained;
    this.epsilon = model.epsilon;
    this.recentRewards = model.recentRewards.slice(-RECENT_REWARD_WINDOW);
    this.logger.info('model loaded', {
      path: result.path,
      states: this.qTable.size,
      trainingEpisodes: this.trainingEpisodes,
    });
    return { ok: true, path: result.path };
  }

  reset(): void {
    this.qTable = new QTable();
    this.epsilon = this.config.epsilon;
    this.trainingEpisodes = 0;
    this.recentRewards = [];
    this.trained = false;
  }

  trainingProgress(): TrainingProgress {
    return {
      trainingEpisodes: this.trainingEpisodes,
      isTrained: this.trained,
      epsilon: this.epsilon,
      qTableSize: this.qTable.size,
      recentRewards: [...this.recentRewards],
    };
  }

  /** Values for a state key; zeros for states never updated. */
  actionValues(board: Board): number[] {
    return this.qTable.values(serializeBoard(validateBoard(board)));
  }

  get tableSize(): number {
    return this.qTable.size;
  }

  get currentEpsilon(): number {
    return this.epsilon;
  }

  configuration(): StrategyParameters {
    return { ...this.config };
  }
}

export const qLearningDefinition: StrategyDefinition = {
  create: (config?: unknown) =>
    new QLearningStrategy(parseStrategyConfig(qLearningConfigSchema, config, 'Q-Learning')),
};
