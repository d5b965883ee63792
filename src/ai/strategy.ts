/**
 * Strategy Layer
 *
 * Capability contract shared by every decision procedure: given a board,
 * produce a move. Rule-based, heuristic and learned strategies all implement
 * it, so the registry and the game runner treat them uniformly.
 */

import { z } from 'zod';

import { applyMove, validateBoard } from '../core/board';
import { ConfigValidationError, PersistenceResult, persistenceFailure } from '../core/errors';
import { Board, Move, MOVES, MoveScores } from '../core/types';
import { Logger } from '../util/log';
import { simpleScore } from './evaluator';

/**
 * Score given to a move that leaves the board unchanged.
 */
export const INVALID_MOVE_SCORE = -999;

/**
 * Strategy categories
 */
export enum StrategyCategory {
  RULE_BASED = 'rule_based',
  HEURISTIC = 'heuristic',
  REINFORCEMENT_LEARNING = 'reinforcement_learning',
  DEEP_LEARNING = 'deep_learning',
  MONTE_CARLO = 'monte_carlo',
  STUDENT_SUBMISSION = 'student_submission',
}

export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | readonly ParameterValue[]
  | { readonly [key: string]: ParameterValue };

export type StrategyParameters = Readonly<Record<string, ParameterValue>>;

export interface StrategyMetadata {
  readonly name: string;
  readonly version: string;
  readonly author: string;
  readonly description: string;
  readonly category: StrategyCategory;
  readonly parameters: StrategyParameters;
  /** Expected points per move, when known */
  readonly performanceBaseline?: number;
  readonly trainingRequired: boolean;
}

/**
 * Cumulative statistics of one strategy instance
 */
export interface PerformanceRecord {
  gamesPlayed: number;
  totalScore: number;
  totalMoves: number;
  highestTile: number;
  /** totalScore / totalMoves */
  averageEfficiency: number;
}

export interface GameResult {
  finalScore: number;
  movesCompleted: number;
  highestTile: number;
}

export function createEmptyPerformance(): PerformanceRecord {
  return {
    gamesPlayed: 0,
    totalScore: 0,
    totalMoves: 0,
    highestTile: 0,
    averageEfficiency: 0,
  };
}

export interface EpisodeStats {
  episode: number;
  totalReward: number;
  steps: number;
  score: number;
  highestTile: number;
  epsilon: number;
}

export interface TrainingOptions {
  episodes?: number;
  maxSteps?: number;
  seed?: number;
  /** Log progress every N episodes; 0 disables progress logging */
  progressInterval?: number;
  logger?: Logger;
  onEpisode?: (stats: EpisodeStats) => void;
}

export interface TrainingSummary {
  episodesTrained: number;
  totalEpisodes: number;
  averageReward: number;
  averageEpisodeLength: number;
  averageHighestTile: number;
  maxHighestTile: number;
  finalEpsilon: number;
  modelSize: number;
  converged: boolean;
}

export type TrainingOutcome =
  | { supported: true; summary: TrainingSummary }
  | { supported: false; reason: string };

export interface Strategy {
  metadata(): StrategyMetadata;

  /**
   * Always returns a move. When no direction changes the board the
   * best-ranked option is still returned; detecting game over is the
   * caller's job.
   */
  nextMove(board: Board): Move;

  moveScores(board: Board): MoveScores;

  train(data?: unknown, options?: TrainingOptions): TrainingOutcome;

  save(path: string): PersistenceResult;

  load(path: string): PersistenceResult;

  reset(): void;

  recordGame(result: GameResult): PerformanceRecord;

  performance(): PerformanceRecord;

  configuration(): StrategyParameters;
}

/**
 * Registry entry point. `create` receives untrusted configuration and
 * validates it, throwing ConfigValidationError on bad input.
 */
export interface StrategyDefinition {
  create(config?: unknown): Strategy;
}

export const moveSchema = z.nativeEnum(Move);

export const moveOrderSchema = z
  .array(moveSchema)
  .min(1)
  .refine((moves) => new Set(moves).size === moves.length, {
    message: 'Move order must not repeat a move',
  });

export function parseStrategyConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  strategyName: string,
): T {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigValidationError(
      `Invalid configuration for ${strategyName}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Picks the highest score. Ties go to whichever move comes first in
 * `tieOrder`.
 */
export function selectBestMove(scores: MoveScores, tieOrder: readonly Move[] = MOVES): Move {
  let best = tieOrder[0] ?? Move.Up;
  let bestScore = -Infinity;
  for (const move of tieOrder) {
    const score = scores[move];
    if (score > bestScore) {
      best = move;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Argmax restricted to `legal` when it is non-empty, so a legal move wins
 * even when its score falls below INVALID_MOVE_SCORE.
 */
export function selectBestLegalMove(
  scores: MoveScores,
  legal: readonly Move[],
  tieOrder: readonly Move[] = MOVES,
): Move {
  const candidates = tieOrder.filter((move) => legal.includes(move));
  return selectBestMove(scores, candidates.length > 0 ? candidates : tieOrder);
}

export function createMoveScores(scoreOf: (move: Move) => number): MoveScores {
  return {
    [Move.Up]: scoreOf(Move.Up),
    [Move.Down]: scoreOf(Move.Down),
    [Move.Left]: scoreOf(Move.Left),
    [Move.Right]: scoreOf(Move.Right),
  };
}

export abstract class BaseStrategy implements Strategy {
  private cachedMetadata: StrategyMetadata | null = null;
  private stats: PerformanceRecord = createEmptyPerformance();

  protected abstract describe(): StrategyMetadata;

  abstract nextMove(board: Board): Move;

  abstract configuration(): StrategyParameters;

  metadata(): StrategyMetadata {
    if (!this.cachedMetadata) {
      const described = this.describe();
      this.cachedMetadata = Object.freeze({
        ...described,
        parameters: Object.freeze({ ...described.parameters }),
      });
    }
    return this.cachedMetadata;
  }

  /**
   * Simulates each move and scores the result with the basic evaluator
   * (empty cells and max tile). Moves that change nothing get
   * INVALID_MOVE_SCORE.
   */
  moveScores(board: Board): MoveScores {
    const checked = validateBoard(board);
    return createMoveScores((move) => {
      const outcome = applyMove(checked, move);
      return outcome.moved ? simpleScore(outcome.board) : INVALID_MOVE_SCORE;
    });
  }

  train(_data?: unknown, _options?: TrainingOptions): TrainingOutcome {
    return {
      supported: false,
      reason: `${this.metadata().name} does not support training`,
    };
  }

  save(_path: string): PersistenceResult {
    return persistenceFailure(
      'unsupported',
      `${this.metadata().name} has no trained state to save`,
    );
  }

  load(_path: string): PersistenceResult {
    return persistenceFailure(
      'unsupported',
      `${this.metadata().name} has no trained state to load`,
    );
  }

  reset(): void {
    // Stateless by default.
  }

  recordGame(result: GameResult): PerformanceRecord {
    const stats = this.stats;
    stats.gamesPlayed += 1;
    stats.totalScore += result.finalScore;
    stats.totalMoves += result.movesCompleted;
    stats.highestTile = Math.max(stats.highestTile, result.highestTile);
    stats.averageEfficiency = stats.totalMoves > 0 ? stats.totalScore / stats.totalMoves : 0;
    return { ...stats };
  }

  performance(): PerformanceRecord {
    return { ...this.stats };
  }
}
