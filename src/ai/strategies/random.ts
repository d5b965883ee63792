import { z } from 'zod';

import { legalMoves, validateBoard } from '../../core/board';
import { createRandom, pickRandom, RandomSource } from '../../core/random';
import { Board, Move, MOVES } from '../../core/types';
import {
  BaseStrategy,
  parseStrategyConfig,
  StrategyCategory,
  StrategyDefinition,
  StrategyMetadata,
  StrategyParameters,
} from '../strategy';

export const randomConfigSchema = z
  .object({
    seed: z.number().int().optional(),
  })
  .strict();

export interface RandomConfig {
  seed?: number;
}

/**
 * Uniform over the moves that change the board. Baseline for the leaderboard.
 */
export class RandomStrategy extends BaseStrategy {
  private readonly seed: number | undefined;
  private random: RandomSource;

  constructor(config: RandomConfig = {}, random?: RandomSource) {
    super();
    this.seed = parseStrategyConfig(randomConfigSchema, config, 'Random').seed;
    this.random = random ?? createRandom(this.seed);
  }

  protected describe(): StrategyMetadata {
    return {
      name: 'Random',
      version: '1.0',
      author: 'Engine maintainers',
      description: 'Picks a uniformly random legal move',
      category: StrategyCategory.RULE_BASED,
      parameters: { seed: this.seed ?? null },
      performanceBaseline: 0.5,
      trainingRequired: false,
    };
  }

  nextMove(board: Board): Move {
    const legal = legalMoves(validateBoard(board));
    const candidates = legal.length > 0 ? legal : MOVES;
    return pickRandom(candidates, this.random) ?? Move.Up;
  }

  reset(): void {
    if (this.seed !== undefined) {
      this.random = createRandom(this.seed);
    }
  }

  configuration(): StrategyParameters {
    return { seed: this.seed ?? null };
  }
}

export const randomDefinition: StrategyDefinition = {
  create: (config?: unknown) =>
    new RandomStrategy(parseStrategyConfig(randomConfigSchema, config, 'Random')),
};
