import { z } from 'zod';

import { applyMove, validateBoard } from '../../core/board';
import { Board, Move, MoveScores } from '../../core/types';
import {
  BaseStrategy,
  createMoveScores,
  INVALID_MOVE_SCORE,
  moveOrderSchema,
  parseStrategyConfig,
  StrategyCategory,
  StrategyDefinition,
  StrategyMetadata,
  StrategyParameters,
} from '../strategy';

export const DEFAULT_MOVE_PRIORITY: readonly Move[] = [Move.Up, Move.Left, Move.Down, Move.Right];

/** Score of the highest-priority legal move; each later slot loses 10. */
const PRIORITY_SCORE_BASE = 100;
const PRIORITY_SCORE_STEP = 10;

export const fixedPriorityConfigSchema = z
  .object({
    movePriority: moveOrderSchema.optional(),
  })
  .strict();

export interface FixedPriorityConfig {
  movePriority?: readonly Move[];
}

/**
 * Tries directions in a fixed order and plays the first one that changes the
 * board. No look-ahead.
 */
export class FixedPriorityStrategy extends BaseStrategy {
  private readonly initialPriority: readonly Move[];
  private priority: Move[];

  constructor(config: FixedPriorityConfig = {}) {
    super();
    this.priority = parseStrategyConfig(fixedPriorityConfigSchema, config, 'Basic Priority')
      .movePriority ?? [...DEFAULT_MOVE_PRIORITY];
    this.initialPriority = [...this.priority];
  }

  protected describe(): StrategyMetadata {
    return {
      name: 'Basic Priority',
      version: '1.0',
      author: 'Engine maintainers',
      description: 'Plays the first direction in a fixed priority order that changes the board',
      category: StrategyCategory.RULE_BASED,
      parameters: { movePriority: [...this.initialPriority] },
      performanceBaseline: 1.8,
      trainingRequired: false,
    };
  }

  nextMove(board: Board): Move {
    const checked = validateBoard(board);
    for (const move of this.priority) {
      if (applyMove(checked, move).moved) {
        return move;
      }
    }
    return this.priority[0] ?? Move.Up;
  }

  moveScores(board: Board): MoveScores {
    const checked = validateBoard(board);
    return createMoveScores((move) => {
      const index = this.priority.indexOf(move);
      if (index < 0 || !applyMove(checked, move).moved) {
        return INVALID_MOVE_SCORE;
      }
      return PRIORITY_SCORE_BASE - PRIORITY_SCORE_STEP * index;
    });
  }

  /**
   * Replaces the move order. Throws ConfigValidationError on an empty order,
   * an unknown direction or a repeated one.
   */
  setPriority(order: readonly unknown[]): void {
    const parsed = parseStrategyConfig(
      fixedPriorityConfigSchema,
      { movePriority: order },
      'Basic Priority',
    );
    this.priority = parsed.movePriority ?? [...DEFAULT_MOVE_PRIORITY];
  }

  get movePriority(): readonly Move[] {
    return [...this.priority];
  }

  configuration(): StrategyParameters {
    return { movePriority: [...this.priority] };
  }
}

export const fixedPriorityDefinition: StrategyDefinition = {
  create: (config?: unknown) =>
    new FixedPriorityStrategy(parseStrategyConfig(fixedPriorityConfigSchema, config, 'Basic Priority')),
};
