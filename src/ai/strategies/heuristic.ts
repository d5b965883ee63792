import { z } from 'zod';

import { applyMove, countEmptyCells, legalMoves, validateBoard } from '../../core/board';
import { Board, Move, MOVES, MoveScores } from '../../core/types';
import {
  FeatureBreakdown,
  HeuristicWeights,
  LinearEvaluator,
  mergeWeights,
  weightsSchema,
} from '../evaluator';
import { computeFeatures } from '../features';
import {
  BaseStrategy,
  createMoveScores,
  INVALID_MOVE_SCORE,
  moveOrderSchema,
  parseStrategyConfig,
  selectBestLegalMove,
  StrategyCategory,
  StrategyDefinition,
  StrategyMetadata,
  StrategyParameters,
} from '../strategy';
import { DEFAULT_MOVE_PRIORITY } from './fixed_priority';

export const heuristicConfigSchema = z
  .object({
    weights: weightsSchema.partial().optional(),
    tiePriority: moveOrderSchema.optional(),
  })
  .strict();

export interface HeuristicConfig {
  weights?: Partial<HeuristicWeights>;
  tiePriority?: readonly Move[];
}

export interface MoveExplanation {
  move: Move;
  scores: MoveScores;
  /** Feature breakdown of the board the chosen move produces; null when it changes nothing */
  breakdown: FeatureBreakdown | null;
  emptyTilesAfter: number;
  reasoning: string;
}

/**
 * One-ply search: simulate every direction, score each result with the
 * weighted evaluator, play the best.
 */
export class HeuristicStrategy extends BaseStrategy {
  private readonly evaluator: LinearEvaluator;
  private readonly tiePriority: Move[];

  constructor(config: HeuristicConfig = {}) {
    super();
    const parsed = parseStrategyConfig(heuristicConfigSchema, config, 'Enhanced Heuristic');
    this.evaluator = new LinearEvaluator({ weights: mergeWeights(parsed.weights) });
    this.tiePriority = parsed.tiePriority ?? [...DEFAULT_MOVE_PRIORITY];
    // Any direction left out of the tie order still gets considered, last.
    for (const move of MOVES) {
      if (!this.tiePriority.includes(move)) {
        this.tiePriority.push(move);
      }
    }
  }

  protected describe(): StrategyMetadata {
    return {
      name: 'Enhanced Heuristic',
      version: '2.1',
      author: 'Engine maintainers',
      description:
        'Scores each move by empty tiles, merge potential, corner placement, monotonicity and max tile',
      category: StrategyCategory.HEURISTIC,
      parameters: { weights: { ...this.evaluator.getWeights() } },
      performanceBaseline: 2.36,
      trainingRequired: false,
    };
  }

  moveScores(board: Board): MoveScores {
    const checked = validateBoard(board);
    return createMoveScores((move) => {
      const outcome = applyMove(checked, move);
      if (!outcome.moved) {
        return INVALID_MOVE_SCORE;
      }
      return this.evaluator.evaluateFeatures(computeFeatures(outcome.board));
    });
  }

  nextMove(board: Board): Move {
    const checked = validateBoard(board);
    return selectBestLegalMove(this.moveScores(checked), legalMoves(checked), this.tiePriority);
  }

  explain(board: Board): MoveExplanation {
    const checked = validateBoard(board);
    const scores = this.moveScores(checked);
    const move = selectBestLegalMove(scores, legalMoves(checked), this.tiePriority);
    const outcome = applyMove(checked, move);
    if (!outcome.moved) {
      return {
        move,
        scores,
        breakdown: null,
        emptyTilesAfter: countEmptyCells(checked),
        reasoning: 'No direction changes the board',
      };
    }
    const breakdown = this.evaluator.breakdown(outcome.board);
    const strongest = Object.entries(breakdown).reduce((best, entry) =>
      entry[1].weightedScore > best[1].weightedScore ? entry : best,
    );
    return {
      move,
      scores,
      breakdown,
      emptyTilesAfter: countEmptyCells(outcome.board),
      reasoning: `${move} scores ${scores[move].toFixed(1)}; largest term is ${strongest[0]} (${strongest[1].weightedScore.toFixed(1)})`,
    };
  }

  configureWeights(partial: Partial<HeuristicWeights>): HeuristicWeights {
    const parsed = parseStrategyConfig(heuristicConfigSchema, { weights: partial }, 'Enhanced Heuristic');
    this.evaluator.setWeights(parsed.weights ?? {});
    return this.evaluator.getWeights();
  }

  getWeights(): HeuristicWeights {
    return this.evaluator.getWeights();
  }

  configuration(): StrategyParameters {
    return {
      weights: { ...this.evaluator.getWeights() },
      tiePriority: [...this.tiePriority],
    };
  }
}

export const heuristicDefinition: StrategyDefinition = {
  create: (config?: unknown) =>
    new HeuristicStrategy(parseStrategyConfig(heuristicConfigSchema, config, 'Enhanced Heuristic')),
};
