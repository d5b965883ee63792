import { z } from 'zod';

import { countEmptyCells, maxTile, validateBoard } from '../core/board';
import { ConfigValidationError } from '../core/errors';
import { Board } from '../core/types';
import { computeFeatures, FEATURE_NAMES, FeatureName, FeatureVector } from './features';

export type HeuristicWeights = Record<FeatureName, number>;

export const DEFAULT_WEIGHTS: Readonly<HeuristicWeights> = Object.freeze({
  empty_tiles: 150,
  merge_potential: 100,
  corner_bonus: 250,
  monotonicity: 75,
  max_tile_value: 15,
});

/**
 * Weights of the basic evaluator behind the default move scoring:
 * empty cells x 10 plus max tile x 0.1.
 */
export const SIMPLE_WEIGHTS = Object.freeze({
  emptyTiles: 10,
  maxTile: 0.1,
});

const finiteNumber = z.number().finite();

export const weightsSchema = z
  .object({
    empty_tiles: finiteNumber,
    merge_potential: finiteNumber,
    corner_bonus: finiteNumber,
    monotonicity: finiteNumber,
    max_tile_value: finiteNumber,
  })
  .strict();

export function parseWeights(input: unknown): HeuristicWeights {
  const result = weightsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      'Invalid heuristic weights',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Fills keys the caller left out from the defaults before validating.
 */
export function mergeWeights(partial: Partial<HeuristicWeights> = {}): HeuristicWeights {
  return parseWeights({ ...DEFAULT_WEIGHTS, ...partial });
}

export function evaluateFeatures(features: FeatureVector, weights: HeuristicWeights): number {
  let value = 0;
  for (const name of FEATURE_NAMES) {
    value += weights[name] * features.values[name];
  }
  return value;
}

/**
 * Weighted sum of the board's features. Throws BoardValidationError on a
 * malformed board instead of returning a sentinel.
 */
export function scoreBoard(board: Board, weights: HeuristicWeights = DEFAULT_WEIGHTS): number {
  return evaluateFeatures(computeFeatures(validateBoard(board)), weights);
}

export function simpleScore(board: Board): number {
  return countEmptyCells(board) * SIMPLE_WEIGHTS.emptyTiles + maxTile(board) * SIMPLE_WEIGHTS.maxTile;
}

export interface FeatureContribution {
  rawValue: number;
  weight: number;
  weightedScore: number;
}

export type FeatureBreakdown = Record<FeatureName, FeatureContribution>;

export interface EvaluatorConfig {
  weights: HeuristicWeights;
}

export class LinearEvaluator {
  protected weights: HeuristicWeights;

  constructor(config: EvaluatorConfig = { weights: DEFAULT_WEIGHTS }) {
    this.weights = parseWeights(config.weights);
  }

  evaluate(board: Board): number {
    return scoreBoard(board, this.weights);
  }

  evaluateFeatures(features: FeatureVector): number {
    return evaluateFeatures(features, this.weights);
  }

  breakdown(board: Board): FeatureBreakdown {
    const features = computeFeatures(validateBoard(board));
    const contribution = (name: FeatureName): FeatureContribution => {
      const rawValue = features.values[name];
      const weight = this.weights[name];
      return { rawValue, weight, weightedScore: rawValue * weight };
    };
    return {
      empty_tiles: contribution('empty_tiles'),
      merge_potential: contribution('merge_potential'),
      corner_bonus: contribution('corner_bonus'),
      monotonicity: contribution('monotonicity'),
      max_tile_value: contribution('max_tile_value'),
    };
  }

  getWeights(): HeuristicWeights {
    return { ...this.weights };
  }

  setWeights(weights: Partial<HeuristicWeights>): void {
    this.weights = parseWeights({ ...this.weights, ...weights });
  }

  serialize(): EvaluatorConfig {
    return { weights: { ...this.weights } };
  }
}
