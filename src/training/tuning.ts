import { ConfigValidationError } from '../core/errors';
import { HeuristicWeights } from '../ai/evaluator';
import { HeuristicStrategy } from '../ai/strategies/heuristic';
import { Logger, silentLogger } from '../util/log';
import { benchmarkStrategy } from './engine';

export interface NamedWeights {
  name: string;
  /** Missing features keep their default weight */
  weights: Partial<HeuristicWeights>;
}

/**
 * Starting points for a comparison run. `baseline` is the reference the
 * others are measured against.
 */
export const WEIGHT_PRESETS: readonly NamedWeights[] = [
  {
    name: 'baseline',
    weights: {
      empty_tiles: 100,
      merge_potential: 50,
      corner_bonus: 200,
      monotonicity: 30,
      max_tile_value: 10,
    },
  },
  {
    name: 'empty_focus',
    weights: {
      empty_tiles: 200,
      merge_potential: 75,
      corner_bonus: 150,
      monotonicity: 50,
      max_tile_value: 10,
    },
  },
  {
    name: 'corner_aggressive',
    weights: {
      empty_tiles: 80,
      merge_potential: 40,
      corner_bonus: 400,
      monotonicity: 60,
      max_tile_value: 15,
    },
  },
  {
    name: 'merge_focused',
    weights: {
      empty_tiles: 120,
      merge_potential: 150,
      corner_bonus: 100,
      monotonicity: 40,
      max_tile_value: 20,
    },
  },
  {
    name: 'balanced_optimized',
    weights: {
      empty_tiles: 150,
      merge_potential: 100,
      corner_bonus: 250,
      monotonicity: 75,
      max_tile_value: 15,
    },
  },
];

const DEFAULT_TUNING_SEED = 1;

export interface TuningOptions {
  /** Every weight set plays the same games: game i is seeded with seed + i */
  seed?: number;
  maxMoves?: number;
  /** Name of the reference set; defaults to the first one */
  baseline?: string;
  logger?: Logger;
}

export interface WeightSetResult {
  rank: number;
  name: string;
  weights: HeuristicWeights;
  games: number;
  averageScore: number;
  averageMoves: number;
  averageEfficiency: number;
  highestTile: number;
  /** Efficiency change against the baseline in percent; null when the baseline scored nothing */
  improvementPercent: number | null;
}

/**
 * Benchmarks the heuristic strategy once per weight set on identical seeded
 * games and orders the sets by efficiency. Equal efficiencies keep the input
 * order.
 */
export function compareWeightSets(
  configs: readonly NamedWeights[],
  games: number,
  options: TuningOptions = {},
): WeightSetResult[] {
  if (!Number.isInteger(games) || games < 1) {
    throw new ConfigValidationError('Invalid weight comparison', [
      `games must be a positive integer, got ${games}`,
    ]);
  }
  const names = configs.map((config) => config.name);
  const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
  if (duplicates.length > 0) {
    throw new ConfigValidationError('Invalid weight comparison', [
      `duplicate weight set names: ${[...new Set(duplicates)].join(', ')}`,
    ]);
  }
  const baselineName = options.baseline ?? names[0];
  if (baselineName !== undefined && !names.includes(baselineName)) {
    throw new ConfigValidationError('Invalid weight comparison', [
      `baseline ${baselineName} is not among the weight sets`,
    ]);
  }

  const logger = options.logger ?? silentLogger;
  const seed = options.seed ?? DEFAULT_TUNING_SEED;

  const measured = configs.map((config) => {
    const strategy = new HeuristicStrategy({ weights: config.weights });
    const result = benchmarkStrategy(strategy, games, { seed, maxMoves: options.maxMoves });
    logger.info('weight set measured', {
      name: config.name,
      averageScore: result.averageScore,
      averageEfficiency: result.averageEfficiency,
      highestTile: result.highestTile,
    });
    return {
      name: config.name,
      weights: strategy.getWeights(),
      games: result.games.length,
      averageScore: result.averageScore,
      averageMoves: result.averageMoves,
      averageEfficiency: result.averageEfficiency,
      highestTile: result.highestTile,
    };
  });

  const baselineEfficiency = measured.find((item) => item.name === baselineName)?.averageEfficiency ?? 0;

  return [...measured]
    .sort((a, b) => b.averageEfficiency - a.averageEfficiency)
    .map((item, index) => ({
      rank: index + 1,
      ...item,
      improvementPercent:
        baselineEfficiency > 0
          ? ((item.averageEfficiency - baselineEfficiency) / baselineEfficiency) * 100
          : null,
    }));
}
