/**
 * Strategy Performance Ranking
 *
 * Turns per-strategy performance histories into comparable metrics and a
 * composite leaderboard score. Pure functions; the registry owns the
 * histories.
 */

import { PerformanceRecord } from './strategy';

/**
 * One entry of a strategy's history. Each snapshot covers games that no
 * other snapshot counts, so games played add up across a history.
 */
export interface PerformanceSnapshot {
  /** Milliseconds since the epoch */
  timestamp: number;
  statistics: PerformanceRecord;
}

export interface RankingWeights {
  efficiency: number;
  consistency: number;
  highestTile: number;
  improvement: number;
}

export const RANKING_WEIGHTS: Readonly<RankingWeights> = Object.freeze({
  efficiency: 0.4,
  consistency: 0.3,
  highestTile: 0.2,
  improvement: 0.1,
});

/**
 * Floor for the mean in the consistency ratio so a near-zero efficiency
 * does not blow the coefficient of variation up.
 */
const CONSISTENCY_MEAN_FLOOR = 0.1;

/** Snapshots looked at for the stability index. */
const STABILITY_WINDOW = 5;

export interface StrategyMetrics {
  strategyId: string;
  /** Snapshots in the history */
  samples: number;
  gamesPlayed: number;
  averageEfficiency: number;
  averageScore: number;
  highestTile: number;
  /** 1 - coefficient of variation of efficiency, clamped to [0, 1] */
  consistency: number;
  /** Least-squares slope of efficiency over the history index */
  improvementRate: number;
  /** Consistency of the last few snapshots */
  stabilityIndex: number;
}

export interface NormalizedMetrics {
  efficiency: number;
  consistency: number;
  highestTile: number;
  improvement: number;
}

export interface RankedStrategy extends StrategyMetrics {
  normalized: NormalizedMetrics;
  compositeScore: number;
  /** 1-based */
  rank: number;
  /** Share of the ranked set at or below this entry, 0-100 */
  percentile: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Population standard deviation.
 */
export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const average = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - average) ** 2)));
}

/**
 * Slope of the least-squares line through (index, value). Zero with fewer
 * than two points.
 */
export function linearSlope(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) {
    return 0;
  }
  const meanX = (n - 1) / 2;
  const meanY = mean(values);
  let numerator = 0;
  let denominator = 0;
  values.forEach((value, index) => {
    numerator += (index - meanX) * (value - meanY);
    denominator += (index - meanX) ** 2;
  });
  return denominator === 0 ? 0 : numerator / denominator;
}

function clampUnit(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function consistencyScore(efficiencies: readonly number[]): number {
  if (efficiencies.length === 0) {
    return 0;
  }
  const ratio = standardDeviation(efficiencies) / Math.max(mean(efficiencies), CONSISTENCY_MEAN_FLOOR);
  return clampUnit(1 - ratio);
}

export function computeMetrics(
  strategyId: string,
  history: readonly PerformanceSnapshot[],
): StrategyMetrics | null {
  if (history.length === 0) {
    return null;
  }
  const efficiencies = history.map((entry) => entry.statistics.averageEfficiency);
  const scores = history.map(
    (entry) => entry.statistics.totalScore / Math.max(entry.statistics.gamesPlayed, 1),
  );
  const consistency = consistencyScore(efficiencies);
  return {
    strategyId,
    samples: history.length,
    gamesPlayed: history.reduce((sum, entry) => sum + entry.statistics.gamesPlayed, 0),
    averageEfficiency: mean(efficiencies),
    averageScore: mean(scores),
    highestTile: Math.max(...history.map((entry) => entry.statistics.highestTile)),
    consistency,
    improvementRate: linearSlope(efficiencies),
    stabilityIndex:
      efficiencies.length >= STABILITY_WINDOW
        ? consistencyScore(efficiencies.slice(-STABILITY_WINDOW))
        : consistency,
  };
}

/**
 * Min-max scaling to [0, 1]. When every value is equal they all map to
 * `flatValue`.
 */
export function normalize(values: readonly number[], flatValue = 1): number[] {
  if (values.length === 0) {
    return [];
  }
  const min = Math.min(...values);
  const max = Math.max(...values);
  if (max === min) {
    return values.map(() => flatValue);
  }
  return values.map((value) => (value - min) / (max - min));
}

function tileScale(tile: number): number {
  return Math.log2(Math.max(tile, 1));
}

/**
 * Orders strategies by composite score, highest first. The sort is stable,
 * so equal composites keep the input order (registration order when the
 * registry calls this).
 */
export function rankStrategies(
  metrics: readonly StrategyMetrics[],
  weights: RankingWeights = RANKING_WEIGHTS,
): RankedStrategy[] {
  const efficiency = normalize(metrics.map((item) => item.averageEfficiency));
  const consistency = normalize(metrics.map((item) => item.consistency));
  const highestTile = normalize(metrics.map((item) => tileScale(item.highestTile)));
  // Slopes can be negative; a flat set sits in the middle.
  const improvement = normalize(
    metrics.map((item) => item.improvementRate),
    0.5,
  );

  const scored = metrics.map((item, index) => {
    const normalized: NormalizedMetrics = {
      efficiency: efficiency[index] ?? 0,
      consistency: consistency[index] ?? 0,
      highestTile: highestTile[index] ?? 0,
      improvement: improvement[index] ?? 0,
    };
    const compositeScore =
      normalized.efficiency * weights.efficiency +
      normalized.consistency * weights.consistency +
      normalized.highestTile * weights.highestTile +
      normalized.improvement * weights.improvement;
    return { ...item, normalized, compositeScore };
  });

  const total = scored.length;
  return [...scored]
    .sort((a, b) => b.compositeScore - a.compositeScore)
    .map((item, index) => ({
      ...item,
      rank: index + 1,
      percentile: ((total - index) / total) * 100,
    }));
}
