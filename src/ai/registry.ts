/**
 * Strategy Registry
 *
 * Explicitly constructed catalogue of strategy definitions plus a bounded
 * performance history per strategy. Hosts create one and pass it around;
 * there is no module-level instance.
 *
 * Single writer: mutations are synchronous and hold no locks. A mutation
 * that starts while another is running (for example from inside a strategy
 * constructor invoked by `register`) throws ConcurrentMutationError.
 */

import { z } from 'zod';

import { ConcurrentMutationError, describeError, PersistenceResult } from '../core/errors';
import { readJsonFile, writeJsonFile } from '../training/persistence';
import { Logger, silentLogger } from '../util/log';
import {
  GameResult,
  PerformanceRecord,
  Strategy,
  StrategyCategory,
  StrategyDefinition,
  StrategyMetadata,
} from './strategy';
import {
  computeMetrics,
  PerformanceSnapshot,
  RANKING_WEIGHTS,
  RankedStrategy,
  rankStrategies,
  RankingWeights,
  StrategyMetrics,
} from './strategy_performance';

export const HISTORY_LIMIT = 100;

/** Snapshots shown by `info()`. */
const RECENT_PERFORMANCE_COUNT = 10;

export const PERFORMANCE_FORMAT = 'performance/1';

export interface RegistryOptions {
  logger?: Logger;
  historyLimit?: number;
  now?: () => number;
}

export interface RegisterOptions {
  /** Replace an existing definition with the same id */
  override?: boolean;
}

export type RegisterResult =
  | { ok: true; id: string; replaced: boolean }
  | { ok: false; id: string; reason: 'duplicate' | 'construction_failed'; message: string };

export type CreateResult =
  | { ok: true; id: string; strategy: Strategy }
  | { ok: false; id: string; reason: 'not_found' | 'construction_failed'; message: string };

export interface StrategySummary {
  id: string;
  name: string;
  version: string;
  author: string;
  description: string;
  category: StrategyCategory;
  trainingRequired: boolean;
  performanceBaseline: number | null;
}

export interface StrategyInfo {
  id: string;
  metadata: StrategyMetadata;
  historySize: number;
  recentPerformance: PerformanceSnapshot[];
}

export interface ComparisonReport {
  strategies: StrategyMetrics[];
  rankings: {
    byEfficiency: string[];
    byHighestTile: string[];
    byConsistency: string[];
  };
}

/** Field names are part of the export format. */
export interface LeaderboardEntry {
  algorithm_id: string;
  algorithm_name: string;
  category: string;
  games_played: number;
  average_efficiency: number;
  highest_tile: number;
  consistency_score: number;
  improvement_rate: number;
  rank: number;
  composite_score: number;
  percentile: number;
}

export interface PerformanceReport {
  generatedAt: string;
  rankingWeights: RankingWeights;
  leaderboard: LeaderboardEntry[];
  history: Record<string, PerformanceSnapshot[]>;
}

interface RegisteredStrategy {
  id: string;
  definition: StrategyDefinition;
  metadata: StrategyMetadata;
  order: number;
}

const performanceRecordSchema = z.object({
  gamesPlayed: z.number().int().min(0),
  totalScore: z.number().min(0),
  totalMoves: z.number().int().min(0),
  highestTile: z.number().int().min(0),
  averageEfficiency: z.number().finite().min(0),
});

const performanceFileSchema = z.object({
  format: z.literal(PERFORMANCE_FORMAT),
  histories: z.record(
    z.array(
      z.object({
        timestamp: z.number(),
        statistics: performanceRecordSchema,
      }),
    ),
  ),
});

export function strategyId(metadata: Pick<StrategyMetadata, 'name' | 'version'>): string {
  return `${metadata.name}_${metadata.version}`;
}

/**
 * A single finished game expressed as a performance record.
 */
export function gameRecord(result: GameResult): PerformanceRecord {
  return {
    gamesPlayed: 1,
    totalScore: result.finalScore,
    totalMoves: result.movesCompleted,
    highestTile: result.highestTile,
    averageEfficiency: result.movesCompleted > 0 ? result.finalScore / result.movesCompleted : 0,
  };
}

function byDescending(
  metrics: readonly StrategyMetrics[],
  value: (item: StrategyMetrics) => number,
): string[] {
  return [...metrics].sort((a, b) => value(b) - value(a)).map((item) => item.strategyId);
}

export class StrategyRegistry {
  private readonly entries = new Map<string, RegisteredStrategy>();
  private readonly histories = new Map<string, PerformanceSnapshot[]>();
  private readonly logger: Logger;
  private readonly historyLimit: number;
  private readonly now: () => number;
  private nextOrder = 0;
  private mutationDepth = 0;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.historyLimit = options.historyLimit ?? HISTORY_LIMIT;
    this.now = options.now ?? Date.now;
  }

  /**
   * Registers a definition under `name_version` of the metadata its default
   * instance reports.
   */
  register(definition: StrategyDefinition, options: RegisterOptions = {}): RegisterResult {
    return this.mutate<RegisterResult>('register', () => {
      let metadata: StrategyMetadata;
      try {
        metadata = definition.create().metadata();
      } catch (error) {
        if (error instanceof ConcurrentMutationError) {
          throw error;
        }
        return {
          ok: false,
          id: '',
          reason: 'construction_failed',
          message: `Could not instantiate strategy for registration: ${describeError(error)}`,
        };
      }
      const id = strategyId(metadata);
      const existing = this.entries.get(id);
      if (existing && !options.override) {
        return {
          ok: false,
          id,
          reason: 'duplicate',
          message: `Strategy ${id} is already registered`,
        };
      }
      this.entries.set(id, {
        id,
        definition,
        metadata,
        order: existing ? existing.order : this.nextOrder++,
      });
      this.logger.info('strategy registered', { id, replaced: existing !== undefined });
      return { ok: true, id, replaced: existing !== undefined };
    });
  }

  unregister(id: string): boolean {
    return this.mutate('unregister', () => this.entries.delete(id));
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  ids(): string[] {
    return this.registered().map((entry) => entry.id);
  }

  /**
   * Builds a fresh instance. Configuration is validated by the definition;
   * a rejected configuration comes back as `construction_failed`.
   */
  create(id: string, config?: unknown): CreateResult {
    const entry = this.entries.get(id);
    if (!entry) {
      return { ok: false, id, reason: 'not_found', message: `Strategy ${id} is not registered` };
    }
    try {
      return { ok: true, id, strategy: entry.definition.create(config) };
    } catch (error) {
      if (error instanceof ConcurrentMutationError) {
        throw error;
      }
      this.logger.warn('strategy construction failed', { id, error });
      return { ok: false, id, reason: 'construction_failed', message: describeError(error) };
    }
  }

  list(category?: StrategyCategory): StrategySummary[] {
    return this.registered()
      .filter((entry) => category === undefined || entry.metadata.category === category)
      .map(({ id, metadata }) => ({
        id,
        name: metadata.name,
        version: metadata.version,
        author: metadata.author,
        description: metadata.description,
        category: metadata.category,
        trainingRequired: metadata.trainingRequired,
        performanceBaseline: metadata.performanceBaseline ?? null,
      }));
  }

  info(id: string): StrategyInfo | null {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    const history = this.history(id);
    return {
      id,
      metadata: entry.metadata,
      historySize: history.length,
      recentPerformance: history.slice(-RECENT_PERFORMANCE_COUNT),
    };
  }

  /**
   * Appends a snapshot and drops the oldest beyond the history limit.
   * Histories may exist for ids that are not registered (loaded from disk).
   */
  recordPerformance(id: string, statistics: PerformanceRecord, timestamp = this.now()): number {
    return this.mutate('recordPerformance', () => {
      const history = this.histories.get(id) ?? [];
      history.push({ timestamp, statistics: { ...statistics } });
      if (history.length > this.historyLimit) {
        history.splice(0, history.length - this.historyLimit);
      }
      this.histories.set(id, history);
      return history.length;
    });
  }

  /**
   * Updates the instance's cumulative record and appends the single game to
   * the registry history.
   */
  recordGame(id: string, strategy: Strategy, result: GameResult): PerformanceRecord {
    const cumulative = strategy.recordGame(result);
    this.recordPerformance(id, gameRecord(result));
    return cumulative;
  }

  history(id: string): PerformanceSnapshot[] {
    return (this.histories.get(id) ?? []).map((entry) => ({
      timestamp: entry.timestamp,
      statistics: { ...entry.statistics },
    }));
  }

  clearHistory(id?: string): void {
    this.mutate('clearHistory', () => {
      if (id === undefined) {
        this.histories.clear();
      } else {
        this.histories.delete(id);
      }
    });
  }

  metrics(ids?: readonly string[]): StrategyMetrics[] {
    const result: StrategyMetrics[] = [];
    for (const id of ids ?? this.rankableIds()) {
      const metrics = computeMetrics(id, this.histories.get(id) ?? []);
      if (metrics) {
        result.push(metrics);
      }
    }
    return result;
  }

  /**
   * Composite ranking of every strategy with history (or the given ids).
   * Ties keep registration order; unregistered ids follow registered ones.
   */
  rank(ids?: readonly string[], weights: RankingWeights = RANKING_WEIGHTS): RankedStrategy[] {
    const selected = ids ? this.sortByRegistration(ids) : this.rankableIds();
    return rankStrategies(this.metrics(selected), weights);
  }

  compare(ids: readonly string[]): ComparisonReport {
    const strategies = this.metrics(this.sortByRegistration(ids));
    return {
      strategies,
      rankings: {
        byEfficiency: byDescending(strategies, (item) => item.averageEfficiency),
        byHighestTile: byDescending(strategies, (item) => item.highestTile),
        byConsistency: byDescending(strategies, (item) => item.consistency),
      },
    };
  }

  exportReport(weights: RankingWeights = RANKING_WEIGHTS): PerformanceReport {
    const leaderboard = this.rank(undefined, weights).map((item) => {
      const metadata = this.entries.get(item.strategyId)?.metadata;
      return {
        algorithm_id: item.strategyId,
        algorithm_name: metadata?.name ?? item.strategyId,
        category: metadata?.category ?? 'unknown',
        games_played: item.gamesPlayed,
        average_efficiency: item.averageEfficiency,
        highest_tile: item.highestTile,
        consistency_score: item.consistency,
        improvement_rate: item.improvementRate,
        rank: item.rank,
        composite_score: item.compositeScore,
        percentile: item.percentile,
      };
    });
    const history: Record<string, PerformanceSnapshot[]> = {};
    for (const id of this.rankableIds()) {
      history[id] = this.history(id);
    }
    return {
      generatedAt: new Date(this.now()).toISOString(),
      rankingWeights: { ...weights },
      leaderboard,
      history,
    };
  }

  savePerformance(path: string): PersistenceResult {
    const histories: Record<string, PerformanceSnapshot[]> = {};
    for (const [id, history] of this.histories) {
      histories[id] = history;
    }
    const result = writeJsonFile(path, { format: PERFORMANCE_FORMAT, histories });
    if (result.ok) {
      this.logger.info('performance saved', { path: result.path, strategies: this.histories.size });
    } else {
      this.logger.error('performance save failed', { path, message: result.message });
    }
    return result;
  }

  /**
   * Replaces every history with the file's content. Existing histories are
   * kept when the file is missing or invalid.
   */
  loadPerformance(path: string): PersistenceResult {
    const result = readJsonFile(path, performanceFileSchema);
    if (!result.ok) {
      this.logger.warn('performance load failed', { path, reason: result.reason, message: result.message });
      return { ok: false, reason: result.reason, message: result.message };
    }
    const histories = result.data.histories;
    this.mutate('loadPerformance', () => {
      this.histories.clear();
      for (const [id, history] of Object.entries(histories)) {
        this.histories.set(id, history.slice(-this.historyLimit));
      }
    });
    this.logger.info('performance loaded', { path: result.path, strategies: this.histories.size });
    return { ok: true, path: result.path };
  }

  private registered(): RegisteredStrategy[] {
    return [...this.entries.values()].sort((a, b) => a.order - b.order);
  }

  private orderOf(id: string): number {
    return this.entries.get(id)?.order ?? Number.POSITIVE_INFINITY;
  }

  private sortByRegistration(ids: readonly string[]): string[] {
    const unique = [...new Set(ids)];
    return unique
      .map((id, index) => ({ id, index }))
      .sort((a, b) => {
        const orderA = this.orderOf(a.id);
        const orderB = this.orderOf(b.id);
        if (orderA !== orderB) {
          return orderA < orderB ? -1 : 1;
        }
        return a.index - b.index;
      })
      .map((item) => item.id);
  }

  private rankableIds(): string[] {
    return this.sortByRegistration([...this.histories.keys()]);
  }

  private mutate<T>(operation: string, action: () => T): T {
    if (this.mutationDepth > 0) {
      throw new ConcurrentMutationError(operation);
    }
    this.mutationDepth += 1;
    try {
      return action();
    } finally {
      this.mutationDepth -= 1;
    }
  }
}
