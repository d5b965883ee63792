import { describeError } from '../core/errors';
import { QLearningStrategy } from '../ai/strategies/q_learning';
import { Logger, silentLogger } from '../util/log';

export interface TrainingStatus {
  running: boolean;
  cycle: number;
  episodesPerBatch: number;
  totalEpisodes: number;
  epsilon: number;
  qTableSize: number;
  averageReward: number;
  averageHighestTile: number;
  maxHighestTile: number;
  updatedAt: string | null;
  message?: string;
}

export interface TrainingControllerOptions {
  episodesPerBatch: number;
  /** Model is saved here after every batch when set */
  modelPath?: string;
  /** Batch n trains with seed + n */
  seed?: number;
  /** Delay between batches; 0 still yields to pending requests */
  pauseMs?: number;
  /** Delay after a failed batch */
  errorPauseMs?: number;
  logger?: Logger;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Background Q-learning loop for the HTTP service. Each batch runs
 * synchronously; the loop yields to the event loop between batches so
 * status and stop requests are served.
 */
export class TrainingController {
  private stopRequested = false;
  private loopPromise: Promise<void> | null = null;
  private readonly status: TrainingStatus;
  private readonly logger: Logger;

  constructor(
    private readonly strategy: QLearningStrategy,
    private readonly options: TrainingControllerOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    const progress = strategy.trainingProgress();
    this.status = {
      running: false,
      cycle: 0,
      episodesPerBatch: options.episodesPerBatch,
      totalEpisodes: progress.trainingEpisodes,
      epsilon: progress.epsilon,
      qTableSize: progress.qTableSize,
      averageReward: 0,
      averageHighestTile: 0,
      maxHighestTile: 0,
      updatedAt: null,
    };
  }

  get running(): boolean {
    return this.loopPromise !== null;
  }

  /**
   * Returns false when a loop is already running.
   */
  start(): boolean {
    if (this.loopPromise) {
      return false;
    }
    this.stopRequested = false;
    this.status.running = true;
    this.loopPromise = this.runLoop().finally(() => {
      this.loopPromise = null;
      this.status.running = false;
    });
    return true;
  }

  /**
   * Requests a stop and resolves once the current batch has finished.
   */
  async stop(): Promise<void> {
    this.stopRequested = true;
    if (this.loopPromise) {
      await this.loopPromise;
    }
  }

  getStatus(): TrainingStatus {
    return { ...this.status };
  }

  private async runLoop(): Promise<void> {
    this.logger.info('training loop started', { episodesPerBatch: this.options.episodesPerBatch });
    // Let start() return before the first batch occupies the event loop.
    await delay(0);
    while (!this.stopRequested) {
      try {
        this.runBatch();
      } catch (error) {
        this.status.message = describeError(error);
        this.logger.error('training batch failed', { error });
        await delay(this.options.errorPauseMs ?? 2000);
        continue;
      }
      await delay(this.options.pauseMs ?? 0);
    }
    this.logger.info('training loop stopped', { cycle: this.status.cycle });
  }

  private runBatch(): void {
    const { seed } = this.options;
    const outcome = this.strategy.train(undefined, {
      episodes: this.options.episodesPerBatch,
      seed: seed !== undefined ? seed + this.status.cycle : undefined,
      progressInterval: 0,
      logger: this.logger,
    });
    if (!outcome.supported) {
      throw new Error(outcome.reason);
    }
    const { summary } = outcome;
    this.status.cycle += 1;
    this.status.totalEpisodes = summary.totalEpisodes;
    this.status.epsilon = summary.finalEpsilon;
    this.status.qTableSize = summary.modelSize;
    this.status.averageReward = summary.averageReward;
    this.status.averageHighestTile = summary.averageHighestTile;
    this.status.maxHighestTile = Math.max(this.status.maxHighestTile, summary.maxHighestTile);
    this.status.updatedAt = new Date().toISOString();
    delete this.status.message;

    if (this.options.modelPath) {
      const saved = this.strategy.save(this.options.modelPath);
      if (!saved.ok) {
        this.status.message = saved.message;
      }
    }
  }
}
