import { formatBoard, legalMoves, parseBoard } from '../core/board';
import { gameRecord, StrategyRegistry } from '../ai/registry';
import { QLearningStrategy } from '../ai/strategies/q_learning';
import { Strategy } from '../ai/strategy';
import { Settings } from '../config/settings';
import { benchmarkStrategy, playGame } from '../training/engine';
import { compareWeightSets, WEIGHT_PRESETS } from '../training/tuning';
import { createLogger } from '../util/log';

export type CliCommand = 'play' | 'train' | 'leaderboard' | 'suggest' | 'list' | 'tune';

export const COMMANDS: readonly CliCommand[] = ['play', 'train', 'leaderboard', 'suggest', 'list', 'tune'];

export interface CliOptions {
  command: CliCommand;
  strategy: string;
  games: number;
  episodes: number;
  seed: number | undefined;
  maxMoves: number | undefined;
  render: boolean;
  renderEvery: number;
  modelPath: string;
  outPath: string | null;
  board: string | null;
}

export type Printer = (line: string) => void;

/**
 * Q-learning instances pick up the saved model so `play` and `suggest`
 * use what `train` produced.
 */
export function createStrategy(registry: StrategyRegistry, options: CliOptions, print: Printer): Strategy {
  const created = registry.create(options.strategy);
  if (!created.ok) {
    throw new Error(`${created.message}. Known strategies: ${registry.ids().join(', ')}`);
  }
  if (created.strategy.metadata().trainingRequired) {
    const loaded = created.strategy.load(options.modelPath);
    if (!loaded.ok) {
      print(`Playing untrained (${loaded.reason}: ${loaded.message})`);
    }
  }
  return created.strategy;
}

export function runPlay(registry: StrategyRegistry, options: CliOptions, print: Printer): void {
  const strategy = createStrategy(registry, options, print);
  for (let i = 0; i < options.games; i += 1) {
    if (options.games > 1) {
      print(`\n=== Game ${i + 1}/${options.games} ===`);
    }
    const summary = playGame(strategy, {
      seed: options.seed !== undefined ? options.seed + i : undefined,
      maxMoves: options.maxMoves,
      onMove: (event) => {
        if (options.render && event.moveNumber % options.renderEvery === 0) {
          print(formatBoard(event.board));
          print(`Move=${event.moveNumber} ${event.move} Score=${event.score}`);
        }
      },
    });
    strategy.recordGame(summary);
    if (options.render) {
      print(formatBoard(summary.board));
    }
    print(
      `Game finished: score=${summary.finalScore}, moves=${summary.movesCompleted}, highest=${summary.highestTile}, fallbacks=${summary.fallbackMoves}`,
    );
  }
  const performance = strategy.performance();
  print(
    `${strategy.metadata().name}: games=${performance.gamesPlayed} efficiency=${performance.averageEfficiency.toFixed(2)} highest=${performance.highestTile}`,
  );
}

export function runTrain(settings: Settings, options: CliOptions, print: Printer): void {
  const logger = createLogger({ level: settings.logLevel, scope: 'train' });
  const learner = new QLearningStrategy(settings.qLearning, { logger });
  const loaded = learner.load(options.modelPath);
  if (!loaded.ok && loaded.reason !== 'missing') {
    print(`Starting from an empty table (${loaded.reason}: ${loaded.message})`);
  }
  const outcome = learner.train(undefined, { episodes: options.episodes, seed: options.seed });
  if (!outcome.supported) {
    throw new Error(outcome.reason);
  }
  const { summary } = outcome;
  print(
    `Trained ${summary.episodesTrained} episodes (total ${summary.totalEpisodes}): avgReward=${summary.averageReward.toFixed(2)} avgHighest=${summary.averageHighestTile.toFixed(1)} maxHighest=${summary.maxHighestTile} epsilon=${summary.finalEpsilon.toFixed(3)} states=${summary.modelSize}`,
  );
  const saved = learner.save(options.modelPath);
  if (!saved.ok) {
    throw new Error(saved.message);
  }
  print(`Model saved to ${saved.path}`);
}

/**
 * Benchmarks every registered strategy and appends the games to the
 * performance file, keeping the history already stored there.
 */
export function runLeaderboard(
  registry: StrategyRegistry,
  settings: Settings,
  options: CliOptions,
  print: Printer,
): void {
  const performancePath = options.outPath ?? settings.performancePath;
  const existing = registry.loadPerformance(performancePath);
  if (!existing.ok && existing.reason !== 'missing') {
    throw new Error(`Refusing to overwrite ${performancePath}: ${existing.message}`);
  }

  for (const id of registry.ids()) {
    const strategy = createStrategy(registry, { ...options, strategy: id }, print);
    const result = benchmarkStrategy(strategy, options.games, {
      seed: options.seed,
      maxMoves: options.maxMoves,
    });
    for (const game of result.games) {
      registry.recordPerformance(id, gameRecord(game));
    }
    print(`${id}: avgScore=${result.averageScore.toFixed(1)} efficiency=${result.averageEfficiency.toFixed(2)}`);
  }

  const report = registry.exportReport();
  print('\nRank  Strategy                    Efficiency  Consistency  Highest  Percentile');
  for (const entry of report.leaderboard) {
    print(
      `${String(entry.rank).padEnd(6)}${entry.algorithm_id.padEnd(28)}${entry.average_efficiency.toFixed(2).padEnd(12)}${entry.consistency_score.toFixed(3).padEnd(13)}${String(entry.highest_tile).padEnd(9)}${entry.percentile.toFixed(1)}%`,
    );
  }

  const saved = registry.savePerformance(performancePath);
  if (!saved.ok) {
    throw new Error(saved.message);
  }
  print(`\nPerformance history written to ${saved.path}`);
}

export function runSuggest(registry: StrategyRegistry, options: CliOptions, print: Printer): void {
  if (!options.board) {
    throw new Error('suggest needs --board "r0c0,r0c1,r0c2,r0c3/r1c0,..."');
  }
  const board = parseBoard(options.board);
  const strategy = createStrategy(registry, options, print);
  print(formatBoard(board));
  if (legalMoves(board).length === 0) {
    print('No legal moves: game over');
    return;
  }
  const scores = strategy.moveScores(board);
  print(`Suggested move: ${strategy.nextMove(board)}`);
  for (const [move, score] of Object.entries(scores)) {
    print(`  ${move.padEnd(6)}${score.toFixed(2)}`);
  }
}

export function runList(registry: StrategyRegistry, print: Printer): void {
  for (const summary of registry.list()) {
    const training = summary.trainingRequired ? ' (training required)' : '';
    print(`${summary.id.padEnd(24)}${summary.category.padEnd(24)}${summary.description}${training}`);
  }
}

export function runTune(settings: Settings, options: CliOptions, print: Printer): void {
  const results = compareWeightSets(WEIGHT_PRESETS, options.games, {
    seed: options.seed,
    maxMoves: options.maxMoves,
    logger: createLogger({ level: settings.logLevel, scope: 'tune' }),
  });
  print('Rank  Weights               Efficiency  Score     Highest  vs baseline');
  for (const result of results) {
    const change =
      result.improvementPercent === null
        ? 'n/a'
        : `${result.improvementPercent >= 0 ? '+' : ''}${result.improvementPercent.toFixed(1)}%`;
    print(
      `${String(result.rank).padEnd(6)}${result.name.padEnd(22)}${result.averageEfficiency.toFixed(3).padEnd(12)}${result.averageScore.toFixed(0).padEnd(10)}${String(result.highestTile).padEnd(9)}${change}`,
    );
  }
  const best = results[0];
  if (best) {
    print(`\nBest weights: ${best.name} ${JSON.stringify(best.weights)}`);
  }
}
