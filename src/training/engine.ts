import { legalMoves } from '../core/board';
import { RandomSource } from '../core/random';
import { Board, Move } from '../core/types';
import { GameResult, PerformanceRecord, Strategy } from '../ai/strategy';
import { GameEnvironment } from './environment';
import { scoreDeltaReward } from './reward';

export interface PlayOptions {
  seed?: number;
  random?: RandomSource;
  /** Stop after this many moves even if the game is not over */
  maxMoves?: number;
  /** Called after every move with the board after the spawn */
  onMove?: (step: MoveEvent) => void;
}

export interface MoveEvent {
  moveNumber: number;
  move: Move;
  board: Board;
  score: number;
  fallback: boolean;
}

export interface GameSummary extends GameResult {
  board: Board;
  /** Moves where the strategy's choice changed nothing and the runner substituted one */
  fallbackMoves: number;
  truncated: boolean;
}

export interface BenchmarkOptions extends Omit<PlayOptions, 'seed' | 'random'> {
  /** Game i is seeded with seed + i */
  seed?: number;
}

export interface BenchmarkResult {
  games: GameSummary[];
  averageScore: number;
  averageMoves: number;
  averageEfficiency: number;
  highestTile: number;
  performance: PerformanceRecord;
}

const DEFAULT_MAX_MOVES = 10000;

/**
 * Plays one simulated game to the end. Detecting the end is this runner's
 * job: strategies always answer with a move, so a move that changes nothing
 * is replaced by the first legal one.
 */
export function playGame(strategy: Strategy, options: PlayOptions = {}): GameSummary {
  const environment = new GameEnvironment({
    random: options.random,
    seed: options.seed,
    reward: scoreDeltaReward,
  });
  environment.reset();
  const maxMoves = options.maxMoves ?? DEFAULT_MAX_MOVES;
  let fallbackMoves = 0;

  while (!environment.done && environment.moves < maxMoves) {
    const board = environment.board;
    let move = strategy.nextMove(board);
    const legal = legalMoves(board);
    const fallback = !legal.includes(move);
    if (fallback) {
      const substitute = legal[0];
      if (substitute === undefined) {
        break;
      }
      move = substitute;
      fallbackMoves += 1;
    }
    environment.step(move);
    options.onMove?.({
      moveNumber: environment.moves,
      move,
      board: environment.board,
      score: environment.score,
      fallback,
    });
  }

  const state = environment.state();
  return {
    finalScore: state.score,
    movesCompleted: state.totalMoves,
    highestTile: state.highestTile,
    board: state.board,
    fallbackMoves,
    truncated: !state.done,
  };
}

/**
 * Plays `games` games and records each into the strategy's performance.
 */
export function benchmarkStrategy(
  strategy: Strategy,
  games: number,
  options: BenchmarkOptions = {},
): BenchmarkResult {
  const summaries: GameSummary[] = [];
  for (let index = 0; index < games; index += 1) {
    const summary = playGame(strategy, {
      ...options,
      seed: options.seed !== undefined ? options.seed + index : undefined,
    });
    strategy.recordGame(summary);
    summaries.push(summary);
  }

  const count = Math.max(summaries.length, 1);
  const totalScore = summaries.reduce((sum, item) => sum + item.finalScore, 0);
  const totalMoves = summaries.reduce((sum, item) => sum + item.movesCompleted, 0);
  return {
    games: summaries,
    averageScore: totalScore / count,
    averageMoves: totalMoves / count,
    averageEfficiency: totalMoves > 0 ? totalScore / totalMoves : 0,
    highestTile: summaries.reduce((max, item) => Math.max(max, item.highestTile), 0),
    performance: strategy.performance(),
  };
}
