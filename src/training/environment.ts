import {
  applyMove,
  countEmptyCells,
  createEmptyBoard,
  emptyCells,
  hasLegalMove,
  legalMoves,
  maxTile,
  placeTile,
  validateBoard,
} from '../core/board';
import { EpisodeFinishedError } from '../core/errors';
import { createRandom, pickRandom, RandomSource } from '../core/random';
import { Board, Move } from '../core/types';
import { countMonotonicLines } from '../ai/features';
import { RewardFunction, shapedReward } from './reward';

/** Score is divided by this before being appended to the observation. */
export const SCORE_SCALE = 10000;

/** Chance that a spawned tile is a 2 rather than a 4. */
export const TWO_TILE_PROBABILITY = 0.9;

export interface EnvironmentOptions {
  random?: RandomSource;
  seed?: number;
  reward?: RewardFunction;
}

export interface StepInfo {
  moved: boolean;
  scoreDelta: number;
  highestTile: number;
  emptyTiles: number;
  totalMoves: number;
  efficiency: number;
  board: Board;
}

export interface StepResult {
  observation: number[];
  reward: number;
  done: boolean;
  info: StepInfo;
}

export interface EnvironmentState {
  board: Board;
  score: number;
  highestTile: number;
  emptyTiles: number;
  totalMoves: number;
  done: boolean;
  validActions: Move[];
  monotonicity: number;
}

/**
 * Observation vector: log2 of each cell in row-major order (empty stays 0),
 * then the scaled score.
 */
export function encodeObservation(board: Board, score: number): number[] {
  const cells = board.flatMap((row) => row.map((value) => (value > 0 ? Math.log2(value) : 0)));
  return [...cells, score / SCORE_SCALE];
}

/**
 * Episodic 2048 simulation for training and simulated play.
 */
export class GameEnvironment {
  private readonly random: RandomSource;
  private readonly reward: RewardFunction;
  private boardValue: Board = createEmptyBoard();
  private scoreValue = 0;
  private doneValue = false;
  private totalMoves = 0;
  private highestTile = 0;

  constructor(options: EnvironmentOptions = {}) {
    this.random = options.random ?? createRandom(options.seed);
    this.reward = options.reward ?? shapedReward;
  }

  get board(): Board {
    return this.boardValue;
  }

  get score(): number {
    return this.scoreValue;
  }

  get done(): boolean {
    return this.doneValue;
  }

  get moves(): number {
    return this.totalMoves;
  }

  reset(): number[] {
    this.boardValue = createEmptyBoard();
    this.scoreValue = 0;
    this.doneValue = false;
    this.totalMoves = 0;
    this.highestTile = 0;
    this.spawnTile();
    this.spawnTile();
    this.highestTile = maxTile(this.boardValue);
    return this.observation();
  }

  /**
   * Starts an episode from a given position instead of a random one.
   */
  load(board: Board, score = 0): number[] {
    this.boardValue = validateBoard(board);
    this.scoreValue = score;
    this.totalMoves = 0;
    this.highestTile = maxTile(this.boardValue);
    this.doneValue = !hasLegalMove(this.boardValue);
    return this.observation();
  }

  step(move: Move): StepResult {
    if (this.doneValue) {
      throw new EpisodeFinishedError();
    }
    const previousBoard = this.boardValue;
    const outcome = applyMove(previousBoard, move);
    this.totalMoves += 1;
    this.scoreValue += outcome.scoreDelta;
    this.boardValue = outcome.board;

    if (outcome.moved) {
      this.spawnTile();
    }
    this.doneValue = !hasLegalMove(this.boardValue);
    this.highestTile = Math.max(this.highestTile, maxTile(this.boardValue));

    // Shaping looks at the board the move produced, before the spawn.
    const reward = this.reward({
      previousBoard,
      board: outcome.board,
      moved: outcome.moved,
      scoreDelta: outcome.scoreDelta,
      score: this.scoreValue,
      done: this.doneValue,
    });

    return {
      observation: this.observation(),
      reward,
      done: this.doneValue,
      info: {
        moved: outcome.moved,
        scoreDelta: outcome.scoreDelta,
        highestTile: this.highestTile,
        emptyTiles: countEmptyCells(this.boardValue),
        totalMoves: this.totalMoves,
        efficiency: this.scoreValue / Math.max(this.totalMoves, 1),
        board: this.boardValue,
      },
    };
  }

  validActions(): Move[] {
    return legalMoves(this.boardValue);
  }

  observation(): number[] {
    return encodeObservation(this.boardValue, this.scoreValue);
  }

  state(): EnvironmentState {
    return {
      board: this.boardValue,
      score: this.scoreValue,
      highestTile: this.highestTile,
      emptyTiles: countEmptyCells(this.boardValue),
      totalMoves: this.totalMoves,
      done: this.doneValue,
      validActions: this.validActions(),
      monotonicity: countMonotonicLines(this.boardValue),
    };
  }

  private spawnTile(): boolean {
    const position = pickRandom(emptyCells(this.boardValue), this.random);
    if (!position) {
      return false;
    }
    const value = this.random() < TWO_TILE_PROBABILITY ? 2 : 4;
    this.boardValue = placeTile(this.boardValue, position, value);
    return true;
  }
}
