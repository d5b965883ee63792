import { describe, expect, it } from 'vitest';

import { countEmptyCells } from '../src/core/board';
import { EpisodeFinishedError } from '../src/core/errors';
import { Board, Move } from '../src/core/types';
import { encodeObservation, GameEnvironment } from '../src/training/environment';
import { QTable } from '../src/training/q_table';
import { createShapedReward, scoreDeltaReward, shapedReward } from '../src/training/reward';

const stuck: Board = [
  [2, 4, 2, 4],
  [4, 2, 4, 2],
  [2, 4, 2, 4],
  [4, 2, 4, 2],
];

const pair: Board = [
  [2, 2, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
  [0, 0, 0, 0],
];

describe('GameEnvironment', () => {
  it('starts an episode with two tiles', () => {
    const environment = new GameEnvironment({ seed: 1 });
    environment.reset();
    expect(countEmptyCells(environment.board)).toBe(14);
    const tiles = environment.board.flat().filter((value) => value !== 0);
    expect(tiles.every((value) => value === 2 || value === 4)).toBe(true);
    expect(environment.score).toBe(0);
    expect(environment.moves).toBe(0);
    expect(environment.done).toBe(false);
  });

  it('spawns the same tiles for the same seed', () => {
    const first = new GameEnvironment({ seed: 21 });
    const second = new GameEnvironment({ seed: 21 });
    first.reset();
    second.reset();
    expect(second.board).toEqual(first.board);
    const move = first.validActions()[0] ?? Move.Up;
    expect(second.step(move).observation).toEqual(first.step(move).observation);
  });

  it('rewards the board the move produced, before the spawn', () => {
    const environment = new GameEnvironment({ seed: 3 });
    environment.load(pair);
    const result = environment.step(Move.Left);
    // 4 merged + 15 empty * 2 + log2(4) + no monotonic line
    expect(result.reward).toBe(36);
    expect(result.info.moved).toBe(true);
    expect(result.info.scoreDelta).toBe(4);
    expect(countEmptyCells(result.info.board)).toBe(14);
    expect(environment.score).toBe(4);
  });

  it('penalizes a move that changes nothing and spawns no tile', () => {
    const packed: Board = [
      [2, 4, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
    ];
    const environment = new GameEnvironment({ seed: 3 });
    environment.load(packed);
    const result = environment.step(Move.Left);
    expect(result.reward).toBe(-10);
    expect(result.done).toBe(false);
    expect(result.info.moved).toBe(false);
    expect(result.info.totalMoves).toBe(1);
    expect(environment.board).toEqual(packed);
  });

  it('refuses to step a finished episode', () => {
    const environment = new GameEnvironment({ seed: 3 });
    environment.load(stuck);
    expect(environment.done).toBe(true);
    expect(environment.validActions()).toEqual([]);
    expect(() => environment.step(Move.Up)).toThrow(EpisodeFinishedError);
    environment.reset();
    expect(environment.done).toBe(false);
  });

  it('reports the state of the episode', () => {
    const environment = new GameEnvironment({ seed: 3 });
    environment.load(pair, 40);
    expect(environment.state()).toEqual({
      board: pair,
      score: 40,
      highestTile: 2,
      emptyTiles: 14,
      totalMoves: 0,
      done: false,
      validActions: [Move.Down, Move.Left, Move.Right],
      monotonicity: 1,
    });
  });

  it('encodes observations as log2 cells plus scaled score', () => {
    const observation = encodeObservation(pair, 500);
    expect(observation).toHaveLength(17);
    expect(observation.slice(0, 4)).toEqual([1, 1, 0, 0]);
    expect(observation[16]).toBe(0.05);
  });
});

describe('rewards', () => {
  it('uses only the merge score when asked to', () => {
    const context = { previousBoard: pair, board: pair, moved: true, scoreDelta: 8, score: 8, done: false };
    expect(scoreDeltaReward(context)).toBe(8);
    expect(scoreDeltaReward({ ...context, moved: false, scoreDelta: 0 })).toBe(-10);
  });

  it('takes custom weights', () => {
    const reward = createShapedReward({ emptyCell: 0, maxTileLog: 0, monotonicity: 0, invalidMovePenalty: -1 });
    const context = { previousBoard: pair, board: pair, moved: true, scoreDelta: 8, score: 8, done: false };
    expect(reward(context)).toBe(8);
    expect(reward({ ...context, moved: false })).toBe(-1);
    // 14 empty * 2 + log2(2) + one monotonic row
    expect(shapedReward({ ...context, scoreDelta: 0 })).toBe(34);
  });
});

describe('QTable', () => {
  it('reads unseen states as zeros without growing', () => {
    const table = new QTable();
    expect(table.values('s')).toEqual([0, 0, 0, 0]);
    expect(table.maxValue('s')).toBe(0);
    expect(table.size).toBe(0);
  });

  it('picks the best action with ties going to the earliest move', () => {
    const table = new QTable();
    expect(table.bestMove('s')).toBe(Move.Up);
    table.set('s', Move.Left, 2);
    table.set('s', Move.Right, 2);
    expect(table.bestMove('s')).toBe(Move.Left);
    expect(table.bestMove('s', [Move.Right, Move.Left])).toBe(Move.Right);
    expect(table.values('s')).toEqual([0, 0, 2, 2]);
  });

  it('serializes to plain objects', () => {
    const table = new QTable();
    table.set('a', Move.Down, -1.5);
    const restored = QTable.fromJSON(table.toJSON());
    expect(restored.toJSON()).toEqual({ a: [0, -1.5, 0, 0] });
    expect(restored.keys()).toEqual(['a']);
  });
});
