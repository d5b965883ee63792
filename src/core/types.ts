export const BOARD_SIZE = 4;

export enum Move {
  Up = 'UP',
  Down = 'DOWN',
  Left = 'LEFT',
  Right = 'RIGHT',
}

/**
 * Canonical move order. Keyed outputs (move scores, Q-values) and
 * first-wins tie breaks follow it.
 */
export const MOVES: readonly Move[] = [Move.Up, Move.Down, Move.Left, Move.Right];

export type Row = readonly number[];

/**
 * 4x4 grid, row-major. Every cell is 0 (empty) or a power of two >= 2.
 * Boards are never mutated once produced.
 */
export type Board = readonly Row[];

export interface MoveOutcome {
  board: Board;
  moved: boolean;
  scoreDelta: number;
}

export interface Position {
  row: number;
  col: number;
}

export type MoveScores = Record<Move, number>;

export function isMove(value: unknown): value is Move {
  return MOVES.some((move) => move === value);
}

export function parseMove(value: string): Move | null {
  const upper = value.trim().toUpperCase();
  return isMove(upper) ? upper : null;
}
