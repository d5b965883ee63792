import { countEmptyCells, maxTile, transpose } from '../core/board';
import { Board, Row } from '../core/types';

export const FEATURE_NAMES = [
  'empty_tiles',
  'merge_potential',
  'corner_bonus',
  'monotonicity',
  'max_tile_value',
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export interface FeatureVector {
  readonly values: Record<FeatureName, number>;
}

export function computeFeatures(board: Board): FeatureVector {
  return {
    values: {
      empty_tiles: countEmptyCells(board),
      merge_potential: countMergePairs(board),
      corner_bonus: cornerBonus(board),
      monotonicity: countMonotonicLines(board),
      max_tile_value: maxTile(board),
    },
  };
}

/**
 * Orthogonally adjacent pairs of equal, non-empty tiles.
 */
export function countMergePairs(board: Board): number {
  let pairs = 0;
  for (let row = 0; row < board.length; row += 1) {
    const cells = board[row] ?? [];
    for (let col = 0; col < cells.length; col += 1) {
      const value = cells[col] ?? 0;
      if (value === 0) {
        continue;
      }
      if (cells[col + 1] === value) {
        pairs += 1;
      }
      if (board[row + 1]?.[col] === value) {
        pairs += 1;
      }
    }
  }
  return pairs;
}

export function cornerBonus(board: Board): number {
  const max = maxTile(board);
  if (max === 0) {
    return 0;
  }
  const last = board.length - 1;
  const corners = [
    board[0]?.[0],
    board[0]?.[last],
    board[last]?.[0],
    board[last]?.[last],
  ];
  return corners.includes(max) ? 1 : 0;
}

/**
 * A line counts when its non-empty tiles (at least two) are entirely
 * non-increasing or non-decreasing. No partial credit.
 */
export function isMonotonicLine(line: Row): boolean {
  const tiles = line.filter((value) => value !== 0);
  if (tiles.length < 2) {
    return false;
  }
  let ascending = true;
  let descending = true;
  for (let i = 1; i < tiles.length; i += 1) {
    const previous = tiles[i - 1] ?? 0;
    const current = tiles[i] ?? 0;
    if (current < previous) {
      ascending = false;
    }
    if (current > previous) {
      descending = false;
    }
  }
  return ascending || descending;
}

export function countMonotonicLines(board: Board): number {
  const lines = [...board, ...transpose(board)];
  return lines.filter((line) => isMonotonicLine(line)).length;
}
