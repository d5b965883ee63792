import { countEmptyCells, maxTile } from '../core/board';
import { Board } from '../core/types';
import { countMonotonicLines } from '../ai/features';

export interface RewardContext {
  previousBoard: Board;
  board: Board;
  moved: boolean;
  scoreDelta: number;
  score: number;
  done: boolean;
}

export type RewardFunction = (context: RewardContext) => number;

export interface ShapedRewardWeights {
  /** Reward for a move that leaves the board unchanged */
  invalidMovePenalty: number;
  /** Per empty cell after the move */
  emptyCell: number;
  /** Multiplier on log2 of the largest tile */
  maxTileLog: number;
  /** Per monotonic row or column */
  monotonicity: number;
}

export const DEFAULT_REWARD_WEIGHTS: Readonly<ShapedRewardWeights> = Object.freeze({
  invalidMovePenalty: -10,
  emptyCell: 2,
  maxTileLog: 1,
  monotonicity: 5,
});

/**
 * Merge score plus board tidiness terms. The defaults are tuning starting
 * points, not derived values.
 */
export function createShapedReward(
  weights: Partial<ShapedRewardWeights> = {},
): RewardFunction {
  const resolved: ShapedRewardWeights = { ...DEFAULT_REWARD_WEIGHTS, ...weights };
  return ({ board, moved, scoreDelta }) => {
    if (!moved) {
      return resolved.invalidMovePenalty;
    }
    const max = maxTile(board);
    const tileReward = max > 0 ? Math.log2(max) * resolved.maxTileLog : 0;
    return (
      scoreDelta +
      countEmptyCells(board) * resolved.emptyCell +
      tileReward +
      countMonotonicLines(board) * resolved.monotonicity
    );
  };
}

export const shapedReward: RewardFunction = createShapedReward();

/**
 * Raw merge score, with the same penalty for non-moves.
 */
export const scoreDeltaReward: RewardFunction = ({ moved, scoreDelta }) =>
  moved ? scoreDelta : DEFAULT_REWARD_WEIGHTS.invalidMovePenalty;
