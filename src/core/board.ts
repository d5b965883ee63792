import { BoardValidationError } from './errors';
import { Board, BOARD_SIZE, Move, MoveOutcome, MOVES, Position, Row } from './types';

export interface RowMergeResult {
  row: number[];
  scoreDelta: number;
}

/**
 * Slides a single row towards index 0. Each resulting tile takes part in at
 * most one merge, so [2, 2, 2, 2] becomes [4, 4, 0, 0].
 */
export function mergeRowLeft(row: Row): RowMergeResult {
  const tiles = row.filter((value) => value !== 0);
  const merged: number[] = [];
  let scoreDelta = 0;
  let i = 0;
  while (i < tiles.length) {
    const current = tiles[i] ?? 0;
    const next = tiles[i + 1];
    if (next !== undefined && next === current) {
      const value = current * 2;
      merged.push(value);
      scoreDelta += value;
      i += 2;
    } else {
      merged.push(current);
      i += 1;
    }
  }
  while (merged.length < row.length) {
    merged.push(0);
  }
  return { row: merged, scoreDelta };
}

export function transpose(board: Board): number[][] {
  const size = board.length;
  return Array.from({ length: size }, (_, col) =>
    Array.from({ length: size }, (__, row) => board[row]?.[col] ?? 0),
  );
}

export function reverseRows(board: Board): number[][] {
  return board.map((row) => [...row].reverse());
}

function slideLeft(board: Board): { cells: number[][]; scoreDelta: number } {
  let scoreDelta = 0;
  const cells = board.map((row) => {
    const result = mergeRowLeft(row);
    scoreDelta += result.scoreDelta;
    return result.row;
  });
  return { cells, scoreDelta };
}

function slideRight(board: Board): { cells: number[][]; scoreDelta: number } {
  const result = slideLeft(reverseRows(board));
  return { cells: reverseRows(result.cells), scoreDelta: result.scoreDelta };
}

function slide(board: Board, move: Move): { cells: number[][]; scoreDelta: number } {
  switch (move) {
    case Move.Left:
      return slideLeft(board);
    case Move.Right:
      return slideRight(board);
    case Move.Up: {
      const result = slideLeft(transpose(board));
      return { cells: transpose(result.cells), scoreDelta: result.scoreDelta };
    }
    case Move.Down: {
      const result = slideRight(transpose(board));
      return { cells: transpose(result.cells), scoreDelta: result.scoreDelta };
    }
  }
}

/**
 * Applies a move and returns a new board. When nothing moves the input board
 * itself is returned with a zero score delta.
 */
export function applyMove(board: Board, move: Move): MoveOutcome {
  const { cells, scoreDelta } = slide(board, move);
  if (boardsEqual(board, cells)) {
    return { board, moved: false, scoreDelta: 0 };
  }
  return { board: cells, moved: true, scoreDelta };
}

export function boardsEqual(a: Board, b: Board): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let row = 0; row < a.length; row += 1) {
    const left = a[row];
    const right = b[row];
    if (!left || !right || left.length !== right.length) {
      return false;
    }
    for (let col = 0; col < left.length; col += 1) {
      if (left[col] !== right[col]) {
        return false;
      }
    }
  }
  return true;
}

export function hasLegalMove(board: Board): boolean {
  for (let row = 0; row < board.length; row += 1) {
    const cells = board[row] ?? [];
    for (let col = 0; col < cells.length; col += 1) {
      const value = cells[col] ?? 0;
      if (value === 0) {
        return true;
      }
      if (col + 1 < cells.length && cells[col + 1] === value) {
        return true;
      }
      if (row + 1 < board.length && board[row + 1]?.[col] === value) {
        return true;
      }
    }
  }
  return false;
}

export function legalMoves(board: Board): Move[] {
  return MOVES.filter((move) => applyMove(board, move).moved);
}

export function createEmptyBoard(size: number = BOARD_SIZE): Board {
  return Array.from({ length: size }, () => Array.from({ length: size }, () => 0));
}

export function emptyCells(board: Board): Position[] {
  const cells: Position[] = [];
  board.forEach((values, row) => {
    values.forEach((value, col) => {
      if (value === 0) {
        cells.push({ row, col });
      }
    });
  });
  return cells;
}

export function countEmptyCells(board: Board): number {
  let count = 0;
  for (const row of board) {
    for (const value of row) {
      if (value === 0) {
        count += 1;
      }
    }
  }
  return count;
}

export function maxTile(board: Board): number {
  let max = 0;
  for (const row of board) {
    for (const value of row) {
      if (value > max) {
        max = value;
      }
    }
  }
  return max;
}

export function placeTile(board: Board, position: Position, value: number): Board {
  if (board[position.row]?.[position.col] === undefined) {
    throw new BoardValidationError(
      `Position (${position.row}, ${position.col}) is outside of the board`,
    );
  }
  return board.map((values, row) =>
    row === position.row
      ? values.map((current, col) => (col === position.col ? value : current))
      : [...values],
  );
}

/**
 * Q-table state key. Exact cell values, no bucketing.
 */
export function serializeBoard(board: Board): string {
  return board.map((row) => row.join(',')).join('|');
}

export function isTileValue(value: number): boolean {
  return value === 0 || (Number.isSafeInteger(value) && value >= 2 && Number.isInteger(Math.log2(value)));
}

/**
 * Validates untrusted input (HTTP payloads, CLI arguments, orchestrator
 * observations) and returns a fresh copy typed as a Board.
 */
export function validateBoard(input: unknown): Board {
  if (!Array.isArray(input) || input.length !== BOARD_SIZE) {
    throw new BoardValidationError(`Board must have ${BOARD_SIZE} rows`);
  }
  return input.map((row: unknown, rowIndex) => {
    if (!Array.isArray(row) || row.length !== BOARD_SIZE) {
      throw new BoardValidationError(`Row ${rowIndex} must have ${BOARD_SIZE} cells`);
    }
    return row.map((cell: unknown, colIndex) => {
      if (typeof cell !== 'number' || !Number.isInteger(cell)) {
        throw new BoardValidationError(
          `Cell (${rowIndex}, ${colIndex}) must be an integer, got ${String(cell)}`,
        );
      }
      if (cell < 0) {
        throw new BoardValidationError(`Cell (${rowIndex}, ${colIndex}) is negative: ${cell}`);
      }
      if (!isTileValue(cell)) {
        throw new BoardValidationError(
          `Cell (${rowIndex}, ${colIndex}) is not a power of two: ${cell}`,
        );
      }
      return cell;
    });
  });
}

export function isBoard(input: unknown): input is Board {
  try {
    validateBoard(input);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parses the compact "2,0,0,0/0,0,0,0/..." notation used on the command line.
 */
export function parseBoard(text: string): Board {
  const rows = text
    .trim()
    .split('/')
    .map((row) => row.split(',').map((cell) => Number(cell.trim())));
  return validateBoard(rows);
}

export function formatBoard(board: Board): string {
  const width = Math.max(4, ...board.flatMap((row) => row.map((value) => String(value).length)));
  const border = `+${Array.from({ length: board.length }, () => '-'.repeat(width + 2)).join('+')}+`;
  const lines = [border];
  for (const row of board) {
    const cells = row.map((value) => (value === 0 ? '.' : String(value)).padStart(width));
    lines.push(`| ${cells.join(' | ')} |`);
    lines.push(border);
  }
  return lines.join('\n');
}
