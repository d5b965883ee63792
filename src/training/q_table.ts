import { Move, MOVES } from '../core/types';

/**
 * Action values in canonical move order: UP, DOWN, LEFT, RIGHT.
 */
export type ActionValues = [number, number, number, number];

export type SerializedQTable = Record<string, number[]>;

function zeros(): ActionValues {
  return [0, 0, 0, 0];
}

export function actionIndex(move: Move): number {
  return MOVES.indexOf(move);
}

/**
 * State key -> action values. Reading an unseen state yields zeros without
 * growing the table; only updates add entries.
 */
export class QTable {
  private readonly table = new Map<string, ActionValues>();

  get size(): number {
    return this.table.size;
  }

  has(key: string): boolean {
    return this.table.has(key);
  }

  values(key: string): ActionValues {
    const stored = this.table.get(key);
    return stored ? [...stored] : zeros();
  }

  value(key: string, move: Move): number {
    return this.table.get(key)?.[actionIndex(move)] ?? 0;
  }

  maxValue(key: string): number {
    return Math.max(...this.values(key));
  }

  /**
   * Argmax over the state's values; ties resolve to the earliest move in
   * canonical order.
   */
  bestMove(key: string, candidates: readonly Move[] = MOVES): Move {
    let best = candidates[0] ?? Move.Up;
    let bestValue = -Infinity;
    for (const move of candidates) {
      const value = this.value(key, move);
      if (value > bestValue) {
        best = move;
        bestValue = value;
      }
    }
    return best;
  }

  set(key: string, move: Move, value: number): void {
    let row = this.table.get(key);
    if (!row) {
      row = zeros();
      this.table.set(key, row);
    }
    row[actionIndex(move)] = value;
  }

  clear(): void {
    this.table.clear();
  }

  keys(): string[] {
    return [...this.table.keys()];
  }

  toJSON(): SerializedQTable {
    const result: SerializedQTable = {};
    for (const [key, row] of this.table) {
      result[key] = [...row];
    }
    return result;
  }

  static fromJSON(data: Readonly<Record<string, readonly number[]>>): QTable {
    const table = new QTable();
    for (const [key, row] of Object.entries(data)) {
      table.table.set(key, [row[0] ?? 0, row[1] ?? 0, row[2] ?? 0, row[3] ?? 0]);
    }
    return table;
  }
}
