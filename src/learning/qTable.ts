// qTable.ts
// Action-value table keyed by signature key. Unseen pairs read as 0.

import { DIRECTIONS, isDirection, type Direction } from '../grid.ts';
import { isFiniteNumber, isRecord } from '../utils.ts';
import { parseSignatureKey, signatureKey } from './signature.ts';

export type ActionValues = Record<Direction, number>;

/** Persisted layout: signature key -> direction name -> value. */
export type QTableJSON = Record<string, ActionValues>;

export type QTableParseResult =
  | { ok: true; table: QTable; dropped: number }
  | { ok: false; reason: string };

function zeroValues(): ActionValues {
  return { left: 0, right: 0, up: 0, down: 0 };
}

/**
 * Validate one persisted row. Missing directions default to 0; unknown keys
 * or non-finite values reject the row.
 */
function parseRow(raw: unknown): ActionValues | null {
  if (!isRecord(raw)) return null;
  const values = zeroValues();
  for (const [name, value] of Object.entries(raw)) {
    if (!isDirection(name) || !isFiniteNumber(value)) return null;
    values[name] = value;
  }
  return values;
}

export class QTable {
  /** Rows keyed by signature key. */
  private rows = new Map<string, ActionValues>();

  /** Number of signatures with at least one stored value. */
  get size(): number {
    return this.rows.size;
  }

  get(key: string, direction: Direction): number {
    return this.rows.get(key)?.[direction] ?? 0;
  }

  set(key: string, direction: Direction, value: number): void {
    let row = this.rows.get(key);
    if (!row) {
      row = zeroValues();
      this.rows.set(key, row);
    }
    row[direction] = value;
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  /** Copy of a row; zeros for an unseen key. */
  values(key: string): ActionValues {
    const row = this.rows.get(key);
    return row ? { ...row } : zeroValues();
  }

  /**
   * Highest value among `actions`.
   * @returns 0 when `actions` is empty (terminal state).
   */
  maxValue(key: string, actions: readonly Direction[]): number {
    let best = -Infinity;
    for (const direction of actions) {
      best = Math.max(best, this.get(key, direction));
    }
    return best === -Infinity ? 0 : best;
  }

  /**
   * Member of `actions` with the highest value; priority order breaks ties.
   * @returns Null when `actions` is empty.
   */
  bestAction(key: string, actions: readonly Direction[]): Direction | null {
    let best: Direction | null = null;
    let bestValue = -Infinity;
    for (const direction of DIRECTIONS) {
      if (!actions.includes(direction)) continue;
      const value = this.get(key, direction);
      if (best === null || value > bestValue) {
        best = direction;
        bestValue = value;
      }
    }
    return best;
  }

  keys(): string[] {
    return [...this.rows.keys()];
  }

  clear(): void {
    this.rows.clear();
  }

  /** Plain mapping with every row's four directions, keys sorted. */
  toJSON(): QTableJSON {
    const out: QTableJSON = {};
    for (const key of [...this.rows.keys()].sort()) {
      const row = this.rows.get(key);
      if (row) out[key] = { ...row };
    }
    return out;
  }

  /**
   * Build a table from parsed JSON. Rows with a malformed or non-canonical
   * key, or a malformed value, are dropped and counted; a non-object document is rejected as a whole.
   */
  static fromJSON(raw: unknown): QTableParseResult {
    if (!isRecord(raw)) {
      return { ok: false, reason: 'q-table document must be an object' };
    }
    const table = new QTable();
    let dropped = 0;
    for (const [key, value] of Object.entries(raw)) {
      const signature = parseSignatureKey(key);
      const canonical = signature !== null && signatureKey(signature) === key;
      const row = canonical ? parseRow(value) : null;
      if (!row) {
        dropped++;
        continue;
      }
      table.rows.set(key, row);
    }
    return { ok: true, table, dropped };
  }
}
