// grid.ts
// Cells, directions and the read-only grid snapshot shared by every strategy.

/** Integer coordinate on the board. */
export interface Cell {
  readonly x: number;
  readonly y: number;
}

/** Cardinal move. `up` decreases y, `down` increases it. */
export type Direction = 'left' | 'right' | 'up' | 'down';

/** Board size in cells. */
export interface Bounds {
  width: number;
  height: number;
}

/**
 * Read-only view of the game for one tick.
 * `body` runs head to tail, so `body[0]` is the head.
 */
export interface GridState {
  head: Cell;
  body: readonly Cell[];
  target: Cell;
  heading: Direction;
  bounds: Bounds;
}

/** Ordered cells from head (inclusive) to goal (inclusive). */
export type Path = Cell[];

/** A strategy's answer for one tick. `safe` is false when every move is lethal. */
export interface MoveDecision {
  direction: Direction;
  safe: boolean;
}

/** Fixed priority order used for every deterministic tie-break. */
export const DIRECTIONS: readonly Direction[] = ['left', 'right', 'up', 'down'];

const VECTORS: Record<Direction, Cell> = {
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 }
};

const OPPOSITES: Record<Direction, Direction> = {
  left: 'right',
  right: 'left',
  up: 'down',
  down: 'up'
};

export function isDirection(value: unknown): value is Direction {
  return value === 'left' || value === 'right' || value === 'up' || value === 'down';
}

export function opposite(direction: Direction): Direction {
  return OPPOSITES[direction];
}

export function isReversal(heading: Direction, direction: Direction): boolean {
  return OPPOSITES[heading] === direction;
}

export function moveCell(cell: Cell, direction: Direction): Cell {
  const v = VECTORS[direction];
  return { x: cell.x + v.x, y: cell.y + v.y };
}

export function cellKey(cell: Cell): string {
  return `${cell.x},${cell.y}`;
}

export function sameCell(a: Cell, b: Cell): boolean {
  return a.x === b.x && a.y === b.y;
}

export function manhattan(a: Cell, b: Cell): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function inBounds(cell: Cell, bounds: Bounds): boolean {
  return cell.x >= 0 && cell.y >= 0 && cell.x < bounds.width && cell.y < bounds.height;
}

/**
 * Direction of a single step between two adjacent cells.
 * @param from - Step origin.
 * @param to - Step destination.
 * @returns Direction, or null when the cells are not adjacent.
 */
export function directionBetween(from: Cell, to: Cell): Direction | null {
  for (const direction of DIRECTIONS) {
    if (sameCell(moveCell(from, direction), to)) return direction;
  }
  return null;
}

/**
 * Check the snapshot invariants for states built by hand.
 * Throws on the first violation; snapshots read from a game never fail it.
 * @param state - Snapshot to check.
 */
export function assertGridState(state: GridState): void {
  const { head, body, target, bounds } = state;
  if (!Number.isInteger(bounds.width) || !Number.isInteger(bounds.height)) {
    throw new Error('bounds must be integers');
  }
  if (bounds.width <= 0 || bounds.height <= 0) {
    throw new Error('bounds must be positive');
  }
  const first = body[0];
  if (!first || !sameCell(first, head)) {
    throw new Error('head must equal body[0]');
  }
  const seen = new Set<string>();
  for (const segment of body) {
    const key = cellKey(segment);
    if (seen.has(key)) throw new Error(`duplicate body cell ${key}`);
    seen.add(key);
  }
  if (seen.has(cellKey(target))) {
    throw new Error('target lies inside the body');
  }
}
