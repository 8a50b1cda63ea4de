// collision.ts
// Lethality checks against a single snapshot.

import {
  DIRECTIONS,
  cellKey,
  inBounds,
  moveCell,
  type Cell,
  type Direction,
  type GridState
} from './grid.ts';

export interface CollisionOracle {
  /** True when the cell is off the board or on any body segment, tail included. */
  isLethal(cell: Cell): boolean;
}

/**
 * Build an oracle for one snapshot. Body membership is hashed once.
 * @param state - Snapshot to check against.
 */
export function createCollisionOracle(state: GridState): CollisionOracle {
  const occupied = new Set(state.body.map(cellKey));
  const { bounds } = state;
  return {
    isLethal: (cell) => !inBounds(cell, bounds) || occupied.has(cellKey(cell))
  };
}

/**
 * Directions whose next head is not lethal, in priority order.
 * Reversals are not filtered here.
 */
export function safeDirections(
  state: GridState,
  oracle: CollisionOracle = createCollisionOracle(state)
): Direction[] {
  return DIRECTIONS.filter(direction => !oracle.isLethal(moveCell(state.head, direction)));
}

