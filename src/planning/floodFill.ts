import type { CollisionOracle } from '../collision.ts';
import { DIRECTIONS, cellKey, moveCell, type Cell } from '../grid.ts';

/**
 * Count non-lethal cells reachable from `start` in at most `radius` steps.
 *
 * The start cell counts when it is itself non-lethal; a lethal start yields 0.
 * Work is bounded by the radius (at most 2r^2 + 2r + 1 cells), not the board.
 *
 * @param oracle - Oracle for the current snapshot.
 * @param start - Flood origin.
 * @param radius - Maximum BFS depth.
 * @returns Number of reachable free cells.
 */
export function boundedFreeSpace(oracle: CollisionOracle, start: Cell, radius: number): number {
  if (oracle.isLethal(start)) return 0;
  return flood(oracle, start, radius);
}

/**
 * Free cells reachable from `origin` within `radius` steps, not counting the
 * origin. Unlike {@link boundedFreeSpace} the origin may be occupied, so this
 * measures the room around the head.
 */
export function openArea(oracle: CollisionOracle, origin: Cell, radius: number): number {
  return flood(oracle, origin, radius) - 1;
}

function flood(oracle: CollisionOracle, start: Cell, radius: number): number {
  const seen = new Set<string>([cellKey(start)]);
  let frontier: Cell[] = [start];
  for (let depth = 0; depth < radius && frontier.length > 0; depth++) {
    const next: Cell[] = [];
    for (const cell of frontier) {
      for (const direction of DIRECTIONS) {
        const neighbour = moveCell(cell, direction);
        const key = cellKey(neighbour);
        if (seen.has(key) || oracle.isLethal(neighbour)) continue;
        seen.add(key);
        next.push(neighbour);
      }
    }
    frontier = next;
  }
  return seen.size;
}
