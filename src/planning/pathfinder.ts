// pathfinder.ts
// Grid search from the head: A* toward the target, BFS as the fallback and a
// refuge search for when the target cannot be reached at all.

import { createCollisionOracle, type CollisionOracle } from '../collision.ts';
import {
  DIRECTIONS,
  cellKey,
  manhattan,
  moveCell,
  sameCell,
  type Cell,
  type GridState,
  type Path
} from '../grid.ts';
import { boundedFreeSpace } from './floodFill.ts';
import { StablePriorityQueue } from './priorityQueue.ts';

export type SearchMethod = 'astar' | 'bfs';

export interface PlannedRoute {
  path: Path;
  method: SearchMethod;
}

/** Parent links keyed by cell key; the start maps to null. */
type ParentMap = Map<string, Cell | null>;

function rebuildPath(parents: ParentMap, end: Cell): Path {
  const path: Path = [];
  let current: Cell | null = end;
  while (current) {
    path.push(current);
    current = parents.get(cellKey(current)) ?? null;
  }
  return path.reverse();
}

/**
 * A* with unit edge costs and the Manhattan heuristic.
 * Equal f-scores pop in insertion order; neighbours are pushed in priority order.
 */
function aStar(start: Cell, goal: Cell, oracle: CollisionOracle): Path | null {
  const startKey = cellKey(start);
  const parents: ParentMap = new Map([[startKey, null]]);
  const gScore = new Map<string, number>([[startKey, 0]]);
  const closed = new Set<string>();
  const open = new StablePriorityQueue<Cell>();
  open.push(start, manhattan(start, goal));

  while (open.size > 0) {
    const current = open.pop();
    if (!current) break;
    const currentKey = cellKey(current);
    if (closed.has(currentKey)) continue;
    closed.add(currentKey);
    if (sameCell(current, goal)) return rebuildPath(parents, current);

    const g = gScore.get(currentKey) ?? 0;
    for (const direction of DIRECTIONS) {
      const next = moveCell(current, direction);
      const nextKey = cellKey(next);
      if (closed.has(nextKey) || oracle.isLethal(next)) continue;
      const tentative = g + 1;
      const known = gScore.get(nextKey);
      if (known !== undefined && tentative >= known) continue;
      gScore.set(nextKey, tentative);
      parents.set(nextKey, current);
      open.push(next, tentative + manhattan(next, goal));
    }
  }
  return null;
}

/** Breadth-first parent map over every reachable cell, in discovery order. */
function breadthFirst(
  start: Cell,
  oracle: CollisionOracle,
  stopAt?: Cell
): { parents: ParentMap; order: Cell[] } {
  const parents: ParentMap = new Map([[cellKey(start), null]]);
  const order: Cell[] = [start];
  for (let cursor = 0; cursor < order.length; cursor++) {
    const current = order[cursor];
    if (!current) break;
    if (stopAt && sameCell(current, stopAt)) break;
    for (const direction of DIRECTIONS) {
      const next = moveCell(current, direction);
      const nextKey = cellKey(next);
      if (parents.has(nextKey) || oracle.isLethal(next)) continue;
      parents.set(nextKey, current);
      order.push(next);
    }
  }
  return { parents, order };
}

/**
 * Post-check for a planned path against a (possibly newer) snapshot.
 * @param state - Snapshot to validate against.
 * @param path - Candidate path.
 * @param goal - Expected last cell; defaults to the target.
 * @returns True when the path starts at the head, ends at the goal, moves one
 * cell per step and crosses no lethal cell after the head.
 */
export function validatePath(state: GridState, path: Path, goal: Cell = state.target): boolean {
  const first = path[0];
  const last = path[path.length - 1];
  if (!first || !last) return false;
  if (!sameCell(first, state.head) || !sameCell(last, goal)) return false;
  const oracle = createCollisionOracle(state);
  for (let i = 1; i < path.length; i++) {
    const prev = path[i - 1];
    const cell = path[i];
    if (!prev || !cell) return false;
    if (manhattan(prev, cell) !== 1) return false;
    if (oracle.isLethal(cell)) return false;
  }
  return true;
}

/**
 * Shortest path from head to target by A*.
 * @returns Validated path, or null when the target is unreachable.
 */
export function findPath(state: GridState): Path | null {
  const path = aStar(state.head, state.target, createCollisionOracle(state));
  if (!path || !validatePath(state, path)) return null;
  return path;
}

/**
 * Shortest path in edge count by plain BFS, independent of the heuristic.
 * @returns Validated path, or null when the target is unreachable.
 */
export function findPathBFS(state: GridState): Path | null {
  const oracle = createCollisionOracle(state);
  const { parents } = breadthFirst(state.head, oracle, state.target);
  if (!parents.has(cellKey(state.target))) return null;
  const path = rebuildPath(parents, state.target);
  if (!validatePath(state, path)) return null;
  return path;
}

/**
 * Broader exploration: path to the reachable cell with the most bounded free
 * space around it. Nearer cells win ties, then earlier discovery.
 * @param state - Current snapshot.
 * @param radius - Flood-fill depth used to score each reachable cell.
 * @returns Validated path of at least one step, or null when the head is boxed in.
 */
export function findRefugePath(state: GridState, radius: number): Path | null {
  const oracle = createCollisionOracle(state);
  const { parents, order } = breadthFirst(state.head, oracle);
  let best: Cell | null = null;
  let bestSpace = -1;
  for (let i = 1; i < order.length; i++) {
    const cell = order[i];
    if (!cell) continue;
    const space = boundedFreeSpace(oracle, cell, radius);
    if (space > bestSpace) {
      bestSpace = space;
      best = cell;
    }
  }
  if (!best) return null;
  const path = rebuildPath(parents, best);
  if (!validatePath(state, path, best)) return null;
  return path;
}

/**
 * A* first, BFS when A* yields nothing.
 * @returns Route with the method that produced it, or null.
 */
export function planRoute(state: GridState): PlannedRoute | null {
  const astar = findPath(state);
  if (astar) return { path: astar, method: 'astar' };
  const bfs = findPathBFS(state);
  if (bfs) return { path: bfs, method: 'bfs' };
  return null;
}
