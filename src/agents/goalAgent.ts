// goalAgent.ts
// Planning agent: route to the target when there is room and the route leaves
// an exit, else head for open space, else any route, else any safe step.

import { createCollisionOracle, safeDirections } from '../collision.ts';
import {
  DIRECTIONS,
  cellKey,
  directionBetween,
  isReversal,
  moveCell,
  type Direction,
  type GridState,
  type MoveDecision,
  type Path
} from '../grid.ts';
import { openArea } from '../planning/floodFill.ts';
import { findPath, findPathBFS, findRefugePath } from '../planning/pathfinder.ts';
import type { Agent } from './types.ts';

export type GoalStage = 'astar' | 'refuge' | 'bfs' | 'emergency';

export interface GoalDecision extends MoveDecision {
  stage: GoalStage;
}

/** The target is chased only while the open area exceeds this many body lengths. */
export const CHASE_SPACE_FACTOR = 2;

/** Free cells reachable from the head, the head itself excluded. */
export function headRoom(state: GridState): number {
  const { width, height } = state.bounds;
  return openArea(createCollisionOracle(state), state.head, width * height);
}

/**
 * True when the path's end keeps at least one free neighbour that the path
 * itself does not cover.
 */
export function leavesExit(state: GridState, path: Path): boolean {
  const end = path[path.length - 1];
  if (!end || path.length < 2) return false;
  const oracle = createCollisionOracle(state);
  const onPath = new Set(path.map(cellKey));
  return DIRECTIONS.some(direction => {
    const neighbour = moveCell(end, direction);
    return !onPath.has(cellKey(neighbour)) && !oracle.isLethal(neighbour);
  });
}

function firstStep(state: GridState, path: Path | null): Direction | null {
  const next = path?.[1];
  if (!next) return null;
  const direction = directionBetween(state.head, next);
  if (!direction || isReversal(state.heading, direction)) return null;
  return direction;
}

/**
 * One planning pass.
 * @param state - Current snapshot.
 * @param refugeRadius - Flood-fill depth for the refuge search.
 */
export function planGoalMove(state: GridState, refugeRadius: number): GoalDecision {
  if (headRoom(state) > CHASE_SPACE_FACTOR * state.body.length) {
    const route = findPath(state);
    const astar = route && leavesExit(state, route) ? firstStep(state, route) : null;
    if (astar) return { direction: astar, safe: true, stage: 'astar' };
  }

  const refuge = firstStep(state, findRefugePath(state, refugeRadius));
  if (refuge) return { direction: refuge, safe: true, stage: 'refuge' };

  const bfs = firstStep(state, findPathBFS(state));
  if (bfs) return { direction: bfs, safe: true, stage: 'bfs' };

  const emergency = safeDirections(state).find(d => !isReversal(state.heading, d));
  if (emergency) return { direction: emergency, safe: true, stage: 'emergency' };
  return { direction: state.heading, safe: false, stage: 'emergency' };
}

export function createGoalAgent(refugeRadius: number): Agent {
  return {
    kind: 'goal',
    decide: (state: GridState): MoveDecision => {
      const { direction, safe } = planGoalMove(state, refugeRadius);
      return { direction, safe };
    },
    resetEpisode: () => {}
  };
}
