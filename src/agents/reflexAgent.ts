import { createCollisionOracle, safeDirections } from '../collision.ts';
import { isReversal, moveCell, type Direction, type GridState, type MoveDecision } from '../grid.ts';
import type { Agent } from './types.ts';

/** Directions that close the gap to the target, x axis first. */
function targetFacing(state: GridState): Direction[] {
  const { head, target } = state;
  const out: Direction[] = [];
  if (target.x < head.x) out.push('left');
  if (target.x > head.x) out.push('right');
  if (target.y > head.y) out.push('down');
  if (target.y < head.y) out.push('up');
  return out;
}

/**
 * Stateless greedy chaser: first safe step toward the target, else any safe
 * non-reversing step.
 */
export function reflexDecision(state: GridState): MoveDecision {
  const oracle = createCollisionOracle(state);
  for (const direction of targetFacing(state)) {
    if (isReversal(state.heading, direction)) continue;
    if (!oracle.isLethal(moveCell(state.head, direction))) return { direction, safe: true };
  }
  const fallback = safeDirections(state, oracle).find(d => !isReversal(state.heading, d));
  if (fallback) return { direction: fallback, safe: true };
  return { direction: state.heading, safe: false };
}

export function createReflexAgent(): Agent {
  return {
    kind: 'reflex',
    decide: reflexDecision,
    resetEpisode: () => {}
  };
}
