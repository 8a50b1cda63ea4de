// utility.ts
// Multi-criteria scoring of the four candidate moves.

import { AGENT_DEFAULTS, type UtilityWeights } from '../config.ts';
import { createCollisionOracle } from '../collision.ts';
import {
  DIRECTIONS,
  cellKey,
  isReversal,
  manhattan,
  moveCell,
  type Cell,
  type Direction,
  type GridState,
  type MoveDecision
} from '../grid.ts';
import { boundedFreeSpace } from './floodFill.ts';

/** Per-direction breakdown, useful for logging and tests. */
export interface MoveScore {
  direction: Direction;
  next: Cell;
  lethal: boolean;
  /** Manhattan distance from the next head to the target. */
  distance: number;
  /** Bounded free space around the next head. */
  space: number;
  score: number;
}

export interface UtilityOptions {
  weights?: UtilityWeights;
  /** Cell keys to penalize, e.g. remembered danger zones. */
  hazards?: Pick<ReadonlySet<string>, 'has'>;
}

/**
 * Score every direction in priority order. Lethal moves score -Infinity.
 * @param state - Current snapshot; not mutated.
 * @param options - Weights and optional hazard cells.
 */
export function evaluateMoves(state: GridState, options: UtilityOptions = {}): MoveScore[] {
  const weights = options.weights ?? AGENT_DEFAULTS.utility;
  const hazards = options.hazards;
  const oracle = createCollisionOracle(state);

  return DIRECTIONS.map((direction): MoveScore => {
    const next = moveCell(state.head, direction);
    const distance = manhattan(next, state.target);
    if (oracle.isLethal(next)) {
      return { direction, next, lethal: true, distance, space: 0, score: -Infinity };
    }
    const space = boundedFreeSpace(oracle, next, weights.spaceRadius);
    let score = -weights.distanceWeight * distance + weights.spaceWeight * space - weights.moveCost;
    if (isReversal(state.heading, direction)) score -= weights.reversePenalty;
    if (hazards?.has(cellKey(next))) score -= weights.hazardPenalty;
    return { direction, next, lethal: false, distance, space, score };
  });
}

/**
 * Argmax over {@link evaluateMoves}; ties go to the earlier direction in
 * priority order. When all four moves are lethal the first direction is
 * returned with `safe: false`.
 */
export function bestMove(state: GridState, options: UtilityOptions = {}): MoveDecision {
  const scores = evaluateMoves(state, options);
  let best: MoveScore | undefined;
  for (const entry of scores) {
    if (!best || entry.score > best.score) best = entry;
  }
  if (!best) return { direction: 'left', safe: false };
  return { direction: best.direction, safe: !best.lethal };
}
