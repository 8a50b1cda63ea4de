// worldModel.ts
// Session memory for the model agent: danger zones, near misses and a
// last-write-wins cache of moves that worked for a signature.

import {
  AGENT_DEFAULTS,
  type SignatureConfig,
  type UtilityWeights,
  type WorldModelConfig
} from '../config.ts';
import { createCollisionOracle } from '../collision.ts';
import {
  cellKey,
  isReversal,
  manhattan,
  moveCell,
  type Cell,
  type Direction,
  type GridState,
  type MoveDecision
} from '../grid.ts';
import { encode, signatureKey, type StateSignature } from '../learning/signature.ts';
import { bestMove } from '../planning/utility.ts';
import { BoundedMap } from './boundedMap.ts';

export interface NearMiss {
  cell: Cell;
  tick: number;
  /** Manhattan distance to the nearest lethal cell when observed. */
  distance: number;
}

export interface WorldModelStats {
  /** Decisions served from the safe-move cache. */
  hits: number;
  /** Decisions that fell back to the utility evaluator. */
  misses: number;
  successes: number;
  failures: number;
}

export interface WorldModelSnapshot {
  tickCount: number;
  dangerZones: Cell[];
  safeMoves: Record<string, Direction>;
  nearMisses: NearMiss[];
  stats: WorldModelStats;
}

export interface WorldModelOptions {
  config?: WorldModelConfig;
  utility?: UtilityWeights;
  signature?: SignatureConfig;
}

/**
 * Manhattan distance from the head to the closest lethal cell: the nearest
 * cell outside the bounds, or a body segment past the neck. The neck is left
 * out since it always touches the head and is only reachable by reversing.
 */
export function nearestLethalDistance(state: GridState): number {
  const { head, body, bounds } = state;
  let nearest = Math.max(
    0,
    Math.min(head.x + 1, head.y + 1, bounds.width - head.x, bounds.height - head.y)
  );
  for (let i = 2; i < body.length; i++) {
    const segment = body[i];
    if (segment) nearest = Math.min(nearest, manhattan(head, segment));
  }
  return nearest;
}

function emptyStats(): WorldModelStats {
  return { hits: 0, misses: 0, successes: 0, failures: 0 };
}

export class WorldModel {
  private readonly config: WorldModelConfig;
  private readonly utility: UtilityWeights;
  private readonly signatureConfig: SignatureConfig;
  private readonly dangerZones: BoundedMap<string, Cell>;
  private readonly safeMoves: BoundedMap<string, Direction>;
  private nearMisses: NearMiss[] = [];
  private ticks = 0;
  private stats = emptyStats();

  constructor(options: WorldModelOptions = {}) {
    this.config = options.config ?? AGENT_DEFAULTS.worldModel;
    this.utility = options.utility ?? AGENT_DEFAULTS.utility;
    this.signatureConfig = options.signature ?? AGENT_DEFAULTS.signature;
    this.dangerZones = new BoundedMap(this.config.dangerZoneCapacity);
    this.safeMoves = new BoundedMap(this.config.safeMoveCapacity);
  }

  get tickCount(): number {
    return this.ticks;
  }

  /** Observe one tick; records a danger zone when the head runs close to a lethal cell. */
  update(state: GridState): void {
    this.ticks++;
    const horizon = this.ticks - this.config.nearMissMemoryTicks;
    this.nearMisses = this.nearMisses.filter(miss => miss.tick > horizon);

    const distance = nearestLethalDistance(state);
    if (distance >= this.config.nearMissThreshold) return;
    this.dangerZones.set(cellKey(state.head), { x: state.head.x, y: state.head.y });
    this.nearMisses.push({ cell: { x: state.head.x, y: state.head.y }, tick: this.ticks, distance });
    if (this.nearMisses.length > this.config.maxNearMisses) {
      this.nearMisses.splice(0, this.nearMisses.length - this.config.maxNearMisses);
    }
  }

  recordOutcome(signature: StateSignature, direction: Direction, succeeded: boolean): void {
    const key = signatureKey(signature);
    if (succeeded) {
      this.stats.successes++;
      this.safeMoves.set(key, direction);
      return;
    }
    this.stats.failures++;
    if (this.safeMoves.get(key) === direction) this.safeMoves.delete(key);
  }

  /** Cached move for a signature, if one has been recorded. */
  lookup(signature: StateSignature): Direction | undefined {
    return this.safeMoves.get(signatureKey(signature));
  }

  isDangerZone(cell: Cell): boolean {
    return this.dangerZones.has(cellKey(cell));
  }

  /**
   * Cached move when it is still safe, otherwise the utility evaluator's
   * choice with danger zones penalized.
   */
  decide(state: GridState): MoveDecision {
    const cached = this.lookup(encode(state, this.signatureConfig));
    if (cached && !isReversal(state.heading, cached)) {
      const oracle = createCollisionOracle(state);
      if (!oracle.isLethal(moveCell(state.head, cached))) {
        this.stats.hits++;
        return { direction: cached, safe: true };
      }
    }
    this.stats.misses++;
    return bestMove(state, { weights: this.utility, hazards: this.dangerZones });
  }

  reset(): void {
    this.dangerZones.clear();
    this.safeMoves.clear();
    this.nearMisses = [];
    this.ticks = 0;
    this.stats = emptyStats();
  }

  snapshot(): WorldModelSnapshot {
    const safeMoves: Record<string, Direction> = {};
    for (const [key, direction] of this.safeMoves.toArray()) safeMoves[key] = direction;
    return {
      tickCount: this.ticks,
      dangerZones: this.dangerZones.toArray().map(([, cell]) => ({ ...cell })),
      safeMoves,
      nearMisses: this.nearMisses.map(miss => ({ ...miss, cell: { ...miss.cell } })),
      stats: { ...this.stats }
    };
  }
}
