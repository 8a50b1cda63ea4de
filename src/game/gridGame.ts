// gridGame.ts
// Headless snake on an integer grid. One call to step() is one tick.

import { AGENT_DEFAULTS } from '../config.ts';
import {
  cellKey,
  inBounds,
  isReversal,
  moveCell,
  sameCell,
  type Bounds,
  type Cell,
  type Direction
} from '../grid.ts';
import { createRng, randomIndex, type RandomSource } from '../rng.ts';
import type { GameQuery } from './query.ts';

/** Why a game stopped. `board-full` means the snake filled every cell. */
export type GameOverReason = 'wall' | 'self' | 'board-full';

export interface StepResult {
  ate: boolean;
  died: boolean;
  /** Set once the game is over. */
  reason: GameOverReason | null;
}

export interface GridGameOptions {
  width?: number;
  height?: number;
  /** Seed for target spawning; ignored when `rng` is given. */
  seed?: number;
  rng?: RandomSource;
  /** Initial body, head first. Defaults to a single cell at (1, 1). */
  body?: Cell[];
  heading?: Direction;
  /** Initial target; spawned from the random source when omitted. */
  target?: Cell;
}

const START: Cell = { x: 1, y: 1 };

export class GridGame implements GameQuery {
  readonly bounds: Bounds;
  private readonly rng: RandomSource;
  private body: Cell[];
  private heading: Direction;
  private target: Cell;
  private score = 0;
  private ticks = 0;
  private overReason: GameOverReason | null = null;

  constructor(options: GridGameOptions = {}) {
    this.bounds = {
      width: options.width ?? AGENT_DEFAULTS.board.width,
      height: options.height ?? AGENT_DEFAULTS.board.height
    };
    this.rng = options.rng ?? createRng(options.seed ?? 1);
    this.body = (options.body ?? [START]).map(cell => ({ x: cell.x, y: cell.y }));
    if (this.body.length === 0) throw new Error('snake body must not be empty');
    for (const cell of this.body) {
      if (!inBounds(cell, this.bounds)) throw new Error(`body cell ${cellKey(cell)} is out of bounds`);
    }
    this.heading = options.heading ?? 'down';
    const target = options.target ?? this.spawnTarget();
    if (!target) throw new Error('no free cell for a target');
    this.target = { x: target.x, y: target.y };
  }

  currentHead(): Cell {
    return { ...this.headCell() };
  }

  currentBody(): Cell[] {
    return this.body.map(cell => ({ ...cell }));
  }

  currentTarget(): Cell {
    return { ...this.target };
  }

  currentHeading(): Direction {
    return this.heading;
  }

  currentScore(): number {
    return this.score;
  }

  currentBounds(): Bounds {
    return { ...this.bounds };
  }

  potentialHead(direction: Direction): Cell {
    return moveCell(this.headCell(), direction);
  }

  /** Same rule as the collision oracle: outside the board or on any segment. */
  wouldCollide(cell: Cell): boolean {
    if (!inBounds(cell, this.bounds)) return true;
    return this.body.some(segment => sameCell(segment, cell));
  }

  /** Set the heading for the next tick. Reversals are ignored. */
  applyMove(direction: Direction): void {
    if (isReversal(this.heading, direction)) return;
    this.heading = direction;
  }

  get tickCount(): number {
    return this.ticks;
  }

  isOver(): boolean {
    return this.overReason !== null;
  }

  /** Advance one tick along the current heading. */
  step(): StepResult {
    if (this.overReason) {
      return { ate: false, died: this.overReason !== 'board-full', reason: this.overReason };
    }
    this.ticks++;
    const next = moveCell(this.headCell(), this.heading);
    if (!inBounds(next, this.bounds)) return this.end('wall');

    const ate = sameCell(next, this.target);
    // The tail moves out of the way this tick unless the snake grows.
    const blocking = ate ? this.body : this.body.slice(0, -1);
    if (blocking.some(segment => sameCell(segment, next))) return this.end('self');

    this.body.unshift(next);
    if (!ate) {
      this.body.pop();
      return { ate: false, died: false, reason: null };
    }
    this.score++;
    const target = this.spawnTarget();
    if (!target) {
      this.overReason = 'board-full';
      return { ate: true, died: false, reason: 'board-full' };
    }
    this.target = target;
    return { ate: true, died: false, reason: null };
  }

  private end(reason: 'wall' | 'self'): StepResult {
    this.overReason = reason;
    return { ate: false, died: true, reason };
  }

  private headCell(): Cell {
    const head = this.body[0];
    if (!head) throw new Error('snake has no head');
    return head;
  }

  private spawnTarget(): Cell | null {
    const occupied = new Set(this.body.map(cellKey));
    const free: Cell[] = [];
    for (let y = 0; y < this.bounds.height; y++) {
      for (let x = 0; x < this.bounds.width; x++) {
        if (!occupied.has(cellKey({ x, y }))) free.push({ x, y });
      }
    }
    if (free.length === 0) return null;
    return free[randomIndex(this.rng, free.length)] ?? null;
  }
}
