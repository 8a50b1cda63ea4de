import type { Bounds, Cell, Direction, GridState } from '../grid.ts';

/**
 * Read side of a running game plus the single mutating call a strategy makes.
 */
export interface GameQuery {
  currentHead(): Cell;
  /** Head first. */
  currentBody(): Cell[];
  currentTarget(): Cell;
  currentHeading(): Direction;
  currentScore(): number;
  currentBounds(): Bounds;
  /** Where the head would be after moving in `direction`; does not mutate. */
  potentialHead(direction: Direction): Cell;
  wouldCollide(cell: Cell): boolean;
  /** Commit the move for this tick. */
  applyMove(direction: Direction): void;
}

/** Snapshot a game for one decision. */
export function readGridState(query: GameQuery): GridState {
  return {
    head: query.currentHead(),
    body: query.currentBody(),
    target: query.currentTarget(),
    heading: query.currentHeading(),
    bounds: query.currentBounds()
  };
}
