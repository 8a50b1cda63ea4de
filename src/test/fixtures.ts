import type { Cell, Direction, GridState } from '../grid.ts';

export interface StateInput {
  /** Head first. */
  body: Cell[];
  target: Cell;
  heading?: Direction;
  width?: number;
  height?: number;
}

/** Snapshot for tests; the head is taken from `body[0]`. */
export function makeState(input: StateInput): GridState {
  const head = input.body[0];
  if (!head) throw new Error('fixture body must not be empty');
  return {
    head,
    body: input.body,
    target: input.target,
    heading: input.heading ?? 'right',
    bounds: { width: input.width ?? 10, height: input.height ?? 10 }
  };
}

/** Horizontal run of cells from `from` leftwards, e.g. a snake heading right. */
export function rowLeftOf(from: Cell, length: number): Cell[] {
  return Array.from({ length }, (_, i) => ({ x: from.x - i, y: from.y }));
}
