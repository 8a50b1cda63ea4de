import type { GridState, MoveDecision } from '../grid.ts';

export type AgentKind = 'reflex' | 'goal' | 'utility' | 'model' | 'learning';

export const AGENT_KINDS: readonly AgentKind[] = ['reflex', 'goal', 'utility', 'model', 'learning'];

export function isAgentKind(value: unknown): value is AgentKind {
  return typeof value === 'string' && (AGENT_KINDS as readonly string[]).includes(value);
}

/** What happened after a decision was applied for one tick. */
export interface Outcome {
  previous: GridState;
  decision: MoveDecision;
  /** Snapshot after the tick; equals the pre-move board when the snake died. */
  next: GridState;
  previousScore: number;
  currentScore: number;
  died: boolean;
}

export interface Agent {
  readonly kind: AgentKind;
  decide(state: GridState): MoveDecision;
  observe?(outcome: Outcome): void;
  /** Drop per-episode memory; session memory survives. */
  resetEpisode(): void;
}
