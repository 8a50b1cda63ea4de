import type { Direction, GridState, MoveDecision } from '../grid.ts';
import type { StateSignature } from '../learning/signature.ts';
import { encode } from '../learning/signature.ts';
import type { WorldModel } from '../model/worldModel.ts';
import type { SignatureConfig } from '../config.ts';
import type { Agent, Outcome } from './types.ts';

export function createModelAgent(worldModel: WorldModel, signature: SignatureConfig): Agent {
  let pending: { signature: StateSignature; direction: Direction } | null = null;

  return {
    kind: 'model',
    decide(state: GridState): MoveDecision {
      worldModel.update(state);
      const decision = worldModel.decide(state);
      pending = decision.safe ? { signature: encode(state, signature), direction: decision.direction } : null;
      return decision;
    },
    observe(outcome: Outcome): void {
      if (!pending) return;
      worldModel.recordOutcome(pending.signature, pending.direction, !outcome.died);
      pending = null;
    },
    resetEpisode(): void {
      pending = null;
    }
  };
}
