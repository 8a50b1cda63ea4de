import type { Direction, GridState, MoveDecision } from '../grid.ts';
import { reward, type QLearningEngine } from '../learning/qLearning.ts';
import type { StateSignature } from '../learning/signature.ts';
import type { Agent, Outcome } from './types.ts';

export interface LearningAgentOptions {
  /** Apply Bellman updates from observed outcomes. Off for evaluation. */
  learn?: boolean;
}

/**
 * Epsilon-greedy agent over the session's Q engine. When no action is valid
 * it keeps the heading, reports `safe: false`, and skips the update. A move
 * into such a state is charged the death reward.
 */
export function createLearningAgent(engine: QLearningEngine, options: LearningAgentOptions = {}): Agent {
  const learn = options.learn ?? true;
  let pending: { signature: StateSignature; action: Direction } | null = null;
  engine.start();

  return {
    kind: 'learning',
    decide(state: GridState): MoveDecision {
      const signature = engine.encode(state);
      const action = engine.chooseAction(signature, engine.validActions(state));
      if (!action) {
        pending = null;
        return { direction: state.heading, safe: false };
      }
      pending = { signature, action };
      return { direction: action, safe: true };
    },
    observe(outcome: Outcome): void {
      const taken = pending;
      pending = null;
      if (!learn || !taken) return;
      const nextValid = outcome.died ? [] : engine.validActions(outcome.next);
      // A state with no valid action is a death one tick later; charge it here.
      engine.update({
        previousSignature: taken.signature,
        actionTaken: taken.action,
        reward: reward(outcome.previousScore, outcome.currentScore, outcome.died || nextValid.length === 0),
        nextSignature: engine.encode(outcome.next),
        nextValidActions: nextValid
      });
    },
    resetEpisode(): void {
      pending = null;
    }
  };
}
