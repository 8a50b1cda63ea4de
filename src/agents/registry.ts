import { createGoalAgent } from './goalAgent.ts';
import { createLearningAgent } from './learningAgent.ts';
import { createModelAgent } from './modelAgent.ts';
import { createReflexAgent } from './reflexAgent.ts';
import type { SessionContext } from './session.ts';
import type { Agent, AgentKind } from './types.ts';
import { createUtilityAgent } from './utilityAgent.ts';

export interface CreateAgentOptions {
  /** Learning agent only: apply updates from outcomes. */
  learn?: boolean;
}

export function createAgent(kind: AgentKind, session: SessionContext, options: CreateAgentOptions = {}): Agent {
  const { config } = session;
  switch (kind) {
    case 'reflex':
      return createReflexAgent();
    case 'goal':
      return createGoalAgent(config.utility.spaceRadius);
    case 'utility':
      return createUtilityAgent(config.utility);
    case 'model':
      return createModelAgent(session.worldModel, config.signature);
    case 'learning':
      return createLearningAgent(session.qEngine, { learn: options.learn ?? true });
    default: {
      const unknown: never = kind;
      throw new Error(`Unknown agent kind: ${String(unknown)}`);
    }
  }
}
