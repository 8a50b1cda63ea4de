import type { UtilityWeights } from '../config.ts';
import type { GridState } from '../grid.ts';
import { bestMove } from '../planning/utility.ts';
import type { Agent } from './types.ts';

export function createUtilityAgent(weights: UtilityWeights): Agent {
  return {
    kind: 'utility',
    decide: (state: GridState) => bestMove(state, { weights }),
    resetEpisode: () => {}
  };
}
