import type { Agent } from '../agents/types.ts';
import type { GameOverReason, GridGame } from './gridGame.ts';
import { readGridState } from './query.ts';

export type EpisodeEndReason = GameOverReason | 'max-steps';

export interface EpisodeResult {
  score: number;
  steps: number;
  reason: EpisodeEndReason;
}

export interface EpisodeLimits {
  maxSteps: number;
}

/**
 * Play one game to the end: decide, apply, step, observe.
 * @param game - Fresh game; mutated.
 * @param agent - Strategy; its per-episode memory is reset first.
 * @param limits - Step cap.
 */
export function runEpisode(game: GridGame, agent: Agent, limits: EpisodeLimits): EpisodeResult {
  agent.resetEpisode();
  let steps = 0;
  while (steps < limits.maxSteps) {
    const previous = readGridState(game);
    const previousScore = game.currentScore();
    const decision = agent.decide(previous);
    game.applyMove(decision.direction);
    const result = game.step();
    steps++;
    agent.observe?.({
      previous,
      decision,
      next: readGridState(game),
      previousScore,
      currentScore: game.currentScore(),
      died: result.died
    });
    if (result.reason) {
      return { score: game.currentScore(), steps, reason: result.reason };
    }
  }
  return { score: game.currentScore(), steps, reason: 'max-steps' };
}
