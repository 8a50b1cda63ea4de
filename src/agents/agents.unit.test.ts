import { describe, it, expect } from 'vitest';
import { resolveAgentConfig } from '../config.ts';
import { GridGame } from '../game/gridGame.ts';
import { runEpisode } from '../game/episode.ts';
import type { GridState } from '../grid.ts';
import { encode } from '../learning/signature.ts';
import { bestMove } from '../planning/utility.ts';
import { makeState } from '../test/fixtures.ts';
import { headRoom, leavesExit, planGoalMove } from './goalAgent.ts';
import { reflexDecision } from './reflexAgent.ts';
import { createAgent } from './registry.ts';
import { createSession } from './session.ts';
import { AGENT_KINDS, isAgentKind, type Outcome } from './types.ts';

const open = makeState({ body: [{ x: 5, y: 5 }], target: { x: 8, y: 5 }, heading: 'right' });
const trapped = makeState({
  body: [{ x: 0, y: 0 }, { x: 1, y: 0 }],
  target: { x: 5, y: 5 },
  heading: 'left',
  width: 2,
  height: 1
});

function outcome(previous: GridState, next: GridState, died = false): Outcome {
  return { previous, decision: { direction: 'right', safe: true }, next, previousScore: 0, currentScore: 0, died };
}

describe('agent kinds (unit)', () => {
  it('recognises every registered kind', () => {
    for (const kind of AGENT_KINDS) expect(isAgentKind(kind)).toBe(true);
    expect(isAgentKind('random')).toBe(false);
    expect(isAgentKind(3)).toBe(false);
  });

  it('builds an agent of each kind from one session', () => {
    const session = createSession();
    for (const kind of AGENT_KINDS) expect(createAgent(kind, session).kind).toBe(kind);
  });

  it('derives the session random source from the seed', () => {
    expect(createSession({ seed: 3 }).rng()).toBe(createSession({ seed: 3 }).rng());
    expect(createSession({ seed: 3 }).rng()).not.toBe(createSession({ seed: 4 }).rng());
  });
});

describe('reflex agent (unit)', () => {
  it('steps toward the target', () => {
    expect(reflexDecision(open)).toEqual({ direction: 'right', safe: true });
  });

  it('skips a reversal toward the target and takes the first safe alternative', () => {
    const behind = makeState({ body: [{ x: 5, y: 5 }], target: { x: 2, y: 5 }, heading: 'right' });
    expect(reflexDecision(behind)).toEqual({ direction: 'right', safe: true });
  });

  it('keeps the heading when every move is lethal', () => {
    expect(reflexDecision(trapped)).toEqual({ direction: 'left', safe: false });
  });
});

describe('goal agent (unit)', () => {
  it('follows the A* route when it leaves an exit', () => {
    const state = makeState({ body: [{ x: 5, y: 5 }], target: { x: 5, y: 1 }, heading: 'up' });
    expect(planGoalMove(state, 4)).toEqual({ direction: 'up', safe: true, stage: 'astar' });
  });

  it('checks for a free cell beside the end of a path', () => {
    expect(leavesExit(open, [{ x: 5, y: 5 }, { x: 6, y: 5 }])).toBe(true);
    expect(leavesExit(open, [{ x: 5, y: 5 }])).toBe(false);
  });

  it('heads for open space instead of the target when the snake is cramped', () => {
    // Free cells (3,0) and (4,0): room 2 is not more than twice the length 3.
    const cramped = makeState({
      body: [{ x: 2, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 0 }],
      target: { x: 3, y: 0 },
      heading: 'right',
      width: 5,
      height: 1
    });
    expect(headRoom(cramped)).toBe(2);
    expect(planGoalMove(cramped, 4)).toEqual({ direction: 'right', safe: true, stage: 'refuge' });
  });

  it('measures the room around the head without counting the head', () => {
    expect(headRoom(open)).toBe(99);
    expect(headRoom(trapped)).toBe(0);
  });

  it('reports an unsafe emergency when nothing is reachable', () => {
    expect(planGoalMove(trapped, 4)).toEqual({ direction: 'left', safe: false, stage: 'emergency' });
  });
});

describe('utility agent (unit)', () => {
  it('returns the evaluator choice under the session weights', () => {
    const agent = createAgent('utility', createSession());
    expect(agent.decide(open)).toEqual(bestMove(open));
  });
});

describe('model agent (unit)', () => {
  it('falls back to the evaluator and caches the move once it survives', () => {
    const session = createSession();
    const agent = createAgent('model', session);
    const decision = agent.decide(open);
    expect(decision).toEqual(bestMove(open));
    expect(session.worldModel.tickCount).toBe(1);

    agent.observe?.(outcome(open, makeState({ body: [{ x: 6, y: 5 }], target: { x: 8, y: 5 } })));
    expect(session.worldModel.lookup(encode(open))).toBe(decision.direction);
  });

  it('does not cache a move that killed the snake', () => {
    const session = createSession();
    const agent = createAgent('model', session);
    agent.decide(open);
    agent.observe?.(outcome(open, open, true));
    expect(session.worldModel.lookup(encode(open))).toBeUndefined();
  });
});

describe('learning agent (unit)', () => {
  const greedy = resolveAgentConfig({ learning: { epsilon: { initial: 0, floor: 0 } } });
  const after = makeState({ body: [{ x: 6, y: 5 }], target: { x: 8, y: 5 }, heading: 'right' });

  it('acts greedily and learns from the step penalty', () => {
    const session = createSession({ config: greedy });
    const agent = createAgent('learning', session);
    // Empty table: right, up and down tie; right comes first in priority order.
    expect(agent.decide(open)).toEqual({ direction: 'right', safe: true });
    agent.observe?.(outcome(open, after));
    // 0 + 0.1 * (-1 + 0.95 * 0 - 0)
    expect(session.qEngine.valueOf(encode(open), 'right')).toBeCloseTo(-0.1, 10);
  });

  it('leaves the table alone when learning is off', () => {
    const session = createSession({ config: greedy });
    const agent = createAgent('learning', session, { learn: false });
    agent.decide(open);
    agent.observe?.(outcome(open, after));
    expect(session.qEngine.table.size).toBe(0);
  });

  it('charges the death reward for stepping into a dead end', () => {
    const session = createSession({ config: greedy });
    const agent = createAgent('learning', session);
    const game = new GridGame({
      width: 3,
      height: 1,
      body: [{ x: 1, y: 0 }],
      heading: 'right',
      target: { x: 0, y: 0 }
    });
    // Right is the only valid move; from (2,0) nothing is, so the wall follows.
    expect(runEpisode(game, agent, { maxSteps: 10 })).toEqual({ score: 0, steps: 2, reason: 'wall' });
    const start = makeState({ body: [{ x: 1, y: 0 }], target: { x: 0, y: 0 }, heading: 'right', width: 3, height: 1 });
    // 0 + 0.1 * (-100 - 0)
    expect(session.qEngine.valueOf(encode(start), 'right')).toBeCloseTo(-10, 10);
    expect(session.qEngine.table.size).toBe(1);
  });

  it('keeps the heading without an update when no action is valid', () => {
    const session = createSession({ config: greedy });
    const agent = createAgent('learning', session);
    expect(agent.decide(trapped)).toEqual({ direction: 'left', safe: false });
    agent.observe?.(outcome(trapped, trapped, true));
    expect(session.qEngine.table.size).toBe(0);
  });
});
