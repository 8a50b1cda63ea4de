import { describe, it, expect } from 'vitest';
import { AGENT_DEFAULTS, resolveAgentConfig } from './config.ts';

function resolveWithWarnings(overrides: Parameters<typeof resolveAgentConfig>[0]) {
  const warnings: string[] = [];
  const config = resolveAgentConfig(overrides, msg => warnings.push(msg));
  return { config, warnings };
}

describe('resolveAgentConfig (unit)', () => {
  it('returns a copy of the defaults when nothing is overridden', () => {
    const { config, warnings } = resolveWithWarnings({});
    expect(config).toEqual(AGENT_DEFAULTS);
    expect(config).not.toBe(AGENT_DEFAULTS);
    expect(config.learning).not.toBe(AGENT_DEFAULTS.learning);
    expect(warnings).toEqual([]);
  });

  it('applies overrides in range without warnings', () => {
    const { config, warnings } = resolveWithWarnings({
      learning: { alpha: 0.5, epsilon: { schedule: { kind: 'linear', episodes: 200 } } },
      utility: { spaceRadius: 2.7 }
    });
    expect(config.learning.alpha).toBe(0.5);
    expect(config.learning.gamma).toBe(0.95);
    expect(config.learning.epsilon.schedule).toEqual({ kind: 'linear', episodes: 200 });
    expect(config.utility.spaceRadius).toBe(2);
    expect(warnings).toEqual([]);
  });

  it('clamps out-of-range values and says so', () => {
    const { config, warnings } = resolveWithWarnings({
      learning: { alpha: 2 },
      board: { width: 600 }
    });
    expect(config.learning.alpha).toBe(1);
    expect(config.board.width).toBe(512);
    expect(warnings).toEqual(['board.width was clamped to 512.', 'learning.alpha was clamped to 1.']);
  });

  it('replaces non-finite values with the default', () => {
    const { config, warnings } = resolveWithWarnings({ learning: { gamma: Number.NaN } });
    expect(config.learning.gamma).toBe(0.95);
    expect(warnings).toEqual(['learning.gamma is invalid; using 0.95.']);
  });

  it('keeps the epsilon floor at or below the initial value', () => {
    const { config, warnings } = resolveWithWarnings({ learning: { epsilon: { initial: 0.2, floor: 0.5 } } });
    expect(config.learning.epsilon.floor).toBe(0.2);
    expect(warnings).toEqual(['learning.epsilon.floor exceeded initial; clamping to initial.']);
  });

  it('clamps a linear schedule to at least one episode', () => {
    const { config, warnings } = resolveWithWarnings({
      learning: { epsilon: { schedule: { kind: 'linear', episodes: 0 } } }
    });
    expect(config.learning.epsilon.schedule).toEqual({ kind: 'linear', episodes: 1 });
    expect(warnings).toEqual(['learning.epsilon.schedule.episodes was clamped to 1.']);
  });

  it('never mutates the defaults', () => {
    resolveAgentConfig({ utility: { moveCost: 9 } });
    expect(AGENT_DEFAULTS.utility.moveCost).toBe(1);
  });
});
