import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadTomlConfig, normalizeConfig, parseConfig } from './config.ts';

describe('runner config (unit)', () => {
  let dir: string;
  let warnings: string[];
  const warn = (msg: string) => {
    warnings.push(msg);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'runner-config-'));
    warnings = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeToml = (body: string): string => {
    const file = path.join(dir, 'config.toml');
    fs.writeFileSync(file, body);
    return file;
  };

  it('falls back to the defaults without a file, flags or environment', () => {
    const config = parseConfig(['--config', path.join(dir, 'missing.toml')], {}, warn);
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  it('ranks flags over environment over the file', () => {
    const file = writeToml('[runner]\nepisodes = 10\nseed = 3\nagent = "goal"\n');
    const config = parseConfig(['--config', file, '--episodes', '30'], { EPISODES: '20', AGENT: 'utility' }, warn);
    expect(config.episodes).toBe(30);
    expect(config.agent).toBe('utility');
    expect(config.seed).toBe(3);
    expect(warnings).toEqual([]);
  });

  it('accepts --flag=value and finds the file through SNAKE_CONFIG', () => {
    const file = writeToml('[runner]\nmode = "evaluate"\ndbPath = "./runs/test.db"\n');
    const config = parseConfig(['--episodes=40', '--log=debug'], { SNAKE_CONFIG: file }, warn);
    expect(config.episodes).toBe(40);
    expect(config.logLevel).toBe('debug');
    expect(config.mode).toBe('evaluate');
    expect(config.dbPath).toBe('./runs/test.db');
  });

  it('reads every runner setting from the environment', () => {
    const config = parseConfig(
      ['--config', path.join(dir, 'missing.toml')],
      {
        RUN_MODE: 'evaluate',
        SEED: '11',
        Q_TABLE_PATH: '/tmp/q.json',
        DB_PATH: ':memory:',
        CHECKPOINT_EVERY: '5',
        LOG_EVERY: '0',
        LOG_LEVEL: 'warn'
      },
      warn
    );
    expect(config).toMatchObject({
      mode: 'evaluate',
      seed: 11,
      qTablePath: '/tmp/q.json',
      dbPath: ':memory:',
      checkpointEvery: 5,
      logEvery: 0,
      logLevel: 'warn'
    });
  });

  it('warns about and replaces invalid values', () => {
    const config = normalizeConfig(
      { mode: 'fly', agent: 'random', logLevel: 'loud', episodes: 0, seed: -1, qTablePath: '  ' },
      warn
    );
    expect(config).toMatchObject({
      mode: 'train',
      agent: 'learning',
      logLevel: 'info',
      episodes: 1,
      seed: 0,
      qTablePath: DEFAULT_CONFIG.qTablePath
    });
    expect(warnings).toEqual([
      'mode "fly" is invalid; using train.',
      'agent "random" is invalid; using learning.',
      'logLevel "loud" is invalid; using info (one of debug, info, warn, error).',
      'episodes was clamped to 1.',
      'seed was clamped to 0.',
      'qTablePath is invalid; using ./data/q_table.json.'
    ]);
  });

  it('collects agent tuning sections and skips non-numeric values', () => {
    const file = writeToml(
      [
        '[learning]',
        'alpha = 0.2',
        '[learning.epsilon]',
        'schedule = "linear"',
        'episodes = 100',
        '[utility]',
        'spaceRadius = "big"',
        '[runner]',
        'mode = 5'
      ].join('\n')
    );
    const input = loadTomlConfig(file, warn);
    expect(input.mode).toBeUndefined();
    expect(input.agentOverrides).toEqual({
      board: {},
      learning: { alpha: 0.2, epsilon: { schedule: { kind: 'linear', episodes: 100 } } },
      signature: {},
      utility: {},
      worldModel: {},
      episode: {}
    });
    expect(warnings).toEqual(['utility.spaceRadius must be a number; ignoring.', 'runner.mode must be a string; ignoring.']);
  });

  it('ignores an unknown epsilon schedule', () => {
    const file = writeToml('[learning.epsilon]\nschedule = "cosine"\n');
    const input = loadTomlConfig(file, warn);
    expect(input.agentOverrides?.learning?.epsilon).toEqual({});
    expect(warnings).toEqual(['learning.epsilon.schedule "cosine" is invalid; ignoring.']);
  });

  it('reports a file that does not parse and keeps the defaults', () => {
    const file = writeToml('[runner\nepisodes = ');
    const config = parseConfig(['--config', file], {}, warn);
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`failed to parse ${file}:`)).toBe(true);
  });

  it('treats a blank file as empty', () => {
    expect(loadTomlConfig(writeToml('  \n'), warn)).toEqual({});
    expect(warnings).toEqual([]);
  });
});
