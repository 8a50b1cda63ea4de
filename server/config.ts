import fs from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import { isAgentKind, type AgentKind } from '../src/agents/types.ts';
import type { AgentConfigOverrides, EpsilonSchedule } from '../src/config.ts';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../src/logger.ts';
import { isFiniteNumber, isRecord } from '../src/utils.ts';

export type RunMode = 'train' | 'evaluate';

export interface RunnerConfig {
  mode: RunMode;
  agent: AgentKind;
  episodes: number;
  seed: number;
  qTablePath: string;
  dbPath: string;
  /** Flush the Q-table every N episodes; 0 flushes only at the end. */
  checkpointEvery: number;
  /** Progress line every N episodes; 0 disables it. */
  logEvery: number;
  logLevel: LogLevel;
  /** Agent tuning from the TOML file, resolved later by resolveAgentConfig. */
  agentOverrides: AgentConfigOverrides;
}

export type RunnerConfigInput = Partial<Omit<RunnerConfig, 'mode' | 'agent' | 'logLevel'>> & {
  mode?: string;
  agent?: string;
  logLevel?: string;
};

export const DEFAULT_CONFIG: RunnerConfig = {
  mode: 'train',
  agent: 'learning',
  episodes: 500,
  seed: 1,
  qTablePath: './data/q_table.json',
  dbPath: './data/runs.db',
  checkpointEvery: 50,
  logEvery: 25,
  logLevel: 'info',
  agentOverrides: {}
};

export const DEFAULT_CONFIG_PATH = 'config.toml';

type Env = Record<string, string | undefined>;
type Warn = (msg: string) => void;

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clampInt(Math.floor(parsed), min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

function coercePath(name: string, value: string | undefined, fallback: string, warn?: Warn): string {
  if (value === undefined) return fallback;
  if (!value.trim()) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  return value;
}

export function normalizeConfig(input: RunnerConfigInput, warn?: Warn): RunnerConfig {
  let mode = DEFAULT_CONFIG.mode;
  if (input.mode === 'train' || input.mode === 'evaluate') {
    mode = input.mode;
  } else if (input.mode) {
    warn?.(`mode "${input.mode}" is invalid; using ${mode}.`);
  }
  let agent = DEFAULT_CONFIG.agent;
  if (isAgentKind(input.agent)) {
    agent = input.agent;
  } else if (input.agent) {
    warn?.(`agent "${input.agent}" is invalid; using ${agent}.`);
  }
  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel) {
    warn?.(`logLevel "${input.logLevel}" is invalid; using ${logLevel} (one of ${LOG_LEVELS.join(', ')}).`);
  }
  return {
    mode,
    agent,
    episodes: coerceInt('episodes', input.episodes, DEFAULT_CONFIG.episodes, 1, 10_000_000, warn),
    seed: coerceInt('seed', input.seed, DEFAULT_CONFIG.seed, 0, 0xffffffff, warn),
    qTablePath: coercePath('qTablePath', input.qTablePath, DEFAULT_CONFIG.qTablePath, warn),
    dbPath: coercePath('dbPath', input.dbPath, DEFAULT_CONFIG.dbPath, warn),
    checkpointEvery: coerceInt('checkpointEvery', input.checkpointEvery, DEFAULT_CONFIG.checkpointEvery, 0, 1_000_000, warn),
    logEvery: coerceInt('logEvery', input.logEvery, DEFAULT_CONFIG.logEvery, 0, 1_000_000, warn),
    logLevel,
    agentOverrides: input.agentOverrides ?? {}
  };
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  return isRecord(value) ? value : {};
}

/** Finite numbers under `keys`; anything else is reported and skipped. */
function numbers<K extends string>(
  table: Record<string, unknown>,
  prefix: string,
  keys: readonly K[],
  warn?: Warn
): Partial<Record<K, number>> {
  const out: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = table[key];
    if (value === undefined) continue;
    if (isFiniteNumber(value)) {
      out[key] = value;
    } else {
      warn?.(`${prefix}.${key} must be a number; ignoring.`);
    }
  }
  return out;
}

function readSchedule(table: Record<string, unknown>, warn?: Warn): EpsilonSchedule | undefined {
  const kind = table['schedule'];
  if (kind === undefined) return undefined;
  const params = numbers(table, 'learning.epsilon', ['rate', 'episodes'] as const, warn);
  if (kind === 'geometric') return { kind: 'geometric', rate: params.rate ?? 0.995 };
  if (kind === 'linear') return { kind: 'linear', episodes: params.episodes ?? 1000 };
  warn?.(`learning.epsilon.schedule "${String(kind)}" is invalid; ignoring.`);
  return undefined;
}

/** Agent tuning sections of the TOML document. Range checks happen later. */
export function readAgentOverrides(raw: Record<string, unknown>, warn?: Warn): AgentConfigOverrides {
  const learning = section(raw, 'learning');
  const epsilon = section(learning, 'epsilon');
  const schedule = readSchedule(epsilon, warn);
  return {
    board: numbers(section(raw, 'board'), 'board', ['width', 'height'] as const, warn),
    learning: {
      ...numbers(learning, 'learning', ['alpha', 'gamma'] as const, warn),
      epsilon: {
        ...numbers(epsilon, 'learning.epsilon', ['initial', 'floor'] as const, warn),
        ...(schedule ? { schedule } : {})
      }
    },
    signature: numbers(section(raw, 'signature'), 'signature', ['bucketSize', 'bucketCount'] as const, warn),
    utility: numbers(
      section(raw, 'utility'),
      'utility',
      ['distanceWeight', 'spaceWeight', 'moveCost', 'reversePenalty', 'hazardPenalty', 'spaceRadius'] as const,
      warn
    ),
    worldModel: numbers(
      section(raw, 'worldModel'),
      'worldModel',
      ['nearMissThreshold', 'nearMissMemoryTicks', 'maxNearMisses', 'dangerZoneCapacity', 'safeMoveCapacity'] as const,
      warn
    ),
    episode: numbers(section(raw, 'episode'), 'episode', ['maxSteps'] as const, warn)
  };
}

function stringField(table: Record<string, unknown>, key: string, warn?: Warn): string | undefined {
  const value = table[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  warn?.(`runner.${key} must be a string; ignoring.`);
  return undefined;
}

/**
 * Load runner settings and agent tuning from a TOML file.
 * @param filePath - TOML path to read.
 * @returns Partial input; empty when the file is missing, blank or invalid.
 */
export function loadTomlConfig(filePath: string, warn?: Warn): RunnerConfigInput {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, 'utf8');
  if (!raw.trim()) return {};
  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    warn?.(`failed to parse ${filePath}: ${message}`);
    return {};
  }
  const runner = section(parsed, 'runner');
  const input: RunnerConfigInput = {
    ...numbers(runner, 'runner', ['episodes', 'seed', 'checkpointEvery', 'logEvery'] as const, warn),
    agentOverrides: readAgentOverrides(parsed, warn)
  };
  const mode = stringField(runner, 'mode', warn);
  if (mode !== undefined) input.mode = mode;
  const agent = stringField(runner, 'agent', warn);
  if (agent !== undefined) input.agent = agent;
  const logLevel = stringField(runner, 'logLevel', warn);
  if (logLevel !== undefined) input.logLevel = logLevel;
  const qTablePath = stringField(runner, 'qTablePath', warn);
  if (qTablePath !== undefined) input.qTablePath = qTablePath;
  const dbPath = stringField(runner, 'dbPath', warn);
  if (dbPath !== undefined) input.dbPath = dbPath;
  return input;
}

/**
 * Resolve the runner config. Flags beat environment variables, which beat
 * the TOML file, which beats the defaults.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: Warn = (msg) => console.warn(`[config] ${msg}`)
): RunnerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['SNAKE_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const input: RunnerConfigInput = loadTomlConfig(configPath, warn);

  const mode = getArgValue(argv, '--mode') ?? env['RUN_MODE'];
  if (mode) input.mode = mode;
  const agent = getArgValue(argv, '--agent') ?? env['AGENT'];
  if (agent) input.agent = agent;
  const episodes = parseIntValue(getArgValue(argv, '--episodes')) ?? parseIntValue(env['EPISODES']);
  if (episodes !== undefined) input.episodes = episodes;
  const seed = parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['SEED']);
  if (seed !== undefined) input.seed = seed;
  const qTablePath = getArgValue(argv, '--q-table') ?? env['Q_TABLE_PATH'];
  if (qTablePath) input.qTablePath = qTablePath;
  const dbPath = getArgValue(argv, '--db-path') ?? env['DB_PATH'];
  if (dbPath) input.dbPath = dbPath;
  const checkpointEvery =
    parseIntValue(getArgValue(argv, '--checkpoint-every')) ?? parseIntValue(env['CHECKPOINT_EVERY']);
  if (checkpointEvery !== undefined) input.checkpointEvery = checkpointEvery;
  const logEvery = parseIntValue(getArgValue(argv, '--log-every')) ?? parseIntValue(env['LOG_EVERY']);
  if (logEvery !== undefined) input.logEvery = logEvery;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  return normalizeConfig(input, warn);
}
