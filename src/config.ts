// config.ts
// Default tuning values for the decision core and the resolver that turns
// partial overrides into a complete, range-checked configuration.

import { clamp, deepClone, isFiniteNumber } from './utils.ts';

/** How epsilon shrinks between episodes. */
export type EpsilonSchedule =
  | { kind: 'geometric'; rate: number }
  | { kind: 'linear'; episodes: number };

export interface LearningConfig {
  /** Learning rate. */
  alpha: number;
  /** Discount factor. */
  gamma: number;
  epsilon: {
    initial: number;
    floor: number;
    schedule: EpsilonSchedule;
  };
}

export interface SignatureConfig {
  /** Manhattan width of one distance bucket. */
  bucketSize: number;
  /** Number of buckets; the last one is open-ended. */
  bucketCount: number;
}

export interface UtilityWeights {
  distanceWeight: number;
  spaceWeight: number;
  moveCost: number;
  /** Charged to the move that reverses the heading (a no-op in the game). */
  reversePenalty: number;
  /** Charged to moves into caller-supplied hazard cells. */
  hazardPenalty: number;
  /** Flood-fill depth for the free-space term. */
  spaceRadius: number;
}

export interface WorldModelConfig {
  /** A head closer than this to the nearest lethal cell counts as a near miss. */
  nearMissThreshold: number;
  /** Near misses older than this many ticks are forgotten. */
  nearMissMemoryTicks: number;
  maxNearMisses: number;
  dangerZoneCapacity: number;
  safeMoveCapacity: number;
}

export interface AgentConfig {
  board: { width: number; height: number };
  learning: LearningConfig;
  signature: SignatureConfig;
  utility: UtilityWeights;
  worldModel: WorldModelConfig;
  episode: { maxSteps: number };
}

export type AgentConfigOverrides = {
  board?: Partial<AgentConfig['board']>;
  learning?: {
    alpha?: number;
    gamma?: number;
    epsilon?: {
      initial?: number;
      floor?: number;
      schedule?: EpsilonSchedule;
    };
  };
  signature?: Partial<SignatureConfig>;
  utility?: Partial<UtilityWeights>;
  worldModel?: Partial<WorldModelConfig>;
  episode?: Partial<AgentConfig['episode']>;
};

// Board size matches a 1000x800 playfield of 40px blocks.
export const AGENT_DEFAULTS: AgentConfig = {
  board: { width: 25, height: 20 },
  learning: {
    alpha: 0.1,
    gamma: 0.95,
    epsilon: {
      initial: 0.9,
      floor: 0.01,
      schedule: { kind: 'geometric', rate: 0.995 }
    }
  },
  signature: {
    bucketSize: 5,
    bucketCount: 4
  },
  utility: {
    distanceWeight: 1,
    spaceWeight: 1,
    moveCost: 1,
    reversePenalty: 1000,
    hazardPenalty: 100,
    spaceRadius: 4
  },
  worldModel: {
    nearMissThreshold: 2,
    nearMissMemoryTicks: 50,
    maxNearMisses: 256,
    dangerZoneCapacity: 64,
    safeMoveCapacity: 4096
  },
  episode: {
    maxSteps: 1000
  }
};

type Warn = (msg: string) => void;

function pickNumber(
  name: string,
  value: number | undefined,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  if (value === undefined) return fallback;
  if (!isFiniteNumber(value)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clamp(value, min, max);
  if (clamped !== value) warn?.(`${name} was clamped to ${clamped}.`);
  return clamped;
}

function pickInt(
  name: string,
  value: number | undefined,
  fallback: number,
  min: number,
  max: number,
  warn?: Warn
): number {
  const picked = pickNumber(name, value, fallback, min, max, warn);
  return Math.floor(picked);
}

function resolveSchedule(
  raw: EpsilonSchedule | undefined,
  fallback: EpsilonSchedule,
  warn?: Warn
): EpsilonSchedule {
  if (!raw) return { ...fallback };
  if (raw.kind === 'geometric') {
    return {
      kind: 'geometric',
      rate: pickNumber('learning.epsilon.schedule.rate', raw.rate, 0.995, 0, 1, warn)
    };
  }
  return {
    kind: 'linear',
    episodes: pickInt('learning.epsilon.schedule.episodes', raw.episodes, 1000, 1, 10_000_000, warn)
  };
}

/**
 * Merge overrides onto the defaults and clamp every value into range.
 * @param overrides - Partial configuration from a file, flags or a test.
 * @param warn - Receives one message per rejected or clamped value.
 * @returns Complete configuration; the defaults are never mutated.
 */
export function resolveAgentConfig(overrides: AgentConfigOverrides = {}, warn?: Warn): AgentConfig {
  const base = deepClone(AGENT_DEFAULTS);
  const learning = overrides.learning ?? {};
  const epsilon = learning.epsilon ?? {};
  const signature = overrides.signature ?? {};
  const utility = overrides.utility ?? {};
  const worldModel = overrides.worldModel ?? {};
  const board = overrides.board ?? {};

  const initial = pickNumber('learning.epsilon.initial', epsilon.initial, base.learning.epsilon.initial, 0, 1, warn);
  let floor = pickNumber('learning.epsilon.floor', epsilon.floor, base.learning.epsilon.floor, 0, 1, warn);
  if (floor > initial) {
    warn?.('learning.epsilon.floor exceeded initial; clamping to initial.');
    floor = initial;
  }

  return {
    board: {
      width: pickInt('board.width', board.width, base.board.width, 2, 512, warn),
      height: pickInt('board.height', board.height, base.board.height, 2, 512, warn)
    },
    learning: {
      alpha: pickNumber('learning.alpha', learning.alpha, base.learning.alpha, 0, 1, warn),
      gamma: pickNumber('learning.gamma', learning.gamma, base.learning.gamma, 0, 1, warn),
      epsilon: {
        initial,
        floor,
        schedule: resolveSchedule(epsilon.schedule, base.learning.epsilon.schedule, warn)
      }
    },
    signature: {
      bucketSize: pickInt('signature.bucketSize', signature.bucketSize, base.signature.bucketSize, 1, 1024, warn),
      bucketCount: pickInt('signature.bucketCount', signature.bucketCount, base.signature.bucketCount, 1, 64, warn)
    },
    utility: {
      distanceWeight: pickNumber('utility.distanceWeight', utility.distanceWeight, base.utility.distanceWeight, 0, 1e6, warn),
      spaceWeight: pickNumber('utility.spaceWeight', utility.spaceWeight, base.utility.spaceWeight, 0, 1e6, warn),
      moveCost: pickNumber('utility.moveCost', utility.moveCost, base.utility.moveCost, 0, 1e6, warn),
      reversePenalty: pickNumber('utility.reversePenalty', utility.reversePenalty, base.utility.reversePenalty, 0, 1e9, warn),
      hazardPenalty: pickNumber('utility.hazardPenalty', utility.hazardPenalty, base.utility.hazardPenalty, 0, 1e9, warn),
      spaceRadius: pickInt('utility.spaceRadius', utility.spaceRadius, base.utility.spaceRadius, 0, 64, warn)
    },
    worldModel: {
      nearMissThreshold: pickInt('worldModel.nearMissThreshold', worldModel.nearMissThreshold, base.worldModel.nearMissThreshold, 1, 64, warn),
      nearMissMemoryTicks: pickInt('worldModel.nearMissMemoryTicks', worldModel.nearMissMemoryTicks, base.worldModel.nearMissMemoryTicks, 1, 1_000_000, warn),
      maxNearMisses: pickInt('worldModel.maxNearMisses', worldModel.maxNearMisses, base.worldModel.maxNearMisses, 1, 1_000_000, warn),
      dangerZoneCapacity: pickInt('worldModel.dangerZoneCapacity', worldModel.dangerZoneCapacity, base.worldModel.dangerZoneCapacity, 1, 1_000_000, warn),
      safeMoveCapacity: pickInt('worldModel.safeMoveCapacity', worldModel.safeMoveCapacity, base.worldModel.safeMoveCapacity, 1, 1_000_000, warn)
    },
    episode: {
      maxSteps: pickInt('episode.maxSteps', overrides.episode?.maxSteps, base.episode.maxSteps, 1, 10_000_000, warn)
    }
  };
}
