// qLearning.ts
// Tabular Q-learning: epsilon-greedy selection, Bellman updates, epsilon
// schedule and table persistence.

import { AGENT_DEFAULTS, type LearningConfig, type SignatureConfig } from '../config.ts';
import { createCollisionOracle } from '../collision.ts';
import { DIRECTIONS, isReversal, moveCell, type Direction, type GridState } from '../grid.ts';
import { silentLogger, type Logger } from '../logger.ts';
import { randomIndex, type RandomSource } from '../rng.ts';
import { clamp } from '../utils.ts';
import { QTable, type ActionValues } from './qTable.ts';
import { readTableFile, writeTableFile, type PersistResult, type RestoreReport } from './qTableStore.ts';
import { encode, signatureKey, type StateSignature } from './signature.ts';

/** Reward for a tick that raised the score. */
export const REWARD_TARGET = 50;
/** Reward for a tick that ended the episode. */
export const REWARD_DEATH = -100;
/** Reward for any other tick. */
export const REWARD_STEP = -1;

/**
 * Session lifecycle. `active` loops on every choice or update; `flushed`
 * follows a successful persist and returns to `active` on the next update.
 */
export type EnginePhase = 'uninitialized' | 'loaded' | 'active' | 'flushed';

/** One observed step, consumed by a single update. */
export interface Transition {
  previousSignature: StateSignature;
  actionTaken: Direction;
  reward: number;
  nextSignature: StateSignature;
  /** Empty for terminal transitions. */
  nextValidActions: readonly Direction[];
}

export interface QLearningOptions {
  learning?: LearningConfig;
  signature?: SignatureConfig;
  rng: RandomSource;
  logger?: Logger;
}

/**
 * Reward for one tick. Death outranks a score change.
 * @param previousScore - Score before the tick.
 * @param currentScore - Score after the tick.
 * @param died - Whether the tick ended the episode.
 */
export function reward(previousScore: number, currentScore: number, died: boolean): number {
  if (died) return REWARD_DEATH;
  if (currentScore > previousScore) return REWARD_TARGET;
  return REWARD_STEP;
}

export class QLearningEngine {
  private learning: LearningConfig;
  private signatureConfig: SignatureConfig;
  private rng: RandomSource;
  private logger: Logger;
  private qTable = new QTable();
  private phaseValue: EnginePhase = 'uninitialized';
  private epsilonValue: number;
  private episodes = 0;
  private closed = false;

  constructor(options: QLearningOptions) {
    this.learning = options.learning ?? AGENT_DEFAULTS.learning;
    this.signatureConfig = options.signature ?? AGENT_DEFAULTS.signature;
    this.rng = options.rng;
    this.logger = options.logger ?? silentLogger;
    this.epsilonValue = this.learning.epsilon.initial;
  }

  get phase(): EnginePhase {
    return this.phaseValue;
  }

  get epsilon(): number {
    return this.epsilonValue;
  }

  /** Completed episodes since construction. */
  get episodeCount(): number {
    return this.episodes;
  }

  /** Live table; callers may inspect or seed it. */
  get table(): QTable {
    return this.qTable;
  }

  /** Override exploration, e.g. 0 for greedy evaluation. */
  setEpsilon(value: number): void {
    this.epsilonValue = clamp(value, 0, 1);
  }

  /** Begin with an empty table instead of restoring one. */
  start(): void {
    this.ensureOpen();
    if (this.phaseValue !== 'uninitialized') return;
    this.qTable = new QTable();
    this.phaseValue = 'loaded';
  }

  /**
   * Replace the table with the contents of a file. Never throws on I/O: a
   * missing or unreadable file leaves an empty table.
   * @param filePath - JSON table file.
   */
  restore(filePath: string): RestoreReport {
    this.ensureOpen();
    const { table, report } = readTableFile(filePath);
    this.qTable = table;
    this.phaseValue = 'loaded';
    if (report.source === 'empty') {
      if (report.reason === 'missing') {
        this.logger.info('qlearning', `no q-table at ${filePath}; starting empty`);
      } else {
        this.logger.warn('qlearning', `q-table at ${filePath} unusable (${report.reason}); starting empty`);
      }
    } else {
      this.logger.info('qlearning', `restored ${report.states} states from ${filePath}`);
    }
    if (report.dropped > 0) {
      this.logger.warn('qlearning', `dropped ${report.dropped} malformed rows from ${filePath}`);
    }
    return report;
  }

  /**
   * Write the whole table. Failures are returned, never thrown; the
   * in-memory table is kept either way.
   * @param filePath - Destination JSON file.
   */
  persist(filePath: string): PersistResult {
    this.ensureOpen();
    const result = writeTableFile(filePath, this.qTable);
    if (result.ok) {
      this.phaseValue = 'flushed';
      this.logger.debug('qlearning', `flushed ${result.states} states to ${filePath}`);
    } else {
      this.logger.warn('qlearning', `persist to ${filePath} failed: ${result.reason}`);
    }
    return result;
  }

  /**
   * End the session. Flushes first when a path is given; the engine rejects
   * further use either way.
   */
  close(filePath?: string): PersistResult | null {
    const result = filePath ? this.persist(filePath) : null;
    this.closed = true;
    return result;
  }

  encode(state: GridState): StateSignature {
    return encode(state, this.signatureConfig);
  }

  /**
   * Moves that neither reverse the heading nor hit a lethal cell, in priority
   * order. May be empty.
   */
  validActions(state: GridState): Direction[] {
    const oracle = createCollisionOracle(state);
    return DIRECTIONS.filter(
      direction =>
        !isReversal(state.heading, direction) && !oracle.isLethal(moveCell(state.head, direction))
    );
  }

  /**
   * Epsilon-greedy choice among `validActions`.
   * @returns Null when there is nothing to choose from.
   */
  chooseAction(signature: StateSignature, validActions: readonly Direction[]): Direction | null {
    this.ensureReady();
    if (validActions.length === 0) return null;
    this.phaseValue = 'active';
    if (this.rng() < this.epsilonValue) {
      return validActions[randomIndex(this.rng, validActions.length)] ?? null;
    }
    return this.qTable.bestAction(signatureKey(signature), validActions);
  }

  /**
   * Apply one Bellman update.
   * @returns The new value of Q[previousSignature][actionTaken].
   */
  update(transition: Transition): number {
    this.ensureReady();
    const { alpha, gamma } = this.learning;
    const key = signatureKey(transition.previousSignature);
    const current = this.qTable.get(key, transition.actionTaken);
    const future = this.qTable.maxValue(signatureKey(transition.nextSignature), transition.nextValidActions);
    const next = current + alpha * (transition.reward + gamma * future - current);
    this.qTable.set(key, transition.actionTaken, next);
    this.phaseValue = 'active';
    return next;
  }

  valueOf(signature: StateSignature, direction: Direction): number {
    return this.qTable.get(signatureKey(signature), direction);
  }

  valuesOf(signature: StateSignature): ActionValues {
    return this.qTable.values(signatureKey(signature));
  }

  /**
   * Close an episode and advance the epsilon schedule.
   * @returns Epsilon for the next episode.
   */
  endEpisode(): number {
    this.episodes++;
    const { initial, floor, schedule } = this.learning.epsilon;
    if (schedule.kind === 'geometric') {
      this.epsilonValue = Math.max(floor, this.epsilonValue * schedule.rate);
    } else {
      const progress = Math.min(1, this.episodes / schedule.episodes);
      this.epsilonValue = initial - (initial - floor) * progress;
    }
    return this.epsilonValue;
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error('q-learning engine is closed');
  }

  private ensureReady(): void {
    this.ensureOpen();
    if (this.phaseValue === 'uninitialized') {
      throw new Error('q-learning engine not initialized; call start() or restore() first');
    }
  }
}
