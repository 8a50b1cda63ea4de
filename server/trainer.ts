import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { createAgent } from '../src/agents/registry.ts';
import type { SessionContext } from '../src/agents/session.ts';
import type { AgentKind } from '../src/agents/types.ts';
import { runEpisode, type EpisodeResult } from '../src/game/episode.ts';
import { GridGame } from '../src/game/gridGame.ts';
import type { PersistResult } from '../src/learning/qTableStore.ts';
import { deriveEpisodeSeed, toUint32 } from '../src/rng.ts';
import { fmtNumber, mean } from '../src/utils.ts';
import { hashConfig } from './hash.ts';
import type { EpisodeRecord, Persistence } from './persistence.ts';

/** Mixed into the run seed so evaluation boards differ from training boards. */
const EVAL_SEED_SALT = 0x9e3779b9;

export interface TrainOptions {
  episodes: number;
  agent?: AgentKind;
  /** Q-table file flushed at checkpoints and on the way out. */
  qTablePath?: string;
  persistence?: Persistence;
  /** Checkpoint every N episodes; 0 only at the end. */
  checkpointEvery?: number;
  /** Progress line every N episodes; 0 disables it. */
  logEvery?: number;
  signal?: AbortSignal;
  onEpisode?: (record: EpisodeRecord) => void;
}

export interface TrainReport {
  runId: number | null;
  episodes: number;
  aborted: boolean;
  best: number;
  average: number;
  /** Result of the final Q-table flush; null when there was nothing to flush. */
  flush: PersistResult | null;
}

export interface EvaluationReport {
  games: number;
  best: number;
  worst: number;
  average: number;
  /** Score -> number of games that ended with it. */
  distribution: Record<number, number>;
}

function newGame(session: SessionContext, seed: number): GridGame {
  const { width, height } = session.config.board;
  return new GridGame({ width, height, seed });
}

/**
 * Sequential training over the session. Episodes share the session's Q-table
 * and world model. Cancellation is checked between episodes; the table is
 * flushed on every exit path.
 */
export async function train(session: SessionContext, options: TrainOptions): Promise<TrainReport> {
  const { logger, qEngine, config } = session;
  const kind = options.agent ?? 'learning';
  const learning = kind === 'learning';
  const persistence = options.persistence;
  const checkpointEvery = options.checkpointEvery ?? 0;
  const logEvery = options.logEvery ?? 0;
  const cfgHash = hashConfig(config);

  const agent = createAgent(kind, session);
  const runId =
    persistence?.startRun({
      agent: kind,
      mode: 'train',
      episodesPlanned: options.episodes,
      seed: session.seed,
      cfgHash
    }) ?? null;

  const scores: number[] = [];
  let best = 0;
  let pending: EpisodeRecord[] = [];
  let flush: PersistResult | null = null;
  let aborted = false;

  const checkpoint = (episode: number): void => {
    if (persistence && runId !== null && pending.length > 0) {
      persistence.recordEpisodes(runId, pending);
    }
    pending = [];
    if (!learning) return;
    if (options.qTablePath) flush = qEngine.persist(options.qTablePath);
    if (persistence && runId !== null) {
      persistence.saveCheckpoint({ runId, episode, cfgHash, table: qEngine.table });
    }
  };

  logger.info('trainer', `training ${kind} agent for ${options.episodes} episodes (cfg ${cfgHash})`);
  try {
    for (let i = 0; i < options.episodes; i++) {
      if (options.signal?.aborted) {
        aborted = true;
        break;
      }
      const epsilon = learning ? qEngine.epsilon : 0;
      const result = runEpisode(newGame(session, deriveEpisodeSeed(session.seed, i)), agent, config.episode);
      if (learning) qEngine.endEpisode();

      const record: EpisodeRecord = { episode: i + 1, ...result, epsilon };
      scores.push(result.score);
      best = Math.max(best, result.score);
      pending.push(record);
      options.onEpisode?.(record);

      const done = i + 1;
      if (logEvery > 0 && done % logEvery === 0) {
        const recent = scores.slice(-logEvery);
        const eps = learning ? ` eps=${fmtNumber(qEngine.epsilon, 3)}` : '';
        logger.info(
          'trainer',
          `episode ${done}/${options.episodes} mean=${fmtNumber(mean(recent), 2)} ` +
            `best=${recent.reduce((a, b) => Math.max(a, b), 0)}${eps}`
        );
      }
      if (checkpointEvery > 0 && done % checkpointEvery === 0 && done < options.episodes) {
        checkpoint(done);
      }
      await yieldToEventLoop();
    }
  } finally {
    checkpoint(scores.length);
    if (persistence && runId !== null) {
      persistence.finishRun(runId, {
        status: aborted ? 'aborted' : 'completed',
        episodesDone: scores.length,
        bestScore: best,
        meanScore: mean(scores)
      });
    }
  }

  if (aborted) logger.warn('trainer', `aborted after ${scores.length} episodes`);
  return {
    runId,
    episodes: scores.length,
    aborted,
    best,
    average: mean(scores),
    flush
  };
}

/** Summarize finished games. */
export function summarize(results: readonly EpisodeResult[]): EvaluationReport {
  const scores = results.map(result => result.score);
  const distribution: Record<number, number> = {};
  let best = -Infinity;
  let worst = Infinity;
  for (const score of scores) {
    distribution[score] = (distribution[score] ?? 0) + 1;
    best = Math.max(best, score);
    worst = Math.min(worst, score);
  }
  return {
    games: scores.length,
    best: scores.length ? best : 0,
    worst: scores.length ? worst : 0,
    average: mean(scores),
    distribution
  };
}

/**
 * Greedy play without learning. Epsilon is restored afterwards.
 * @param session - Shared session; the Q-table is read, never updated.
 * @param kind - Strategy to evaluate.
 * @param games - Number of games.
 */
export function evaluate(session: SessionContext, kind: AgentKind, games: number): EvaluationReport {
  const { qEngine } = session;
  const savedEpsilon = qEngine.epsilon;
  if (kind === 'learning') qEngine.setEpsilon(0);
  try {
    const agent = createAgent(kind, session, { learn: false });
    const baseSeed = toUint32(session.seed ^ EVAL_SEED_SALT);
    const results: EpisodeResult[] = [];
    for (let i = 0; i < games; i++) {
      results.push(runEpisode(newGame(session, deriveEpisodeSeed(baseSeed, i)), agent, session.config.episode));
    }
    const report = summarize(results);
    session.logger.info(
      'evaluate',
      `${kind}: games=${report.games} best=${report.best} worst=${report.worst} avg=${fmtNumber(report.average, 2)}`
    );
    return report;
  } finally {
    qEngine.setEpsilon(savedEpsilon);
  }
}
