import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { AGENT_KINDS, type AgentKind } from '../src/agents/types.ts';
import type { EpisodeEndReason } from '../src/game/episode.ts';
import { QTable } from '../src/learning/qTable.ts';
import type { RunMode } from './config.ts';

const MAX_CHECKPOINT_BYTES = 64 * 1024 * 1024;

export type RunStatus = 'running' | 'completed' | 'aborted';

export interface RunStart {
  agent: AgentKind;
  mode: RunMode;
  episodesPlanned: number;
  seed: number;
  cfgHash: string;
}

export interface RunSummary {
  status: Exclude<RunStatus, 'running'>;
  episodesDone: number;
  bestScore: number;
  meanScore: number;
}

export interface RunRecord extends RunStart {
  id: number;
  startedAt: number;
  finishedAt: number | null;
  status: RunStatus;
  episodesDone: number;
  bestScore: number | null;
  meanScore: number | null;
}

export interface EpisodeRecord {
  episode: number;
  score: number;
  steps: number;
  reason: EpisodeEndReason;
  epsilon: number;
}

export interface CheckpointInput {
  runId: number;
  episode: number;
  cfgHash: string;
  table: QTable;
}

export interface Checkpoint {
  id: number;
  runId: number;
  episode: number;
  cfgHash: string;
  createdAt: number;
  table: QTable;
  /** Rows dropped while validating the stored payload. */
  dropped: number;
}

export interface Persistence {
  startRun: (run: RunStart) => number;
  recordEpisode: (runId: number, episode: EpisodeRecord) => void;
  recordEpisodes: (runId: number, episodes: readonly EpisodeRecord[]) => void;
  finishRun: (runId: number, summary: RunSummary) => void;
  listRuns: (limit: number) => RunRecord[];
  loadEpisodes: (runId: number) => EpisodeRecord[];
  saveCheckpoint: (checkpoint: CheckpointInput) => number;
  /** Latest checkpoint, optionally only for a matching config hash. */
  loadLatestCheckpoint: (cfgHash?: string) => Checkpoint | null;
}

type DbType = ReturnType<typeof Database>;

interface RunRow {
  id: number;
  started_at: number;
  finished_at: number | null;
  agent: string;
  mode: string;
  episodes_planned: number;
  episodes_done: number;
  seed: number;
  cfg_hash: string;
  status: string;
  best_score: number | null;
  mean_score: number | null;
}

interface EpisodeRow {
  episode: number;
  score: number;
  steps: number;
  reason: string;
  epsilon: number;
}

interface CheckpointRow {
  id: number;
  run_id: number;
  episode: number;
  cfg_hash: string;
  created_at: number;
  payload_json: string;
}

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS training_runs (
  id INTEGER PRIMARY KEY,
  started_at INTEGER,
  finished_at INTEGER,
  agent TEXT,
  mode TEXT,
  episodes_planned INTEGER,
  episodes_done INTEGER DEFAULT 0,
  seed INTEGER,
  cfg_hash TEXT,
  status TEXT,
  best_score REAL,
  mean_score REAL
);

CREATE TABLE IF NOT EXISTS episode_stats (
  id INTEGER PRIMARY KEY,
  run_id INTEGER REFERENCES training_runs(id),
  episode INTEGER,
  score INTEGER,
  steps INTEGER,
  reason TEXT,
  epsilon REAL
);

CREATE TABLE IF NOT EXISTS qtable_checkpoints (
  id INTEGER PRIMARY KEY,
  run_id INTEGER REFERENCES training_runs(id),
  created_at INTEGER,
  episode INTEGER,
  states INTEGER,
  cfg_hash TEXT,
  payload_json TEXT
);

CREATE INDEX IF NOT EXISTS idx_episode_run ON episode_stats(run_id, episode);
CREATE INDEX IF NOT EXISTS idx_checkpoint_hash ON qtable_checkpoints(cfg_hash);
`;

const RUN_STATUSES: readonly RunStatus[] = ['running', 'completed', 'aborted'];
const END_REASONS: readonly EpisodeEndReason[] = ['wall', 'self', 'board-full', 'max-steps'];

function pick<T extends string>(value: string, allowed: readonly T[], name: string): T {
  const found = allowed.find(entry => entry === value);
  if (found === undefined) throw new Error(`stored ${name} "${value}" is invalid`);
  return found;
}

export function initDb(dbPath: string): DbType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.exec(SCHEMA_SQL);
  return db;
}

export function createPersistence(db: DbType): Persistence {
  const insertRun = db.prepare<{
    started_at: number;
    agent: string;
    mode: string;
    episodes_planned: number;
    seed: number;
    cfg_hash: string;
    status: RunStatus;
  }>(
    `INSERT INTO training_runs (started_at, agent, mode, episodes_planned, seed, cfg_hash, status)
     VALUES (@started_at, @agent, @mode, @episodes_planned, @seed, @cfg_hash, @status)`
  );
  const updateRun = db.prepare<{
    id: number;
    finished_at: number;
    status: RunStatus;
    episodes_done: number;
    best_score: number;
    mean_score: number;
  }>(
    `UPDATE training_runs
     SET finished_at = @finished_at, status = @status, episodes_done = @episodes_done,
         best_score = @best_score, mean_score = @mean_score
     WHERE id = @id`
  );
  const insertEpisode = db.prepare<{
    run_id: number;
    episode: number;
    score: number;
    steps: number;
    reason: string;
    epsilon: number;
  }>(
    `INSERT INTO episode_stats (run_id, episode, score, steps, reason, epsilon)
     VALUES (@run_id, @episode, @score, @steps, @reason, @epsilon)`
  );
  const bumpEpisodes = db.prepare<[number, number]>(
    `UPDATE training_runs SET episodes_done = episodes_done + ? WHERE id = ?`
  );
  const listRunsStmt = db.prepare<[number], RunRow>(
    `SELECT id, started_at, finished_at, agent, mode, episodes_planned, episodes_done,
            seed, cfg_hash, status, best_score, mean_score
     FROM training_runs ORDER BY id DESC LIMIT ?`
  );
  const loadEpisodesStmt = db.prepare<[number], EpisodeRow>(
    `SELECT episode, score, steps, reason, epsilon FROM episode_stats
     WHERE run_id = ? ORDER BY episode ASC`
  );
  const insertCheckpoint = db.prepare<{
    run_id: number;
    created_at: number;
    episode: number;
    states: number;
    cfg_hash: string;
    payload_json: string;
  }>(
    `INSERT INTO qtable_checkpoints (run_id, created_at, episode, states, cfg_hash, payload_json)
     VALUES (@run_id, @created_at, @episode, @states, @cfg_hash, @payload_json)`
  );
  const latestCheckpoint = db.prepare<[], CheckpointRow>(
    `SELECT id, run_id, episode, cfg_hash, created_at, payload_json
     FROM qtable_checkpoints ORDER BY id DESC LIMIT 1`
  );
  const latestCheckpointForHash = db.prepare<[string], CheckpointRow>(
    `SELECT id, run_id, episode, cfg_hash, created_at, payload_json
     FROM qtable_checkpoints WHERE cfg_hash = ? ORDER BY id DESC LIMIT 1`
  );

  const startRun = (run: RunStart): number => {
    const info = insertRun.run({
      started_at: Date.now(),
      agent: run.agent,
      mode: run.mode,
      episodes_planned: run.episodesPlanned,
      seed: run.seed,
      cfg_hash: run.cfgHash,
      status: 'running'
    });
    return Number(info.lastInsertRowid);
  };

  const writeEpisode = (runId: number, episode: EpisodeRecord): void => {
    if (!Number.isFinite(episode.score) || !Number.isFinite(episode.steps)) {
      throw new Error('episode score and steps must be finite');
    }
    insertEpisode.run({
      run_id: runId,
      episode: episode.episode,
      score: episode.score,
      steps: episode.steps,
      reason: episode.reason,
      epsilon: episode.epsilon
    });
  };

  const recordEpisode = (runId: number, episode: EpisodeRecord): void => {
    writeEpisode(runId, episode);
    bumpEpisodes.run(1, runId);
  };

  const recordEpisodes = db.transaction((runId: number, episodes: readonly EpisodeRecord[]) => {
    for (const episode of episodes) writeEpisode(runId, episode);
    bumpEpisodes.run(episodes.length, runId);
  });

  const finishRun = (runId: number, summary: RunSummary): void => {
    updateRun.run({
      id: runId,
      finished_at: Date.now(),
      status: summary.status,
      episodes_done: summary.episodesDone,
      best_score: summary.bestScore,
      mean_score: summary.meanScore
    });
  };

  const listRuns = (limit: number): RunRecord[] =>
    listRunsStmt.all(limit).map(row => ({
      id: row.id,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      agent: pick(row.agent, AGENT_KINDS, 'agent'),
      mode: row.mode === 'evaluate' ? 'evaluate' : 'train',
      episodesPlanned: row.episodes_planned,
      episodesDone: row.episodes_done,
      seed: row.seed,
      cfgHash: row.cfg_hash,
      status: pick(row.status, RUN_STATUSES, 'status'),
      bestScore: row.best_score,
      meanScore: row.mean_score
    }));

  const loadEpisodes = (runId: number): EpisodeRecord[] =>
    loadEpisodesStmt.all(runId).map(row => ({
      episode: row.episode,
      score: row.score,
      steps: row.steps,
      reason: pick(row.reason, END_REASONS, 'reason'),
      epsilon: row.epsilon
    }));

  const saveCheckpoint = (checkpoint: CheckpointInput): number => {
    if (!checkpoint.cfgHash.trim()) {
      throw new Error('checkpoint cfgHash missing');
    }
    const json = JSON.stringify(checkpoint.table.toJSON());
    const bytes = Buffer.byteLength(json, 'utf8');
    if (bytes > MAX_CHECKPOINT_BYTES) {
      throw new Error(`checkpoint too large (${bytes} bytes)`);
    }
    const info = insertCheckpoint.run({
      run_id: checkpoint.runId,
      created_at: Date.now(),
      episode: checkpoint.episode,
      states: checkpoint.table.size,
      cfg_hash: checkpoint.cfgHash,
      payload_json: json
    });
    return Number(info.lastInsertRowid);
  };

  const loadLatestCheckpoint = (cfgHash?: string): Checkpoint | null => {
    const row = cfgHash === undefined ? latestCheckpoint.get() : latestCheckpointForHash.get(cfgHash);
    if (!row?.payload_json) return null;
    const parsed = QTable.fromJSON(JSON.parse(row.payload_json));
    if (!parsed.ok) {
      throw new Error(`invalid checkpoint ${row.id}: ${parsed.reason}`);
    }
    return {
      id: row.id,
      runId: row.run_id,
      episode: row.episode,
      cfgHash: row.cfg_hash,
      createdAt: row.created_at,
      table: parsed.table,
      dropped: parsed.dropped
    };
  };

  return {
    startRun,
    recordEpisode,
    recordEpisodes,
    finishRun,
    listRuns,
    loadEpisodes,
    saveCheckpoint,
    loadLatestCheckpoint
  };
}
