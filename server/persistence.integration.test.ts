import { describe, it, expect } from 'vitest';
import { QTable } from '../src/learning/qTable.ts';
import { createPersistence, initDb, type EpisodeRecord, type RunStart } from './persistence.ts';

const RUN: RunStart = { agent: 'learning', mode: 'train', episodesPlanned: 10, seed: 7, cfgHash: 'abc12345' };

function episode(index: number, score: number): EpisodeRecord {
  return { episode: index, score, steps: 10 + index, reason: 'wall', epsilon: 0.5 };
}

function setup() {
  const db = initDb(':memory:');
  return { db, persistence: createPersistence(db) };
}

describe('persistence (integration)', () => {
  it('creates the run, episode and checkpoint tables', () => {
    const { db } = setup();
    const names = db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type='table' ORDER BY name`)
      .all()
      .map(row => row.name);
    expect(names).toEqual(['episode_stats', 'qtable_checkpoints', 'training_runs']);
  });

  it('tracks a run from start to finish', () => {
    const { persistence } = setup();
    const runId = persistence.startRun(RUN);
    expect(runId).toBe(1);

    persistence.recordEpisode(runId, episode(0, 2));
    persistence.recordEpisodes(runId, [episode(1, 5), episode(2, 3)]);
    const running = persistence.listRuns(10)[0];
    expect(running?.status).toBe('running');
    expect(running?.episodesDone).toBe(3);
    expect(running?.finishedAt).toBeNull();

    persistence.finishRun(runId, { status: 'completed', episodesDone: 3, bestScore: 5, meanScore: 10 / 3 });
    const [finished] = persistence.listRuns(10);
    expect(finished).toMatchObject({
      id: 1,
      agent: 'learning',
      mode: 'train',
      episodesPlanned: 10,
      episodesDone: 3,
      seed: 7,
      cfgHash: 'abc12345',
      status: 'completed',
      bestScore: 5
    });
    expect(finished?.meanScore).toBeCloseTo(3.333333, 5);
    expect(typeof finished?.finishedAt).toBe('number');
  });

  it('lists runs newest first up to the limit', () => {
    const { persistence } = setup();
    persistence.startRun(RUN);
    persistence.startRun({ ...RUN, agent: 'goal', mode: 'evaluate' });
    persistence.startRun({ ...RUN, agent: 'reflex' });
    expect(persistence.listRuns(2).map(run => [run.id, run.agent, run.mode])).toEqual([
      [3, 'reflex', 'train'],
      [2, 'goal', 'evaluate']
    ]);
  });

  it('loads episodes in episode order', () => {
    const { persistence } = setup();
    const runId = persistence.startRun(RUN);
    persistence.recordEpisodes(runId, [episode(1, 4), episode(0, 1)]);
    expect(persistence.loadEpisodes(runId)).toEqual([
      { episode: 0, score: 1, steps: 10, reason: 'wall', epsilon: 0.5 },
      { episode: 1, score: 4, steps: 11, reason: 'wall', epsilon: 0.5 }
    ]);
  });

  it('rolls back a batch containing an invalid episode', () => {
    const { persistence } = setup();
    const runId = persistence.startRun(RUN);
    expect(() => persistence.recordEpisodes(runId, [episode(0, 1), episode(1, Number.NaN)])).toThrow(
      'episode score and steps must be finite'
    );
    expect(persistence.loadEpisodes(runId)).toEqual([]);
    expect(persistence.listRuns(1)[0]?.episodesDone).toBe(0);
  });

  it('saves checkpoints and loads the latest, optionally by config hash', () => {
    const { persistence } = setup();
    const runId = persistence.startRun(RUN);
    expect(persistence.loadLatestCheckpoint()).toBeNull();

    const first = new QTable();
    first.set('0-:0:up:0000', 'up', 1.5);
    const second = new QTable();
    second.set('+0:1:right:0100', 'left', -2);
    persistence.saveCheckpoint({ runId, episode: 5, cfgHash: 'abc12345', table: first });
    const latestId = persistence.saveCheckpoint({ runId, episode: 10, cfgHash: 'ffff0000', table: second });

    const latest = persistence.loadLatestCheckpoint();
    expect(latest?.id).toBe(latestId);
    expect(latest?.episode).toBe(10);
    expect(latest?.table.get('+0:1:right:0100', 'left')).toBe(-2);
    expect(latest?.dropped).toBe(0);

    const matching = persistence.loadLatestCheckpoint('abc12345');
    expect(matching?.episode).toBe(5);
    expect(matching?.table.get('0-:0:up:0000', 'up')).toBe(1.5);
    expect(persistence.loadLatestCheckpoint('00000000')).toBeNull();
  });

  it('rejects a checkpoint without a config hash', () => {
    const { persistence } = setup();
    const runId = persistence.startRun(RUN);
    expect(() => persistence.saveCheckpoint({ runId, episode: 1, cfgHash: ' ', table: new QTable() })).toThrow(
      'checkpoint cfgHash missing'
    );
  });

  it('refuses a stored payload that is not a table', () => {
    const { db, persistence } = setup();
    const runId = persistence.startRun(RUN);
    db.prepare<[number, string]>(
      `INSERT INTO qtable_checkpoints (run_id, created_at, episode, states, cfg_hash, payload_json)
       VALUES (?, 0, 1, 0, 'abc12345', ?)`
    ).run(runId, '[1]');
    expect(() => persistence.loadLatestCheckpoint()).toThrow(
      'invalid checkpoint 1: q-table document must be an object'
    );
  });
});
