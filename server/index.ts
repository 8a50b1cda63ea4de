import { pathToFileURL } from 'node:url';
import { createSession } from '../src/agents/session.ts';
import { resolveAgentConfig } from '../src/config.ts';
import { createLogger, type Logger } from '../src/logger.ts';
import { parseConfig, type RunnerConfig } from './config.ts';
import { hashConfig } from './hash.ts';
import { createPersistence, initDb } from './persistence.ts';
import { evaluate, train, type EvaluationReport, type TrainReport } from './trainer.ts';

export type RunOutcome =
  | { mode: 'train'; report: TrainReport }
  | { mode: 'evaluate'; report: EvaluationReport };

export interface RunOptions {
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Resolve the agent config, restore the Q-table, then train or evaluate.
 * The database and the engine are closed on every exit path.
 */
export async function run(config: RunnerConfig, options: RunOptions): Promise<RunOutcome> {
  const { logger } = options;
  const agentConfig = resolveAgentConfig(config.agentOverrides, (msg) => logger.warn('config', msg));
  const session = createSession({ config: agentConfig, logger, seed: config.seed });
  const db = initDb(config.dbPath);
  const persistence = createPersistence(db);
  try {
    if (config.agent === 'learning') session.qEngine.restore(config.qTablePath);
    if (config.mode === 'evaluate') {
      const runId = persistence.startRun({
        agent: config.agent,
        mode: 'evaluate',
        episodesPlanned: config.episodes,
        seed: config.seed,
        cfgHash: hashConfig(agentConfig)
      });
      const report = evaluate(session, config.agent, config.episodes);
      persistence.finishRun(runId, {
        status: 'completed',
        episodesDone: report.games,
        bestScore: report.best,
        meanScore: report.average
      });
      return { mode: 'evaluate', report };
    }
    const report = await train(session, {
      episodes: config.episodes,
      agent: config.agent,
      qTablePath: config.qTablePath,
      persistence,
      checkpointEvery: config.checkpointEvery,
      logEvery: config.logEvery,
      signal: options.signal
    });
    return { mode: 'train', report };
  } finally {
    session.qEngine.close();
    db.close();
  }
}

export async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2), process.env);
  const logger = createLogger(config.logLevel);
  const controller = new AbortController();

  const shutdown = () => {
    if (controller.signal.aborted) return;
    logger.info('runner', 'stopping after the current episode');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  logger.info('runner', `${config.mode} ${config.agent} x${config.episodes} (seed ${config.seed})`);
  try {
    const outcome = await run(config, { logger, signal: controller.signal });
    if (outcome.mode === 'train') {
      const { report } = outcome;
      logger.info(
        'runner',
        `done: episodes=${report.episodes} best=${report.best} avg=${report.average.toFixed(2)}` +
          (report.aborted ? ' (aborted)' : '')
      );
    } else {
      const { report } = outcome;
      logger.info('runner', `distribution ${JSON.stringify(report.distribution)}`);
    }
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
