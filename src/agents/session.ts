import { AGENT_DEFAULTS, type AgentConfig } from '../config.ts';
import { silentLogger, type Logger } from '../logger.ts';
import { QLearningEngine } from '../learning/qLearning.ts';
import { WorldModel } from '../model/worldModel.ts';
import { createRng, hashSeed, type RandomSource } from '../rng.ts';

/**
 * Everything a run shares across episodes. Owned by the caller; agents read
 * it, and nothing is kept at module level.
 */
export interface SessionContext {
  config: AgentConfig;
  logger: Logger;
  seed: number;
  rng: RandomSource;
  worldModel: WorldModel;
  qEngine: QLearningEngine;
}

export interface SessionOptions {
  config?: AgentConfig;
  logger?: Logger;
  seed?: number;
}

export function createSession(options: SessionOptions = {}): SessionContext {
  const config = options.config ?? AGENT_DEFAULTS;
  const logger = options.logger ?? silentLogger;
  const seed = options.seed ?? 1;
  const rng = createRng(hashSeed(seed, 0x5eed));
  return {
    config,
    logger,
    seed,
    rng,
    worldModel: new WorldModel({
      config: config.worldModel,
      utility: config.utility,
      signature: config.signature
    }),
    qEngine: new QLearningEngine({
      learning: config.learning,
      signature: config.signature,
      rng,
      logger
    })
  };
}
