/** Seeded randomness for exploration, target spawning and replayable runs. */

/** Float in [0, 1). Every random choice in the core goes through one of these. */
export type RandomSource = () => number;

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const UINT32_RANGE = 0x100000000;

/** Floor into an unsigned 32-bit integer; non-finite input maps to 0. */
export function toUint32(value: number): number {
  return Number.isFinite(value) ? Math.floor(value) >>> 0 : 0;
}

/**
 * FNV-1a over 32-bit words. Order matters: `hashSeed(a, b)` and
 * `hashSeed(b, a)` differ.
 */
export function hashSeed(...values: number[]): number {
  return values.reduce((hash, value) => Math.imul(hash ^ toUint32(value), FNV_PRIME) >>> 0, FNV_OFFSET_BASIS);
}

function xorshift32(state: number): number {
  let x = state;
  x ^= x << 13;
  x ^= x >>> 17;
  x ^= x << 5;
  return x >>> 0;
}

/**
 * xorshift32 source. A zero seed would stick at zero, so it is replaced by 1.
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state = xorshift32(state);
    return state / UINT32_RANGE;
  };
}

/**
 * Seed for a single episode so reruns of one episode replay the same targets.
 * @param baseSeed - Run seed.
 * @param episode - Episode index.
 */
export function deriveEpisodeSeed(baseSeed: number, episode: number): number {
  return hashSeed(baseSeed, episode);
}

/**
 * Uniform index in [0, length).
 * @param rng - Random source.
 * @param length - Collection size; must be positive.
 */
export function randomIndex(rng: RandomSource, length: number): number {
  return Math.min(Math.floor(rng() * length), length - 1);
}
