import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel } from './logger.ts';
import { createRng, deriveEpisodeSeed, hashSeed, randomIndex, toUint32 } from './rng.ts';
import { clamp, deepClone, fmtNumber, isFiniteNumber, isRecord, mean } from './utils.ts';

describe('utils.ts', () => {
  it('deepClone should create a deep copy', () => {
    const obj = { a: 1, b: { c: 2 } };
    const cloned = deepClone(obj);
    expect(cloned).toEqual(obj);
    expect(cloned).not.toBe(obj);
    expect(cloned.b).not.toBe(obj.b);
  });

  it('clamp should constrain values', () => {
    expect(clamp(5, 0, 10)).toBe(5);
    expect(clamp(-5, 0, 10)).toBe(0);
    expect(clamp(15, 0, 10)).toBe(10);
  });

  it('mean should average and treat an empty list as 0', () => {
    expect(mean([1, 2, 3])).toBe(2);
    expect(mean([])).toBe(0);
  });

  it('fmtNumber should format numbers', () => {
    expect(fmtNumber(1.2345, 2)).toBe('1.23');
    expect(fmtNumber(1.6, 0)).toBe('2');
  });

  it('type guards should accept only their own shapes', () => {
    expect(isFiniteNumber(1)).toBe(true);
    expect(isFiniteNumber(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isFiniteNumber('1')).toBe(false);
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});

describe('rng.ts', () => {
  it('normalizes to unsigned 32-bit integers', () => {
    expect(toUint32(3.7)).toBe(3);
    expect(toUint32(-1)).toBe(4294967295);
    expect(toUint32(Number.NaN)).toBe(0);
  });

  it('replays the same sequence for the same seed', () => {
    const a = createRng(99);
    const b = createRng(99);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
    for (const value of first) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('remaps a zero seed to 1', () => {
    expect(createRng(0)()).toBe(createRng(1)());
  });

  it('hashes seeds deterministically and order-sensitively', () => {
    expect(hashSeed(1, 2)).toBe(hashSeed(1, 2));
    expect(hashSeed(1, 2)).not.toBe(hashSeed(2, 1));
    expect(deriveEpisodeSeed(7, 0)).not.toBe(deriveEpisodeSeed(7, 1));
  });

  it('keeps random indexes inside the range', () => {
    expect(randomIndex(() => 0, 3)).toBe(0);
    expect(randomIndex(() => 0.5, 3)).toBe(1);
    expect(randomIndex(() => 0.9999999, 3)).toBe(2);
  });
});

describe('logger.ts', () => {
  it('formats lines as timestamp | level | module | message', () => {
    const lines: string[] = [];
    const logger = createLogger('info', line => lines.push(line));
    logger.info('core', 'hello');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \| info \| core \| hello$/);
  });

  it('drops lines below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', line => lines.push(line));
    logger.debug('core', 'a');
    logger.info('core', 'b');
    logger.warn('core', 'c');
    logger.error('core', 'd');
    expect(lines.map(line => line.split(' | ')[1])).toEqual(['warn', 'error']);
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(2)).toBe(false);
  });
});
