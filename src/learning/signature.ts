// signature.ts
// Finite abstraction of a grid snapshot used as the Q-table key.

import { AGENT_DEFAULTS, type SignatureConfig } from '../config.ts';
import { createCollisionOracle } from '../collision.ts';
import {
  DIRECTIONS,
  isDirection,
  manhattan,
  moveCell,
  type Direction,
  type GridState
} from '../grid.ts';

/** Sign of a target offset along one axis. */
export type Bearing = -1 | 0 | 1;

/**
 * Decision-equivalence class of a snapshot. Two snapshots with equal
 * signatures are treated identically by the learner.
 */
export interface StateSignature {
  bearingX: Bearing;
  bearingY: Bearing;
  distanceBucket: number;
  heading: Direction;
  /** One bit per direction, priority order from the high bit: left=8, right=4, up=2, down=1. */
  danger: number;
}

const KEY_PATTERN = /^([-0+])([-0+]):(\d{1,4}):(left|right|up|down):([01]{4})$/;

function bearingOf(delta: number): Bearing {
  if (delta > 0) return 1;
  if (delta < 0) return -1;
  return 0;
}

function bearingSymbol(bearing: Bearing): string {
  if (bearing > 0) return '+';
  if (bearing < 0) return '-';
  return '0';
}

function parseBearing(symbol: string | undefined): Bearing | null {
  if (symbol === '+') return 1;
  if (symbol === '-') return -1;
  if (symbol === '0') return 0;
  return null;
}

/** Bit mask of a direction inside {@link StateSignature.danger}. */
export function dangerMask(direction: Direction): number {
  return 1 << (DIRECTIONS.length - 1 - DIRECTIONS.indexOf(direction));
}

export function isDangerous(signature: StateSignature, direction: Direction): boolean {
  return (signature.danger & dangerMask(direction)) !== 0;
}

/**
 * Encode a snapshot. Total and deterministic.
 * @param state - Snapshot to abstract.
 * @param config - Distance bucketing.
 */
export function encode(
  state: GridState,
  config: SignatureConfig = AGENT_DEFAULTS.signature
): StateSignature {
  const oracle = createCollisionOracle(state);
  let danger = 0;
  for (const direction of DIRECTIONS) {
    if (oracle.isLethal(moveCell(state.head, direction))) danger |= dangerMask(direction);
  }
  const distance = manhattan(state.head, state.target);
  const bucketSize = Math.max(1, config.bucketSize);
  const lastBucket = Math.max(0, config.bucketCount - 1);
  return {
    bearingX: bearingOf(state.target.x - state.head.x),
    bearingY: bearingOf(state.target.y - state.head.y),
    distanceBucket: Math.min(lastBucket, Math.floor(distance / bucketSize)),
    heading: state.heading,
    danger
  };
}

/**
 * Canonical string form, e.g. `"0-:0:up:0000"`.
 */
export function signatureKey(signature: StateSignature): string {
  const bits = DIRECTIONS.map(direction => (isDangerous(signature, direction) ? '1' : '0')).join('');
  return (
    bearingSymbol(signature.bearingX) +
    bearingSymbol(signature.bearingY) +
    `:${signature.distanceBucket}:${signature.heading}:${bits}`
  );
}

/**
 * Inverse of {@link signatureKey}.
 * @returns Signature, or null for anything that is not a canonical key.
 */
export function parseSignatureKey(key: string): StateSignature | null {
  const match = KEY_PATTERN.exec(key);
  if (!match) return null;
  const bearingX = parseBearing(match[1]);
  const bearingY = parseBearing(match[2]);
  const heading = match[4];
  const bits = match[5];
  if (bearingX === null || bearingY === null || !isDirection(heading) || !bits) return null;
  return {
    bearingX,
    bearingY,
    distanceBucket: Number.parseInt(match[3] ?? '0', 10),
    heading,
    danger: Number.parseInt(bits, 2)
  };
}
