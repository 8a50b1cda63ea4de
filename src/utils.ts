// utils.ts
// Small numeric and type-guard helpers shared by the core and the runner.

/**
 * Deeply clones a plain object via JSON serialisation.
 * @param obj - JSON-safe value.
 */
export function deepClone<T>(obj: T): T {
  return JSON.parse(JSON.stringify(obj)) as T;
}

/**
 * Constrains a value to the inclusive range [a, b].
 */
export function clamp(x: number, a: number, b: number): number {
  return Math.max(a, Math.min(b, x));
}

/**
 * Check for a finite numeric value.
 * @param value - Value to test.
 * @returns True when value is a finite number.
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/** Plain object check used when validating parsed JSON. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Arithmetic mean; zero for an empty list.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Formats a number to a fixed number of decimal places.  Integers are rounded.
 */
export function fmtNumber(x: number, decimals: number): string {
  if (decimals === 0) return String(Math.round(x));
  return Number(x).toFixed(decimals);
}
