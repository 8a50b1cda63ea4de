import fs from 'node:fs';
import path from 'node:path';
import { QTable } from './qTable.ts';

/** Upper bound on a table file; far above any reachable signature count. */
const MAX_TABLE_BYTES = 64 * 1024 * 1024;

export type PersistResult =
  | { ok: true; path: string; states: number; bytes: number }
  | { ok: false; reason: string };

export interface RestoreReport {
  source: 'file' | 'empty';
  states: number;
  dropped: number;
  /** Why the table started empty: 'missing', or the read/parse failure. */
  reason?: string;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Write the full table through a temp file and an atomic rename, so a reader
 * never sees a half-written snapshot.
 * @param filePath - Destination JSON file.
 * @param table - Table to serialize.
 * @returns Result; failures leave the destination untouched.
 */
export function writeTableFile(filePath: string, table: QTable): PersistResult {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const json = JSON.stringify(table.toJSON(), null, 2);
    const bytes = Buffer.byteLength(json, 'utf8');
    if (bytes > MAX_TABLE_BYTES) {
      return { ok: false, reason: `q-table too large (${bytes} bytes)` };
    }
    fs.writeFileSync(tmpPath, json, 'utf8');
    fs.renameSync(tmpPath, filePath);
    return { ok: true, path: filePath, states: table.size, bytes };
  } catch (err) {
    if (fs.existsSync(tmpPath)) fs.rmSync(tmpPath, { force: true });
    return { ok: false, reason: errorMessage(err) };
  }
}

/**
 * Read a table file. Never throws: a missing, unreadable or unparsable file
 * yields an empty table, and malformed rows are dropped.
 * @param filePath - Source JSON file.
 */
export function readTableFile(filePath: string): { table: QTable; report: RestoreReport } {
  const empty = (reason: string) => ({
    table: new QTable(),
    report: { source: 'empty' as const, states: 0, dropped: 0, reason }
  });

  if (!fs.existsSync(filePath)) return empty('missing');

  let raw: string;
  try {
    const stat = fs.statSync(filePath);
    if (stat.size > MAX_TABLE_BYTES) return empty(`file too large (${stat.size} bytes)`);
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    return empty(errorMessage(err));
  }
  if (!raw.trim()) return empty('file is empty');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (err) {
    return empty(`invalid JSON: ${errorMessage(err)}`);
  }

  const result = QTable.fromJSON(parsed);
  if (!result.ok) return empty(result.reason);
  return {
    table: result.table,
    report: { source: 'file', states: result.table.size, dropped: result.dropped }
  };
}
