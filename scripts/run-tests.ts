import { spawnSync } from 'node:child_process';
import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';

/** Test categories and the filename suffix that marks each. */
const categories = {
  unit: 'unit.test.ts',
  integration: 'integration.test.ts',
  regression: 'regression.test.ts',
  performance: 'performance.test.ts'
} as const;

type Category = keyof typeof categories;

function isCategory(value: string): value is Category {
  return Object.hasOwn(categories, value);
}

/** Test files under `root` whose names end in one of `suffixes`, sorted. */
function collect(root: string, suffixes: readonly string[]): string[] {
  if (!existsSync(root)) return [];
  return readdirSync(root, { recursive: true, encoding: 'utf8' })
    .filter(name => suffixes.some(suffix => name.endsWith(suffix)))
    .map(name => join(root, name))
    .sort();
}

// One or more categories, e.g. `tsx scripts/run-tests.ts unit integration`.
const requested = process.argv.slice(2);
const unknown = requested.filter(name => !isCategory(name));
if (requested.length === 0 || unknown.length > 0) {
  console.error(
    `Usage: tsx scripts/run-tests.ts <category...>\nCategories: ${Object.keys(categories).join(', ')}`
  );
  process.exit(1);
}

const suffixes = requested.filter(isCategory).map(name => categories[name]);
const files = ['src', 'server'].flatMap(root => collect(resolve(root), suffixes));
if (files.length === 0) {
  console.error(`No test files found for ${requested.join(', ')}.`);
  process.exit(1);
}

const vitestBin = resolve('node_modules', '.bin', process.platform === 'win32' ? 'vitest.cmd' : 'vitest');
const result = spawnSync(vitestBin, ['run', ...files], { stdio: 'inherit' });
if (result.error) {
  console.error(result.error.message);
  process.exit(1);
}
process.exit(result.status ?? 1);
