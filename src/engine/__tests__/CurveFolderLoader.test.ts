import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadCurveFolder } from '../curves/CurveFolderLoader';

// ─── 1. Folder loading ────────────────────────────────────────────────────────

describe('CurveFolderLoader – loadCurveFolder', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'curves-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('loads one family per CSV file, keyed by the file stem', () => {
    writeFileSync(join(dir, '2.5.csv'), '50,0.2\n100,0.18\n');
    writeFileSync(join(dir, '1.csv'), '50,0.3\n100,0.28\n');
    writeFileSync(join(dir, 'notes.txt'), 'ignored');

    const set = loadCurveFolder(dir);
    expect([...set.keys()]).toEqual([1, 2.5]);
    expect(set.get(1)).toEqual([[50, 0.3], [100, 0.28]]);
  });

  it('rejects a folder without CSV files', () => {
    expect(() => loadCurveFolder(dir)).toThrow(`No CSV files found in ${dir}`);
  });

  it('rejects a non-numeric file name', () => {
    writeFileSync(join(dir, 'curveA.csv'), '1,1\n');
    expect(() => loadCurveFolder(dir)).toThrow('Invalid curve filename: curveA.csv');
  });
});

// ─── 2. Browser bundle ────────────────────────────────────────────────────────

const SRC_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '../..');

function resolveSource(fromFile: string, specifier: string): string | undefined {
  const base = resolve(dirname(fromFile), specifier);
  return [`${base}.ts`, `${base}.tsx`, join(base, 'index.ts')].find(candidate => existsSync(candidate));
}

/** Every TypeScript module reachable from `entry` through relative imports. */
function reachableModules(entry: string): Set<string> {
  const seen = new Set<string>();
  const pending = [entry];
  while (pending.length > 0) {
    const file = pending.pop();
    if (file === undefined || seen.has(file)) continue;
    seen.add(file);
    const source = readFileSync(file, 'utf8');
    for (const match of source.matchAll(/from\s+'(\.{1,2}\/[^']+)'/g)) {
      const target = resolveSource(file, match[1]);
      if (target !== undefined) pending.push(target);
    }
  }
  return seen;
}

describe('CurveFolderLoader – browser bundle', () => {
  const appModules = reachableModules(join(SRC_DIR, 'main.tsx'));

  it('the app shell reaches the engine and the curve loader', () => {
    expect(appModules.has(join(SRC_DIR, 'engine', 'Engine.ts'))).toBe(true);
    expect(appModules.has(join(SRC_DIR, 'engine', 'curves', 'CurveLoader.ts'))).toBe(true);
  });

  it('nothing the app shell imports depends on Node built-ins', () => {
    const withNodeImports = [...appModules].filter(file => /from\s+'node:/.test(readFileSync(file, 'utf8')));
    expect(withNodeImports).toEqual([]);
  });
});
