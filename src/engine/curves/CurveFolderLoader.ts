import { readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { parseCurveCsv } from './CurveLoader';
import type { CurveFamilySet, Point } from '../schema/ThermalSchemaV1';

// Server-side only: nothing the engine or the app shell imports may depend
// on this module.

/**
 * Load every `<key>.csv` in a folder as one family of a figure.
 *
 * @throws Error when a file stem is not numeric, a file has no data, or the
 *         folder holds no CSV files.
 */
export function loadCurveFolder(folder: string): CurveFamilySet {
  const files = readdirSync(folder).filter(name => extname(name).toLowerCase() === '.csv');
  if (files.length === 0) {
    throw new Error(`No CSV files found in ${folder}`);
  }

  const families = files.map((file): [number, Point[]] => {
    const stem = basename(file, extname(file));
    const key = Number(stem);
    if (stem.trim() === '' || !Number.isFinite(key)) {
      throw new Error(`Invalid curve filename: ${file}`);
    }
    return [key, parseCurveCsv(readFileSync(join(folder, file), 'utf8'), file)];
  });

  families.sort((a, b) => a[0] - b[0]);
  return new Map(families);
}
