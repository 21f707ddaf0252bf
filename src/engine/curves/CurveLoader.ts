import type { CurveFamilySet, FigureDataSetV1, Point } from '../schema/ThermalSchemaV1';

// ─── Curve data loading ───────────────────────────────────────────────────────
//
// Digitized figure data reaches the engine once, at start-up, in one of two
// shapes:
//
//   • a JSON record  { "fig3": [[x, y], …], "fig5": { "<Ae>": [[x, y], …] }, … }
//   • a folder of CSV files per family, the file stem being the family key
//     (e.g. fig5/2.5.csv holds the Ae = 2.5 m² curve), read by the Node-only
//     CurveFolderLoader
//
// Everything is validated here so that the interpolation layer can assume
// sorted, duplicate-free, finite points.

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Validate and sort a raw point list.
 *
 * @throws Error on non-numeric pairs, empty lists or duplicate x values.
 */
export function toSortedPoints(raw: unknown, label: string): Point[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    throw new Error(`Curve data "${label}": expected a non-empty array of [x, y] pairs`);
  }

  const points: Point[] = raw.map((pair: unknown, i: number) => {
    if (!Array.isArray(pair) || pair.length < 2 || !isFiniteNumber(pair[0]) || !isFiniteNumber(pair[1])) {
      throw new Error(`Curve data "${label}": row ${i} is not a numeric [x, y] pair`);
    }
    const point: Point = [pair[0], pair[1]];
    return point;
  });

  points.sort((a, b) => a[0] - b[0]);
  for (let i = 1; i < points.length; i++) {
    if (points[i][0] === points[i - 1][0]) {
      throw new Error(`Curve data "${label}": duplicate x value ${points[i][0]}`);
    }
  }
  return points;
}

/**
 * Build a family set from a record keyed by the family parameter as text.
 *
 * @throws Error when a key is not numeric or the record is empty.
 */
export function buildCurveFamilySet(raw: unknown, label: string): CurveFamilySet {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error(`Curve family "${label}": expected an object keyed by family parameter`);
  }

  const entries = Object.entries(raw);
  if (entries.length === 0) {
    throw new Error(`Curve family "${label}": no curves`);
  }

  const families = entries.map(([key, points]): [number, Point[]] => {
    const familyKey = Number(key);
    if (key.trim() === '' || !Number.isFinite(familyKey)) {
      throw new Error(`Curve family "${label}": invalid family key "${key}"`);
    }
    return [familyKey, toSortedPoints(points, `${label}[${key}]`)];
  });

  families.sort((a, b) => a[0] - b[0]);
  return new Map(families);
}

/**
 * Validate a JSON figure record.  Unknown keys are ignored; missing figures
 * stay undefined and later fall back to their closed-form fits.
 */
export function loadFigureDataSet(raw: unknown): FigureDataSetV1 {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new Error('Figure data: expected an object');
  }
  const record: Record<string, unknown> = { ...raw };

  const data: FigureDataSetV1 = {};
  if (record.fig3 !== undefined) data.fig3 = toSortedPoints(record.fig3, 'fig3');
  if (record.fig4 !== undefined) data.fig4 = toSortedPoints(record.fig4, 'fig4');
  if (record.fig5 !== undefined) data.fig5 = buildCurveFamilySet(record.fig5, 'fig5');
  if (record.fig6 !== undefined) data.fig6 = buildCurveFamilySet(record.fig6, 'fig6');
  if (record.fig7 !== undefined) data.fig7 = toSortedPoints(record.fig7, 'fig7');
  return data;
}

// ─── CSV ──────────────────────────────────────────────────────────────────────

/**
 * Parse "x,y" rows.  Blank lines and lines starting with '#' are skipped;
 * columns beyond the second are ignored.
 */
export function parseCurveCsv(text: string, label = 'csv'): Point[] {
  const rows: unknown[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return;
    const cells = trimmed.split(',').map(cell => cell.trim());
    const x = cells[0] === '' ? NaN : Number(cells[0]);
    const y = cells.length > 1 && cells[1] !== '' ? Number(cells[1]) : NaN;
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      throw new Error(`Curve data "${label}": line ${i + 1} is not a numeric x,y row`);
    }
    rows.push([x, y]);
  });
  if (rows.length === 0) {
    throw new Error(`Curve data "${label}": no data rows`);
  }
  return toSortedPoints(rows, label);
}
