import type { CurveNumber, FigureId, FigureLabel, ThermalResultV1 } from '../../contracts/ThermalEngineOutputV1';
import type { CoefficientSource } from '../../engine/modules/CoefficientSource';
import { roundTo } from '../../engine/utils/numeric';

// ─── Temperature profile ──────────────────────────────────────────────────────

export interface TemperatureProfilePoint {
  /** Multiple of the enclosure height (0 = floor, 1 = top). */
  heightMultiple: number;
  temperatureC: number;
  label: string;
}

/**
 * Air temperature characteristic over the enclosure height, as drawn in the
 * IEC 60890 construction: ambient at the floor, then the 0.5, 0.75 (small
 * enclosures only) and 1.0 points of the result.
 */
export function buildTemperatureProfile(
  result: ThermalResultV1,
  ambientC: number = result.ambientC,
): TemperatureProfilePoint[] {
  const points: TemperatureProfilePoint[] = [
    { heightMultiple: 0, temperatureC: ambientC, label: 'Ambient' },
    { heightMultiple: 0.5, temperatureC: result.temperatures.midC, label: 'T@0.5t' },
  ];
  if (result.temperatures.threeQuarterC !== null) {
    points.push({ heightMultiple: 0.75, temperatureC: result.temperatures.threeQuarterC, label: 'T@0.75t' });
  }
  points.push({ heightMultiple: 1, temperatureC: result.temperatures.topC, label: 'T@1.0t' });
  return points;
}

// ─── Coefficient figures ──────────────────────────────────────────────────────

export interface FigureSeries {
  name: string;
  evaluate: (x: number) => number;
}

export interface FigureDefinition {
  key: FigureId;
  label: FigureLabel;
  title: string;
  xLabel: string;
  yLabel: string;
  xStart: number;
  xEnd: number;
  xStep: number;
  series: (source: CoefficientSource) => FigureSeries[];
}

/** One chart row: the x value plus one column per series name. */
export type FigureRow = Record<string, number>;

export interface SampledFigure {
  definition: FigureDefinition;
  seriesNames: string[];
  rows: FigureRow[];
}

const CURVE_NUMBERS: readonly CurveNumber[] = [1, 2, 3, 4, 5];
const FIG5_AE_KEYS = [1, 2, 4, 6, 10, 14];
const FIG6_F_KEYS = [1.5, 2, 4, 6, 10];

export const FIGURE_DEFINITIONS: readonly FigureDefinition[] = [
  {
    key: 'fig3',
    label: 'Fig. 3',
    title: 'Enclosure constant k, no ventilation openings, Ae > 1.25 m²',
    xLabel: 'Effective cooling surface Ae (m²)',
    yLabel: 'k',
    xStart: 1.25,
    xEnd: 14,
    xStep: 0.25,
    series: source => [{ name: 'k', evaluate: ae => source.kUnventilatedLarge(ae).value }],
  },
  {
    key: 'fig4',
    label: 'Fig. 4',
    title: 'Temperature distribution factor c, no ventilation openings, Ae > 1.25 m²',
    xLabel: 'f = h^1.35 / Ab',
    yLabel: 'c',
    xStart: 0.6,
    xEnd: 10,
    xStep: 0.2,
    series: source =>
      CURVE_NUMBERS.map(n => ({ name: `Curve ${n}`, evaluate: (f: number) => source.cUnventilatedLarge(n, f).value })),
  },
  {
    key: 'fig5',
    label: 'Fig. 5',
    title: 'Enclosure constant k, with ventilation openings, Ae > 1.25 m²',
    xLabel: 'Air inlet opening (cm²)',
    yLabel: 'k',
    xStart: 50,
    xEnd: 700,
    xStep: 10,
    series: source =>
      FIG5_AE_KEYS.map(ae => ({ name: `Ae = ${ae} m²`, evaluate: (s: number) => source.kVentilated(ae, s).value })),
  },
  {
    key: 'fig6',
    label: 'Fig. 6',
    title: 'Temperature distribution factor c, with ventilation openings, Ae > 1.25 m²',
    xLabel: 'Air inlet opening (cm²)',
    yLabel: 'c',
    xStart: 50,
    xEnd: 700,
    xStep: 10,
    series: source =>
      FIG6_F_KEYS.map(f => ({ name: `f = ${f}`, evaluate: (s: number) => source.cVentilated(f, s).value })),
  },
  {
    key: 'fig7',
    label: 'Fig. 7',
    title: 'Enclosure constant k, no ventilation openings, Ae ≤ 1.25 m²',
    xLabel: 'Effective cooling surface Ae (m²)',
    yLabel: 'k',
    xStart: 0.05,
    xEnd: 1.25,
    xStep: 0.05,
    series: source => [{ name: 'k', evaluate: ae => source.kUnventilatedSmall(ae).value }],
  },
  {
    key: 'fig8',
    label: 'Fig. 8',
    title: 'Temperature distribution factor c, no ventilation openings, Ae ≤ 1.25 m²',
    xLabel: 'g = h / w',
    yLabel: 'c',
    xStart: 0.2,
    xEnd: 3,
    xStep: 0.1,
    series: source => [{ name: 'c', evaluate: g => source.cUnventilatedSmall(g).value }],
  },
];

export function figureDefinition(key: FigureId): FigureDefinition {
  const def = FIGURE_DEFINITIONS.find(d => d.key === key);
  if (def === undefined) throw new Error(`Unknown figure: ${key}`);
  return def;
}

/** Evenly spaced x values from `xStart` to `xEnd` inclusive. */
export function figureXValues(def: FigureDefinition): number[] {
  const count = Math.round((def.xEnd - def.xStart) / def.xStep) + 1;
  return Array.from({ length: count }, (_, i) => roundTo(def.xStart + i * def.xStep, 6));
}

/** Samples every series of a figure into Recharts-ready rows. */
export function sampleFigure(key: FigureId, source: CoefficientSource): SampledFigure {
  const definition = figureDefinition(key);
  const series = definition.series(source);
  const rows = figureXValues(definition).map(x => {
    const row: FigureRow = { x };
    for (const s of series) row[s.name] = s.evaluate(x);
    return row;
  });
  return { definition, seriesNames: series.map(s => s.name), rows };
}
