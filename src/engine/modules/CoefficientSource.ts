import type { CurveNumber, CurveSnapV1, FigureId } from '../../contracts/ThermalEngineOutputV1';
import type { CoefficientLookup, FigureDataSetV1, Point } from '../schema/ThermalSchemaV1';
import { CurveFamilyInterpolator, DigitizedCurve } from './CurveFamilyInterpolator';
import { clamp } from '../utils/numeric';

// ─── Coefficient functions ────────────────────────────────────────────────────
//
//   Figure 3  k vs Ae                 unventilated, Ae > 1.25 m²
//   Figure 4  c vs f, curves 1–5      unventilated, Ae > 1.25 m²
//   Figure 5  k vs inlet area, per Ae ventilated
//   Figure 6  c vs inlet area, per f  ventilated
//   Figure 7  k vs Ae                 unventilated, Ae ≤ 1.25 m²
//   Figure 8  c vs g                  unventilated, Ae ≤ 1.25 m²
//
// Each function has two strategies.  The digitized strategy reads monotone
// splines through the host's figure data and is authoritative; the closed-form
// strategy is a power law fitted through two anchor points read off the same
// figure and is only used for figures the host did not supply.

export type CoefficientFunctionId =
  | 'kUnventilatedLarge'
  | 'cUnventilatedLarge'
  | 'kUnventilatedSmall'
  | 'cUnventilatedSmall'
  | 'kVentilated'
  | 'cVentilated';

export type CoefficientStrategy = 'digitized' | 'closed_form';

export interface CoefficientSource {
  readonly strategies: Readonly<Record<CoefficientFunctionId, CoefficientStrategy>>;
  kUnventilatedLarge(ae: number): CoefficientLookup;
  cUnventilatedLarge(curveNumber: CurveNumber, f: number): CoefficientLookup;
  kUnventilatedSmall(ae: number): CoefficientLookup;
  cUnventilatedSmall(g: number): CoefficientLookup;
  kVentilated(ae: number, inletAreaCm2: number): CoefficientLookup;
  cVentilated(f: number, inletAreaCm2: number): CoefficientLookup;
}

/**
 * Figure 4 offsets added to the curve-1 value for each installation curve.
 * More sheltered installations (higher curve number) sit lower on the chart.
 */
export const CURVE_NUMBER_OFFSETS: Readonly<Record<CurveNumber, number>> = {
  1: 0,
  2: -0.02,
  3: -0.04,
  4: -0.06,
  5: -0.08,
};

// ─── Power-law fits ───────────────────────────────────────────────────────────

/** y = C · x^B */
export interface PowerLaw {
  C: number;
  B: number;
}

/**
 * Fit y = C·x^B exactly through two anchors:
 *   B = ln(y₂/y₁) / ln(x₂/x₁),  C = y₁ / x₁^B
 */
export function fitPowerLaw(a: Point, b: Point): PowerLaw {
  const B = Math.log(b[1] / a[1]) / Math.log(b[0] / a[0]);
  const C = a[1] / Math.pow(a[0], B);
  return { C, B };
}

export function evaluatePowerLaw(law: PowerLaw, x: number): number {
  return law.C * Math.pow(x, law.B);
}

interface ClosedFormCurveDef {
  figure: FigureId;
  parameter: CurveSnapV1['parameter'];
  anchors: [Point, Point];
  domain: [number, number];
}

/**
 * Two-parameter fallback for the family figures: a power law along the family
 * key at the reference opening, times a power law in the opening area
 * normalised to that reference.
 *
 *   value = C·key^B · (s / sRef)^E
 */
interface ClosedFormFamilyDef {
  figure: FigureId;
  keyParameter: CurveSnapV1['parameter'];
  keyAnchors: [Point, Point];
  keyDomain: [number, number];
  referenceOpeningCm2: number;
  openingAnchors: [Point, Point];
  openingDomain: [number, number];
}

/** Anchor points for every closed-form approximation. Changing these changes results. */
export const CLOSED_FORM_CURVES = {
  fig3: { figure: 'fig3', parameter: 'Ae', anchors: [[1.25, 0.524], [14, 0.078]], domain: [1.25, 14] },
  fig4: { figure: 'fig4', parameter: 'f', anchors: [[1, 1.225], [10, 1.488]], domain: [0.6, 10] },
  fig7: { figure: 'fig7', parameter: 'Ae', anchors: [[0.1, 2.2], [1.25, 0.524]], domain: [0.05, 1.25] },
  fig8: { figure: 'fig8', parameter: 'g', anchors: [[0.5, 1.1], [2.5, 1.45]], domain: [0.2, 3] },
} satisfies Record<string, ClosedFormCurveDef>;

export const CLOSED_FORM_FAMILIES = {
  fig5: {
    figure: 'fig5',
    keyParameter: 'Ae',
    keyAnchors: [[1, 0.2394], [14, 0.029]],
    keyDomain: [1, 14],
    referenceOpeningCm2: 300,
    openingAnchors: [[50, 0.3271], [700, 0.2047]],
    openingDomain: [50, 700],
  },
  fig6: {
    figure: 'fig6',
    keyParameter: 'f',
    keyAnchors: [[1.5, 1.379], [10, 1.671]],
    keyDomain: [1.5, 10],
    referenceOpeningCm2: 300,
    openingAnchors: [[50, 1.293], [700, 1.404]],
    openingDomain: [50, 700],
  },
} satisfies Record<string, ClosedFormFamilyDef>;

type SingleCurve = (x: number) => CoefficientLookup;
type FamilyCurve = (key: number, x: number) => CoefficientLookup;

function closedFormCurve(def: ClosedFormCurveDef): SingleCurve {
  const law = fitPowerLaw(def.anchors[0], def.anchors[1]);
  return (x) => {
    const used = clamp(x, def.domain[0], def.domain[1]);
    return {
      value: evaluatePowerLaw(law, used),
      snaps: used === x ? [] : [{ figure: def.figure, parameter: def.parameter, requested: x, used }],
    };
  };
}

function closedFormFamily(def: ClosedFormFamilyDef): FamilyCurve {
  const keyLaw = fitPowerLaw(def.keyAnchors[0], def.keyAnchors[1]);
  const openingLaw = fitPowerLaw(def.openingAnchors[0], def.openingAnchors[1]);
  return (key, s) => {
    const usedKey = clamp(key, def.keyDomain[0], def.keyDomain[1]);
    const usedS = clamp(s, def.openingDomain[0], def.openingDomain[1]);
    const snaps: CurveSnapV1[] = [];
    if (usedKey !== key) snaps.push({ figure: def.figure, parameter: def.keyParameter, requested: key, used: usedKey });
    if (usedS !== s) snaps.push({ figure: def.figure, parameter: 'inletAreaCm2', requested: s, used: usedS });
    const value =
      evaluatePowerLaw(keyLaw, usedKey) * Math.pow(usedS / def.referenceOpeningCm2, openingLaw.B);
    return { value, snaps };
  };
}

function digitizedCurve(figure: FigureId, parameter: CurveSnapV1['parameter'], points: readonly Point[]): SingleCurve {
  const curve = new DigitizedCurve(figure, parameter, points);
  return (x) => curve.evaluate(x);
}

function withOffset(lookup: CoefficientLookup, offset: number): CoefficientLookup {
  return { value: lookup.value + offset, snaps: lookup.snaps };
}

// ─── Factory ──────────────────────────────────────────────────────────────────

/**
 * Build the coefficient source for an engine instance.
 *
 * Strategy selection happens once here: every figure present in `figures`
 * is read through its digitized curves, every missing one through its
 * closed-form fit.  The returned object holds no mutable state and can be
 * shared by concurrent evaluations.
 */
export function createCoefficientSource(figures: FigureDataSetV1 = {}): CoefficientSource {
  const fig3 = figures.fig3
    ? digitizedCurve('fig3', 'Ae', figures.fig3)
    : closedFormCurve(CLOSED_FORM_CURVES.fig3);
  const fig4 = figures.fig4
    ? digitizedCurve('fig4', 'f', figures.fig4)
    : closedFormCurve(CLOSED_FORM_CURVES.fig4);
  const fig7 = figures.fig7
    ? digitizedCurve('fig7', 'Ae', figures.fig7)
    : closedFormCurve(CLOSED_FORM_CURVES.fig7);
  const fig8 = closedFormCurve(CLOSED_FORM_CURVES.fig8);

  let fig5: FamilyCurve;
  if (figures.fig5) {
    const family = new CurveFamilyInterpolator('fig5', 'Ae', 'inletAreaCm2', figures.fig5);
    fig5 = (ae, s) => family.evaluate(ae, s);
  } else {
    fig5 = closedFormFamily(CLOSED_FORM_FAMILIES.fig5);
  }

  let fig6: FamilyCurve;
  if (figures.fig6) {
    const family = new CurveFamilyInterpolator('fig6', 'f', 'inletAreaCm2', figures.fig6);
    fig6 = (f, s) => family.evaluate(f, s);
  } else {
    fig6 = closedFormFamily(CLOSED_FORM_FAMILIES.fig6);
  }

  const strategy = (present: unknown): CoefficientStrategy => (present ? 'digitized' : 'closed_form');

  return {
    strategies: {
      kUnventilatedLarge: strategy(figures.fig3),
      cUnventilatedLarge: strategy(figures.fig4),
      kUnventilatedSmall: strategy(figures.fig7),
      cUnventilatedSmall: 'closed_form',
      kVentilated: strategy(figures.fig5),
      cVentilated: strategy(figures.fig6),
    },
    kUnventilatedLarge: (ae) => fig3(ae),
    cUnventilatedLarge: (curveNumber, f) => withOffset(fig4(f), CURVE_NUMBER_OFFSETS[curveNumber]),
    kUnventilatedSmall: (ae) => fig7(ae),
    cUnventilatedSmall: (g) => fig8(g),
    kVentilated: (ae, inletAreaCm2) => fig5(ae, inletAreaCm2),
    cVentilated: (f, inletAreaCm2) => fig6(f, inletAreaCm2),
  };
}
