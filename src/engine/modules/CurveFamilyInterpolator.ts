import type { CurveSnapV1, FigureId } from '../../contracts/ThermalEngineOutputV1';
import type { CoefficientLookup, CurveFamilySet, Point } from '../schema/ThermalSchemaV1';
import { MonotoneSpline } from './MonotoneSpline';
import { clamp } from '../utils/numeric';

type CurveParameter = CurveSnapV1['parameter'];

function snapIfClamped(
  figure: FigureId,
  parameter: CurveParameter,
  requested: number,
  used: number,
): CurveSnapV1[] {
  return requested === used ? [] : [{ figure, parameter, requested, used }];
}

// ─── Single digitized curve ───────────────────────────────────────────────────

/** One digitized curve (Figures 3, 4 and 7) with domain clamping. */
export class DigitizedCurve {
  private readonly spline: MonotoneSpline;

  constructor(
    readonly figure: FigureId,
    readonly parameter: CurveParameter,
    points: readonly Point[],
  ) {
    this.spline = new MonotoneSpline(points);
  }

  get domain(): [number, number] {
    return [this.spline.minX, this.spline.maxX];
  }

  evaluate(x: number): CoefficientLookup {
    const used = clamp(x, this.spline.minX, this.spline.maxX);
    return {
      value: this.spline.evaluate(used),
      snaps: snapIfClamped(this.figure, this.parameter, x, used),
    };
  }
}

// ─── Curve family ─────────────────────────────────────────────────────────────

export interface FamilyBracket {
  lower: number;
  upper: number;
  /** Fractional position of the query key between lower and upper (0 when equal). */
  t: number;
}

/**
 * CurveFamilyInterpolator
 *
 * Two-level interpolation across a figure drawn as a family of curves
 * (Figures 5 and 6): the family key selects a curve, the query x is a point
 * along it.
 *
 *   1. clamp the key to the digitized domain
 *   2. bracket the key between the two nearest stored families
 *   3. evaluate each bracketing curve's monotone spline at x, clamped to
 *      that curve's own x range
 *   4. interpolate linearly by the key's fractional position
 *
 * A key that lands exactly on a stored family skips step 4 and returns that
 * family's spline value unchanged.
 */
export class CurveFamilyInterpolator {
  private readonly keys: number[];
  private readonly splines = new Map<number, MonotoneSpline>();
  readonly keyDomain: [number, number];
  readonly xDomain: [number, number];

  constructor(
    readonly figure: FigureId,
    readonly keyParameter: CurveParameter,
    readonly xParameter: CurveParameter,
    families: CurveFamilySet,
  ) {
    if (families.size === 0) {
      throw new Error(`CurveFamilyInterpolator(${figure}): at least one curve family is required`);
    }

    this.keys = [...families.keys()].sort((a, b) => a - b);
    let minX = Infinity;
    let maxX = -Infinity;
    for (const key of this.keys) {
      const spline = new MonotoneSpline(families.get(key) ?? []);
      this.splines.set(key, spline);
      minX = Math.min(minX, spline.minX);
      maxX = Math.max(maxX, spline.maxX);
    }

    this.keyDomain = [this.keys[0], this.keys[this.keys.length - 1]];
    this.xDomain = [minX, maxX];
  }

  familyKeys(): readonly number[] {
    return this.keys;
  }

  /** Evaluate a single stored family's spline directly (no clamping of x beyond the spline's own). */
  evaluateFamily(key: number, x: number): number | undefined {
    return this.splines.get(key)?.evaluate(x);
  }

  bracket(key: number): FamilyBracket {
    const k = clamp(key, this.keyDomain[0], this.keyDomain[1]);
    let lower = this.keys[0];
    let upper = this.keys[this.keys.length - 1];
    for (const candidate of this.keys) {
      if (candidate <= k) lower = candidate;
      if (candidate >= k) {
        upper = candidate;
        break;
      }
    }
    const t = upper === lower ? 0 : (k - lower) / (upper - lower);
    return { lower, upper, t };
  }

  evaluate(key: number, x: number): CoefficientLookup {
    const usedKey = clamp(key, this.keyDomain[0], this.keyDomain[1]);
    const snaps = snapIfClamped(this.figure, this.keyParameter, key, usedKey);

    // Families may be digitized over different x ranges, so each bracketing
    // curve clamps x to its own domain.
    const readFamily = (familyKey: number): number => {
      const spline = this.splines.get(familyKey);
      if (spline === undefined) return 0;
      const usedX = clamp(x, spline.minX, spline.maxX);
      if (usedX !== x && !snaps.some(s => s.parameter === this.xParameter && s.used === usedX)) {
        snaps.push({ figure: this.figure, parameter: this.xParameter, requested: x, used: usedX });
      }
      return spline.evaluate(usedX);
    };

    const { lower, upper, t } = this.bracket(usedKey);
    const vLower = readFamily(lower);
    if (upper === lower) {
      return { value: vLower, snaps };
    }
    const vUpper = readFamily(upper);
    return { value: vLower + t * (vUpper - vLower), snaps };
  }
}
