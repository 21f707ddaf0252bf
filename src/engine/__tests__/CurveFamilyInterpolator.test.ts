import { describe, it, expect } from 'vitest';
import { CurveFamilyInterpolator, DigitizedCurve } from '../modules/CurveFamilyInterpolator';
import type { CurveFamilySet, Point } from '../schema/ThermalSchemaV1';

// Two straight families make every expected value exact:
//   key 1: y = 10 + x      key 3: y = 30 + x      (x ∈ [0, 10])
const families: CurveFamilySet = new Map<number, readonly Point[]>([
  [1, [[0, 10], [10, 20]]],
  [3, [[0, 30], [10, 40]]],
]);

const interpolator = new CurveFamilyInterpolator('fig5', 'Ae', 'inletAreaCm2', families);

// ─── 1. Bracketing ────────────────────────────────────────────────────────────

describe('CurveFamilyInterpolator – bracketing', () => {
  it('brackets a key between the two nearest families', () => {
    expect(interpolator.bracket(2)).toEqual({ lower: 1, upper: 3, t: 0.5 });
  });

  it('collapses the bracket when the key lands on a family', () => {
    expect(interpolator.bracket(3)).toEqual({ lower: 3, upper: 3, t: 0 });
  });

  it('reports key and x domains', () => {
    expect(interpolator.keyDomain).toEqual([1, 3]);
    expect(interpolator.xDomain).toEqual([0, 10]);
    expect(interpolator.familyKeys()).toEqual([1, 3]);
  });
});

// ─── 2. Evaluation ────────────────────────────────────────────────────────────

describe('CurveFamilyInterpolator – evaluation', () => {
  it('returns the family value unchanged for an exact key', () => {
    const result = interpolator.evaluate(1, 5);
    expect(result.value).toBeCloseTo(15, 10);
    expect(result.snaps).toEqual([]);
  });

  it('interpolates linearly between families', () => {
    // lower 15, upper 35, t = 0.5
    expect(interpolator.evaluate(2, 5).value).toBeCloseTo(25, 10);
    // t = 0.25 at key 1.5
    expect(interpolator.evaluate(1.5, 5).value).toBeCloseTo(20, 10);
  });

  it('clamps both inputs and records a snap for each', () => {
    const result = interpolator.evaluate(5, 20);
    expect(result.value).toBeCloseTo(40, 10);
    expect(result.snaps).toEqual([
      { figure: 'fig5', parameter: 'Ae', requested: 5, used: 3 },
      { figure: 'fig5', parameter: 'inletAreaCm2', requested: 20, used: 10 },
    ]);
  });

  it('clamps below the key domain', () => {
    const result = interpolator.evaluate(0.2, 0);
    expect(result.value).toBeCloseTo(10, 10);
    expect(result.snaps).toEqual([{ figure: 'fig5', parameter: 'Ae', requested: 0.2, used: 1 }]);
  });

  it('is non-decreasing in the key when families are ordered', () => {
    let prev = -Infinity;
    for (let key = 1; key <= 3; key += 0.1) {
      const v = interpolator.evaluate(key, 4).value;
      expect(v).toBeGreaterThanOrEqual(prev);
      prev = v;
    }
  });

  it('rejects an empty family set', () => {
    expect(() => new CurveFamilyInterpolator('fig6', 'f', 'inletAreaCm2', new Map())).toThrow(
      'at least one curve family',
    );
  });
});

// ─── 3. Families of uneven length ─────────────────────────────────────────────

describe('CurveFamilyInterpolator – families digitized over different ranges', () => {
  const uneven = new CurveFamilyInterpolator('fig5', 'Ae', 'inletAreaCm2', new Map<number, readonly Point[]>([
    [1, [[50, 0.3], [150, 0.28], [300, 0.24]]],
    [2, [[50, 0.2], [300, 0.16], [700, 0.12]]],
  ]));

  it('reports the union of the families as the x domain', () => {
    expect(uneven.xDomain).toEqual([50, 700]);
  });

  it('records a snap when the exact family ends before x', () => {
    expect(uneven.evaluate(1, 500)).toEqual({
      value: 0.24,
      snaps: [{ figure: 'fig5', parameter: 'inletAreaCm2', requested: 500, used: 300 }],
    });
  });

  it('does not snap a family that covers x', () => {
    expect(uneven.evaluate(2, 500).snaps).toEqual([]);
  });

  it('snaps only the shorter bracketing family', () => {
    const upper = uneven.evaluateFamily(2, 500) ?? NaN;
    const result = uneven.evaluate(1.5, 500);
    expect(result.value).toBeCloseTo(0.24 + 0.5 * (upper - 0.24), 12);
    expect(result.snaps).toEqual([{ figure: 'fig5', parameter: 'inletAreaCm2', requested: 500, used: 300 }]);
  });

  it('records one snap per distinct clamp when both families end before x', () => {
    const result = uneven.evaluate(1.5, 800);
    expect(result.value).toBeCloseTo(0.18, 12);
    expect(result.snaps).toEqual([
      { figure: 'fig5', parameter: 'inletAreaCm2', requested: 800, used: 300 },
      { figure: 'fig5', parameter: 'inletAreaCm2', requested: 800, used: 700 },
    ]);
  });
});

// ─── 4. Single digitized curve ────────────────────────────────────────────────

describe('DigitizedCurve', () => {
  const curve = new DigitizedCurve('fig3', 'Ae', [[1.25, 0.5], [2.5, 0.3], [5, 0.2]]);

  it('evaluates inside the domain without snaps', () => {
    expect(curve.evaluate(2.5)).toEqual({ value: 0.3, snaps: [] });
  });

  it('clamps outside the domain and records the snap', () => {
    expect(curve.evaluate(8)).toEqual({
      value: 0.2,
      snaps: [{ figure: 'fig3', parameter: 'Ae', requested: 8, used: 5 }],
    });
  });

  it('reports its domain', () => {
    expect(curve.domain).toEqual([1.25, 5]);
  });
});
