import type { Point } from '../schema/ThermalSchemaV1';

// ─── Monotone cubic Hermite spline ────────────────────────────────────────────
//
// Digitized IEC 60890 curves are smooth and monotone between reading points.
// A plain cubic spline overshoots near the steep ends of Figures 3 and 7 and
// can invent local maxima; the Fritsch–Carlson tangent choice keeps each
// segment inside the range of its two knots.
//
//   m[i]  secant slope of segment i = (y[i+1] − y[i]) / (x[i+1] − x[i])
//   d[i]  tangent at knot i
//
//   d[0]   = m[0]
//   d[n−1] = m[n−2]
//   d[i]   = 0                                   if m[i−1]·m[i] ≤ 0
//          = (w1 + w2) / (w1/m[i−1] + w2/m[i])  otherwise
//            w1 = 2·dx[i] + dx[i−1],  w2 = dx[i] + 2·dx[i−1]
//
// Outside [x0, xn] the curve is held flat at the end value.

/**
 * MonotoneSpline
 *
 * Immutable after construction; `evaluate` is a pure function of the knots
 * and the query.
 *
 * @throws Error when constructed with no points or with duplicate x values.
 */
export class MonotoneSpline {
  private readonly xs: number[];
  private readonly ys: number[];
  private readonly tangents: number[];

  constructor(points: readonly Point[]) {
    if (points.length === 0) {
      throw new Error('MonotoneSpline: at least one point is required');
    }

    const sorted = [...points].sort((a, b) => a[0] - b[0]);
    for (let i = 1; i < sorted.length; i++) {
      if (sorted[i][0] === sorted[i - 1][0]) {
        throw new Error(`MonotoneSpline: duplicate x value ${sorted[i][0]}`);
      }
    }

    this.xs = sorted.map(p => p[0]);
    this.ys = sorted.map(p => p[1]);
    this.tangents = fritschCarlsonTangents(this.xs, this.ys);
  }

  /** Smallest knot x. */
  get minX(): number {
    return this.xs[0];
  }

  /** Largest knot x. */
  get maxX(): number {
    return this.xs[this.xs.length - 1];
  }

  get knotCount(): number {
    return this.xs.length;
  }

  evaluate(x: number): number {
    const { xs, ys, tangents } = this;
    const n = xs.length;

    if (n === 1 || x <= xs[0]) return ys[0];
    if (x >= xs[n - 1]) return ys[n - 1];

    const i = findSegment(xs, x);
    const h = xs[i + 1] - xs[i];
    if (h <= 0) return ys[i];

    const t = (x - xs[i]) / h;
    const t2 = t * t;
    const t3 = t2 * t;

    const h00 = 2 * t3 - 3 * t2 + 1;
    const h10 = t3 - 2 * t2 + t;
    const h01 = -2 * t3 + 3 * t2;
    const h11 = t3 - t2;

    return h00 * ys[i] + h10 * h * tangents[i] + h01 * ys[i + 1] + h11 * h * tangents[i + 1];
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function fritschCarlsonTangents(xs: number[], ys: number[]): number[] {
  const n = xs.length;
  if (n < 2) return new Array<number>(n).fill(0);

  const dx: number[] = [];
  const m: number[] = [];
  for (let i = 0; i < n - 1; i++) {
    const h = xs[i + 1] - xs[i];
    dx.push(h);
    m.push(h > 0 ? (ys[i + 1] - ys[i]) / h : 0);
  }

  const d = new Array<number>(n).fill(0);
  d[0] = m[0];
  d[n - 1] = m[n - 2];

  for (let i = 1; i < n - 1; i++) {
    const m0 = m[i - 1];
    const m1 = m[i];
    if (m0 === 0 || m1 === 0 || Math.sign(m0) !== Math.sign(m1)) {
      d[i] = 0;
      continue;
    }
    const w1 = 2 * dx[i] + dx[i - 1];
    const w2 = dx[i] + 2 * dx[i - 1];
    d[i] = (w1 + w2) / (w1 / m0 + w2 / m1);
  }

  return d;
}

/** Index i such that xs[i] <= x < xs[i + 1]; caller guarantees xs[0] < x < xs[n−1]. */
function findSegment(xs: number[], x: number): number {
  let lo = 0;
  let hi = xs.length - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (xs[mid] <= x) lo = mid;
    else hi = mid;
  }
  return lo;
}
