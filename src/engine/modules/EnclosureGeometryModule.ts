import type {
  CurveNumber,
  FaceAreaFactors,
  SurfaceContributionV1,
  TouchingSides,
} from '../../contracts/ThermalEngineOutputV1';
import type { EnclosureGeometryResult, SectionRect } from '../schema/ThermalSchemaV1';
import { noopLogSink, type ThermalLogSink } from '../utils/logging';

/** Ae threshold separating Figures 7/8 (≤) from Figures 3–6 (>). */
export const SMALL_ENCLOSURE_AE_M2 = 1.25;

/** Default distance (m) under which two opposing faces count as touching. */
export const DEFAULT_TOUCH_TOLERANCE_M = 1e-3;

/** Guard for f and g denominators on degenerate geometry. */
const MIN_DIMENSION = 1e-9;

const F_HEIGHT_EXPONENT = 1.35;

// ─── IEC 60890 Table III – surface factor b ───────────────────────────────────
//
//   Exposed top surface ....................... 1.4
//   Covered top surface (section above) ....... 0.7
//   Exposed side surface ...................... 0.9
//   Covered side surface (section beside) ..... 0.5
//   Rear surface against a wall ............... 0.5
//   Floor surface ............................. not taken into account

const B_TOP_EXPOSED = 1.4;
const B_TOP_COVERED = 0.7;
const B_SIDE_EXPOSED = 0.9;
const B_SIDE_COVERED = 0.5;
const B_FLOOR = 0;

export interface GeometryOptions {
  wallMounted: boolean;
  touchToleranceM?: number;
  log?: ThermalLogSink;
}

export interface SectionGeometryInput extends SectionRect {
  depthM: number;
  id?: string;
}

/** Strict overlap of two open intervals. */
function overlaps1d(a0: number, a1: number, b0: number, b1: number): boolean {
  return !(a1 <= b0 || b1 <= a0);
}

/**
 * Which faces of `sections[index]` touch another section.
 *
 * A face touches when the opposing face of a sibling lies within the
 * tolerance and the two sections overlap along the perpendicular axis.
 * The scan runs over the whole arena on every call, so the answer never
 * depends on sibling order.
 */
export function touchingSides(
  index: number,
  sections: readonly SectionRect[],
  toleranceM: number = DEFAULT_TOUCH_TOLERANCE_M,
): TouchingSides {
  const r = sections[index];
  const left = r.xM;
  const right = r.xM + r.widthM;
  const bottom = r.yM;
  const top = r.yM + r.heightM;

  const result: TouchingSides = { top: false, bottom: false, left: false, right: false };

  sections.forEach((o, j) => {
    if (j === index) return;
    const oLeft = o.xM;
    const oRight = o.xM + o.widthM;
    const oBottom = o.yM;
    const oTop = o.yM + o.heightM;

    const verticalOverlap = overlaps1d(bottom, top, oBottom, oTop);
    const horizontalOverlap = overlaps1d(left, right, oLeft, oRight);

    if (verticalOverlap && Math.abs(left - oRight) <= toleranceM) result.left = true;
    if (verticalOverlap && Math.abs(right - oLeft) <= toleranceM) result.right = true;
    if (horizontalOverlap && Math.abs(top - oBottom) <= toleranceM) result.top = true;
    if (horizontalOverlap && Math.abs(bottom - oTop) <= toleranceM) result.bottom = true;
  });

  return result;
}

export function faceFactorsFor(touching: TouchingSides, wallMounted: boolean): FaceAreaFactors {
  return {
    top: touching.top ? B_TOP_COVERED : B_TOP_EXPOSED,
    bottom: B_FLOOR,
    left: touching.left ? B_SIDE_COVERED : B_SIDE_EXPOSED,
    right: touching.right ? B_SIDE_COVERED : B_SIDE_EXPOSED,
    front: B_SIDE_EXPOSED,
    rear: wallMounted ? B_SIDE_COVERED : B_SIDE_EXPOSED,
  };
}

/** Ae = Σ b × A0 over all six faces. */
export function effectiveArea(widthM: number, heightM: number, depthM: number, b: FaceAreaFactors): number {
  const plan = widthM * depthM;
  const side = heightM * depthM;
  const elevation = widthM * heightM;
  return (
    b.top * plan +
    b.bottom * plan +
    b.left * side +
    b.right * side +
    b.front * elevation +
    b.rear * elevation
  );
}

/** Per-surface breakdown for reports; the floor is omitted (b = 0). */
export function resolveSurfaces(
  widthM: number,
  heightM: number,
  depthM: number,
  b: FaceAreaFactors,
): SurfaceContributionV1[] {
  const rows: Array<[SurfaceContributionV1['name'], number, number, number]> = [
    ['Roof', widthM, depthM, b.top],
    ['Front', widthM, heightM, b.front],
    ['Rear', widthM, heightM, b.rear],
    ['Left', heightM, depthM, b.left],
    ['Right', heightM, depthM, b.right],
  ];
  return rows.map(([name, dim1M, dim2M, factor]) => {
    const areaM2 = dim1M * dim2M;
    return { name, dim1M, dim2M, areaM2, factor, effectiveAreaM2: areaM2 * factor };
  });
}

/**
 * Shape ratios selecting the c curve:
 *   f = h^1.35 / Ab   (Ab = w × d, large and ventilated enclosures)
 *   g = h / w         (small unventilated enclosures)
 */
export function shapeRatios(widthM: number, heightM: number, depthM: number): { f: number; g: number } {
  const baseArea = Math.max(MIN_DIMENSION, widthM * depthM);
  return {
    f: Math.pow(heightM, F_HEIGHT_EXPONENT) / baseArea,
    g: heightM / Math.max(MIN_DIMENSION, widthM),
  };
}

/**
 * Figure 4 installation curve from the side/top adjacency pattern.
 *
 *   sides touching   top covered   free-standing   wall-mounted
 *   none             no            1               3
 *   one              no            2               4
 *   both             no            3               5
 *   both             yes           3               4
 *   anything else                  3               4
 */
export function curveNumberFor(touching: TouchingSides, wallMounted: boolean): CurveNumber {
  const { left, right, top } = touching;
  const both = left && right;
  const one = left !== right;

  if (!left && !right && !top) return wallMounted ? 3 : 1;
  if (one && !top) return wallMounted ? 4 : 2;
  if (both && !top) return wallMounted ? 5 : 3;
  if (wallMounted && both && top) return 4;
  return wallMounted ? 4 : 3;
}

/**
 * EnclosureGeometryModule
 *
 * Resolves the IEC 60890 geometry of one section against its siblings:
 * touching faces, Table III factors, effective cooling surface Ae, the shape
 * ratios f and g, and the Figure 4 curve number.
 *
 * @param index     Position of the section inside `sections`.
 * @param sections  Every section of the layout, the evaluated one included.
 */
export function resolveEnclosureGeometry(
  index: number,
  sections: readonly SectionGeometryInput[],
  options: GeometryOptions,
): EnclosureGeometryResult {
  const log = options.log ?? noopLogSink;
  const section = sections[index];
  const { widthM, heightM, depthM } = section;

  const touching = touchingSides(index, sections, options.touchToleranceM ?? DEFAULT_TOUCH_TOLERANCE_M);
  const faceFactors = faceFactorsFor(touching, options.wallMounted);
  const effectiveAreaM2 = effectiveArea(widthM, heightM, depthM, faceFactors);
  const { f, g } = shapeRatios(widthM, heightM, depthM);
  const curveNumber = curveNumberFor(touching, options.wallMounted);

  log.debug('geometry.face_factors', {
    section: section.id ?? index,
    top: faceFactors.top,
    left: faceFactors.left,
    right: faceFactors.right,
    rear: faceFactors.rear,
    touchTop: touching.top,
    touchLeft: touching.left,
    touchRight: touching.right,
    wallMounted: options.wallMounted,
    curveNumber,
  });

  return {
    widthM,
    heightM,
    depthM,
    touching,
    faceFactors,
    surfaces: resolveSurfaces(widthM, heightM, depthM, faceFactors),
    effectiveAreaM2,
    f,
    g,
    isSmall: effectiveAreaM2 <= SMALL_ENCLOSURE_AE_M2,
    curveNumber,
    wallMounted: options.wallMounted,
  };
}

/** Curve number of every section in a layout, e.g. for drawing badges. */
export function assignCurveNumbers(
  sections: readonly SectionRect[],
  wallMounted: boolean,
  toleranceM: number = DEFAULT_TOUCH_TOLERANCE_M,
): CurveNumber[] {
  return sections.map((_, i) => curveNumberFor(touchingSides(i, sections, toleranceM), wallMounted));
}
