import type { FigureLabel, ThermalBranch } from '../../contracts/ThermalEngineOutputV1';
import type {
  EnclosureGeometryResult,
  ResolvedCoefficients,
  ThermalSolveResult,
} from '../schema/ThermalSchemaV1';
import type { CoefficientSource } from './CoefficientSource';
import { SMALL_ENCLOSURE_AE_M2 } from './EnclosureGeometryModule';

/** Power-law exponent x for enclosures with effective ventilation openings. */
export const EXPONENT_VENTILATED = 0.715;
/** Power-law exponent x for sealed enclosures. */
export const EXPONENT_UNVENTILATED = 0.804;

/** IP first digit from which ventilation openings are ignored (IP5X and above). */
export const IP_OPENINGS_IGNORED_FROM = 5;

// ─── d-factor: horizontal partitions (IEC 60890 Tables IV and V) ─────────────
//
//   partitions   without openings   with openings
//   0            1.00               1.00
//   1            1.05               1.05
//   2            1.15               1.10
//   3            1.30               1.15
//
// Only applies to Ae > 1.25 m²; more than three partitions is outside the
// tables and takes the last row.

const D_FACTOR_UNVENTILATED = [1.0, 1.05, 1.15, 1.3] as const;
const D_FACTOR_VENTILATED = [1.0, 1.05, 1.1, 1.15] as const;

export function resolveDFactor(
  partitions: number,
  ventilated: boolean,
  small: boolean,
): { d: number; clamped: boolean } {
  if (small) return { d: 1, clamped: false };
  const table = ventilated ? D_FACTOR_VENTILATED : D_FACTOR_UNVENTILATED;
  const last = table.length - 1;
  const n = Math.max(0, Math.floor(partitions));
  return { d: table[Math.min(n, last)], clamped: n > last };
}

/**
 * Ventilation only counts when it is switched on, the enclosure is in the
 * Ae > 1.25 m² regime (Figures 5/6 start there) and the IP rating allows
 * openings.
 */
export function isVentilationEffective(enabled: boolean, effectiveAreaM2: number, ipRating: number): boolean {
  return enabled && effectiveAreaM2 > SMALL_ENCLOSURE_AE_M2 && ipRating < IP_OPENINGS_IGNORED_FROM;
}

export function branchFor(ventilationEffective: boolean, effectiveAreaM2: number): ThermalBranch {
  if (ventilationEffective) return 'ventilated';
  return effectiveAreaM2 <= SMALL_ENCLOSURE_AE_M2 ? 'unventilated_small' : 'unventilated_large';
}

/**
 * Pick k, c, x and d for a branch.
 *
 * `inletAreaCm2` is only read by the ventilated branch.  The result carries
 * every clamp the curve layer applied.
 */
export function selectCoefficients(
  branch: ThermalBranch,
  geometry: EnclosureGeometryResult,
  inletAreaCm2: number,
  partitions: number,
  source: CoefficientSource,
): ResolvedCoefficients {
  const ae = geometry.effectiveAreaM2;

  if (branch === 'ventilated') {
    const k = source.kVentilated(ae, inletAreaCm2);
    const c = source.cVentilated(geometry.f, inletAreaCm2);
    const { d, clamped } = resolveDFactor(partitions, true, false);
    return {
      branch,
      k: k.value,
      c: c.value,
      x: EXPONENT_VENTILATED,
      d,
      f: geometry.f,
      g: null,
      figuresUsed: ['Fig. 5', 'Fig. 6'],
      snaps: [...k.snaps, ...c.snaps],
      partitionsClamped: clamped,
    };
  }

  if (branch === 'unventilated_small') {
    const k = source.kUnventilatedSmall(ae);
    const c = source.cUnventilatedSmall(geometry.g);
    return {
      branch,
      k: k.value,
      c: c.value,
      x: EXPONENT_UNVENTILATED,
      d: 1,
      f: null,
      g: geometry.g,
      figuresUsed: ['Fig. 7', 'Fig. 8'],
      snaps: [...k.snaps, ...c.snaps],
      partitionsClamped: false,
    };
  }

  const k = source.kUnventilatedLarge(ae);
  const c = source.cUnventilatedLarge(geometry.curveNumber, geometry.f);
  const { d, clamped } = resolveDFactor(partitions, false, false);
  return {
    branch,
    k: k.value,
    c: c.value,
    x: EXPONENT_UNVENTILATED,
    d,
    f: geometry.f,
    g: null,
    figuresUsed: ['Fig. 3', 'Fig. 4'],
    snaps: [...k.snaps, ...c.snaps],
    partitionsClamped: clamped,
  };
}

export interface ThermalSolverInput {
  geometry: EnclosureGeometryResult;
  powerW: number;
  ventilation: { enabled: boolean; inletAreaCm2: number };
  ipRating: number;
  horizontalPartitions: number;
  ambientC: number;
  solarOffsetK: number;
  coefficients: CoefficientSource;
}

/**
 * Mid-height and top rises for resolved coefficients:
 *
 *   Δt0.5 = k · d · P^x
 *   Δt1.0 = c · Δt0.5
 *
 * Small unventilated enclosures use the Figure 2 construction: the 0.75-height
 * point sits midway between Δt0.5 and c·Δt0.5, and the top is drawn straight
 * above it at the same rise.
 */
export function computeRises(
  coefficients: ResolvedCoefficients,
  powerW: number,
): { dtMidK: number; dtTopRawK: number; dtThreeQuarterK: number | null; dtTopK: number } {
  const p = Math.max(0, powerW);
  const dtMidK = p > 0 ? coefficients.k * coefficients.d * Math.pow(p, coefficients.x) : 0;
  const dtTopRawK = coefficients.c * dtMidK;

  if (coefficients.branch === 'unventilated_small') {
    const dtThreeQuarterK = 0.5 * (dtMidK + dtTopRawK);
    return { dtMidK, dtTopRawK, dtThreeQuarterK, dtTopK: dtThreeQuarterK };
  }
  return { dtMidK, dtTopRawK, dtThreeQuarterK: null, dtTopK: dtTopRawK };
}

/**
 * ThermalSolverModule – IEC 60890 forward model for one section.
 *
 * @param input  Resolved geometry, load, ventilation state and the shared
 *               coefficient source.
 */
export function solveThermal(input: ThermalSolverInput): ThermalSolveResult {
  const ae = input.geometry.effectiveAreaM2;
  const ventilationEffective = isVentilationEffective(input.ventilation.enabled, ae, input.ipRating);
  const branch = branchFor(ventilationEffective, ae);
  const coefficients = selectCoefficients(
    branch,
    input.geometry,
    input.ventilation.inletAreaCm2,
    input.horizontalPartitions,
    input.coefficients,
  );

  const powerW = Math.max(0, input.powerW);
  const rises = computeRises(coefficients, powerW);
  const base = input.ambientC + input.solarOffsetK;
  const construction: FigureLabel = branch === 'unventilated_small' ? 'Fig. 2' : 'Fig. 1';

  return {
    coefficients: { ...coefficients, figuresUsed: [construction, ...coefficients.figuresUsed] },
    ventilationEffective,
    powerW,
    ...rises,
    tMidC: base + rises.dtMidK,
    tThreeQuarterC: rises.dtThreeQuarterK === null ? null : base + rises.dtThreeQuarterK,
    tTopC: base + rises.dtTopK,
  };
}
