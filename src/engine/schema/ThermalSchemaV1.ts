import type {
  CurveNumber,
  CurveSnapV1,
  FaceAreaFactors,
  FigureLabel,
  MaxTempSource,
  SurfaceContributionV1,
  ThermalBranch,
  TouchingSides,
} from '../../contracts/ThermalEngineOutputV1';

// ─── Curve data ───────────────────────────────────────────────────────────────

/** One digitized (x, y) sample. */
export type Point = readonly [x: number, y: number];

/** Family key (an Ae or f value) → sorted sample points. Read-only after load. */
export type CurveFamilySet = ReadonlyMap<number, readonly Point[]>;

/**
 * Digitized figure data supplied by the host.
 *
 * Any figure left out falls back to its closed-form approximation.  Figure 8
 * has no digitized form: it is always the fitted power law.
 */
export interface FigureDataSetV1 {
  /** k vs Ae, unventilated, Ae > 1.25 m². */
  fig3?: readonly Point[];
  /** c vs f, unventilated, installation curve 1. */
  fig4?: readonly Point[];
  /** k vs inlet area (cm²), one curve per Ae. */
  fig5?: CurveFamilySet;
  /** c vs inlet area (cm²), one curve per f. */
  fig6?: CurveFamilySet;
  /** k vs Ae, unventilated, Ae ≤ 1.25 m². */
  fig7?: readonly Point[];
}

export interface CoefficientLookup {
  value: number;
  snaps: CurveSnapV1[];
}

// ─── Normalized inputs ────────────────────────────────────────────────────────

export interface ProjectThermalSettingsV1 {
  ambientC: number;
  altitudeM: number;
  solarOffsetK: number;
  materialHeatTransferWm2K: number;
  allowMaterialDissipation: boolean;
  ipRating: number;
  wallMounted: boolean;
  candidateInletAreaCm2: number;
  volumetricHeatCapacityJm3K: number;
  touchToleranceM: number;
}

/** Layout rectangle of a section in metres; y grows upwards. */
export interface SectionRect {
  xM: number;
  yM: number;
  widthM: number;
  heightM: number;
}

export interface NormalizedSection extends SectionRect {
  id: string;
  name: string;
  depthM: number;
  powerW: number;
  ventilation: {
    enabled: boolean;
    inletAreaCm2: number;
    mode: 'installed' | 'what_if';
  };
  maxAllowedC: number;
  maxTempSource: MaxTempSource;
  horizontalPartitions: number;
}

// ─── Geometry ─────────────────────────────────────────────────────────────────

export interface EnclosureGeometryResult {
  widthM: number;
  heightM: number;
  depthM: number;
  touching: TouchingSides;
  faceFactors: FaceAreaFactors;
  surfaces: SurfaceContributionV1[];
  effectiveAreaM2: number;
  f: number;
  g: number;
  isSmall: boolean;
  curveNumber: CurveNumber;
  wallMounted: boolean;
}

// ─── Thermal solve ────────────────────────────────────────────────────────────

export interface ResolvedCoefficients {
  branch: ThermalBranch;
  k: number;
  c: number;
  x: number;
  d: number;
  f: number | null;
  g: number | null;
  figuresUsed: FigureLabel[];
  snaps: CurveSnapV1[];
  /** Partition count exceeded the d-factor table and the last entry was used. */
  partitionsClamped: boolean;
}

export interface ThermalSolveResult {
  coefficients: ResolvedCoefficients;
  ventilationEffective: boolean;
  powerW: number;
  dtMidK: number;
  dtTopRawK: number;
  dtThreeQuarterK: number | null;
  dtTopK: number;
  tMidC: number;
  tThreeQuarterC: number | null;
  tTopC: number;
}
