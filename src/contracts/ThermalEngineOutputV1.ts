import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { ThermalFlagId } from './thermal.flagIds';

export type FaceName = 'top' | 'bottom' | 'left' | 'right' | 'front' | 'rear';

/** IEC 60890 Table III surface factor b per face. */
export type FaceAreaFactors = Record<FaceName, number>;

export interface TouchingSides {
  top: boolean;
  bottom: boolean;
  left: boolean;
  right: boolean;
}

/** Installation-type curve of Figure 4 (1 = free-standing … 5 = most sheltered). */
export type CurveNumber = 1 | 2 | 3 | 4 | 5;

export type FigureId = 'fig3' | 'fig4' | 'fig5' | 'fig6' | 'fig7' | 'fig8';

/** Rendered name of an IEC 60890 figure, e.g. "Fig. 5". */
export type FigureLabel = `Fig. ${number}`;

/**
 * A curve input that fell outside the digitized range and was evaluated at
 * the nearest in-domain value instead.
 */
export interface CurveSnapV1 {
  figure: FigureId;
  parameter: 'Ae' | 'f' | 'g' | 'inletAreaCm2';
  requested: number;
  used: number;
}

export interface SurfaceContributionV1 {
  name: 'Roof' | 'Front' | 'Rear' | 'Left' | 'Right';
  dim1M: number;
  dim2M: number;
  areaM2: number;
  factor: number;
  effectiveAreaM2: number;
}

export type ThermalBranch = 'ventilated' | 'unventilated_small' | 'unventilated_large';

/**
 * Terminal stage reached by the compliance procedure.
 *  infeasible_ambient   – ambient (+ solar) already at or above the limit
 *  base_compliant       – the enclosure meets the limit as built
 *  material_dissipation – the enclosure walls can reject the whole load
 *  active_cooling       – forced airflow is required for the residual load
 */
export type ComplianceStage =
  | 'infeasible_ambient'
  | 'base_compliant'
  | 'material_dissipation'
  | 'active_cooling';

export type InfeasibilityCause = 'ambient' | 'solar';

export type MaxTempSource = 'manual' | 'auto_component' | 'default';

export interface ThermalFlagItem {
  id: ThermalFlagId;
  severity: 'info' | 'warn' | 'fail';
  title: string;
  detail: string;
}

export interface ThermalResultV1 {
  sectionId: string;
  name: string;

  stage: ComplianceStage;
  compliant: boolean;
  compliantMid: boolean;
  compliantTop: boolean;

  geometry: {
    widthM: number;
    heightM: number;
    depthM: number;
    effectiveAreaM2: number;
    /** Ae ≤ 1.25 m² – Figures 7/8 regime. */
    isSmall: boolean;
    touching: TouchingSides;
    faceFactors: FaceAreaFactors;
    surfaces: SurfaceContributionV1[];
    curveNumber: CurveNumber;
    wallMounted: boolean;
  };

  coefficients: {
    branch: ThermalBranch;
    k: number;
    c: number;
    x: number;
    d: number;
    /** h^1.35 / Ab – ventilated and large branches only. */
    f: number | null;
    /** h / w – small unventilated branch only. */
    g: number | null;
    figuresUsed: FigureLabel[];
  };

  powerW: number;
  ambientC: number;
  solarOffsetK: number;
  maxAllowedC: number;
  maxTempSource: MaxTempSource;
  /** maxAllowedC − (ambientC + solarOffsetK). Non-positive when infeasible. */
  allowedRiseK: number;

  rises: {
    midK: number;
    /** Figure 2 construction point; small unventilated enclosures only. */
    threeQuarterK: number | null;
    topK: number;
    /** c × Δt0.5 before any small-enclosure construction. */
    topRawK: number;
  };

  temperatures: {
    midC: number;
    threeQuarterC: number | null;
    topC: number;
  };

  cooling: {
    /** Power the sealed enclosure walls could reject at the allowed rise. */
    passiveCapacityW: number;
    dissipatedW: number;
    activeCoolingW: number;
    /** null when no airflow figure applies (compliant, or ill-posed sizing). */
    requiredAirflowM3h: number | null;
    altitudeFactor: number;
    volumetricHeatCapacityJm3K: number;
  };

  ventilation: {
    enabled: boolean;
    effective: boolean;
    inletAreaCm2: number;
    mode: 'installed' | 'what_if';
    recommended: boolean;
    candidateInletAreaCm2: number | null;
    hypotheticalTopC: number | null;
  };

  infeasibleCauses: InfeasibilityCause[];
  snaps: CurveSnapV1[];
  flags: ThermalFlagItem[];
  notes: string[];
}

export interface ThermalReportRowV1 {
  sectionId: string;
  tag: string;
  effectiveArea: string;
  power: string;
  k: string;
  c: string;
  x: string;
  shapeRatio: string;
  curve: string;
  tempMid: string;
  tempTop: string;
  limit: string;
  verdict: string;
  airflow: string;
  figures: string;
}

export interface ThermalLayoutSummaryV1 {
  sectionCount: number;
  compliantCount: number;
  totalPowerW: number;
  totalActiveCoolingW: number;
  totalAirflowM3h: number;
  /** Section with the smallest margin between top temperature and its limit. */
  worstSectionId: string | null;
  ventilationRecommendedIds: string[];
}

export interface ThermalEngineMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
}

export interface ThermalEngineOutputV1 {
  meta: ThermalEngineMetaV1;
  results: ThermalResultV1[];
  summary: ThermalLayoutSummaryV1;
  reportRows: ThermalReportRowV1[];
}
