import type {
  ComplianceStage,
  InfeasibilityCause,
  ThermalFlagItem,
  ThermalResultV1,
} from '../../contracts/ThermalEngineOutputV1';
import { THERMAL_FLAG_IDS } from '../../contracts/thermal.flagIds';
import type {
  EnclosureGeometryResult,
  NormalizedSection,
  ProjectThermalSettingsV1,
  ThermalSolveResult,
} from '../schema/ThermalSchemaV1';
import type { CoefficientSource } from './CoefficientSource';
import {
  EXPONENT_VENTILATED,
  IP_OPENINGS_IGNORED_FROM,
  branchFor,
  computeRises,
  selectCoefficients,
  solveThermal,
} from './ThermalSolverModule';
import { SMALL_ENCLOSURE_AE_M2 } from './EnclosureGeometryModule';
import { altitudeDerateFactor, requiredFlowM3h } from './AirflowSizerModule';
import { noopLogSink, type ThermalLogSink } from '../utils/logging';
import { roundTo } from '../utils/numeric';

/**
 * Heat-transfer coefficient of the reference enclosure behind the IEC 60890
 * curves (painted sheet steel, W/m²K).  Other materials scale the passive
 * capacity in proportion.
 */
export const REFERENCE_MATERIAL_HEAT_TRANSFER_WM2K = 5.5;

export interface ComplianceStagerInput {
  section: NormalizedSection;
  geometry: EnclosureGeometryResult;
  settings: ProjectThermalSettingsV1;
  coefficients: CoefficientSource;
  log?: ThermalLogSink;
}

/**
 * Power a sealed enclosure could reject while its top stays at the allowed
 * rise, by inverting the unventilated forward model:
 *
 *   c · k · d · P^x = ΔT_allowed   ⇒   P = (ΔT_allowed / (c · k · d))^(1/x)
 *
 * The unventilated coefficients are used even when the section has openings:
 * natural ventilation is left out of this step (Annex K style
 * sealed-enclosure sizing).  The result is scaled by the enclosure material
 * against the sheet-steel reference and derated for altitude.
 */
export function passiveDissipationCapacityW(
  geometry: EnclosureGeometryResult,
  allowedRiseK: number,
  partitions: number,
  settings: ProjectThermalSettingsV1,
  source: CoefficientSource,
): number {
  if (!settings.allowMaterialDissipation || allowedRiseK <= 0) return 0;

  const branch = geometry.effectiveAreaM2 <= SMALL_ENCLOSURE_AE_M2 ? 'unventilated_small' : 'unventilated_large';
  const sealed = selectCoefficients(branch, geometry, 0, partitions, source);
  const riseSlope = sealed.c * sealed.k * sealed.d;
  if (riseSlope <= 0) return 0;

  const sealedCapacityW = Math.pow(allowedRiseK / riseSlope, 1 / sealed.x);
  const materialFactor = settings.materialHeatTransferWm2K / REFERENCE_MATERIAL_HEAT_TRANSFER_WM2K;
  return sealedCapacityW * materialFactor * altitudeDerateFactor(settings.altitudeM);
}

/**
 * Environmental causes when the limit is unreachable before any power is
 * applied.  Ambient alone at or above the limit → 'ambient' (plus 'solar'
 * when a solar offset adds to it); ambient below but ambient + solar at or
 * above → 'solar'.
 */
export function infeasibilityCauses(
  ambientC: number,
  solarOffsetK: number,
  maxAllowedC: number,
): InfeasibilityCause[] {
  if (ambientC >= maxAllowedC) return solarOffsetK > 0 ? ['ambient', 'solar'] : ['ambient'];
  if (ambientC + solarOffsetK >= maxAllowedC) return ['solar'];
  return [];
}

/**
 * ComplianceStagerModule
 *
 * Staged compliance decision for one section, first match wins:
 *
 *   1. infeasible_ambient    ambient (+ solar) ≥ limit → zero rises, no sizing
 *   2. base_compliant        forward model top ≤ limit
 *   3. material_dissipation  sealed-enclosure capacity covers the whole load
 *   4. (diagnostic)          would the candidate ventilation opening suffice?
 *   5. active_cooling        residual load → forced airflow
 *
 * Every branch returns a complete result; nothing here throws.
 */
export function runComplianceStager(input: ComplianceStagerInput): ThermalResultV1 {
  const { section, geometry, settings, coefficients } = input;
  const log = input.log ?? noopLogSink;
  const notes: string[] = [];
  const flags: ThermalFlagItem[] = [];

  const { ambientC, solarOffsetK } = settings;
  const maxAllowedC = section.maxAllowedC;
  const baseC = ambientC + solarOffsetK;
  const allowedRiseK = maxAllowedC - baseC;
  const altitudeFactor = altitudeDerateFactor(settings.altitudeM);
  const volumetricHeatCapacityJm3K = settings.volumetricHeatCapacityJm3K * altitudeFactor;

  const forward = solveThermal({
    geometry,
    powerW: section.powerW,
    ventilation: section.ventilation,
    ipRating: settings.ipRating,
    horizontalPartitions: section.horizontalPartitions,
    ambientC,
    solarOffsetK,
    coefficients,
  });

  collectVentilationFlags(section, geometry, settings, forward, flags);
  if (forward.coefficients.snaps.length > 0) {
    const detail = forward.coefficients.snaps
      .map(s => `${s.figure}: ${s.parameter} ${roundTo(s.requested, 3)} evaluated at ${roundTo(s.used, 3)}`)
      .join('; ');
    flags.push({
      id: THERMAL_FLAG_IDS.CURVE_INPUT_CLAMPED,
      severity: 'info',
      title: 'Curve input outside digitized range',
      detail,
    });
    log.debug('curves.clamped', { section: section.id, count: forward.coefficients.snaps.length });
  }
  if (forward.coefficients.partitionsClamped) {
    flags.push({
      id: THERMAL_FLAG_IDS.PARTITIONS_BEYOND_TABLE,
      severity: 'warn',
      title: 'More horizontal partitions than the d-factor tables cover',
      detail:
        `${section.horizontalPartitions} partitions declared; d = ${forward.coefficients.d} ` +
        `(three-partition row) was used.`,
    });
  }

  const build = (
    stage: ComplianceStage,
    fields: {
      compliantMid: boolean;
      compliantTop: boolean;
      solve: ThermalSolveResult;
      passiveCapacityW: number;
      dissipatedW: number;
      activeCoolingW: number;
      requiredAirflowM3h: number | null;
      recommended: boolean;
      candidateInletAreaCm2: number | null;
      hypotheticalTopC: number | null;
      infeasibleCauses: InfeasibilityCause[];
    },
  ): ThermalResultV1 => {
    const { solve } = fields;
    log.info('stager.terminal', { section: section.id, stage, topC: roundTo(solve.tTopC, 3) });
    return {
      sectionId: section.id,
      name: section.name,
      stage,
      compliant: stage === 'base_compliant' || stage === 'material_dissipation',
      compliantMid: fields.compliantMid,
      compliantTop: fields.compliantTop,
      geometry: {
        widthM: geometry.widthM,
        heightM: geometry.heightM,
        depthM: geometry.depthM,
        effectiveAreaM2: geometry.effectiveAreaM2,
        isSmall: geometry.isSmall,
        touching: geometry.touching,
        faceFactors: geometry.faceFactors,
        surfaces: geometry.surfaces,
        curveNumber: geometry.curveNumber,
        wallMounted: geometry.wallMounted,
      },
      coefficients: {
        branch: solve.coefficients.branch,
        k: solve.coefficients.k,
        c: solve.coefficients.c,
        x: solve.coefficients.x,
        d: solve.coefficients.d,
        f: solve.coefficients.f,
        g: solve.coefficients.g,
        figuresUsed: solve.coefficients.figuresUsed,
      },
      powerW: solve.powerW,
      ambientC,
      solarOffsetK,
      maxAllowedC,
      maxTempSource: section.maxTempSource,
      allowedRiseK,
      rises: {
        midK: solve.dtMidK,
        threeQuarterK: solve.dtThreeQuarterK,
        topK: solve.dtTopK,
        topRawK: solve.dtTopRawK,
      },
      temperatures: {
        midC: solve.tMidC,
        threeQuarterC: solve.tThreeQuarterC,
        topC: solve.tTopC,
      },
      cooling: {
        passiveCapacityW: fields.passiveCapacityW,
        dissipatedW: fields.dissipatedW,
        activeCoolingW: fields.activeCoolingW,
        requiredAirflowM3h: fields.requiredAirflowM3h,
        altitudeFactor,
        volumetricHeatCapacityJm3K,
      },
      ventilation: {
        enabled: section.ventilation.enabled,
        effective: solve.ventilationEffective,
        inletAreaCm2: section.ventilation.inletAreaCm2,
        mode: section.ventilation.mode,
        recommended: fields.recommended,
        candidateInletAreaCm2: fields.candidateInletAreaCm2,
        hypotheticalTopC: fields.hypotheticalTopC,
      },
      infeasibleCauses: fields.infeasibleCauses,
      snaps: solve.coefficients.snaps,
      flags,
      notes,
    };
  };

  // ── Stage 1: infeasible by environment ────────────────────────────────────
  const causes = infeasibilityCauses(ambientC, solarOffsetK, maxAllowedC);
  if (causes.length > 0) {
    if (causes.includes('ambient')) {
      flags.push({
        id: THERMAL_FLAG_IDS.AMBIENT_AT_LIMIT,
        severity: 'fail',
        title: 'Ambient temperature at or above the section limit',
        detail: `Ambient ${ambientC}°C ≥ limit ${maxAllowedC}°C. No enclosure or cooling design can meet the limit.`,
      });
    }
    if (causes.includes('solar')) {
      flags.push({
        id: THERMAL_FLAG_IDS.SOLAR_PUSHES_OVER_LIMIT,
        severity: 'fail',
        title: 'Solar gain takes the enclosure to its limit',
        detail: `Ambient ${ambientC}°C + solar ${solarOffsetK} K ≥ limit ${maxAllowedC}°C.`,
      });
    }
    notes.push(
      `⛔ Thermally infeasible: ambient${solarOffsetK > 0 ? ' + solar offset' : ''} ` +
      `(${roundTo(baseC, 1)}°C) already meets or exceeds the ${maxAllowedC}°C limit.`,
    );
    log.warn('stager.infeasible_ambient', { section: section.id, baseC, maxAllowedC });

    const zero = computeRises(forward.coefficients, 0);
    return build('infeasible_ambient', {
      compliantMid: false,
      compliantTop: false,
      solve: {
        ...forward,
        ...zero,
        tMidC: baseC,
        tThreeQuarterC: zero.dtThreeQuarterK === null ? null : baseC,
        tTopC: baseC,
      },
      passiveCapacityW: 0,
      dissipatedW: 0,
      activeCoolingW: 0,
      requiredAirflowM3h: null,
      recommended: false,
      candidateInletAreaCm2: null,
      hypotheticalTopC: null,
      infeasibleCauses: causes,
    });
  }

  // ── Stage 2: compliant as built ───────────────────────────────────────────
  const compliantMid = forward.tMidC <= maxAllowedC;
  if (forward.tTopC <= maxAllowedC) {
    notes.push(
      `✅ Top temperature ${roundTo(forward.tTopC, 1)}°C is within the ${maxAllowedC}°C limit. ` +
      `No cooling required.`,
    );
    return build('base_compliant', {
      compliantMid,
      compliantTop: true,
      solve: forward,
      passiveCapacityW: 0,
      dissipatedW: 0,
      activeCoolingW: 0,
      requiredAirflowM3h: null,
      recommended: false,
      candidateInletAreaCm2: null,
      hypotheticalTopC: null,
      infeasibleCauses: [],
    });
  }

  // ── Stage 3: enclosure material dissipation ───────────────────────────────
  const passiveCapacityW = passiveDissipationCapacityW(
    geometry,
    allowedRiseK,
    section.horizontalPartitions,
    settings,
    coefficients,
  );
  const dissipatedW = Math.min(forward.powerW, passiveCapacityW);
  log.debug('stager.material_dissipation', {
    section: section.id,
    passiveCapacityW: roundTo(passiveCapacityW, 3),
    powerW: forward.powerW,
  });

  if (!settings.allowMaterialDissipation) {
    flags.push({
      id: THERMAL_FLAG_IDS.MATERIAL_DISSIPATION_DISABLED,
      severity: 'info',
      title: 'Enclosure wall dissipation not credited',
      detail: 'Project settings exclude heat rejected through the enclosure material; the full load is sized for active cooling.',
    });
  }

  if (dissipatedW === forward.powerW) {
    notes.push(
      `🟢 The enclosure walls can reject up to ${roundTo(passiveCapacityW, 1)} W at the allowed ` +
      `${roundTo(allowedRiseK, 1)} K rise, which covers the ${roundTo(forward.powerW, 1)} W load.`,
    );
    return build('material_dissipation', {
      compliantMid: true,
      compliantTop: true,
      solve: forward,
      passiveCapacityW,
      dissipatedW,
      activeCoolingW: 0,
      requiredAirflowM3h: null,
      recommended: false,
      candidateInletAreaCm2: null,
      hypotheticalTopC: null,
      infeasibleCauses: [],
    });
  }

  // ── Stage 4: ventilation recommendation (diagnostic only) ─────────────────
  let recommended = false;
  let candidateInletAreaCm2: number | null = null;
  let hypotheticalTopC: number | null = null;
  const canTryOpenings =
    !forward.ventilationEffective &&
    geometry.effectiveAreaM2 > SMALL_ENCLOSURE_AE_M2 &&
    settings.ipRating < IP_OPENINGS_IGNORED_FROM &&
    settings.candidateInletAreaCm2 > 0;

  if (canTryOpenings) {
    candidateInletAreaCm2 = settings.candidateInletAreaCm2;
    const vented = selectCoefficients(
      branchFor(true, geometry.effectiveAreaM2),
      geometry,
      candidateInletAreaCm2,
      section.horizontalPartitions,
      coefficients,
    );
    const hypothetical = computeRises(vented, forward.powerW);
    hypotheticalTopC = baseC + hypothetical.dtTopK;
    recommended = hypotheticalTopC <= maxAllowedC;
    log.debug('stager.ventilation_trial', {
      section: section.id,
      candidateInletAreaCm2,
      exponent: EXPONENT_VENTILATED,
      hypotheticalTopC: roundTo(hypotheticalTopC, 3),
      recommended,
    });
    if (recommended) {
      flags.push({
        id: THERMAL_FLAG_IDS.VENTILATION_RECOMMENDED,
        severity: 'info',
        title: 'Ventilation openings would achieve compliance',
        detail:
          `With ${candidateInletAreaCm2} cm² inlet openings the top temperature would be ` +
          `${roundTo(hypotheticalTopC, 1)}°C (limit ${maxAllowedC}°C).`,
      });
      notes.push(
        `💨 Adding ${candidateInletAreaCm2} cm² of ventilation openings would bring the top to ` +
        `${roundTo(hypotheticalTopC, 1)}°C.`,
      );
    }
  }

  // ── Stage 5: active cooling ───────────────────────────────────────────────
  const activeCoolingW = Math.max(0, forward.powerW - passiveCapacityW);
  const requiredAirflowM3h = requiredFlowM3h(activeCoolingW, allowedRiseK, volumetricHeatCapacityJm3K);

  flags.push({
    id: THERMAL_FLAG_IDS.ACTIVE_COOLING_REQUIRED,
    severity: 'fail',
    title: 'Active cooling required',
    detail:
      `${roundTo(activeCoolingW, 1)} W must be removed by forced airflow` +
      (requiredAirflowM3h === null ? '.' : ` (≥ ${Math.ceil(requiredAirflowM3h)} m³/h).`),
  });
  notes.push(
    `🔥 Top temperature ${roundTo(forward.tTopC, 1)}°C exceeds the ${maxAllowedC}°C limit. ` +
    `Walls reject ${roundTo(dissipatedW, 1)} W; ${roundTo(activeCoolingW, 1)} W needs active cooling.`,
  );

  return build('active_cooling', {
    compliantMid: false,
    compliantTop: false,
    solve: forward,
    passiveCapacityW,
    dissipatedW,
    activeCoolingW,
    requiredAirflowM3h,
    recommended,
    candidateInletAreaCm2,
    hypotheticalTopC,
    infeasibleCauses: [],
  });
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function collectVentilationFlags(
  section: NormalizedSection,
  geometry: EnclosureGeometryResult,
  settings: ProjectThermalSettingsV1,
  forward: ThermalSolveResult,
  flags: ThermalFlagItem[],
): void {
  if (!section.ventilation.enabled) return;

  if (settings.ipRating >= IP_OPENINGS_IGNORED_FROM) {
    flags.push({
      id: THERMAL_FLAG_IDS.VENTILATION_IGNORED_IP,
      severity: 'warn',
      title: 'Ventilation openings ignored for IP5X and above',
      detail: `IP${settings.ipRating}X enclosures are calculated as sealed.`,
    });
  } else if (geometry.isSmall) {
    flags.push({
      id: THERMAL_FLAG_IDS.VENTILATION_IGNORED_SMALL,
      severity: 'warn',
      title: 'Ventilation openings ignored for small enclosures',
      detail:
        `Ae = ${roundTo(geometry.effectiveAreaM2, 3)} m² ≤ ${SMALL_ENCLOSURE_AE_M2} m²; ` +
        `Figures 7 and 8 cover sealed enclosures only.`,
    });
  }

  if (forward.ventilationEffective && section.ventilation.mode === 'what_if') {
    flags.push({
      id: THERMAL_FLAG_IDS.VENTILATION_WHAT_IF,
      severity: 'info',
      title: 'Ventilation is a what-if trial',
      detail: 'Results assume openings that are not yet part of the enclosure design.',
    });
  }
}
