import type {
  ComplianceStage,
  ThermalEngineOutputV1,
  ThermalLayoutSummaryV1,
  ThermalReportRowV1,
  ThermalResultV1,
} from '../contracts/ThermalEngineOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';

const NOT_APPLICABLE = '—';

const VERDICT_LABELS: Record<ComplianceStage, string> = {
  infeasible_ambient: 'Infeasible (ambient)',
  base_compliant: 'Compliant',
  material_dissipation: 'Compliant (enclosure dissipation)',
  active_cooling: 'Active cooling required',
};

function shapeRatioLabel(result: ThermalResultV1): string {
  const { f, g } = result.coefficients;
  if (f !== null) return `f = ${f.toFixed(3)}`;
  if (g !== null) return `g = ${g.toFixed(3)}`;
  return NOT_APPLICABLE;
}

/**
 * One flat row per section for report generators.  Every value is already
 * formatted; the Figure 4 curve number only appears where it was used.
 */
export function buildReportRow(result: ThermalResultV1): ThermalReportRowV1 {
  const { coefficients, cooling, temperatures } = result;
  return {
    sectionId: result.sectionId,
    tag: result.name,
    effectiveArea: result.geometry.effectiveAreaM2.toFixed(3),
    power: result.powerW.toFixed(1),
    k: coefficients.k.toFixed(3),
    c: coefficients.c.toFixed(3),
    x: coefficients.x.toFixed(3),
    shapeRatio: shapeRatioLabel(result),
    curve: coefficients.branch === 'unventilated_large' ? String(result.geometry.curveNumber) : NOT_APPLICABLE,
    tempMid: temperatures.midC.toFixed(1),
    tempTop: temperatures.topC.toFixed(1),
    limit: result.maxAllowedC.toFixed(1),
    verdict: VERDICT_LABELS[result.stage],
    airflow: cooling.requiredAirflowM3h === null ? NOT_APPLICABLE : `${Math.ceil(cooling.requiredAirflowM3h)} m³/h`,
    figures: coefficients.figuresUsed.join(', '),
  };
}

/** Layout totals; the worst section is the one with the least headroom at the top. */
export function buildLayoutSummary(results: readonly ThermalResultV1[]): ThermalLayoutSummaryV1 {
  let worst: ThermalResultV1 | undefined;
  for (const r of results) {
    if (worst === undefined || r.maxAllowedC - r.temperatures.topC < worst.maxAllowedC - worst.temperatures.topC) {
      worst = r;
    }
  }

  return {
    sectionCount: results.length,
    compliantCount: results.filter(r => r.compliant).length,
    totalPowerW: results.reduce((sum, r) => sum + r.powerW, 0),
    totalActiveCoolingW: results.reduce((sum, r) => sum + r.cooling.activeCoolingW, 0),
    totalAirflowM3h: results.reduce((sum, r) => sum + (r.cooling.requiredAirflowM3h ?? 0), 0),
    worstSectionId: worst?.sectionId ?? null,
    ventilationRecommendedIds: results.filter(r => r.ventilation.recommended).map(r => r.sectionId),
  };
}

export function buildThermalEngineOutputV1(results: ThermalResultV1[]): ThermalEngineOutputV1 {
  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
    },
    results,
    summary: buildLayoutSummary(results),
    reportRows: results.map(buildReportRow),
  };
}
