import type {
  EnclosureSectionV1,
  HeatSourceV1,
  ProjectThermalSettingsInputV1,
} from '../../contracts/ThermalEngineInputV1';
import type { MaxTempSource } from '../../contracts/ThermalEngineOutputV1';
import type { NormalizedSection, ProjectThermalSettingsV1 } from '../schema/ThermalSchemaV1';
import { SEA_LEVEL_VOLUMETRIC_HEAT_CAPACITY_J_M3K } from '../modules/AirflowSizerModule';
import { DEFAULT_TOUCH_TOLERANCE_M } from '../modules/EnclosureGeometryModule';

/** Internal air limit when neither the user nor the components give one (°C). */
export const DEFAULT_MAX_TEMP_C = 70;

/** Painted sheet steel, the enclosure material the IEC 60890 curves describe (W/m²K). */
export const DEFAULT_MATERIAL_HEAT_TRANSFER_WM2K = 5.5;

export const DEFAULT_IP_RATING = 3;

export const DEFAULT_CANDIDATE_INLET_AREA_CM2 = 300;

function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new Error(`${field} must be a finite number (got ${value})`);
  }
}

function assertNonNegative(value: number, field: string): void {
  assertFinite(value, field);
  if (value < 0) throw new Error(`${field} must be ≥ 0 (got ${value})`);
}

function assertPositive(value: number, field: string): void {
  assertFinite(value, field);
  if (value <= 0) throw new Error(`${field} must be > 0 (got ${value})`);
}

/**
 * Applies the documented defaults to the project settings and validates the
 * result.  Throws on the first invalid field.
 */
export function normalizeSettings(input: ProjectThermalSettingsInputV1): ProjectThermalSettingsV1 {
  const settings: ProjectThermalSettingsV1 = {
    ambientC: input.ambientC,
    altitudeM: input.altitudeM ?? 0,
    solarOffsetK: input.solarOffsetK ?? 0,
    materialHeatTransferWm2K: input.materialHeatTransferWm2K ?? DEFAULT_MATERIAL_HEAT_TRANSFER_WM2K,
    allowMaterialDissipation: input.allowMaterialDissipation ?? true,
    ipRating: input.ipRating ?? DEFAULT_IP_RATING,
    wallMounted: input.wallMounted ?? false,
    candidateInletAreaCm2: input.candidateInletAreaCm2 ?? DEFAULT_CANDIDATE_INLET_AREA_CM2,
    volumetricHeatCapacityJm3K: input.volumetricHeatCapacityJm3K ?? SEA_LEVEL_VOLUMETRIC_HEAT_CAPACITY_J_M3K,
    touchToleranceM: input.touchToleranceM ?? DEFAULT_TOUCH_TOLERANCE_M,
  };

  assertFinite(settings.ambientC, 'settings.ambientC');
  assertNonNegative(settings.altitudeM, 'settings.altitudeM');
  assertNonNegative(settings.solarOffsetK, 'settings.solarOffsetK');
  assertPositive(settings.materialHeatTransferWm2K, 'settings.materialHeatTransferWm2K');
  assertNonNegative(settings.candidateInletAreaCm2, 'settings.candidateInletAreaCm2');
  assertPositive(settings.volumetricHeatCapacityJm3K, 'settings.volumetricHeatCapacityJm3K');
  assertNonNegative(settings.touchToleranceM, 'settings.touchToleranceM');
  if (!Number.isInteger(settings.ipRating) || settings.ipRating < 0 || settings.ipRating > 6) {
    throw new Error(`settings.ipRating must be an integer 0–6 (got ${settings.ipRating})`);
  }

  return settings;
}

function sourceQuantity(source: HeatSourceV1): number {
  return source.quantity ?? 1;
}

/**
 * Section load in watts: the explicit `powerW` when given, otherwise the sum
 * of `powerW × quantity` over the heat sources (0 when there are none).
 */
export function resolveSectionPower(section: EnclosureSectionV1): number {
  if (section.powerW !== undefined) return section.powerW;
  return (section.heatSources ?? []).reduce((sum, s) => sum + s.powerW * sourceQuantity(s), 0);
}

/**
 * Internal temperature limit for a section.
 *
 * 'auto' takes the lowest `maxTempC` among the heat sources that declare one;
 * with none declared it falls back to the manual value.  A manual limit that
 * is not set is the 70 °C default.
 */
export function resolveMaxAllowedTemp(
  section: EnclosureSectionV1,
): { maxAllowedC: number; maxTempSource: MaxTempSource } {
  if (section.maxTempMode === 'auto') {
    const ratings = (section.heatSources ?? [])
      .map(s => s.maxTempC)
      .filter((t): t is number => t !== undefined);
    if (ratings.length > 0) {
      return { maxAllowedC: Math.min(...ratings), maxTempSource: 'auto_component' };
    }
  }
  if (section.maxTempC !== undefined) {
    return { maxAllowedC: section.maxTempC, maxTempSource: 'manual' };
  }
  return { maxAllowedC: DEFAULT_MAX_TEMP_C, maxTempSource: 'default' };
}

/**
 * Validates one section and resolves its derived fields.
 *
 * Geometry must be strictly positive: zero-width or zero-height sections are
 * rejected here rather than reaching the curve layer.
 */
export function normalizeSection(section: EnclosureSectionV1): NormalizedSection {
  const label = `section "${section.id}"`;
  if (section.id.trim() === '') throw new Error('section.id must not be empty');

  assertFinite(section.xM, `${label} xM`);
  assertFinite(section.yM, `${label} yM`);
  assertPositive(section.widthM, `${label} widthM`);
  assertPositive(section.heightM, `${label} heightM`);
  assertPositive(section.depthM, `${label} depthM`);

  for (const source of section.heatSources ?? []) {
    assertNonNegative(source.powerW, `${label} heat source "${source.name}" powerW`);
    assertNonNegative(sourceQuantity(source), `${label} heat source "${source.name}" quantity`);
    if (source.maxTempC !== undefined) {
      assertFinite(source.maxTempC, `${label} heat source "${source.name}" maxTempC`);
    }
  }

  const powerW = resolveSectionPower(section);
  assertNonNegative(powerW, `${label} powerW`);

  const horizontalPartitions = section.horizontalPartitions ?? 0;
  if (!Number.isInteger(horizontalPartitions) || horizontalPartitions < 0) {
    throw new Error(`${label} horizontalPartitions must be a non-negative integer (got ${horizontalPartitions})`);
  }

  const inletAreaCm2 = section.ventilation?.inletAreaCm2 ?? 0;
  assertNonNegative(inletAreaCm2, `${label} ventilation.inletAreaCm2`);

  const { maxAllowedC, maxTempSource } = resolveMaxAllowedTemp(section);
  assertFinite(maxAllowedC, `${label} maxTempC`);

  return {
    id: section.id,
    name: section.name ?? section.id,
    xM: section.xM,
    yM: section.yM,
    widthM: section.widthM,
    heightM: section.heightM,
    depthM: section.depthM,
    powerW,
    ventilation: {
      enabled: section.ventilation?.enabled ?? false,
      inletAreaCm2,
      mode: section.ventilation?.mode ?? 'installed',
    },
    maxAllowedC,
    maxTempSource,
    horizontalPartitions,
  };
}

/** Normalizes every section and rejects duplicate ids. */
export function normalizeSections(sections: readonly EnclosureSectionV1[]): NormalizedSection[] {
  const seen = new Set<string>();
  return sections.map(section => {
    if (seen.has(section.id)) throw new Error(`duplicate section id "${section.id}"`);
    seen.add(section.id);
    return normalizeSection(section);
  });
}
