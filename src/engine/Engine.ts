import type { ThermalEngineInputV1 } from '../contracts/ThermalEngineInputV1';
import type { ThermalEngineOutputV1, ThermalResultV1 } from '../contracts/ThermalEngineOutputV1';
import type { NormalizedSection, ProjectThermalSettingsV1 } from './schema/ThermalSchemaV1';
import { normalizeSections, normalizeSettings } from './normalizer/Normalizer';
import { resolveEnclosureGeometry } from './modules/EnclosureGeometryModule';
import { createCoefficientSource, type CoefficientSource } from './modules/CoefficientSource';
import { runComplianceStager } from './modules/ComplianceStagerModule';
import { DEFAULT_FIGURE_DATA } from './curves/FigureData';
import { buildThermalEngineOutputV1 } from './OutputBuilder';
import { noopLogSink, type ThermalLogSink } from './utils/logging';

export interface ThermalEngineDeps {
  /** Coefficient functions; defaults to the bundled digitized figures. */
  coefficients?: CoefficientSource;
  log?: ThermalLogSink;
}

let sharedSource: CoefficientSource | undefined;

/** Coefficient source over the bundled figure data, built on first use and shared. */
export function defaultCoefficientSource(): CoefficientSource {
  if (sharedSource === undefined) sharedSource = createCoefficientSource(DEFAULT_FIGURE_DATA);
  return sharedSource;
}

function evaluateNormalized(
  index: number,
  sections: readonly NormalizedSection[],
  settings: ProjectThermalSettingsV1,
  coefficients: CoefficientSource,
  log: ThermalLogSink,
): ThermalResultV1 {
  const section = sections[index];
  const geometry = resolveEnclosureGeometry(index, sections, {
    wallMounted: settings.wallMounted,
    touchToleranceM: settings.touchToleranceM,
    log,
  });
  return runComplianceStager({ section, geometry, settings, coefficients, log });
}

/**
 * Evaluates one section of a layout.  The whole layout is still normalized
 * because touching faces depend on every sibling.
 */
export function evaluateSection(
  index: number,
  input: ThermalEngineInputV1,
  deps: ThermalEngineDeps = {},
): ThermalResultV1 {
  if (!Number.isInteger(index) || index < 0 || index >= input.sections.length) {
    throw new Error(`section index ${index} is out of range (layout has ${input.sections.length})`);
  }
  const settings = normalizeSettings(input.settings);
  const sections = normalizeSections(input.sections);
  return evaluateNormalized(
    index,
    sections,
    settings,
    deps.coefficients ?? defaultCoefficientSource(),
    deps.log ?? noopLogSink,
  );
}

/**
 * Runs the thermal compliance procedure for every section of a layout.
 *
 * Synchronous and pure: the same input always yields the same output, and
 * sections are evaluated independently against the same sibling snapshot.
 */
export function runThermalEngine(
  input: ThermalEngineInputV1,
  deps: ThermalEngineDeps = {},
): ThermalEngineOutputV1 {
  const log = deps.log ?? noopLogSink;
  const coefficients = deps.coefficients ?? defaultCoefficientSource();
  const settings = normalizeSettings(input.settings);
  const sections = normalizeSections(input.sections);

  log.info('engine.start', {
    sections: sections.length,
    ambientC: settings.ambientC,
    altitudeM: settings.altitudeM,
    ipRating: settings.ipRating,
  });

  const results = sections.map((_, i) => evaluateNormalized(i, sections, settings, coefficients, log));
  return buildThermalEngineOutputV1(results);
}
