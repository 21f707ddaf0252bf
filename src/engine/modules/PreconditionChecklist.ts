import type { ThermalEngineInputV1 } from '../../contracts/ThermalEngineInputV1';
import rawPreconditions from '../checklist/iec60890-preconditions.json';
import { normalizeSettings } from '../normalizer/Normalizer';
import { IP_OPENINGS_IGNORED_FROM } from './ThermalSolverModule';

export type PreconditionAnswer = 'compliant' | 'n/a' | 'non_compliant';

export type PreconditionAnswerSource = 'automatic' | 'user' | 'default';

export interface PreconditionItemV1 {
  id: string;
  group: string;
  condition: string;
}

export interface PreconditionResultV1 extends PreconditionItemV1 {
  answer: PreconditionAnswer;
  source: PreconditionAnswerSource;
}

export interface PreconditionChecklistV1 {
  items: PreconditionResultV1[];
  nonCompliantIds: string[];
  /** True when no condition is answered non-compliant. */
  methodApplicable: boolean;
  notes: string[];
}

/** Smallest inlet opening area for which the ventilated curves apply (cm²). */
export const MIN_INLET_AREA_CM2 = 10;

export const PRECONDITION_ITEMS: readonly PreconditionItemV1[] = rawPreconditions;

type AutomaticRule = (input: ThermalEngineInputV1) => PreconditionAnswer;

function maxPartitions(input: ThermalEngineInputV1): number {
  return input.sections.reduce((m, s) => Math.max(m, s.horizontalPartitions ?? 0), 0);
}

function ventedInletAreas(input: ThermalEngineInputV1): number[] {
  return input.sections
    .filter(s => s.ventilation?.enabled === true)
    .map(s => s.ventilation?.inletAreaCm2 ?? 0);
}

/**
 * Conditions that can be answered from the layout and settings.  The rest
 * need the designer's judgement.
 */
const AUTOMATIC_RULES: Readonly<Partial<Record<string, AutomaticRule>>> = {
  '5.1-3': input => (maxPartitions(input) > 5 ? 'non_compliant' : 'compliant'),
  '5.1-7': input => {
    const ipRating = normalizeSettings(input.settings).ipRating;
    const areas = ventedInletAreas(input);
    if (ipRating >= IP_OPENINGS_IGNORED_FROM || areas.length === 0) return 'n/a';
    return areas.every(a => a >= MIN_INLET_AREA_CM2) ? 'compliant' : 'non_compliant';
  },
  '5.1-8': input =>
    normalizeSettings(input.settings).ipRating >= IP_OPENINGS_IGNORED_FROM ? 'compliant' : 'n/a',
  '5.1-9': input =>
    normalizeSettings(input.settings).ipRating < IP_OPENINGS_IGNORED_FROM ? 'compliant' : 'n/a',
  '5.1-12': input => (normalizeSettings(input.settings).solarOffsetK > 0 ? 'non_compliant' : 'compliant'),
  '10.10-7': input => (maxPartitions(input) > 3 ? 'non_compliant' : 'compliant'),
};

export function isAutomatic(id: string): boolean {
  return id in AUTOMATIC_RULES;
}

/**
 * Answers the applicability conditions of the calculation method.
 *
 * Automatic answers always win; user answers fill the remaining items and
 * anything left unanswered is assumed compliant.
 */
export function evaluatePreconditions(
  input: ThermalEngineInputV1,
  userAnswers: Readonly<Partial<Record<string, PreconditionAnswer>>> = {},
): PreconditionChecklistV1 {
  const items = PRECONDITION_ITEMS.map((item): PreconditionResultV1 => {
    const rule = AUTOMATIC_RULES[item.id];
    if (rule !== undefined) return { ...item, answer: rule(input), source: 'automatic' };
    const user = userAnswers[item.id];
    if (user !== undefined) return { ...item, answer: user, source: 'user' };
    return { ...item, answer: 'compliant', source: 'default' };
  });

  const nonCompliantIds = items.filter(i => i.answer === 'non_compliant').map(i => i.id);
  const notes = nonCompliantIds.length === 0
    ? ['All applicability conditions are met; the IEC 60890 method may be applied.']
    : [`⚠️ Conditions not met: ${nonCompliantIds.join(', ')}. The calculated temperatures are indicative only.`];

  return { items, nonCompliantIds, methodApplicable: nonCompliantIds.length === 0, notes };
}
