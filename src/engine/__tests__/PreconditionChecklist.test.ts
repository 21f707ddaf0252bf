import { describe, it, expect } from 'vitest';
import {
  PRECONDITION_ITEMS,
  evaluatePreconditions,
  isAutomatic,
} from '../modules/PreconditionChecklist';
import type { EnclosureSectionV1, ThermalEngineInputV1 } from '../../contracts/ThermalEngineInputV1';

function section(overrides: Partial<EnclosureSectionV1> = {}): EnclosureSectionV1 {
  return { id: 'S1', xM: 0, yM: 0, widthM: 0.6, heightM: 1.2, depthM: 0.4, powerW: 200, ...overrides };
}

function layout(
  sections: EnclosureSectionV1[] = [section()],
  settings: Partial<ThermalEngineInputV1['settings']> = {},
): ThermalEngineInputV1 {
  return { sections, settings: { ambientC: 35, ...settings } };
}

function answerOf(input: ThermalEngineInputV1, id: string) {
  return evaluatePreconditions(input).items.find(i => i.id === id)?.answer;
}

// ─── 1. Catalogue ─────────────────────────────────────────────────────────────

describe('PreconditionChecklist – catalogue', () => {
  it('lists the clause 5.1 and 10.10 conditions once each', () => {
    const ids = PRECONDITION_ITEMS.map(i => i.id);
    expect(ids).toHaveLength(21);
    expect(new Set(ids).size).toBe(21);
    expect(ids[0]).toBe('5.1-1');
    expect(ids[ids.length - 1]).toBe('10.10-7');
  });

  it('knows which items are answered automatically', () => {
    expect(isAutomatic('5.1-3')).toBe(true);
    expect(isAutomatic('5.1-1')).toBe(false);
  });
});

// ─── 2. Automatic answers ─────────────────────────────────────────────────────

describe('PreconditionChecklist – automatic answers', () => {
  it('a plain sealed layout meets every condition', () => {
    const result = evaluatePreconditions(layout());
    expect(result.methodApplicable).toBe(true);
    expect(result.nonCompliantIds).toEqual([]);
    expect(result.notes).toEqual(['All applicability conditions are met; the IEC 60890 method may be applied.']);
  });

  it('more than three partitions breaks 10.10-7, more than five also breaks 5.1-3', () => {
    expect(answerOf(layout([section({ horizontalPartitions: 4 })]), '10.10-7')).toBe('non_compliant');
    expect(answerOf(layout([section({ horizontalPartitions: 4 })]), '5.1-3')).toBe('compliant');
    expect(evaluatePreconditions(layout([section({ horizontalPartitions: 6 })])).nonCompliantIds).toEqual([
      '5.1-3',
      '10.10-7',
    ]);
  });

  it('inlet openings must reach the minimum area', () => {
    const small = layout([section({ ventilation: { enabled: true, inletAreaCm2: 8 } })]);
    const ok = layout([section({ ventilation: { enabled: true, inletAreaCm2: 10 } })]);
    expect(answerOf(small, '5.1-7')).toBe('non_compliant');
    expect(answerOf(ok, '5.1-7')).toBe('compliant');
    expect(answerOf(layout(), '5.1-7')).toBe('n/a');
  });

  it('the IP rating selects which opening condition applies', () => {
    expect(answerOf(layout(), '5.1-8')).toBe('n/a');
    expect(answerOf(layout(), '5.1-9')).toBe('compliant');
    const sealed = layout([section({ ventilation: { enabled: true, inletAreaCm2: 5 } })], { ipRating: 5 });
    expect(answerOf(sealed, '5.1-7')).toBe('n/a');
    expect(answerOf(sealed, '5.1-8')).toBe('compliant');
    expect(answerOf(sealed, '5.1-9')).toBe('n/a');
  });

  it('solar gain is outside the method', () => {
    const result = evaluatePreconditions(layout([section()], { solarOffsetK: 5 }));
    expect(result.nonCompliantIds).toEqual(['5.1-12']);
    expect(result.methodApplicable).toBe(false);
    expect(result.notes).toEqual([
      '⚠️ Conditions not met: 5.1-12. The calculated temperatures are indicative only.',
    ]);
  });
});

// ─── 3. User answers ──────────────────────────────────────────────────────────

describe('PreconditionChecklist – user answers', () => {
  it('fill the manual items and are marked as such', () => {
    const result = evaluatePreconditions(layout(), { '5.1-1': 'non_compliant', '5.1-2': 'n/a' });
    const first = result.items.find(i => i.id === '5.1-1');
    expect(first).toMatchObject({ answer: 'non_compliant', source: 'user' });
    expect(result.items.find(i => i.id === '5.1-2')?.answer).toBe('n/a');
    expect(result.nonCompliantIds).toEqual(['5.1-1']);
  });

  it('cannot override an automatic answer', () => {
    const result = evaluatePreconditions(layout(), { '5.1-12': 'non_compliant' });
    expect(result.items.find(i => i.id === '5.1-12')).toMatchObject({ answer: 'compliant', source: 'automatic' });
  });

  it('unanswered manual items default to compliant', () => {
    const result = evaluatePreconditions(layout());
    expect(result.items.find(i => i.id === '5.1-4')?.source).toBe('default');
  });
});
