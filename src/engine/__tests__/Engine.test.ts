import { describe, it, expect } from 'vitest';
import { defaultCoefficientSource, evaluateSection, runThermalEngine } from '../Engine';
import { createMemoryLogSink } from '../utils/logging';
import { THERMAL_FLAG_IDS } from '../../contracts/thermal.flagIds';
import type { EnclosureSectionV1, ThermalEngineInputV1 } from '../../contracts/ThermalEngineInputV1';

// ─── Shared fixtures ──────────────────────────────────────────────────────────

function section(overrides: Partial<EnclosureSectionV1> = {}): EnclosureSectionV1 {
  return { id: 'S1', xM: 0, yM: 0, widthM: 0.6, heightM: 1.2, depthM: 0.4, powerW: 200, ...overrides };
}

function input(sections: EnclosureSectionV1[], ambientC = 35, extra: Partial<ThermalEngineInputV1['settings']> = {}) {
  return { sections, settings: { ambientC, ...extra } };
}

// ─── 1. Free-standing section on the bundled curves ──────────────────────────

describe('Engine – free-standing sealed section', () => {
  it('200 W stays within 70 °C', () => {
    const [r] = runThermalEngine(input([section()])).results;
    expect(r.geometry.effectiveAreaM2).toBeCloseTo(2.496, 10);
    expect(r.geometry.curveNumber).toBe(1);
    expect(r.coefficients.k).toBeCloseTo(0.318377, 5);
    expect(r.coefficients.c).toBeCloseTo(1.406028, 5);
    expect(r.coefficients.figuresUsed).toEqual(['Fig. 1', 'Fig. 3', 'Fig. 4']);
    expect(r.temperatures.midC).toBeCloseTo(57.5408, 3);
    expect(r.temperatures.topC).toBeCloseTo(66.6930, 3);
    expect(r.stage).toBe('base_compliant');
    expect(r.compliant).toBe(true);
  });

  it('300 W exceeds the limit', () => {
    const [r] = runThermalEngine(input([section({ powerW: 300 })])).results;
    expect(r.temperatures.topC).toBeCloseTo(78.9077, 3);
    expect(r.compliant).toBe(false);
  });

  it('800 W needs forced air after crediting the walls', () => {
    const [r] = runThermalEngine(input([section({ powerW: 800 })])).results;
    expect(r.stage).toBe('active_cooling');
    expect(r.temperatures.topC).toBeCloseTo(131.6095, 3);
    expect(r.cooling.passiveCapacityW).toBeCloseTo(226.2782, 3);
    expect(r.cooling.activeCoolingW).toBeCloseTo(573.7218, 3);
    expect(r.cooling.requiredAirflowM3h).toBeCloseTo(50.8719, 3);
    expect(r.ventilation.recommended).toBe(true);
    expect(r.ventilation.hypotheticalTopC).toBeCloseTo(56.5713, 3);
  });

  it('altitude derates both walls and air', () => {
    const [r] = runThermalEngine(input([section({ powerW: 800 })], 35, { altitudeM: 1000 })).results;
    expect(r.cooling.passiveCapacityW).toBeCloseTo(201.3876, 3);
    expect(r.cooling.activeCoolingW).toBeCloseTo(598.6124, 3);
    expect(r.cooling.requiredAirflowM3h).toBeCloseTo(59.6393, 3);
  });

  it('a better-conducting enclosure rejects 300 W on its own', () => {
    const [r] = runThermalEngine(input([section({ powerW: 300 })], 35, { materialHeatTransferWm2K: 11 })).results;
    expect(r.stage).toBe('material_dissipation');
    expect(r.cooling.passiveCapacityW).toBeCloseTo(452.5564, 3);
    expect(r.compliant).toBe(true);
  });
});

// ─── 2. Side-by-side line-up ──────────────────────────────────────────────────

describe('Engine – side-by-side sections', () => {
  const pair = [section({ id: 'A' }), section({ id: 'B', xM: 0.6 })];

  it('a shared side lowers Ae and selects curve 2', () => {
    const [a, b] = runThermalEngine(input(pair)).results;
    expect(a.geometry.effectiveAreaM2).toBeCloseTo(2.304, 10);
    expect(a.geometry.curveNumber).toBe(2);
    expect(a.coefficients.k).toBeCloseTo(0.337846, 5);
    expect(a.coefficients.c).toBeCloseTo(1.386028, 5);
    expect(a.rises.midK).toBeCloseTo(23.9192, 3);
    expect(a.rises.topK).toBeCloseTo(33.1527, 3);
    expect(b.rises.topK).toBeCloseTo(a.rises.topK, 10);
  });

  it('wall mounting selects curve 4', () => {
    const [a] = runThermalEngine(input(pair, 35, { wallMounted: true })).results;
    expect(a.geometry.effectiveAreaM2).toBeCloseTo(2.016, 10);
    expect(a.geometry.curveNumber).toBe(4);
    expect(a.coefficients.k).toBeCloseTo(0.372829, 5);
    expect(a.coefficients.c).toBeCloseTo(1.346028, 5);
    expect(a.rises.topK).toBeCloseTo(35.5297, 3);
  });
});

// ─── 3. Small enclosure ───────────────────────────────────────────────────────

describe('Engine – small enclosure', () => {
  it('uses Figures 7 and 8 with the Figure 2 construction', () => {
    const small = section({ widthM: 0.4, heightM: 0.5, depthM: 0.25, powerW: 50 });
    const [r] = runThermalEngine(input([small], 40)).results;
    expect(r.geometry.isSmall).toBe(true);
    expect(r.coefficients.branch).toBe('unventilated_small');
    expect(r.coefficients.k).toBeCloseTo(0.705064, 5);
    expect(r.coefficients.c).toBeCloseTo(1.287352, 5);
    expect(r.coefficients.g).toBeCloseTo(1.25, 10);
    expect(r.temperatures.midC).toBeCloseTo(56.3757, 3);
    expect(r.temperatures.threeQuarterC).toBeCloseTo(58.7285, 3);
    expect(r.temperatures.topC).toBeCloseTo(58.7285, 3);
    expect(r.rises.topRawK).toBeCloseTo(21.0813, 3);
    expect(r.coefficients.figuresUsed).toEqual(['Fig. 2', 'Fig. 7', 'Fig. 8']);
  });

  it('a 55 °C limit is exceeded and the 0.75 point sits between mid and raw top', () => {
    const small = section({ widthM: 0.4, heightM: 0.5, depthM: 0.25, powerW: 50, maxTempC: 55 });
    const [r] = runThermalEngine(input([small], 40)).results;
    expect(r.compliantMid).toBe(false);
    expect(r.compliant).toBe(false);
    expect(r.rises.threeQuarterK).toBeCloseTo(0.5 * (r.rises.midK + r.rises.topRawK), 10);
    expect(r.rises.threeQuarterK).toBeGreaterThan(r.rises.midK);
    expect(r.rises.threeQuarterK).toBeLessThan(r.rises.topRawK);
  });
});

// ─── 4. Ventilated section ────────────────────────────────────────────────────

describe('Engine – ventilated section', () => {
  it('uses Figures 5 and 6 with the ventilated d-factor', () => {
    const vented = section({
      widthM: 0.6,
      heightM: 2.0,
      depthM: 0.6,
      powerW: 420,
      horizontalPartitions: 2,
      ventilation: { enabled: true, inletAreaCm2: 250 },
    });
    const [r] = runThermalEngine(input([vented])).results;
    expect(r.geometry.effectiveAreaM2).toBeCloseTo(4.824, 10);
    expect(r.coefficients.branch).toBe('ventilated');
    expect(r.coefficients.k).toBeCloseTo(0.071376, 6);
    expect(r.coefficients.c).toBeCloseTo(1.606618, 5);
    expect(r.coefficients.d).toBe(1.1);
    expect(r.rises.midK).toBeCloseTo(5.8961, 3);
    expect(r.rises.topK).toBeCloseTo(9.4729, 3);
    expect(r.ventilation.effective).toBe(true);
  });
});

// ─── 5. Infeasible ambient ────────────────────────────────────────────────────

describe('Engine – infeasible ambient', () => {
  it('zero rises whatever the load', () => {
    for (const powerW of [0, 200, 5000]) {
      const [r] = runThermalEngine(input([section({ powerW })], 72)).results;
      expect(r.rises.midK).toBe(0);
      expect(r.rises.topK).toBe(0);
      expect(r.cooling.activeCoolingW).toBe(0);
    }
  });

  it('reports every section infeasible with no airflow', () => {
    const out = runThermalEngine(input([section({ id: 'A' }), section({ id: 'B', xM: 0.6 })], 72));
    for (const r of out.results) {
      expect(r.stage).toBe('infeasible_ambient');
      expect(r.cooling.requiredAirflowM3h).toBeNull();
      expect(r.flags[0].id).toBe(THERMAL_FLAG_IDS.AMBIENT_AT_LIMIT);
    }
    expect(out.summary.compliantCount).toBe(0);
    expect(out.summary.totalAirflowM3h).toBe(0);
    expect(out.reportRows[0].verdict).toBe('Infeasible (ambient)');
  });
});

// ─── 6. Layout behaviour ──────────────────────────────────────────────────────

describe('Engine – layout', () => {
  const layout = [
    section({ id: 'A', powerW: 150 }),
    section({ id: 'B', xM: 0.6, powerW: 400 }),
    section({ id: 'C', xM: 1.2, heightM: 0.8, powerW: 120 }),
    section({ id: 'D', xM: 1.2, yM: 0.8, heightM: 0.4, powerW: 40 }),
  ];

  it('required airflow never falls as the load grows', () => {
    let prev = 0;
    for (const powerW of [600, 800, 1200, 2000, 4000]) {
      const [r] = runThermalEngine(input([section({ powerW })])).results;
      expect(r.stage).toBe('active_cooling');
      const flow = r.cooling.requiredAirflowM3h ?? Number.NaN;
      expect(flow).toBeGreaterThanOrEqual(prev);
      prev = flow;
    }
  });

  it('is deterministic', () => {
    expect(runThermalEngine(input(layout))).toEqual(runThermalEngine(input(layout)));
  });

  it('does not depend on section order', () => {
    const forward = runThermalEngine(input(layout)).results;
    const reversed = runThermalEngine(input([...layout].reverse())).results;
    for (const r of forward) {
      const twin = reversed.find(x => x.sectionId === r.sectionId);
      expect(twin?.temperatures.topC).toBe(r.temperatures.topC);
      expect(twin?.geometry.touching).toEqual(r.geometry.touching);
    }
  });

  it('stacked sections see each other', () => {
    const results = runThermalEngine(input(layout)).results;
    const c = results.find(r => r.sectionId === 'C');
    const d = results.find(r => r.sectionId === 'D');
    expect(c?.geometry.touching).toEqual({ top: true, bottom: false, left: true, right: false });
    expect(d?.geometry.touching).toEqual({ top: false, bottom: true, left: true, right: false });
  });

  it('evaluateSection matches the full run', () => {
    const full = runThermalEngine(input(layout)).results[1];
    expect(evaluateSection(1, input(layout))).toEqual(full);
  });

  it('evaluateSection rejects an index outside the layout', () => {
    expect(() => evaluateSection(4, input(layout))).toThrow('section index 4 is out of range (layout has 4)');
  });

  it('propagates validation errors', () => {
    expect(() => runThermalEngine(input([section({ depthM: 0 })]))).toThrow('section "S1" depthM must be > 0');
  });

  it('logs the run start and one terminal stage per section', () => {
    const log = createMemoryLogSink();
    runThermalEngine(input(layout), { log });
    expect(log.records[0]).toMatchObject({ level: 'info', event: 'engine.start', fields: { sections: 4 } });
    expect(log.records.filter(r => r.event === 'stager.terminal')).toHaveLength(4);
  });

  it('shares one default coefficient source', () => {
    expect(defaultCoefficientSource()).toBe(defaultCoefficientSource());
  });

  it('an empty layout has an empty summary', () => {
    const out = runThermalEngine(input([]));
    expect(out.results).toEqual([]);
    expect(out.summary.worstSectionId).toBeNull();
    expect(out.meta).toEqual({ engineVersion: 'enclosure-thermal-1.0.0', contractVersion: 'v1' });
  });
});
