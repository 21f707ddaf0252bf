import { describe, it, expect } from 'vitest';
import {
  FIGURE_DEFINITIONS,
  buildTemperatureProfile,
  figureDefinition,
  figureXValues,
  sampleFigure,
} from '../visualizers/thermalChartData';
import { runThermalEngine } from '../../engine/Engine';
import { createCoefficientSource } from '../../engine/modules/CoefficientSource';

// ─── 1. Temperature profile ───────────────────────────────────────────────────

describe('thermalChartData – temperature profile', () => {
  it('large sections plot ambient, mid and top', () => {
    const [r] = runThermalEngine({
      sections: [{ id: 'S1', xM: 0, yM: 0, widthM: 0.6, heightM: 1.2, depthM: 0.4, powerW: 200 }],
      settings: { ambientC: 35 },
    }).results;
    const profile = buildTemperatureProfile(r);
    expect(profile.map(p => p.label)).toEqual(['Ambient', 'T@0.5t', 'T@1.0t']);
    expect(profile.map(p => p.heightMultiple)).toEqual([0, 0.5, 1]);
    expect(profile[0].temperatureC).toBe(35);
    expect(profile[2].temperatureC).toBe(r.temperatures.topC);
  });

  it('small sections add the 0.75 construction point', () => {
    const [r] = runThermalEngine({
      sections: [{ id: 'S1', xM: 0, yM: 0, widthM: 0.4, heightM: 0.5, depthM: 0.25, powerW: 50 }],
      settings: { ambientC: 40, solarOffsetK: 3 },
    }).results;
    const profile = buildTemperatureProfile(r);
    expect(profile.map(p => p.heightMultiple)).toEqual([0, 0.5, 0.75, 1]);
    expect(profile[0].temperatureC).toBe(40);
    expect(profile[2].temperatureC).toBe(profile[3].temperatureC);
  });
});

// ─── 2. Coefficient figures ───────────────────────────────────────────────────

describe('thermalChartData – coefficient figures', () => {
  const source = createCoefficientSource();

  it('defines Figures 3 to 8 in order', () => {
    expect(FIGURE_DEFINITIONS.map(d => d.label)).toEqual(['Fig. 3', 'Fig. 4', 'Fig. 5', 'Fig. 6', 'Fig. 7', 'Fig. 8']);
  });

  it('x values include both ends without float noise', () => {
    const xs = figureXValues(figureDefinition('fig7'));
    expect(xs).toHaveLength(25);
    expect(xs[0]).toBe(0.05);
    expect(xs[2]).toBe(0.15);
    expect(xs[24]).toBe(1.25);
  });

  it('samples one column per series', () => {
    const fig = sampleFigure('fig4', source);
    expect(fig.seriesNames).toEqual(['Curve 1', 'Curve 2', 'Curve 3', 'Curve 4', 'Curve 5']);
    expect(fig.rows).toHaveLength(48);
    expect(Object.keys(fig.rows[0])).toEqual(['x', ...fig.seriesNames]);
  });

  it('row values come from the coefficient source', () => {
    const fig = sampleFigure('fig8', source);
    const row = fig.rows.find(r => r.x === 0.5);
    expect(row?.c).toBeCloseTo(1.1, 10);
    expect(sampleFigure('fig3', source).rows[0].k).toBeCloseTo(0.524, 10);
  });

  it('names the Figure 5 families by Ae', () => {
    expect(sampleFigure('fig5', source).seriesNames[0]).toBe('Ae = 1 m²');
  });
});
