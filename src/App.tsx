import { useMemo, useState, type CSSProperties } from 'react';
import type { ThermalEngineInputV1, EnclosureSectionV1 } from './contracts/ThermalEngineInputV1';
import type { FigureId } from './contracts/ThermalEngineOutputV1';
import { runThermalEngine, defaultCoefficientSource } from './engine/Engine';
import { evaluatePreconditions } from './engine/modules/PreconditionChecklist';
import { DEFAULT_LOUVRE_DEFINITION, maxLouvreGrid, maxSectionInletAreaCm2 } from './engine/modules/LouvreModule';
import TemperatureProfileChart from './components/visualizers/TemperatureProfileChart';
import CoefficientFigureChart from './components/visualizers/CoefficientFigureChart';
import { FIGURE_DEFINITIONS } from './components/visualizers/thermalChartData';

// Demo line-up: an incomer, a busbar chamber stacked on a feeder tier, and an
// outgoing section, all 600 mm deep.
const demoSections: EnclosureSectionV1[] = [
  {
    id: 'S1',
    name: 'Incomer',
    xM: 0, yM: 0, widthM: 0.8, heightM: 2.0, depthM: 0.6,
    heatSources: [
      { name: 'ACB 1600 A', powerW: 310, maxTempC: 60 },
      { name: 'Busbar link', powerW: 45 },
    ],
    maxTempMode: 'auto',
  },
  {
    id: 'S2',
    name: 'Feeders',
    xM: 0.8, yM: 0, widthM: 0.6, heightM: 1.4, depthM: 0.6,
    heatSources: [{ name: 'MCCB 250 A', powerW: 28, quantity: 8 }],
    horizontalPartitions: 2,
  },
  {
    id: 'S3',
    name: 'Busbar chamber',
    xM: 0.8, yM: 1.4, widthM: 0.6, heightM: 0.6, depthM: 0.6,
    powerW: 60,
  },
  {
    id: 'S4',
    name: 'Outgoing',
    xM: 1.4, yM: 0, widthM: 0.6, heightM: 2.0, depthM: 0.6,
    powerW: 420,
    ventilation: { enabled: true, inletAreaCm2: 250, mode: 'what_if' },
  },
];

const IP_RATING = 3;

function louvreGrid(widthM: number, heightM: number): string {
  const { cols, rows } = maxLouvreGrid(widthM, heightM, DEFAULT_LOUVRE_DEFINITION);
  return `${cols} × ${2 * rows + 1}`;
}

const card: CSSProperties = {
  background: 'white',
  border: '1px solid #e2e8f0',
  borderRadius: 8,
  padding: '1rem',
  marginBottom: '1rem',
};

export default function App() {
  const [ambientC, setAmbientC] = useState(35);
  const [wallMounted, setWallMounted] = useState(false);
  const [selectedId, setSelectedId] = useState('S1');
  const [figure, setFigure] = useState<FigureId>('fig3');

  const input: ThermalEngineInputV1 = useMemo(
    () => ({ sections: demoSections, settings: { ambientC, wallMounted, ipRating: IP_RATING } }),
    [ambientC, wallMounted],
  );
  const output = useMemo(() => runThermalEngine(input), [input]);
  const checklist = useMemo(() => evaluatePreconditions(input), [input]);
  const selected = output.results.find(r => r.sectionId === selectedId) ?? output.results[0];

  return (
    <div style={{ maxWidth: 1100, margin: '0 auto', padding: '1.5rem', fontFamily: 'system-ui, sans-serif' }}>
      <h1 style={{ marginBottom: 4 }}>🌡️ Enclosure Temperature Rise</h1>
      <p style={{ color: '#4a5568', marginTop: 0 }}>IEC 60890 calculation for multi-section assemblies</p>

      <div style={card}>
        <label>
          Ambient (°C){' '}
          <input
            type="number"
            value={ambientC}
            onChange={e => setAmbientC(Number(e.target.value))}
            style={{ width: 70 }}
          />
        </label>
        <label style={{ marginLeft: '1.5rem' }}>
          <input type="checkbox" checked={wallMounted} onChange={e => setWallMounted(e.target.checked)} /> Wall-mounted
        </label>
      </div>

      <div style={card}>
        <table style={{ width: '100%', borderCollapse: 'collapse', fontSize: '0.85rem' }}>
          <thead>
            <tr>
              {['Section', 'Ae (m²)', 'P (W)', 'k', 'c', 'x', 'Curve', 'T0.5 (°C)', 'T1.0 (°C)', 'Limit', 'Verdict', 'Airflow'].map(h => (
                <th key={h} style={{ textAlign: 'left', borderBottom: '1px solid #e2e8f0', padding: 4 }}>{h}</th>
              ))}
            </tr>
          </thead>
          <tbody>
            {output.reportRows.map(row => (
              <tr
                key={row.sectionId}
                onClick={() => setSelectedId(row.sectionId)}
                style={{ cursor: 'pointer', background: row.sectionId === selected?.sectionId ? '#ebf8ff' : undefined }}
              >
                {[row.tag, row.effectiveArea, row.power, row.k, row.c, row.x, row.curve, row.tempMid, row.tempTop, row.limit, row.verdict, row.airflow].map((v, i) => (
                  <td key={i} style={{ padding: 4 }}>{v}</td>
                ))}
              </tr>
            ))}
          </tbody>
        </table>
        <p style={{ fontSize: '0.8rem', color: '#4a5568' }}>
          {output.summary.compliantCount}/{output.summary.sectionCount} sections compliant ·
          active cooling {output.summary.totalActiveCoolingW.toFixed(0)} W ·
          airflow {Math.ceil(output.summary.totalAirflowM3h)} m³/h
        </p>
      </div>

      {selected !== undefined && (
        <div style={{ ...card, display: 'flex', gap: '1.5rem' }}>
          <div style={{ flex: 1, height: 280 }}>
            <TemperatureProfileChart result={selected} />
          </div>
          <div style={{ flex: 1, fontSize: '0.85rem' }}>
            <h3 style={{ marginTop: 0 }}>{selected.name}</h3>
            <p style={{ color: '#4a5568' }}>
              Door louvres: up to {louvreGrid(selected.geometry.widthM, selected.geometry.heightM)} giving{' '}
              {maxSectionInletAreaCm2(selected.geometry.widthM, selected.geometry.heightM, DEFAULT_LOUVRE_DEFINITION, IP_RATING).toFixed(0)} cm²
              inlet at IP{IP_RATING}X
            </p>
            {selected.notes.map((n, i) => <p key={i}>{n}</p>)}
            <ul>
              {selected.flags.map((f, i) => (
                <li key={i}><strong>{f.title}</strong>: {f.detail}</li>
              ))}
            </ul>
          </div>
        </div>
      )}

      <div style={card}>
        <div style={{ marginBottom: 8 }}>
          {FIGURE_DEFINITIONS.map(d => (
            <button
              key={d.key}
              onClick={() => setFigure(d.key)}
              style={{ marginRight: 6, fontWeight: d.key === figure ? 700 : 400 }}
            >
              {d.label}
            </button>
          ))}
        </div>
        <CoefficientFigureChart figure={figure} source={defaultCoefficientSource()} />
      </div>

      <div style={card}>
        <h3 style={{ marginTop: 0 }}>Preconditions</h3>
        {checklist.notes.map((n, i) => <p key={i} style={{ fontSize: '0.85rem' }}>{n}</p>)}
        <ul style={{ fontSize: '0.8rem' }}>
          {checklist.items.map(item => (
            <li key={item.id}>
              {item.id} – {item.condition} <em>({item.answer}{item.source === 'automatic' ? ', automatic' : ''})</em>
            </li>
          ))}
        </ul>
      </div>
    </div>
  );
}
