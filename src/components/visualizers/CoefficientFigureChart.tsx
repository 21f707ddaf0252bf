import { useMemo } from 'react';
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { FigureId } from '../../contracts/ThermalEngineOutputV1';
import type { CoefficientSource } from '../../engine/modules/CoefficientSource';
import { sampleFigure } from './thermalChartData';

const SERIES_COLOURS = ['#3182ce', '#ed8936', '#38a169', '#805ad5', '#d53f8c', '#2c7a7b'];

interface Props {
  figure: FigureId;
  source: CoefficientSource;
}

export default function CoefficientFigureChart({ figure, source }: Props) {
  const { definition, seriesNames, rows } = useMemo(() => sampleFigure(figure, source), [figure, source]);

  return (
    <div>
      <h4 style={{ margin: '0 0 8px', fontSize: '0.9rem' }}>
        {definition.label}: {definition.title}
      </h4>
      <ResponsiveContainer width="100%" height={280}>
        <LineChart data={rows} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
          <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
          <XAxis
            dataKey="x"
            type="number"
            domain={[definition.xStart, definition.xEnd]}
            tick={{ fontSize: 10 }}
            label={{ value: definition.xLabel, position: 'insideBottom', offset: -2, fontSize: 11 }}
          />
          <YAxis
            tick={{ fontSize: 10 }}
            label={{ value: definition.yLabel, angle: -90, position: 'insideLeft', fontSize: 11 }}
          />
          <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
          {seriesNames.length > 1 && <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />}
          {seriesNames.map((name, i) => (
            <Line
              key={name}
              type="monotone"
              dataKey={name}
              stroke={SERIES_COLOURS[i % SERIES_COLOURS.length]}
              strokeWidth={1.8}
              dot={false}
              isAnimationActive={false}
            />
          ))}
        </LineChart>
      </ResponsiveContainer>
    </div>
  );
}
