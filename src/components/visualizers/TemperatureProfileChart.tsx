import { useMemo } from 'react';
import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
} from 'recharts';
import type { ThermalResultV1 } from '../../contracts/ThermalEngineOutputV1';
import { buildTemperatureProfile } from './thermalChartData';

interface Props {
  result: ThermalResultV1;
  /** Floor temperature of the characteristic; defaults to the result's ambient. */
  ambientC?: number;
}

export default function TemperatureProfileChart({ result, ambientC }: Props) {
  const data = useMemo(() => buildTemperatureProfile(result, ambientC), [result, ambientC]);
  const stroke = result.compliantTop ? '#38a169' : '#e53e3e';

  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={data} margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="temperatureC"
          type="number"
          domain={['dataMin - 5', 'dataMax + 5']}
          tick={{ fontSize: 10 }}
          label={{ value: 'Air temperature (°C)', position: 'insideBottom', offset: -2, fontSize: 11 }}
        />
        <YAxis
          dataKey="heightMultiple"
          type="number"
          domain={[0, 1]}
          ticks={[0, 0.5, 0.75, 1]}
          tick={{ fontSize: 10 }}
          label={{ value: 'Height multiple (t)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <ReferenceLine
          x={result.maxAllowedC}
          stroke="#e53e3e"
          strokeDasharray="4 4"
          label={{ value: `Limit ${result.maxAllowedC}°C`, fontSize: 10, fill: '#e53e3e' }}
        />
        <Line
          type="linear"
          dataKey="heightMultiple"
          stroke={stroke}
          strokeWidth={2.5}
          dot={{ r: 3 }}
          isAnimationActive={false}
        />
      </LineChart>
    </ResponsiveContainer>
  );
}
