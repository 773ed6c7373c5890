import { Bar, BarChart, CartesianGrid, Cell, Legend, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';

import './styles.css';
import type { ProductionRecord } from '../lib/types';
import { chartColors } from './theme';

interface Props {
  records: readonly ProductionRecord[];
}

export function ProductionChart({ records }: Props) {
  const data = records.map((r) => ({ date: r.date, planned: r.plannedQty, actual: r.actualQty, variance: r.variance }));

  return (
    <div className="card">
      <h3>📊 Production Plan vs Actual</h3>
      <div style={{ width: '100%', height: 300 }}>
        <ResponsiveContainer>
          <BarChart data={data}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="date" />
            <YAxis />
            <Tooltip />
            <Legend />
            <Bar dataKey="planned" name="Planned" fill={chartColors.planned} fillOpacity={0.7} />
            <Bar dataKey="actual" name="Actual" fill={chartColors.ahead}>
              {data.map((d) => (
                <Cell key={d.date} fill={d.variance < 0 ? chartColors.behind : chartColors.ahead} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}
