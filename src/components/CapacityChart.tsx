import { Bar, BarChart, CartesianGrid, Cell, LabelList, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';

import './styles.css';
import type { CapacityRecord } from '../lib/types';
import { utilizationColor } from './theme';

interface Props {
  records: readonly CapacityRecord[];
}

export function CapacityChart({ records }: Props) {
  const data = records.map((r) => ({ department: r.department, utilization: r.utilizationPct }));

  return (
    <div className="card">
      <h3>⚡ Capacity Utilization by Department</h3>
      <div style={{ width: '100%', height: 300 }}>
        <ResponsiveContainer>
          <BarChart data={data}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="department" />
            <YAxis unit="%" />
            <Tooltip />
            <Bar dataKey="utilization" name="Utilization %">
              {data.map((d) => (
                <Cell key={d.department} fill={utilizationColor(d.utilization)} />
              ))}
              <LabelList dataKey="utilization" position="top" formatter={(v: unknown) => `${String(v)}%`} />
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}
