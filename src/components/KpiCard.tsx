import './styles.css';
import type { Tone } from './theme';

interface Props {
  label: string;
  value: string;
  delta?: string;
  tone?: Tone;
}

export function KpiCard({ label, value, delta, tone = 'neutral' }: Props) {
  return (
    <div className={`card kpi tone-${tone}`}>
      <div className="kpi-label">{label}</div>
      <div className="kpi-value">{value}</div>
      {delta && <div className="kpi-delta">{delta}</div>}
    </div>
  );
}
