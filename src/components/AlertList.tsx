import './styles.css';
import { alertsInSeverityOrder } from '../lib/calc';
import type { Severity } from '../lib/types';
import { severityClass } from './theme';

interface Props {
  bySeverity: Record<Severity, string[]>;
}

export function AlertList({ bySeverity }: Props) {
  const alerts = alertsInSeverityOrder(bySeverity);

  if (alerts.length === 0) {
    return <div className="success-box">✅ All Systems Operating Normally</div>;
  }

  return (
    <div className="alerts">
      {alerts.map((alert, i) => (
        <div key={`${alert.severity}-${i}`} className={severityClass[alert.severity]}>
          {alert.message}
        </div>
      ))}
    </div>
  );
}
