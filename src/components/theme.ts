import type { MrpStatus, Severity } from '../lib/types';

export type Tone = 'good' | 'warn' | 'bad' | 'neutral';

export const severityClass: Record<Severity, string> = {
  critical: 'alert alert-critical',
  high: 'alert alert-high',
  medium: 'alert alert-medium',
};

export const mrpStatusClass: Record<MrpStatus, string> = {
  Complete: '',
  Pending: 'cell-pending',
  Critical: 'cell-critical',
};

export const chartColors = {
  planned: '#9ecbff',
  ahead: '#2e9e4f',
  behind: '#d64545',
  utilLow: '#d64545',
  utilMid: '#f0a020',
  utilOk: '#2e9e4f',
};

// bar colour bands for the capacity chart
export function utilizationColor(pct: number): string {
  if (pct < 30) return chartColors.utilLow;
  if (pct < 60) return chartColors.utilMid;
  return chartColors.utilOk;
}
