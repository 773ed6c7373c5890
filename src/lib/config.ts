export const THRESHOLDS = {
  productionShortfallUnits: -3000,
  feedingIssueDays: 3,
  capacityCriticalPct: 20,
  capacityLowPct: 40,
  poPendingRatio: 0.3,
} as const;

export const FEEDING_ISSUE_MARKER = 'FEEDING ISSUE';

export const CURRENCY = {
  prefix: 'pkr',
  unit: 'M',
} as const;

export const FG_UNIT = 'pairs';

export const EXPORT_FILE_PREFIX = {
  report: 'Supply_Chain_Report',
  summary: 'Supply_Chain_Summary',
} as const;

export const SHEETS = {
  summary: 'Executive Summary',
  production: 'Production',
  capacity: 'Capacity',
  mrp: 'MRP',
  procurement: 'Procurement',
  imports: 'Imports',
  warehouse: 'Warehouse',
} as const;
