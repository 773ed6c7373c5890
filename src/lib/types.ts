export type MrpStatus = 'Complete' | 'Pending' | 'Critical';

export type Severity = 'critical' | 'high' | 'medium';

export interface ProductionRecord {
  date: string; // e.g. 10-Jun-2025
  plannedQty: number;
  actualQty: number;
  variance: number; // actualQty - plannedQty
  reason: string;
}

export interface CapacityRecord {
  department: string;
  capacity: number;
  plannedLoad: number;
  actualProd: number;
  utilizationPct: number; // not clamped
  mtd: number; // month-to-date output
}

/**
 * Status is taken as supplied. The ordered/available flags are informational
 * and are not checked against it.
 */
export interface MrpOrder {
  order: string;
  ordered: boolean;
  available: boolean;
  status: MrpStatus;
}

export interface ProcurementBucket {
  count: number;
  amount: number; // raw amount; unit label is applied when rendering
}

export interface ProcurementSummary {
  issued: ProcurementBucket;
  received: ProcurementBucket;
  pending: ProcurementBucket;
}

export interface ShipmentCount {
  month: string;
  count: number;
}

export interface ImportStatus {
  preImport: { total: number; received: number; approved: number; pending: number };
  payment: { done: number; pending: number; total: number };
  shipments: readonly ShipmentCount[];
}

export interface BrandStock {
  brand: string;
  pairs: number;
}

export interface WarehouseStatus {
  fgStock: { brands: readonly BrandStock[]; total: number };
  grn: { total: number; done: number; pending: number };
}

export interface Snapshot {
  production: readonly ProductionRecord[];
  capacity: readonly CapacityRecord[];
  mrp: readonly MrpOrder[];
  procurement: ProcurementSummary;
  imports: ImportStatus;
  warehouse: WarehouseStatus;
}

export type IssueRule =
  | 'production-shortfall'
  | 'feeding-issues'
  | 'capacity-critical'
  | 'capacity-low'
  | 'mrp-unavailable'
  | 'po-pending';

export interface Issue {
  severity: Severity;
  rule: IssueRule;
  message: string;
}

export interface Kpis {
  productionEfficiencyPct: number | null; // null when nothing was planned
  totalVariance: number;
  avgUtilizationPct: number | null; // null without departments
  poCompletionPct: number | null; // null when no POs were issued
  fgInventory: number;
}
