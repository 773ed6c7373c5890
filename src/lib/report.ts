import * as XLSX from 'xlsx';

import { classifyIssues, computeKpis, issueMessages, partitionIssues } from './calc';
import { FG_UNIT, SHEETS } from './config';
import { MalformedRecordError } from './errors';
import { formatInt, formatMoney, formatPct, reportDate } from './format';
import { createSnapshot } from './snapshot';
import type { CapacityRecord, Issue, Kpis, MrpOrder, ProductionRecord, Severity, Snapshot } from './types';

type Cell = string | number;
type SheetRow = Record<string, Cell>;

interface ColumnDef<T> {
  key: keyof T;
  label: string;
}

const productionColumns: ColumnDef<ProductionRecord>[] = [
  { key: 'date', label: 'Date' },
  { key: 'plannedQty', label: 'Planned_Qty' },
  { key: 'actualQty', label: 'Actual_Qty' },
  { key: 'variance', label: 'Variance' },
  { key: 'reason', label: 'Reason' },
];

const capacityColumns: ColumnDef<CapacityRecord>[] = [
  { key: 'department', label: 'Department' },
  { key: 'capacity', label: 'Capacity' },
  { key: 'plannedLoad', label: 'Planned_Load' },
  { key: 'actualProd', label: 'Actual_Prod' },
  { key: 'utilizationPct', label: 'Utilization' },
  { key: 'mtd', label: 'MTD' },
];

const mrpColumns: ColumnDef<MrpOrder>[] = [
  { key: 'order', label: 'Order' },
  { key: 'ordered', label: 'Ordered' },
  { key: 'available', label: 'Available' },
  { key: 'status', label: 'Status' },
];

const SUMMARY_HEADER = ['Executive Summary'];
const PROCUREMENT_HEADER = ['Status', 'Count', 'Amount (M)'];
const IMPORTS_HEADER = ['Category', 'Item', 'Count'];
const WAREHOUSE_HEADER = ['Section', 'Item', 'Quantity'];

const PO_ROWS = [
  { key: 'issued', label: 'PO Issued' },
  { key: 'received', label: 'PO Received' },
  { key: 'pending', label: 'PO Pending' },
] as const;

const yesNo = (flag: boolean) => (flag ? 'Yes' : 'No');

/** Everything the presentation layer needs from one snapshot. */
export interface DashboardReport {
  issues: Issue[];
  bySeverity: Record<Severity, string[]>;
  kpis: Kpis;
  summary: string;
}

export function buildDashboardReport(s: Snapshot, now: Date): DashboardReport {
  const issues = classifyIssues(s);
  return {
    issues,
    bySeverity: partitionIssues(issues),
    kpis: computeKpis(s),
    summary: renderSummaryReport(s, issues, now),
  };
}

export function recommendations(s: Snapshot): string[] {
  const pending = s.procurement.pending;
  return [
    '**URGENT:** Address feeding issues from cutting department',
    '**HIGH:** Increase stitching and lasting capacity utilization',
    '**MEDIUM:** Expedite pending material orders (679, 681)',
    `**MEDIUM:** Follow up on ${pending.count} pending POs worth ${formatMoney(pending.amount)}`,
  ];
}

export function renderSummaryReport(s: Snapshot, issues: readonly Issue[], now: Date): string {
  const critical = issueMessages(issues, 'critical');
  const high = issueMessages(issues, 'high');
  const kpis = computeKpis(s);

  const lines = [
    '# 📊 SUPPLY CHAIN EXECUTIVE SUMMARY',
    `**Report Date:** ${reportDate(now)}`,
    '',
    `## 🚨 CRITICAL ALERTS (${critical.length})`,
    ...critical.map((m) => `- ${m}`),
    '',
    `## ⚠️ HIGH PRIORITY (${high.length})`,
    ...high.map((m) => `- ${m}`),
    '',
    '## 📋 KEY METRICS',
    `- **Production Efficiency:** ${formatPct(kpis.productionEfficiencyPct)}`,
    `- **Total Production Variance:** ${formatInt(kpis.totalVariance)} units`,
    `- **Average Capacity Utilization:** ${formatPct(kpis.avgUtilizationPct)}`,
    `- **PO Completion Rate:** ${formatPct(kpis.poCompletionPct)}`,
    `- **Total FG Inventory:** ${formatInt(kpis.fgInventory)} ${FG_UNIT}`,
    '',
    '## 🔄 RECOMMENDATIONS',
    ...recommendations(s).map((r, idx) => `${idx + 1}. ${r}`),
  ];
  return lines.join('\n');
}

function toRows<T>(records: readonly T[], columns: ColumnDef<T>[]): SheetRow[] {
  return records.map((r) => {
    const row: SheetRow = {};
    for (const c of columns) {
      const v = r[c.key];
      row[c.label] = typeof v === 'boolean' ? yesNo(v) : typeof v === 'number' ? v : String(v);
    }
    return row;
  });
}

function makeSheet(rows: SheetRow[], header: string[]) {
  return XLSX.utils.json_to_sheet(rows, { header });
}

function toRowsProcurement(s: Snapshot): SheetRow[] {
  return PO_ROWS.map(({ key, label }) => ({
    Status: label,
    Count: s.procurement[key].count,
    'Amount (M)': s.procurement[key].amount,
  }));
}

function toRowsImports(s: Snapshot): SheetRow[] {
  const { preImport, payment, shipments } = s.imports;
  const row = (Category: string, Item: string, Count: number): SheetRow => ({ Category, Item, Count });
  return [
    row('Pre-Import', 'Total', preImport.total),
    row('Pre-Import', 'Received', preImport.received),
    row('Pre-Import', 'Approved', preImport.approved),
    row('Pre-Import', 'Pending', preImport.pending),
    row('Payment', 'Done', payment.done),
    row('Payment', 'Pending', payment.pending),
    row('Payment', 'Total', payment.total),
    ...shipments.map((sh) => row('Shipment', sh.month, sh.count)),
  ];
}

function toRowsWarehouse(s: Snapshot): SheetRow[] {
  const { fgStock, grn } = s.warehouse;
  const row = (Section: string, Item: string, Quantity: number): SheetRow => ({ Section, Item, Quantity });
  return [
    ...fgStock.brands.map((b) => row('FG Stock', b.brand, b.pairs)),
    row('FG Total', 'Total', fgStock.total),
    row('GRN', 'Total', grn.total),
    row('GRN', 'Done', grn.done),
    row('GRN', 'Pending', grn.pending),
  ];
}

export function buildReportWorkbook(s: Snapshot, summary: string): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  const labels = <T>(cols: ColumnDef<T>[]) => cols.map((c) => c.label);

  XLSX.utils.book_append_sheet(wb, makeSheet([{ [SUMMARY_HEADER[0]]: summary }], SUMMARY_HEADER), SHEETS.summary);
  XLSX.utils.book_append_sheet(
    wb,
    makeSheet(toRows(s.production, productionColumns), labels(productionColumns)),
    SHEETS.production
  );
  XLSX.utils.book_append_sheet(
    wb,
    makeSheet(toRows(s.capacity, capacityColumns), labels(capacityColumns)),
    SHEETS.capacity
  );
  XLSX.utils.book_append_sheet(wb, makeSheet(toRows(s.mrp, mrpColumns), labels(mrpColumns)), SHEETS.mrp);
  XLSX.utils.book_append_sheet(wb, makeSheet(toRowsProcurement(s), PROCUREMENT_HEADER), SHEETS.procurement);
  XLSX.utils.book_append_sheet(wb, makeSheet(toRowsImports(s), IMPORTS_HEADER), SHEETS.imports);
  XLSX.utils.book_append_sheet(wb, makeSheet(toRowsWarehouse(s), WAREHOUSE_HEADER), SHEETS.warehouse);

  return wb;
}

export function writeReportWorkbook(wb: XLSX.WorkBook): ArrayBuffer {
  return XLSX.write(wb, { bookType: 'xlsx', type: 'array' });
}

// ---- reading an exported workbook back into a Snapshot ----

function sheetBody(wb: XLSX.WorkBook, name: string, header: string[]): unknown[][] {
  const ws = wb.Sheets[name];
  if (!ws) throw new MalformedRecordError([{ path: name, message: 'sheet is missing' }]);

  const [head = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, defval: '' });
  const same = head.length === header.length && header.every((h, i) => head[i] === h);
  if (!same) {
    throw new MalformedRecordError([
      { path: name, message: `expected headers [${header.join(', ')}], got [${head.map(String).join(', ')}]` },
    ]);
  }
  return body;
}

const fromYesNo = (v: unknown): unknown => (v === 'Yes' ? true : v === 'No' ? false : v);

function fromRows<T>(rows: unknown[][], columns: ColumnDef<T>[], flags: (keyof T)[] = []) {
  return rows.map((cells) => {
    const record: Record<string, unknown> = {};
    columns.forEach((c, i) => {
      record[String(c.key)] = flags.includes(c.key) ? fromYesNo(cells[i]) : cells[i];
    });
    return record;
  });
}

const lookup = (rows: unknown[][], section: string, item: string) =>
  rows.find((r) => r[0] === section && r[1] === item)?.[2];

export function readReportWorkbook(data: ArrayBuffer): { summary: string; snapshot: Snapshot } {
  const wb = XLSX.read(new Uint8Array(data), { type: 'array' });

  const summaryCell = sheetBody(wb, SHEETS.summary, SUMMARY_HEADER)[0]?.[0];
  if (typeof summaryCell !== 'string') {
    throw new MalformedRecordError([{ path: SHEETS.summary, message: 'summary text is missing' }]);
  }

  const procurement = sheetBody(wb, SHEETS.procurement, PROCUREMENT_HEADER);
  const bucket = (label: string) => {
    const r = procurement.find((row) => row[0] === label);
    return { count: r?.[1], amount: r?.[2] };
  };

  const imports = sheetBody(wb, SHEETS.imports, IMPORTS_HEADER);
  const warehouse = sheetBody(wb, SHEETS.warehouse, WAREHOUSE_HEADER);

  const snapshot = createSnapshot({
    production: fromRows(sheetBody(wb, SHEETS.production, productionColumns.map((c) => c.label)), productionColumns),
    capacity: fromRows(sheetBody(wb, SHEETS.capacity, capacityColumns.map((c) => c.label)), capacityColumns),
    mrp: fromRows(sheetBody(wb, SHEETS.mrp, mrpColumns.map((c) => c.label)), mrpColumns, ['ordered', 'available']),
    procurement: {
      issued: bucket('PO Issued'),
      received: bucket('PO Received'),
      pending: bucket('PO Pending'),
    },
    imports: {
      preImport: {
        total: lookup(imports, 'Pre-Import', 'Total'),
        received: lookup(imports, 'Pre-Import', 'Received'),
        approved: lookup(imports, 'Pre-Import', 'Approved'),
        pending: lookup(imports, 'Pre-Import', 'Pending'),
      },
      payment: {
        done: lookup(imports, 'Payment', 'Done'),
        pending: lookup(imports, 'Payment', 'Pending'),
        total: lookup(imports, 'Payment', 'Total'),
      },
      shipments: imports.filter((r) => r[0] === 'Shipment').map((r) => ({ month: String(r[1]), count: r[2] })),
    },
    warehouse: {
      fgStock: {
        brands: warehouse.filter((r) => r[0] === 'FG Stock').map((r) => ({ brand: String(r[1]), pairs: r[2] })),
        total: lookup(warehouse, 'FG Total', 'Total'),
      },
      grn: {
        total: lookup(warehouse, 'GRN', 'Total'),
        done: lookup(warehouse, 'GRN', 'Done'),
        pending: lookup(warehouse, 'GRN', 'Pending'),
      },
    },
  });

  return { summary: summaryCell, snapshot };
}
