import { useMemo, useState } from 'react';
import { format } from 'date-fns';

import './components/styles.css';
import { AlertList } from './components/AlertList';
import { CapacityChart } from './components/CapacityChart';
import { DataTable, keyWithIndex, type ColumnDef } from './components/DataTable';
import { KpiCard } from './components/KpiCard';
import { ProductionChart } from './components/ProductionChart';
import { mrpStatusClass, type Tone } from './components/theme';

import { FG_UNIT } from './lib/config';
import { loadSampleSnapshot } from './lib/data';
import { downloadReportXlsx, downloadSummaryMarkdown } from './lib/download';
import { MalformedRecordError } from './lib/errors';
import { formatInt, formatMoney, formatPct } from './lib/format';
import { buildDashboardReport, type DashboardReport } from './lib/report';
import type { CapacityRecord, MrpOrder, ProductionRecord, Snapshot } from './lib/types';

const tabs = ['📊 Production', '⚡ Capacity', '📋 MRP Status', '🚢 Imports', '🏭 Warehouse'] as const;

type Tab = (typeof tabs)[number];

type Loaded = { ok: true; snapshot: Snapshot; report: DashboardReport } | { ok: false; error: string };

const productionColumns: ColumnDef<ProductionRecord>[] = [
  { key: 'date', label: 'Date' },
  { key: 'plannedQty', label: 'Planned Qty' },
  { key: 'actualQty', label: 'Actual Qty' },
  { key: 'variance', label: 'Variance', cellClass: (r) => (r.variance < 0 ? 'cell-critical' : '') },
  { key: 'reason', label: 'Reason' },
];

const capacityColumns: ColumnDef<CapacityRecord>[] = [
  { key: 'department', label: 'Department' },
  { key: 'capacity', label: 'Capacity' },
  { key: 'plannedLoad', label: 'Planned Load' },
  { key: 'actualProd', label: 'Actual Prod' },
  { key: 'utilizationPct', label: 'Utilization', render: (r) => `${r.utilizationPct}%` },
  { key: 'mtd', label: 'MTD' },
];

const mrpColumns: ColumnDef<MrpOrder>[] = [
  { key: 'order', label: 'Order' },
  { key: 'ordered', label: 'Ordered' },
  { key: 'available', label: 'Available' },
  { key: 'status', label: 'Status', cellClass: (r) => mrpStatusClass[r.status] },
];

function describeError(err: unknown): string {
  if (err instanceof MalformedRecordError) {
    return [err.message, ...err.issues.map((i) => `${i.path}: ${i.message}`)].join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

function load(now: Date): Loaded {
  try {
    const snapshot = loadSampleSnapshot();
    return { ok: true, snapshot, report: buildDashboardReport(snapshot, now) };
  } catch (err) {
    console.error('Failed to build dashboard snapshot', err);
    return { ok: false, error: describeError(err) };
  }
}

const signed = (n: number, text: string) => (n > 0 ? `+${text}` : text);

export default function App() {
  const [now] = useState(() => new Date());
  const [activeTab, setActiveTab] = useState<Tab>(tabs[0]);
  const [exportError, setExportError] = useState<string | null>(null);

  const loaded = useMemo(() => load(now), [now]);

  if (!loaded.ok) {
    return (
      <div className="app">
        <h1>🚨 Supply Chain Command Center</h1>
        <div className="card error">
          <h3>Snapshot could not be loaded</h3>
          <pre>{loaded.error}</pre>
        </div>
      </div>
    );
  }

  const { snapshot, report } = loaded;
  const { kpis } = report;

  const runExport = (label: string, action: () => string) => {
    try {
      action();
      setExportError(null);
    } catch (err) {
      console.error(`${label} export failed`, err);
      setExportError(`${label} export failed: ${describeError(err)}`);
    }
  };

  const efficiency = kpis.productionEfficiencyPct;
  const avgUtil = kpis.avgUtilizationPct;

  const efficiencyTone: Tone = efficiency == null ? 'neutral' : efficiency < 100 ? 'bad' : 'good';
  const utilTone: Tone = avgUtil == null ? 'neutral' : avgUtil > 50 ? 'good' : 'bad';

  const { procurement, warehouse, imports } = snapshot;
  const poRows = [
    { status: 'PO Issued', count: procurement.issued.count, amount: formatMoney(procurement.issued.amount) },
    { status: 'PO Received', count: procurement.received.count, amount: formatMoney(procurement.received.amount) },
    { status: 'PO Pending', count: procurement.pending.count, amount: formatMoney(procurement.pending.amount) },
  ];
  const fgRows = [...warehouse.fgStock.brands, { brand: 'Total', pairs: warehouse.fgStock.total }];
  const importRows = [
    { category: 'Pre-Import', detail: `${imports.preImport.approved}/${imports.preImport.total} approved, ${imports.preImport.pending} pending` },
    { category: 'Payment', detail: `${imports.payment.done}/${imports.payment.total} done, ${imports.payment.pending} pending` },
    ...imports.shipments.map((s) => ({ category: `Shipment: ${s.month}`, detail: `${s.count} shipments` })),
  ];

  return (
    <div className="app">
      <div className="header">
        <div>
          <h1>🚨 Supply Chain Command Center</h1>
          <div className="small">Real-Time Dashboard & Analytics</div>
        </div>
        <div className="small">
          <b>Updated:</b> {format(now, 'HH:mm:ss')}
        </div>
      </div>

      <h2>🚨 CRITICAL ALERTS & SUMMARY</h2>
      <AlertList bySeverity={report.bySeverity} />

      <h2>📊 KEY PERFORMANCE METRICS</h2>
      <div className="kpis">
        <KpiCard
          label="Production Efficiency"
          value={formatPct(efficiency)}
          delta={efficiency == null ? undefined : signed(efficiency - 100, formatPct(efficiency - 100))}
          tone={efficiencyTone}
        />
        <KpiCard
          label="Production Variance"
          value={signed(kpis.totalVariance, formatInt(kpis.totalVariance))}
          tone={kpis.totalVariance < 0 ? 'bad' : 'good'}
        />
        <KpiCard
          label="Avg Capacity Util."
          value={formatPct(avgUtil)}
          delta={avgUtil == null ? undefined : signed(avgUtil - 50, formatPct(avgUtil - 50))}
          tone={utilTone}
        />
        <KpiCard label="PO Completion" value={formatPct(kpis.poCompletionPct)} />
        <KpiCard label="FG Inventory" value={`${formatInt(kpis.fgInventory)} ${FG_UNIT}`} />
      </div>

      <h2>📈 ANALYTICS DASHBOARD</h2>
      <div className="layout-grid">
        <ProductionChart records={snapshot.production} />
        <CapacityChart records={snapshot.capacity} />
      </div>

      <div className="tabs">
        {tabs.map((t) => (
          <button key={t} className={t === activeTab ? 'active' : undefined} onClick={() => setActiveTab(t)}>
            {t}
          </button>
        ))}
      </div>

      {activeTab === '📊 Production' && (
        <DataTable rows={snapshot.production} columns={productionColumns} rowKey={keyWithIndex((r: ProductionRecord) => r.date)} />
      )}

      {activeTab === '⚡ Capacity' && (
        <DataTable rows={snapshot.capacity} columns={capacityColumns} rowKey={(r) => r.department} />
      )}

      {activeTab === '📋 MRP Status' && (
        <DataTable rows={snapshot.mrp} columns={mrpColumns} rowKey={(r) => r.order} />
      )}

      {activeTab === '🚢 Imports' && (
        <DataTable
          title="Import Status"
          rows={importRows}
          columns={[
            { key: 'category', label: 'Category' },
            { key: 'detail', label: 'Status' },
          ]}
          rowKey={(r) => r.category}
        />
      )}

      {activeTab === '🏭 Warehouse' && (
        <div className="layout-grid">
          <DataTable
            title="Finished Goods Stock"
            rows={fgRows}
            columns={[
              { key: 'brand', label: 'Brand' },
              { key: 'pairs', label: 'Stock (Pairs)' },
            ]}
            rowKey={keyWithIndex((r: { brand: string }) => r.brand)}
          />
          <DataTable
            title="Procurement Summary"
            rows={poRows}
            columns={[
              { key: 'status', label: 'Status' },
              { key: 'count', label: 'Count' },
              { key: 'amount', label: 'Amount' },
            ]}
            rowKey={(r) => r.status}
          />
        </div>
      )}

      <h2>📤 EXPORT REPORTS</h2>
      <div className="header">
        <button onClick={() => runExport('Summary', () => downloadSummaryMarkdown(report.summary, new Date()))}>
          📄 Download Executive Summary
        </button>
        <button
          onClick={() => runExport('Workbook', () => downloadReportXlsx(snapshot, report.summary, new Date()))}
        >
          📊 Download Excel Report
        </button>
      </div>
      {exportError && <div className="card error">{exportError}</div>}
    </div>
  );
}
