import * as XLSX from 'xlsx';
import { describe, expect, it } from 'vitest';

import { classifyIssues } from './calc';
import { loadSampleSnapshot, sampleSnapshotInput } from './data';
import { MalformedRecordError } from './errors';
import {
  buildDashboardReport,
  buildReportWorkbook,
  readReportWorkbook,
  renderSummaryReport,
  writeReportWorkbook,
} from './report';
import { createSnapshot } from './snapshot';

// local time, so the rendered date does not depend on the machine's zone
const NOW = new Date(2025, 5, 16, 9, 5);

describe('Executive summary', () => {
  it('renders the sample snapshot', () => {
    const s = loadSampleSnapshot();
    const text = renderSummaryReport(s, classifyIssues(s), NOW);

    expect(text.split('\n')).toEqual([
      '# 📊 SUPPLY CHAIN EXECUTIVE SUMMARY',
      '**Report Date:** 16-Jun-2025 09:05',
      '',
      '## 🚨 CRITICAL ALERTS (4)',
      '- 🚨 CRITICAL: Production shortfall of 5,241 units',
      '- 🔥 CRITICAL: 3 days of feeding issues from cutting',
      '- ⚠️ CRITICAL: Stitching capacity at 14%',
      '- ⚠️ CRITICAL: Lasting capacity at 0%',
      '',
      '## ⚠️ HIGH PRIORITY (1)',
      '- 📋 HIGH: 2 orders with material unavailability',
      '',
      '## 📋 KEY METRICS',
      '- **Production Efficiency:** 37.6%',
      '- **Total Production Variance:** -5,241 units',
      '- **Average Capacity Utilization:** 24.7%',
      '- **PO Completion Rate:** 60.9%',
      '- **Total FG Inventory:** 2,590 pairs',
      '',
      '## 🔄 RECOMMENDATIONS',
      '1. **URGENT:** Address feeding issues from cutting department',
      '2. **HIGH:** Increase stitching and lasting capacity utilization',
      '3. **MEDIUM:** Expedite pending material orders (679, 681)',
      '4. **MEDIUM:** Follow up on 36 pending POs worth pkr17.93M',
    ]);
  });

  it('shows N/A for metrics without a denominator', () => {
    const s = createSnapshot({
      ...sampleSnapshotInput,
      production: [],
      capacity: [],
      mrp: [],
      procurement: {
        issued: { count: 0, amount: 0 },
        received: { count: 0, amount: 0 },
        pending: { count: 0, amount: 0 },
      },
    });
    const lines = renderSummaryReport(s, classifyIssues(s), NOW).split('\n');

    expect(lines).toContain('## 🚨 CRITICAL ALERTS (0)');
    expect(lines).toContain('- **Production Efficiency:** N/A');
    expect(lines).toContain('- **Total Production Variance:** 0 units');
    expect(lines).toContain('- **Average Capacity Utilization:** N/A');
    expect(lines).toContain('- **PO Completion Rate:** N/A');
    expect(lines).toContain('3. **MEDIUM:** Expedite pending material orders (679, 681)');
  });

  it('bundles issues, KPIs and summary for the dashboard', () => {
    const s = loadSampleSnapshot();
    const report = buildDashboardReport(s, NOW);

    expect(report.issues).toHaveLength(6);
    expect(report.bySeverity.medium).toEqual(['📦 MEDIUM: 39.1% of POs pending']);
    expect(report.kpis.fgInventory).toBe(2590);
    expect(report.summary).toBe(renderSummaryReport(s, report.issues, NOW));
  });
});

describe('Workbook export', () => {
  const sheetRows = (wb: XLSX.WorkBook, name: string) =>
    XLSX.utils.sheet_to_json<unknown[]>(wb.Sheets[name], { header: 1, defval: '' });

  it('lays out one sheet per domain after the summary', () => {
    const wb = buildReportWorkbook(loadSampleSnapshot(), 'summary');
    expect(wb.SheetNames).toEqual([
      'Executive Summary',
      'Production',
      'Capacity',
      'MRP',
      'Procurement',
      'Imports',
      'Warehouse',
    ]);
  });

  it('writes headers in field order and flags as Yes/No', () => {
    const wb = buildReportWorkbook(loadSampleSnapshot(), 'summary');

    expect(sheetRows(wb, 'Production')[0]).toEqual(['Date', 'Planned_Qty', 'Actual_Qty', 'Variance', 'Reason']);
    expect(sheetRows(wb, 'Capacity')[0]).toEqual([
      'Department',
      'Capacity',
      'Planned_Load',
      'Actual_Prod',
      'Utilization',
      'MTD',
    ]);
    expect(sheetRows(wb, 'MRP')[4]).toEqual(['679', 'No', 'No', 'Critical']);
    expect(sheetRows(wb, 'Procurement')[3]).toEqual(['PO Pending', 36, 17.93]);
    expect(sheetRows(wb, 'Warehouse')).toEqual([
      ['Section', 'Item', 'Quantity'],
      ['FG Stock', 'Elten', 1090],
      ['FG Stock', 'Bata', 0],
      ['FG Stock', 'S-Step', 1500],
      ['FG Total', 'Total', 2590],
      ['GRN', 'Total', 4],
      ['GRN', 'Done', 4],
      ['GRN', 'Pending', 0],
    ]);
  });

  it('reads back every record unchanged', () => {
    const s = loadSampleSnapshot();
    const { summary } = buildDashboardReport(s, NOW);

    const back = readReportWorkbook(writeReportWorkbook(buildReportWorkbook(s, summary)));

    expect(back.snapshot).toEqual(s);
    expect(back.summary).toBe(summary);
  });

  it('keeps an empty reason as an empty string', () => {
    const s = createSnapshot({
      ...sampleSnapshotInput,
      production: [{ date: '17-Jun-2025', plannedQty: 500, actualQty: 500, variance: 0, reason: '' }],
    });

    const back = readReportWorkbook(writeReportWorkbook(buildReportWorkbook(s, 'x')));
    expect(back.snapshot.production).toEqual([
      { date: '17-Jun-2025', plannedQty: 500, actualQty: 500, variance: 0, reason: '' },
    ]);
  });

  it('re-validates records when reading', () => {
    const wb = buildReportWorkbook(loadSampleSnapshot(), 'summary');
    wb.Sheets['Production']['D2'] = { t: 'n', v: 999 };

    expect(() => readReportWorkbook(writeReportWorkbook(wb))).toThrow(MalformedRecordError);
  });

  it('rejects a workbook with a missing sheet', () => {
    const wb = buildReportWorkbook(loadSampleSnapshot(), 'summary');
    wb.SheetNames = wb.SheetNames.filter((n) => n !== 'MRP');
    delete wb.Sheets['MRP'];

    expect(() => readReportWorkbook(writeReportWorkbook(wb))).toThrow('Malformed snapshot record: MRP: sheet is missing');
  });

  it('rejects renamed columns', () => {
    const wb = buildReportWorkbook(loadSampleSnapshot(), 'summary');
    wb.Sheets['Capacity']['E1'] = { t: 's', v: 'Util' };

    expect(() => readReportWorkbook(writeReportWorkbook(wb))).toThrow(/expected headers/);
  });
});
