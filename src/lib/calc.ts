import { FEEDING_ISSUE_MARKER, THRESHOLDS } from './config';
import { formatInt } from './format';
import type { Issue, Kpis, Severity, Snapshot } from './types';

/** null stands for "not applicable" when the denominator is zero */
const safeDivide = (n: number, d: number): number | null => (d !== 0 ? n / d : null);

const sum = (xs: readonly number[]) => xs.reduce((acc, x) => acc + x, 0);

export function totalVariance(s: Snapshot): number {
  return sum(s.production.map((p) => p.variance));
}

export function countFeedingIssues(s: Snapshot): number {
  return s.production.filter((p) => p.reason.includes(FEEDING_ISSUE_MARKER)).length;
}

export function criticalOrders(s: Snapshot): string[] {
  return s.mrp.filter((o) => o.status === 'Critical').map((o) => o.order);
}

export function poPendingRatio(s: Snapshot): number | null {
  return safeDivide(s.procurement.pending.count, s.procurement.issued.count);
}

/**
 * Evaluates the alert rules in a fixed order:
 * production -> capacity -> MRP -> procurement.
 */
export function classifyIssues(s: Snapshot): Issue[] {
  const issues: Issue[] = [];

  const variance = totalVariance(s);
  if (variance < THRESHOLDS.productionShortfallUnits) {
    issues.push({
      severity: 'critical',
      rule: 'production-shortfall',
      message: `🚨 CRITICAL: Production shortfall of ${formatInt(Math.abs(variance))} units`,
    });
  }

  const feedingDays = countFeedingIssues(s);
  if (feedingDays >= THRESHOLDS.feedingIssueDays) {
    issues.push({
      severity: 'critical',
      rule: 'feeding-issues',
      message: `🔥 CRITICAL: ${feedingDays} days of feeding issues from cutting`,
    });
  }

  for (const c of s.capacity) {
    if (c.utilizationPct < THRESHOLDS.capacityCriticalPct) {
      issues.push({
        severity: 'critical',
        rule: 'capacity-critical',
        message: `⚠️ CRITICAL: ${c.department} capacity at ${c.utilizationPct}%`,
      });
    } else if (c.utilizationPct < THRESHOLDS.capacityLowPct) {
      issues.push({
        severity: 'high',
        rule: 'capacity-low',
        message: `🔶 HIGH: ${c.department} underutilized at ${c.utilizationPct}%`,
      });
    }
  }

  const critical = criticalOrders(s).length;
  if (critical > 0) {
    issues.push({
      severity: 'high',
      rule: 'mrp-unavailable',
      message: `📋 HIGH: ${critical} orders with material unavailability`,
    });
  }

  // skipped when no POs were issued
  const pending = poPendingRatio(s);
  if (pending != null && pending > THRESHOLDS.poPendingRatio) {
    issues.push({
      severity: 'medium',
      rule: 'po-pending',
      message: `📦 MEDIUM: ${(pending * 100).toFixed(1)}% of POs pending`,
    });
  }

  return issues;
}

export function issueMessages(issues: readonly Issue[], severity: Severity): string[] {
  return issues.filter((i) => i.severity === severity).map((i) => i.message);
}

export function partitionIssues(issues: readonly Issue[]): Record<Severity, string[]> {
  return {
    critical: issueMessages(issues, 'critical'),
    high: issueMessages(issues, 'high'),
    medium: issueMessages(issues, 'medium'),
  };
}

export function computeKpis(s: Snapshot): Kpis {
  const planned = sum(s.production.map((p) => p.plannedQty));
  const actual = sum(s.production.map((p) => p.actualQty));
  const efficiency = safeDivide(actual, planned);

  const avgUtil = safeDivide(sum(s.capacity.map((c) => c.utilizationPct)), s.capacity.length);

  const completion = safeDivide(s.procurement.received.count, s.procurement.issued.count);

  return {
    productionEfficiencyPct: efficiency == null ? null : efficiency * 100,
    totalVariance: totalVariance(s),
    avgUtilizationPct: avgUtil,
    poCompletionPct: completion == null ? null : completion * 100,
    fgInventory: s.warehouse.fgStock.total,
  };
}

export const SEVERITY_ORDER: readonly Severity[] = ['critical', 'high', 'medium'];

/** Flattens partitioned messages so every critical alert precedes every high one, and so on. */
export function alertsInSeverityOrder(
  bySeverity: Record<Severity, string[]>
): { severity: Severity; message: string }[] {
  return SEVERITY_ORDER.flatMap((severity) => bySeverity[severity].map((message) => ({ severity, message })));
}
