import { describe, expect, it } from 'vitest';
import { sampleSnapshotInput } from './data';
import { MalformedRecordError } from './errors';
import { createSnapshot } from './snapshot';

function problemsOf(input: unknown) {
  try {
    createSnapshot(input);
  } catch (err) {
    if (err instanceof MalformedRecordError) return err.issues.map((i) => i.path);
    throw err;
  }
  return [];
}

describe('Snapshot construction', () => {
  it('freezes records so they cannot be edited after loading', () => {
    const s = createSnapshot(sampleSnapshotInput);
    expect(Object.isFrozen(s)).toBe(true);
    expect(Object.isFrozen(s.production[0])).toBe(true);
    expect(Object.isFrozen(s.warehouse.fgStock.brands)).toBe(true);
  });

  it('does not freeze the caller input', () => {
    createSnapshot(sampleSnapshotInput);
    expect(Object.isFrozen(sampleSnapshotInput.production)).toBe(false);
  });

  it('rejects a variance that disagrees with actual - planned', () => {
    const production = [{ ...sampleSnapshotInput.production[0], variance: 0 }];
    expect(problemsOf({ ...sampleSnapshotInput, production })).toEqual(['production.0.variance']);
  });

  it('rejects duplicate departments and order ids', () => {
    const capacity = [sampleSnapshotInput.capacity[0], sampleSnapshotInput.capacity[0]];
    const mrp = [sampleSnapshotInput.mrp[0], sampleSnapshotInput.mrp[0]];
    expect(problemsOf({ ...sampleSnapshotInput, capacity, mrp })).toEqual([
      'capacity.1.department',
      'mrp.1.order',
    ]);
  });

  it('rejects missing fields and non-positive capacity', () => {
    const capacity = [{ ...sampleSnapshotInput.capacity[0], capacity: 0 }];
    const input: Record<string, unknown> = { ...sampleSnapshotInput, capacity };
    delete input.procurement;
    expect(problemsOf(input)).toEqual(['capacity.0.capacity', 'procurement']);
  });

  it('reports the first problem in the error message', () => {
    const production = [{ ...sampleSnapshotInput.production[0], plannedQty: -1, variance: 937 }];
    expect(() => createSnapshot({ ...sampleSnapshotInput, production })).toThrow(
      /^Malformed snapshot record: production\.0\.plannedQty: /
    );
  });

  it('rejects a non-finite procurement amount', () => {
    const procurement = { ...sampleSnapshotInput.procurement, pending: { count: 36, amount: Infinity } };
    expect(problemsOf({ ...sampleSnapshotInput, procurement })).toEqual(['procurement.pending.amount']);
  });

  it('takes MRP status as supplied without checking the flags', () => {
    const mrp = [{ order: '900', ordered: true, available: true, status: 'Critical' as const }];
    expect(createSnapshot({ ...sampleSnapshotInput, mrp }).mrp[0].status).toBe('Critical');
  });

  it('rejects an unknown MRP status', () => {
    const mrp = [{ order: '900', ordered: true, available: true, status: 'Late' }];
    expect(problemsOf({ ...sampleSnapshotInput, mrp })).toEqual(['mrp.0.status']);
  });
});
