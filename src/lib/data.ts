import { createSnapshot, type SnapshotInput } from './snapshot';
import type { Snapshot } from './types';

export const sampleSnapshotInput: SnapshotInput = {
  production: [
    { date: '10-Jun-2025', plannedQty: 800, actualQty: 936, variance: 136, reason: '2 Lines loading' },
    { date: '11-Jun-2025', plannedQty: 800, actualQty: 1180, variance: 380, reason: '2 Lines loading/material issue' },
    { date: '12-Jun-2025', plannedQty: 800, actualQty: 650, variance: -150, reason: 'Loading end/feeding issue' },
    { date: '13-Jun-2025', plannedQty: 2000, actualQty: 0, variance: -2000, reason: 'FEEDING ISSUE FROM CUTTING' },
    { date: '14-Jun-2025', plannedQty: 2000, actualQty: 0, variance: -2000, reason: 'FEEDING ISSUE FROM CUTTING' },
    { date: '16-Jun-2025', plannedQty: 2000, actualQty: 393, variance: -1607, reason: 'FEEDING ISSUE FROM CUTTING' },
  ],

  capacity: [
    { department: 'Cutting', capacity: 3000, plannedLoad: 1823, actualProd: 1800, utilizationPct: 60, mtd: 8763 },
    { department: 'Stitching', capacity: 2788, plannedLoad: 0, actualProd: 393, utilizationPct: 14, mtd: 7974 },
    { department: 'Lasting', capacity: 3462, plannedLoad: 0, actualProd: 0, utilizationPct: 0, mtd: 12100 },
  ],

  mrp: [
    { order: '673', ordered: true, available: true, status: 'Complete' },
    { order: '675', ordered: true, available: true, status: 'Complete' },
    { order: '677', ordered: true, available: true, status: 'Complete' },
    { order: '679', ordered: false, available: false, status: 'Critical' },
    { order: '680', ordered: true, available: false, status: 'Pending' },
    { order: '681', ordered: false, available: false, status: 'Critical' },
  ],

  // amounts in millions
  procurement: {
    issued: { count: 92, amount: 114.77 },
    received: { count: 56, amount: 96.84 },
    pending: { count: 36, amount: 17.93 },
  },

  imports: {
    preImport: { total: 12, received: 12, approved: 12, pending: 0 },
    payment: { done: 3, pending: 4, total: 7 },
    shipments: [
      { month: 'May', count: 1 },
      { month: 'June', count: 8 },
      { month: 'July', count: 1 },
    ],
  },

  warehouse: {
    fgStock: {
      brands: [
        { brand: 'Elten', pairs: 1090 },
        { brand: 'Bata', pairs: 0 },
        { brand: 'S-Step', pairs: 1500 },
      ],
      total: 2590,
    },
    grn: { total: 4, done: 4, pending: 0 },
  },
};

export function loadSampleSnapshot(): Snapshot {
  return createSnapshot(sampleSnapshotInput);
}
