import { z } from 'zod';
import { MalformedRecordError } from './errors';
import type { Snapshot } from './types';

const count = z.number().int().nonnegative();

const ProductionRecordSchema = z
  .object({
    date: z.string().min(1),
    plannedQty: count,
    actualQty: count,
    variance: z.number().int(),
    reason: z.string(),
  })
  .refine((r) => r.variance === r.actualQty - r.plannedQty, {
    message: 'variance must equal actualQty - plannedQty',
    path: ['variance'],
  });

const CapacityRecordSchema = z.object({
  department: z.string().min(1),
  capacity: z.number().int().positive(),
  plannedLoad: count,
  actualProd: count,
  utilizationPct: z.number().int(),
  mtd: count,
});

const MrpOrderSchema = z.object({
  order: z.string().min(1),
  ordered: z.boolean(),
  available: z.boolean(),
  status: z.enum(['Complete', 'Pending', 'Critical']),
});

const BucketSchema = z.object({
  count,
  amount: z.number().finite().nonnegative(),
});

const SnapshotSchema = z
  .object({
    production: z.array(ProductionRecordSchema),
    capacity: z.array(CapacityRecordSchema),
    mrp: z.array(MrpOrderSchema),
    procurement: z.object({
      issued: BucketSchema,
      received: BucketSchema,
      pending: BucketSchema,
    }),
    imports: z.object({
      preImport: z.object({ total: count, received: count, approved: count, pending: count }),
      payment: z.object({ done: count, pending: count, total: count }),
      shipments: z.array(z.object({ month: z.string().min(1), count })),
    }),
    warehouse: z.object({
      fgStock: z.object({
        brands: z.array(z.object({ brand: z.string().min(1), pairs: count })),
        total: count,
      }),
      grn: z.object({ total: count, done: count, pending: count }),
    }),
  })
  .superRefine((s, ctx) => {
    const seenDepartments = new Set<string>();
    s.capacity.forEach((c, i) => {
      if (seenDepartments.has(c.department)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate department "${c.department}"`,
          path: ['capacity', i, 'department'],
        });
      }
      seenDepartments.add(c.department);
    });

    const seenOrders = new Set<string>();
    s.mrp.forEach((o, i) => {
      if (seenOrders.has(o.order)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate order "${o.order}"`,
          path: ['mrp', i, 'order'],
        });
      }
      seenOrders.add(o.order);
    });
  });

export type SnapshotInput = z.input<typeof SnapshotSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Validates raw domain data and returns a frozen Snapshot.
 * Throws MalformedRecordError listing every problem found.
 */
export function createSnapshot(input: unknown): Snapshot {
  const parsed = SnapshotSchema.safeParse(input);
  if (!parsed.success) throw MalformedRecordError.fromZod(parsed.error);
  return deepFreeze(parsed.data);
}
