import { z } from 'zod';

export const categoryValuesSchema = z.record(z.string());

export const axisValueSchema = z.union([z.string().min(1), z.number()]);

export const unitRecordSchema = z.object({
  unitId: z.string().min(1),
  baseValue: z.number().nonnegative(),
  categories: categoryValuesSchema.default({})
});

export const zoneMembershipSchema = z.object({
  unitId: z.string().min(1),
  zoneId: z.string().min(1),
  weight: z.number().min(0).max(1).default(1)
});

export const targetTotalSchema = z.object({
  zoneId: z.string().min(1),
  categories: categoryValuesSchema.default({}),
  axis: axisValueSchema,
  total: z.number().nonnegative()
});

export const baselineTotalSchema = z.object({
  zoneId: z.string().min(1),
  categories: categoryValuesSchema.default({}),
  total: z.number().nonnegative()
});

export const shareModeSchema = z.enum(['count', 'magnitude']);

export const validationPathSchema = z.enum(['advisory', 'authoritative']);

export const projectionSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  axisLabel: z.string().min(1),
  categoryFields: z.array(z.string().min(1)),
  totals: z.array(targetTotalSchema)
});
