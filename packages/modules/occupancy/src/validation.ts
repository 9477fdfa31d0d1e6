import { z } from 'zod';
import { isoDateSchema, monthSchema } from '@hourwise/shared';

// ── Group configuration file ───────────────────────────────────────

export const groupConfigSchema = z.object({
  branches: z.array(
    z.object({
      branch_id: z.coerce.number().int().positive(),
      display_name: z.string().trim().optional(),
      groups: z
        .array(
          z.object({
            group_id: z.string().trim().min(1),
            name: z.string().trim().min(1),
            staff_names: z.array(z.string()).default([]),
            staff_ids: z.array(z.coerce.number().int()).default([]),
          }),
        )
        .default([]),
    }),
  ),
});

export type GroupConfig = z.output<typeof groupConfigSchema>;
export type GroupConfigInput = z.input<typeof groupConfigSchema>;

// ── Upstream payloads ──────────────────────────────────────────────

const countSchema = z.coerce.number().int().nonnegative();

export const recordsPageSchema = z
  .object({
    success: z.boolean().optional(),
    data: z.array(z.unknown()).nullish(),
    // `meta` comes back as [] on empty pages.
    meta: z.union([z.object({ total_count: countSchema.optional() }).passthrough(), z.array(z.unknown())]).nullish(),
  })
  .passthrough();

export const listResponseSchema = z
  .object({
    success: z.boolean().optional(),
    data: z.array(z.unknown()).nullish(),
  })
  .passthrough();

export const staffMemberSchema = z
  .object({
    id: z.coerce.number().int(),
    name: z.string().nullish(),
  })
  .passthrough();

export const companySchema = z
  .object({
    id: z.coerce.number().int(),
    title: z.string().nullish(),
  })
  .passthrough();

// ── Query inputs ───────────────────────────────────────────────────

const hourSchema = z.number().int().min(0).max(23);

export const heatmapPeriodSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('week'), weekStart: isoDateSchema }),
  z.object({ kind: z.literal('month'), month: monthSchema }),
]);

export const heatmapInputSchema = z.object({
  branchId: z.number().int().positive(),
  period: heatmapPeriodSchema,
  hours: z.array(hourSchema).min(1).optional(),
});

export const loadSummaryInputSchema = z.object({
  branchId: z.number().int().positive(),
  groupId: z.string().min(1),
  month: monthSchema,
});

export const dailyLoadInputSchema = z
  .object({
    branchId: z.number().int().positive(),
    groupIds: z.array(z.string().min(1)),
    from: isoDateSchema,
    to: isoDateSchema,
  })
  .refine((v) => v.from <= v.to, { message: 'from must not be after to', path: ['from'] });

export const dateWindowSchema = z
  .object({ from: isoDateSchema, to: isoDateSchema })
  .refine((v) => v.from <= v.to, { message: 'from must not be after to', path: ['from'] });
