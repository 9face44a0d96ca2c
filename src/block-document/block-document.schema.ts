import { z } from 'zod'
import type { BlockDocument, BlockDocumentBlock } from './block-document.types'

const phaseSchema = z.enum(['warmup', 'work', 'rest', 'cooldown'])

const runningDynamicsSchema = z
  .object({
    form_power_med: z.number().nonnegative().optional(),
    lss_med: z.number().nonnegative().optional(),
    gct_med: z.number().nonnegative().optional(),
    vert_osc_med: z.number().nonnegative().optional(),
    step_length_med: z.number().nonnegative().optional(),
    air_power_pct_mean: z.number().nonnegative().optional(),
    form_power_ratio_mean: z.number().nonnegative().optional(),
  })
  .strict()

export const blockDocumentBlockSchema = z
  .object({
    phase: phaseSchema,
    start_s: z.number().nonnegative(),
    end_s: z.number().nonnegative(),
    duration_s: z.number().nonnegative(),
    sample_count: z.number().int().positive(),
    avg_power: z.number().optional(),
    min_power: z.number().optional(),
    max_power: z.number().optional(),
    avg_hr: z.number().optional(),
    min_hr: z.number().optional(),
    max_hr: z.number().optional(),
    avg_pace: z.number().optional(),
    min_pace: z.number().optional(),
    max_pace: z.number().optional(),
    avg_cadence: z.number().optional(),
    distance_m: z.number().nonnegative().optional(),
    hr_drift_pct: z.number().optional(),
    hr_delta_first_last_5s: z.number().optional(),
    running_dynamics: runningDynamicsSchema.optional(),
    zone_distribution: z.record(z.string(), z.number().min(0).max(1)),
    target: z
      .object({
        metric: z.enum(['power', 'pace']),
        lower: z.number(),
        upper: z.number(),
      })
      .optional(),
    compliance_pct: z.number().min(0).max(100).optional(),
    achieved_avg: z.number().nullable().optional(),
    pct_time_below: z.number().min(0).max(100).optional(),
    pct_time_above: z.number().min(0).max(100).optional(),
  })
  .refine((block) => (block.target === undefined) === (block.compliance_pct === undefined), {
    message: 'compliance_pct must be present exactly when target is present',
    path: ['compliance_pct'],
  })
  .refine(
    (block) => {
      const fractions = Object.values(block.zone_distribution)
      if (fractions.length === 0) return true
      return Math.abs(fractions.reduce((sum, f) => sum + f, 0) - 1) <= 1e-3
    },
    { message: 'zone_distribution fractions must sum to 1', path: ['zone_distribution'] },
  ) satisfies z.ZodType<BlockDocumentBlock>

export const blockDocumentSchema = z.object({
  activity_totals: z.object({
    duration_s: z.number().nonnegative(),
    elapsed_s: z.number().nonnegative(),
    gap_s: z.number().nonnegative(),
    distance_m: z.number().nonnegative().optional(),
    avg_power: z.number().optional(),
    avg_hr: z.number().optional(),
    running_dynamics: runningDynamicsSchema.optional(),
  }),
  primary_signal: z.enum(['power', 'pace', 'heart_rate']),
  thresholds: z
    .object({
      work: z.number(),
      rest: z.number(),
      source: z.enum(['configured', 'derived']),
    })
    .nullable(),
  gaps: z.array(z.object({ start_s: z.number(), end_s: z.number() })),
  warnings: z.array(
    z.object({
      code: z.literal('MalformedTarget'),
      block_index: z.number().int().nonnegative(),
      message: z.string(),
    }),
  ),
  blocks: z.array(blockDocumentBlockSchema).min(1),
}) satisfies z.ZodType<BlockDocument>
