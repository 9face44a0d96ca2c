import { z } from 'zod'
import type { TrainingContextDto, WeeklySummaryDto } from './training-load.types'

const count = z.number().int().nonnegative()

export const weeklySummarySchema = z.object({
  period_start: z.string().datetime(),
  period_end: z.string().datetime(),
  days: z.number().int().positive(),
  total_runs: count,
  runs_with_power_data: count,
  runs_without_power_data: count,
  rest_days: count,
  total_distance_km: z.number().finite().nonnegative(),
  total_duration_min: z.number().finite().nonnegative(),
  total_stress: z.number().finite().nonnegative(),
  avg_stress_per_run: z.number().finite().nonnegative().nullable(),
}) satisfies z.ZodType<WeeklySummaryDto>

export const trainingContextSchema = z.object({
  atl: z.number().finite().nonnegative(),
  ctl: z.number().finite().nonnegative(),
  rsb: z.number().finite(),
  as_of: z.string().datetime(),
  rsb_interpretation: z.enum(['fresh', 'balanced', 'fatigued']),
  week: weeklySummarySchema,
}) satisfies z.ZodType<TrainingContextDto>
