import { z } from 'zod'
import { zoneTableSchema } from '../zones/zone-table.schema'
import type { AnalysisConfig } from './analysis-config.types'

export const analysisConfigSchema = z
  .object({
    zoneTable: zoneTableSchema,
    primarySignalOverride: z.enum(['power', 'pace']).nullable(),
    minBlockDurationS: z.number().finite().positive(),
    workThreshold: z.number().finite().positive().nullable(),
    restThreshold: z.number().finite().positive().nullable(),
    gapThresholdS: z.number().finite().positive(),
    zoneWeightCapS: z.number().finite().positive(),
    minActivityDurationS: z.number().finite().nonnegative(),
    tauAtlDays: z.number().finite().positive(),
    tauCtlDays: z.number().finite().positive(),
  })
  .refine((cfg) => (cfg.workThreshold === null) === (cfg.restThreshold === null), {
    message: 'workThreshold and restThreshold must be configured together',
    path: ['workThreshold'],
  }) satisfies z.ZodType<AnalysisConfig>
