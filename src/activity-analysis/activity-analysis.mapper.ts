import { InvalidConfigurationError } from '../common/analysis.errors'
import type { AnalysisConfigOverrides } from '../config/analysis-config.types'
import type { Target, TargetPrescription } from '../target-compliance/target-compliance.types'
import { zoneTableFromHrZones } from '../zones/zone-table'
import { hrZonesProfileSchema } from '../zones/zone-table.schema'
import type { ZoneTable } from '../zones/zone-table.types'
import type { AnalysisConfigOverridesDto } from './dto/analysis-config-overrides.dto'
import type { AnalyzeActivityDto } from './dto/analyze-activity.dto'
import type { TargetsDto } from './dto/target.dto'
import type { AthleteAnalysisInput } from './activity-analysis.types'

export function toTargetPrescription(dto: TargetsDto): TargetPrescription {
  const byWorkOrdinal: Record<number, Target> = {}
  for (const { ordinal, metric, lower, upper } of dto.byWorkOrdinal ?? []) {
    byWorkOrdinal[ordinal] = { metric, lower, upper }
  }

  return {
    ...(dto.everyWorkBlock
      ? {
          everyWorkBlock: {
            metric: dto.everyWorkBlock.metric,
            lower: dto.everyWorkBlock.lower,
            upper: dto.everyWorkBlock.upper,
          },
        }
      : {}),
    ...(dto.byWorkOrdinal ? { byWorkOrdinal } : {}),
  }
}

/** An explicit zone table wins over profile zones. */
export function toConfigOverrides(dto: AnalysisConfigOverridesDto): AnalysisConfigOverrides {
  const { hrZones, zoneTable, ...rest } = dto
  let table: ZoneTable | undefined = zoneTable
  if (!table && hrZones) {
    const parsed = hrZonesProfileSchema.safeParse(hrZones)
    if (!parsed.success) {
      throw new InvalidConfigurationError('hrZones must hold five [low, high] pairs')
    }
    table = zoneTableFromHrZones(parsed.data)
  }
  return { ...rest, ...(table ? { zoneTable: table } : {}) }
}

export function toAthleteAnalysisInput(dto: AnalyzeActivityDto): AthleteAnalysisInput {
  return {
    records: dto.records,
    ...(dto.athleteId !== undefined ? { athleteId: dto.athleteId } : {}),
    ...(dto.startedAtIso !== undefined ? { startedAt: new Date(dto.startedAtIso) } : {}),
    ...(dto.targets ? { targets: toTargetPrescription(dto.targets) } : {}),
    ...(dto.config ? { config: toConfigOverrides(dto.config) } : {}),
    ...(dto.finalize
      ? {
          finalize: {
            ...(dto.finalize.stress !== undefined ? { stress: dto.finalize.stress } : {}),
            ...(dto.finalize.criticalPower !== undefined ? { criticalPower: dto.finalize.criticalPower } : {}),
          },
        }
      : {}),
  }
}
