import type { FinalizeActivityDto } from './dto/finalize-activity.dto'
import type { FinalizedActivity } from './training-load.types'

/** Request body → domain input. Power fields only count when all three are given. */
export function toFinalizedActivity(dto: FinalizeActivityDto): FinalizedActivity {
  const { durationS, avgPower, criticalPower } = dto
  return {
    completedAt: new Date(dto.completedAtIso),
    ...(dto.stress !== undefined ? { stress: dto.stress } : {}),
    ...(durationS !== undefined ? { durationS } : {}),
    ...(dto.distanceM !== undefined ? { distanceM: dto.distanceM } : {}),
    ...(avgPower !== undefined ? { avgPower } : {}),
    ...(durationS !== undefined && avgPower !== undefined && criticalPower !== undefined
      ? { power: { durationS, avgPower, criticalPower } }
      : {}),
  }
}
