import { InternalServerErrorException } from '@nestjs/common'
import { trainingContextSchema } from './training-load.schema'
import type { TrainingContextDto, TrainingLoadSnapshot, WeeklySummary, WeeklySummaryDto } from './training-load.types'
import { WEEK_DAYS } from './training-load.week'

const round1 = (value: number): number => Number(value.toFixed(1))

const presentWeek = (week: WeeklySummary): WeeklySummaryDto => ({
  period_start: week.periodStart.toISOString(),
  period_end: week.periodEnd.toISOString(),
  days: WEEK_DAYS,
  total_runs: week.totalRuns,
  runs_with_power_data: week.runsWithPower,
  runs_without_power_data: week.runsWithoutPower,
  rest_days: week.restDays,
  total_distance_km: round1(week.totalDistanceM / 1000),
  total_duration_min: round1(week.totalDurationS / 60),
  total_stress: round1(week.totalStress),
  avg_stress_per_run: week.avgStressPerRun === null ? null : round1(week.avgStressPerRun),
})

export function presentTrainingContext(snapshot: TrainingLoadSnapshot): TrainingContextDto {
  const candidate = {
    atl: round1(snapshot.atl),
    ctl: round1(snapshot.ctl),
    rsb: round1(snapshot.rsb),
    as_of: snapshot.asOf.toISOString(),
    rsb_interpretation: snapshot.rsbInterpretation,
    week: presentWeek(snapshot.week),
  }

  const parsed = trainingContextSchema.safeParse(candidate)
  if (!parsed.success) {
    throw new InternalServerErrorException({
      message: 'Invalid training context snapshot',
      issues: parsed.error.issues,
    })
  }
  return parsed.data
}
