export type TrainingLoadState = {
  atl: number
  ctl: number
  lastUpdate: Date
}

export type RsbInterpretation = 'fresh' | 'balanced' | 'fatigued'

/** What the weekly summary keeps of one finalized activity. */
export type LoggedActivity = {
  completedAt: Date
  stress: number
  durationS: number
  distanceM: number
  hasPower: boolean
}

/** Activities completed in the 7 days up to and including `periodEnd`. */
export type WeeklySummary = {
  periodStart: Date
  periodEnd: Date
  totalRuns: number
  runsWithPower: number
  runsWithoutPower: number
  restDays: number
  totalDistanceM: number
  totalDurationS: number
  totalStress: number
  avgStressPerRun: number | null
}

export type TrainingLoadSnapshot = {
  atl: number
  ctl: number
  rsb: number
  asOf: Date
  rsbInterpretation: RsbInterpretation
  week: WeeklySummary
}

export type LoadTimeConstants = {
  tauAtlDays: number
  tauCtlDays: number
}

/** Power-based stress input, turned into a Running Stress Score. */
export type PowerStressInput = {
  durationS: number
  avgPower: number
  criticalPower: number
}

/**
 * One finalized activity: a stress value, or what is needed to derive one. Duration,
 * distance and average power feed the weekly summary.
 */
export type FinalizedActivity = {
  completedAt: Date
  stress?: number
  power?: PowerStressInput
  durationS?: number
  distanceM?: number
  avgPower?: number
}

export type WeeklySummaryDto = {
  period_start: string
  period_end: string
  days: number
  total_runs: number
  runs_with_power_data: number
  runs_without_power_data: number
  rest_days: number
  total_distance_km: number
  total_duration_min: number
  total_stress: number
  avg_stress_per_run: number | null
}

/** Wire shape of a snapshot (snake_case, ISO date). */
export type TrainingContextDto = {
  atl: number
  ctl: number
  rsb: number
  as_of: string
  rsb_interpretation: RsbInterpretation
  week: WeeklySummaryDto
}
