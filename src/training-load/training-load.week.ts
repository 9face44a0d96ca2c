import { MS_PER_DAY } from './training-load.math'
import type { FinalizedActivity, LoggedActivity, WeeklySummary } from './training-load.types'

export const WEEK_DAYS = 7

const WEEK_MS = WEEK_DAYS * MS_PER_DAY

export function toLoggedActivity(activity: FinalizedActivity, stress: number): LoggedActivity {
  const avgPower = activity.avgPower ?? activity.power?.avgPower
  return {
    completedAt: activity.completedAt,
    stress,
    durationS: activity.durationS ?? activity.power?.durationS ?? 0,
    distanceM: activity.distanceM ?? 0,
    hasPower: avgPower !== undefined && avgPower > 0,
  }
}

/**
 * Appends an activity to the log and drops entries no later query can reach: snapshots
 * are never taken before the newest entry, so the log only needs its trailing week.
 */
export function appendToWeekLog(log: readonly LoggedActivity[], entry: LoggedActivity): LoggedActivity[] {
  const horizon = entry.completedAt.getTime() - WEEK_MS
  return [...log.filter((a) => a.completedAt.getTime() > horizon), entry]
}

/** Window is (asOf - 7 days, asOf]; a rest day is one of those 7 days without an activity. */
export function summarizeWeek(log: readonly LoggedActivity[], asOf: Date): WeeklySummary {
  const end = asOf.getTime()
  const inWindow = log.filter((a) => {
    const t = a.completedAt.getTime()
    return t > end - WEEK_MS && t <= end
  })

  const activeDays = new Set(inWindow.map((a) => Math.floor((end - a.completedAt.getTime()) / MS_PER_DAY)))
  const runsWithPower = inWindow.filter((a) => a.hasPower).length
  const totalStress = inWindow.reduce((sum, a) => sum + a.stress, 0)

  return {
    periodStart: new Date(end - WEEK_MS),
    periodEnd: asOf,
    totalRuns: inWindow.length,
    runsWithPower,
    runsWithoutPower: inWindow.length - runsWithPower,
    restDays: WEEK_DAYS - activeDays.size,
    totalDistanceM: inWindow.reduce((sum, a) => sum + a.distanceM, 0),
    totalDurationS: inWindow.reduce((sum, a) => sum + a.durationS, 0),
    totalStress,
    avgStressPerRun: inWindow.length > 0 ? totalStress / inWindow.length : null,
  }
}
