import type { LoggedActivity } from './training-load.types'
import { appendToWeekLog, summarizeWeek, toLoggedActivity } from './training-load.week'

const day = (d: number, h = 0) => new Date(Date.UTC(2025, 4, d, h))
const logged = (completedAt: Date, stress: number): LoggedActivity => ({
  completedAt,
  stress,
  durationS: 0,
  distanceM: 0,
  hasPower: false,
})

describe('weekly summary', () => {
  describe('toLoggedActivity', () => {
    it('takes duration and power from the stress input when not given directly', () => {
      const activity = {
        completedAt: day(3),
        power: { durationS: 2400, avgPower: 230, criticalPower: 260 },
      }
      expect(toLoggedActivity(activity, 50)).toEqual({
        completedAt: day(3),
        stress: 50,
        durationS: 2400,
        distanceM: 0,
        hasPower: true,
      })
    })

    it('counts an activity without average power as unpowered', () => {
      expect(toLoggedActivity({ completedAt: day(3), stress: 40, durationS: 1200 }, 40).hasPower).toBe(false)
      expect(toLoggedActivity({ completedAt: day(3), stress: 40, avgPower: 0 }, 40).hasPower).toBe(false)
    })
  })

  it('drops log entries a week or more older than the newest', () => {
    const log = [logged(day(1), 10), logged(day(2, 6), 20)]
    expect(appendToWeekLog(log, logged(day(9), 30)).map((a) => a.stress)).toEqual([20, 30])
  })

  it('counts rest days over the seven days ending at the snapshot', () => {
    const log = [logged(day(4), 10), logged(day(6, 8), 20), logged(day(6, 20), 30)]
    const week = summarizeWeek(log, day(10))

    expect(week.totalRuns).toBe(3)
    expect(week.restDays).toBe(5)
    expect(week.totalStress).toBe(60)
    expect(week.avgStressPerRun).toBe(20)
  })

  it('excludes activities after the snapshot', () => {
    expect(summarizeWeek([logged(day(4), 10), logged(day(5), 20)], day(4)).totalRuns).toBe(1)
  })
})
