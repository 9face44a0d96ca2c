import { Inject, Injectable, Logger } from '@nestjs/common'
import { InvalidInputError, OutOfOrderUpdateError } from '../common/analysis.errors'
import type { Clock } from '../common/clock'
import { CLOCK } from '../common/clock'
import { KeyedMutex } from '../common/keyed-mutex'
import { ANALYSIS_CONFIG } from '../config/analysis-config'
import type { AnalysisConfig } from '../config/analysis-config.types'
import {
  advanceLoad,
  interpretRsb,
  projectLoad,
  resolveTrainingStress,
  runningStressBalance,
} from './training-load.math'
import type {
  FinalizedActivity,
  LoadTimeConstants,
  LoggedActivity,
  TrainingLoadSnapshot,
  TrainingLoadState,
} from './training-load.types'
import { appendToWeekLog, summarizeWeek, toLoggedActivity } from './training-load.week'

export type FinalizeResult = {
  stress: number
  snapshot: TrainingLoadSnapshot
}

export type SeedInput = {
  atl: number
  ctl: number
  asOf?: Date
}

const ZERO_LOAD = { atl: 0, ctl: 0 }

const toSnapshot = (
  load: { atl: number; ctl: number },
  asOf: Date,
  weekLog: readonly LoggedActivity[],
): TrainingLoadSnapshot => {
  const rsb = runningStressBalance(load)
  return {
    atl: load.atl,
    ctl: load.ctl,
    rsb,
    asOf,
    rsbInterpretation: interpretRsb(rsb),
    week: summarizeWeek(weekLog, asOf),
  }
}

/**
 * Per-athlete ATL/CTL store. Reads never mutate; writes for one athlete are serialized
 * and a write dated before the athlete's last update is rejected, never reordered.
 */
@Injectable()
export class TrainingLoadService {
  private readonly logger = new Logger(TrainingLoadService.name)

  /** Map key: athlete id */
  private readonly stateByAthlete = new Map<string, TrainingLoadState>()

  /** Map key: athlete id; activities of the trailing week */
  private readonly weekLogByAthlete = new Map<string, LoggedActivity[]>()

  private readonly writes = new KeyedMutex()

  private readonly tau: LoadTimeConstants

  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(ANALYSIS_CONFIG) config: AnalysisConfig,
  ) {
    this.tau = { tauAtlDays: config.tauAtlDays, tauCtlDays: config.tauCtlDays }
  }

  getSnapshot(athleteId: string, asOf?: Date): TrainingLoadSnapshot {
    const at = asOf ?? this.clock.now()
    const state = this.stateByAthlete.get(athleteId)
    const weekLog = this.weekLog(athleteId)
    if (!state) return toSnapshot(ZERO_LOAD, at, weekLog)
    if (at.getTime() < state.lastUpdate.getTime()) return toSnapshot(state, state.lastUpdate, weekLog)
    return toSnapshot(projectLoad(state, at, this.tau), at, weekLog)
  }

  private weekLog(athleteId: string): readonly LoggedActivity[] {
    return this.weekLogByAthlete.get(athleteId) ?? []
  }

  async finalizeActivity(athleteId: string, activity: FinalizedActivity): Promise<FinalizeResult> {
    const stress = resolveTrainingStress(activity)

    return this.writes.runExclusive(athleteId, () => {
      const current = this.stateByAthlete.get(athleteId)
      if (current && activity.completedAt.getTime() < current.lastUpdate.getTime()) {
        this.logger.warn(
          `Rejected out-of-order load update for ${athleteId}: ` +
            `${activity.completedAt.toISOString()} < ${current.lastUpdate.toISOString()}`,
        )
        throw new OutOfOrderUpdateError(athleteId, activity.completedAt, current.lastUpdate)
      }

      const next = advanceLoad(current, stress, activity.completedAt, this.tau)
      const weekLog = appendToWeekLog(this.weekLog(athleteId), toLoggedActivity(activity, stress))
      this.stateByAthlete.set(athleteId, next)
      this.weekLogByAthlete.set(athleteId, weekLog)
      this.logger.log(
        `Load updated for ${athleteId}: stress=${stress.toFixed(1)} atl=${next.atl.toFixed(1)} ctl=${next.ctl.toFixed(1)}`,
      )
      return { stress, snapshot: toSnapshot(next, next.lastUpdate, weekLog) }
    })
  }

  /**
   * Replaces the athlete's state with a known one (e.g. imported from another system).
   * The weekly log starts over: the seeded state carries no per-activity detail.
   */
  async seedState(athleteId: string, seed: SeedInput): Promise<TrainingLoadSnapshot> {
    if (![seed.atl, seed.ctl].every((v) => Number.isFinite(v) && v >= 0)) {
      throw new InvalidInputError('Seeded atl and ctl must be non-negative numbers')
    }
    const asOf = seed.asOf ?? this.clock.now()

    return this.writes.runExclusive(athleteId, () => {
      const state: TrainingLoadState = { atl: seed.atl, ctl: seed.ctl, lastUpdate: asOf }
      this.stateByAthlete.set(athleteId, state)
      this.weekLogByAthlete.delete(athleteId)
      this.logger.log(`Load seeded for ${athleteId} as of ${asOf.toISOString()}`)
      return toSnapshot(state, asOf, [])
    })
  }

  /**
   * Rebuilds the athlete's state from scratch out of a complete history. Activities are
   * applied in completion order; the store only sees the final result.
   */
  async replayHistory(athleteId: string, activities: readonly FinalizedActivity[]): Promise<TrainingLoadSnapshot> {
    const ordered = activities
      .map((activity) => toLoggedActivity(activity, resolveTrainingStress(activity)))
      .sort((a, b) => a.completedAt.getTime() - b.completedAt.getTime())

    return this.writes.runExclusive(athleteId, () => {
      let state: TrainingLoadState | undefined
      let weekLog: LoggedActivity[] = []
      for (const entry of ordered) {
        state = advanceLoad(state, entry.stress, entry.completedAt, this.tau)
        weekLog = appendToWeekLog(weekLog, entry)
      }

      if (!state) {
        this.stateByAthlete.delete(athleteId)
        this.weekLogByAthlete.delete(athleteId)
        this.logger.log(`Load cleared for ${athleteId}: empty history`)
        return toSnapshot(ZERO_LOAD, this.clock.now(), [])
      }

      this.stateByAthlete.set(athleteId, state)
      this.weekLogByAthlete.set(athleteId, weekLog)
      this.logger.log(`Load replayed for ${athleteId} from ${ordered.length} activities`)
      return toSnapshot(state, state.lastUpdate, weekLog)
    })
  }
}
