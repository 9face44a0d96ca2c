import { InvalidInputError } from '../common/analysis.errors'
import type {
  FinalizedActivity,
  LoadTimeConstants,
  PowerStressInput,
  RsbInterpretation,
  TrainingLoadState,
} from './training-load.types'

export const MS_PER_DAY = 86_400_000

// first activity for an athlete is treated as one day after an all-zero state
export const FIRST_UPDATE_STEP_DAYS = 1

const FRESH_ABOVE = 10
const FATIGUED_AT_OR_BELOW = -10

export const elapsedDays = (from: Date, to: Date): number => (to.getTime() - from.getTime()) / MS_PER_DAY

/** e^(-dt/tau): the share of yesterday's load still present after `dtDays`. */
export const decayFactor = (dtDays: number, tauDays: number): number => Math.exp(-dtDays / tauDays)

/** Exponentially weighted step of one load term towards `stress`. */
export const advanceTerm = (current: number, stress: number, dtDays: number, tauDays: number): number => {
  const k = decayFactor(dtDays, tauDays)
  return current * k + stress * (1 - k)
}

export function advanceLoad(
  state: TrainingLoadState | undefined,
  stress: number,
  at: Date,
  tau: LoadTimeConstants,
): TrainingLoadState {
  const atl = state?.atl ?? 0
  const ctl = state?.ctl ?? 0
  const dt = state ? elapsedDays(state.lastUpdate, at) : FIRST_UPDATE_STEP_DAYS

  return {
    atl: advanceTerm(atl, stress, dt, tau.tauAtlDays),
    ctl: advanceTerm(ctl, stress, dt, tau.tauCtlDays),
    lastUpdate: at,
  }
}

/** Decay-only projection to `at`. A date before `lastUpdate` returns the state as stored. */
export function projectLoad(state: TrainingLoadState, at: Date, tau: LoadTimeConstants): { atl: number; ctl: number } {
  const dt = elapsedDays(state.lastUpdate, at)
  if (dt <= 0) return { atl: state.atl, ctl: state.ctl }
  return {
    atl: state.atl * decayFactor(dt, tau.tauAtlDays),
    ctl: state.ctl * decayFactor(dt, tau.tauCtlDays),
  }
}

export const runningStressBalance = (load: { atl: number; ctl: number }): number => load.ctl - load.atl

export function interpretRsb(rsb: number): RsbInterpretation {
  if (rsb > FRESH_ABOVE) return 'fresh'
  if (rsb > FATIGUED_AT_OR_BELOW) return 'balanced'
  return 'fatigued'
}

/** RSS = hours × (avg power / critical power)² × 100. */
export function computeRunningStressScore(input: PowerStressInput): number {
  const { durationS, avgPower, criticalPower } = input
  if (!(criticalPower > 0)) {
    throw new InvalidInputError(`Critical power must be positive, got ${criticalPower}`)
  }
  if (!(durationS >= 0) || !(avgPower >= 0)) {
    throw new InvalidInputError('Duration and average power must be non-negative')
  }
  const intensity = avgPower / criticalPower
  return (durationS / 3600) * intensity * intensity * 100
}

export function resolveTrainingStress(activity: FinalizedActivity): number {
  if (activity.stress !== undefined) {
    if (!Number.isFinite(activity.stress) || activity.stress < 0) {
      throw new InvalidInputError(`Training stress must be a non-negative number, got ${activity.stress}`)
    }
    return activity.stress
  }
  if (activity.power) return computeRunningStressScore(activity.power)
  throw new InvalidInputError('A finalized activity needs a stress value or power with critical power')
}
