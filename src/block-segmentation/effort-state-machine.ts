import type { EffortThresholds } from './block-segmentation.types'

/** Where one sample sits relative to the two thresholds. */
export type EffortLevel = 'high' | 'low' | 'mid' | 'none'

export type EffortState = 'high' | 'low'

export type MachineState =
  | { kind: 'steady'; state: EffortState }
  | { kind: 'candidate'; state: EffortState; candidate: EffortState; since: number }

export type EffortRun = {
  state: EffortState
  startIndex: number
  endIndex: number
  /** true when the run was opened by a lap marker rather than a threshold crossing */
  lapStart: boolean
}

export type EffortMachineOptions = {
  minDurationS: number
}

// Transition guards

export const crossesWorkThreshold = (value: number, t: EffortThresholds, harderIsLower: boolean): boolean =>
  harderIsLower ? value <= t.work : value >= t.work

export const crossesRestThreshold = (value: number, t: EffortThresholds, harderIsLower: boolean): boolean =>
  harderIsLower ? value >= t.rest : value <= t.rest

export const persistedLongEnough = (
  cumulative: readonly number[],
  since: number,
  index: number,
  minDurationS: number,
): boolean => cumulative[index] - cumulative[since] >= minDurationS

export function classifyLevel(
  value: number | undefined,
  thresholds: EffortThresholds,
  harderIsLower: boolean,
): EffortLevel {
  if (value === undefined) return 'none'
  if (crossesWorkThreshold(value, thresholds, harderIsLower)) return 'high'
  if (crossesRestThreshold(value, thresholds, harderIsLower)) return 'low'
  return 'mid'
}

const opposite = (state: EffortState): EffortState => (state === 'high' ? 'low' : 'high')

/**
 * One step of the hysteresis machine. A sample on the opposite side opens a candidate and
 * only a sample back past the current state's threshold drops it. Dead-zone and missing
 * samples are neutral.
 */
export function nextMachineState(machine: MachineState, level: EffortLevel, index: number): MachineState {
  if (machine.kind === 'steady') {
    const target = opposite(machine.state)
    return level === target
      ? { kind: 'candidate', state: machine.state, candidate: target, since: index }
      : machine
  }
  return level === machine.state ? { kind: 'steady', state: machine.state } : machine
}

/**
 * Majority level over the window that starts at a lap marker. Ties and windows with no
 * high/low sample return null so the caller keeps its current state.
 */
export function levelAfterLap(
  levels: readonly EffortLevel[],
  cumulative: readonly number[],
  from: number,
  minDurationS: number,
): EffortState | null {
  let high = 0
  let low = 0
  for (let i = from; i < levels.length; i++) {
    if (i > from && cumulative[i] - cumulative[from] >= minDurationS) break
    if (levels[i] === 'high') high++
    else if (levels[i] === 'low') low++
  }
  if (high === low) return null
  return high > low ? 'high' : 'low'
}

/**
 * Splits the level sequence into runs of committed effort state. The machine starts low;
 * a change commits once the candidate has held for `minDurationS` of active time, and the
 * boundary is placed at the candidate's first sample. Lap markers always cut a run.
 */
export function detectEffortRuns(
  levels: readonly EffortLevel[],
  lapStarts: readonly boolean[],
  cumulative: readonly number[],
  opts: EffortMachineOptions,
): EffortRun[] {
  const runs: EffortRun[] = []
  if (levels.length === 0) return runs

  let run: EffortRun = { state: 'low', startIndex: 0, endIndex: 0, lapStart: false }
  let machine: MachineState = { kind: 'steady', state: 'low' }

  for (let i = 0; i < levels.length; i++) {
    if (i > 0 && lapStarts[i]) {
      runs.push({ ...run, endIndex: i - 1 })
      const state = levelAfterLap(levels, cumulative, i, opts.minDurationS) ?? run.state
      run = { state, startIndex: i, endIndex: i, lapStart: true }
      machine = { kind: 'steady', state }
    }

    machine = nextMachineState(machine, levels[i], i)

    if (machine.kind === 'candidate' && persistedLongEnough(cumulative, machine.since, i, opts.minDurationS)) {
      const { since, candidate } = machine
      if (since > run.startIndex) {
        runs.push({ ...run, endIndex: since - 1 })
        run = { state: candidate, startIndex: since, endIndex: since, lapStart: false }
      } else {
        run = { ...run, state: candidate }
      }
      machine = { kind: 'steady', state: candidate }
    }
  }

  runs.push({ ...run, endIndex: levels.length - 1 })
  return mergeRuns(runs)
}

/** Joins neighbours with the same state unless a lap marker separates them. */
export function mergeRuns(runs: readonly EffortRun[]): EffortRun[] {
  const merged: EffortRun[] = []
  for (const run of runs) {
    const last = merged[merged.length - 1]
    if (last && last.state === run.state && !run.lapStart) {
      merged[merged.length - 1] = { ...last, endIndex: run.endIndex }
    } else {
      merged.push({ ...run })
    }
  }
  return merged
}
