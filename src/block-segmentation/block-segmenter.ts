import type { SignalOverride } from '../config/analysis-config.types'
import { cumulativeActiveTime, spanDurationS } from '../samples/sample-timing'
import type { SampleStream } from '../samples/samples.types'
import type { Block, Phase, SegmentationResult } from './block-segmentation.types'
import { resolveThresholds } from './effort-thresholds'
import { classifyLevel, detectEffortRuns, type EffortRun } from './effort-state-machine'
import { harderIsLower, selectPrimarySignal, signalValue } from './primary-signal'

export type SegmenterOptions = {
  primarySignalOverride: SignalOverride | null
  workThreshold: number | null
  restThreshold: number | null
  minBlockDurationS: number
}

type PhasedRun = {
  phase: Phase
  startIndex: number
  endIndex: number
  lapStart: boolean
}

// a trailing easy span this much longer than a typical recovery holds a final rest plus a cooldown
const TRAILING_REST_FACTOR = 1.5

const singleWorkBlock = (sampleCount: number): Block[] => [
  { phase: 'work', startIndex: 0, endIndex: sampleCount - 1, sampleCount },
]

const median = (values: readonly number[]): number => {
  const sorted = [...values].sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2
}

const lastIndexOfHigh = (runs: readonly EffortRun[]): number => {
  for (let i = runs.length - 1; i >= 0; i--) {
    if (runs[i].state === 'high') return i
  }
  return -1
}

/** Durations of the rest spans between work runs; lap-split rests count as one span. */
function restSpanDurations(phased: readonly PhasedRun[], cumulative: readonly number[]): number[] {
  const durations: number[] = []
  let spanStart: number | null = null
  for (let i = 0; i < phased.length; i++) {
    const run = phased[i]
    if (run.phase !== 'rest') continue
    const start: number = spanStart ?? run.startIndex
    const next = phased[i + 1]
    if (next && next.phase === 'rest') {
      spanStart = start
    } else {
      durations.push(spanDurationS(cumulative, start, run.endIndex))
      spanStart = null
    }
  }
  return durations
}

/**
 * Threshold crossings cannot tell the last recovery from the cooldown (both sit below the
 * rest threshold), so the trailing easy span is split using the workout's typical rest length.
 */
function separateFinalRest(
  phased: readonly PhasedRun[],
  trailingStart: number,
  cumulative: readonly number[],
  minBlockDurationS: number,
): PhasedRun[] {
  const first = phased[trailingStart]
  const rests = restSpanDurations(phased.slice(0, trailingStart), cumulative)
  if (!first || rests.length === 0) return [...phased]

  const typicalRest = median(rests)
  const head = phased.slice(0, trailingStart)
  const tail = phased.slice(trailingStart + 1)
  const firstDuration = spanDurationS(cumulative, first.startIndex, first.endIndex)

  if (firstDuration > TRAILING_REST_FACTOR * typicalRest) {
    let split = first.startIndex
    while (split <= first.endIndex && cumulative[split] - cumulative[first.startIndex] < typicalRest) split++
    if (split > first.endIndex) return [...phased]

    const last = phased[phased.length - 1]
    const restPart = cumulative[split] - cumulative[first.startIndex]
    const cooldownPart = spanDurationS(cumulative, first.startIndex, last.endIndex) - restPart
    if (restPart < minBlockDurationS || cooldownPart < minBlockDurationS) return [...phased]

    return [
      ...head,
      { phase: 'rest', startIndex: first.startIndex, endIndex: split - 1, lapStart: first.lapStart },
      { phase: 'cooldown', startIndex: split, endIndex: first.endIndex, lapStart: false },
      ...tail,
    ]
  }

  // lap-delimited final recovery followed by further cooldown laps
  if (tail.length > 0) return [...head, { ...first, phase: 'rest' }, ...tail]
  return [...phased]
}

/**
 * Runs before the first high run are warmup, after the last one cooldown, and in between
 * high runs are work and low runs rest. Returns null when no work was ever sustained.
 */
export function labelRuns(
  runs: readonly EffortRun[],
  cumulative: readonly number[],
  minBlockDurationS: number,
): PhasedRun[] | null {
  const firstHigh = runs.findIndex((run) => run.state === 'high')
  if (firstHigh === -1) return null
  const lastHigh = lastIndexOfHigh(runs)

  const phased: PhasedRun[] = runs.map((run, i) => {
    let phase: Phase
    if (i < firstHigh) phase = 'warmup'
    else if (i > lastHigh) phase = 'cooldown'
    else phase = run.state === 'high' ? 'work' : 'rest'
    return { phase, startIndex: run.startIndex, endIndex: run.endIndex, lapStart: run.lapStart }
  })

  return separateFinalRest(phased, lastHigh + 1, cumulative, minBlockDurationS)
}

function toBlocks(phased: readonly PhasedRun[]): Block[] {
  const blocks: Block[] = []
  for (const run of phased) {
    const last = blocks[blocks.length - 1]
    if (last && last.phase === run.phase && !run.lapStart) {
      last.endIndex = run.endIndex
      last.sampleCount = last.endIndex - last.startIndex + 1
    } else {
      blocks.push({
        phase: run.phase,
        startIndex: run.startIndex,
        endIndex: run.endIndex,
        sampleCount: run.endIndex - run.startIndex + 1,
      })
    }
  }
  return blocks
}

/**
 * Partitions the stream into contiguous phase blocks covering every sample index.
 * Pure and deterministic: the same stream and options always give the same blocks.
 */
export function segmentBlocks(stream: SampleStream, opts: SegmenterOptions): SegmentationResult {
  const { samples } = stream
  const selection = selectPrimarySignal(samples, opts.primarySignalOverride)
  const thresholds = resolveThresholds(stream, selection.signal, {
    work: opts.workThreshold,
    rest: opts.restThreshold,
  })
  const base = { signal: selection.signal, thresholds, overrideIgnored: selection.overrideIgnored }

  const cumulative = cumulativeActiveTime(stream)
  const activeS = cumulative[samples.length]
  if (thresholds === null || activeS < opts.minBlockDurationS) {
    return { ...base, blocks: singleWorkBlock(samples.length) }
  }

  const lowerIsHarder = harderIsLower(selection.signal)
  const levels = samples.map((s) => classifyLevel(signalValue(s, selection.signal), thresholds, lowerIsHarder))
  const lapStarts = samples.map((s) => s.lapMarker)
  const runs = detectEffortRuns(levels, lapStarts, cumulative, { minDurationS: opts.minBlockDurationS })

  const phased = labelRuns(runs, cumulative, opts.minBlockDurationS)
  if (phased === null) return { ...base, blocks: singleWorkBlock(samples.length) }

  return { ...base, blocks: toBlocks(phased) }
}
