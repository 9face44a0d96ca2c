import { InvalidConfigurationError } from '../common/analysis.errors'
import type { SampleStream } from '../samples/samples.types'
import type { EffortThresholds, PrimarySignal } from './block-segmentation.types'
import { harderIsLower, signalValue } from './primary-signal'

// below this interquartile spread (relative to the median) the activity counts as steady
const MIN_RELATIVE_SPREAD = 0.1
const LOWER_CUT = 0.35
const UPPER_CUT = 0.65

type WeightedValue = { value: number; weight: number }

// time-weighted quantile; weight = active step leaving the sample
const weightedQuantile = (sorted: readonly WeightedValue[], total: number, q: number): number => {
  const target = total * q
  let acc = 0
  for (const x of sorted) {
    acc += x.weight
    if (acc >= target) return x.value
  }
  return sorted[sorted.length - 1].value
}

export function deriveThresholds(stream: SampleStream, signal: PrimarySignal): EffortThresholds | null {
  const values: WeightedValue[] = []
  stream.samples.forEach((sample, i) => {
    const value = signalValue(sample, signal)
    if (value !== undefined) values.push({ value, weight: stream.steps[i] })
  })
  if (values.length < 2) return null

  let total = values.reduce((sum, v) => sum + v.weight, 0)
  if (total <= 0) {
    values.forEach((v) => (v.weight = 1))
    total = values.length
  }

  const sorted = [...values].sort((a, b) => a.value - b.value)
  const q25 = weightedQuantile(sorted, total, 0.25)
  const q50 = weightedQuantile(sorted, total, 0.5)
  const q75 = weightedQuantile(sorted, total, 0.75)
  const spread = q75 - q25

  if (q50 <= 0 || spread / q50 < MIN_RELATIVE_SPREAD) return null

  // for pace the low quartile is the fast (hard) side
  return harderIsLower(signal)
    ? { work: q25 + LOWER_CUT * spread, rest: q25 + UPPER_CUT * spread, source: 'derived' }
    : { work: q25 + UPPER_CUT * spread, rest: q25 + LOWER_CUT * spread, source: 'derived' }
}

export function resolveThresholds(
  stream: SampleStream,
  signal: PrimarySignal,
  configured: { work: number | null; rest: number | null },
): EffortThresholds | null {
  const { work, rest } = configured
  if (work === null || rest === null) return deriveThresholds(stream, signal)

  const ordered = harderIsLower(signal) ? work < rest : work > rest
  if (!ordered) {
    throw new InvalidConfigurationError(
      harderIsLower(signal)
        ? `Pace work threshold (${work} s/km) must be faster than the rest threshold (${rest} s/km)`
        : `Work threshold (${work}) must be above the rest threshold (${rest})`,
    )
  }
  return { work, rest, source: 'configured' }
}
