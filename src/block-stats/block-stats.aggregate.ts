import type { Block } from '../block-segmentation/block-segmentation.types'
import { sampleTimeWeight } from '../samples/sample-timing'
import type { DynamicsMetric, Sample, SampleMetric, SampleStream } from '../samples/samples.types'
import { zoneFor } from '../zones/zone-table'
import type { ZoneTable } from '../zones/zone-table.types'
import type { BlockStats, MetricSummary, RunningDynamics } from './block-stats.types'

export type AggregateOptions = {
  zoneTable: ZoneTable
  zoneWeightCapS: number
}

const blockSamples = (stream: SampleStream, block: Block): readonly Sample[] =>
  stream.samples.slice(block.startIndex, block.endIndex + 1)

export const summarizeMetric = (samples: readonly Sample[], metric: SampleMetric): MetricSummary | undefined => {
  let count = 0
  let sum = 0
  let min = Infinity
  let max = -Infinity
  for (const sample of samples) {
    const value = sample[metric]
    if (value === undefined) continue
    count++
    sum += value
    if (value < min) min = value
    if (value > max) max = value
  }
  return count > 0 ? { min, avg: sum / count, max } : undefined
}

export const distanceCovered = (samples: readonly Sample[]): number | undefined => {
  let count = 0
  let min = Infinity
  let max = -Infinity
  for (const { distance } of samples) {
    if (distance === undefined) continue
    count++
    if (distance < min) min = distance
    if (distance > max) max = distance
  }
  return count > 1 ? max - min : undefined
}

const valuesOf = (samples: readonly Sample[], metric: DynamicsMetric): number[] => {
  const values: number[] = []
  for (const sample of samples) {
    const value = sample[metric]
    if (value !== undefined) values.push(value)
  }
  return values
}

const medianOf = (values: number[]): number | undefined => {
  if (values.length === 0) return undefined
  const sorted = values.sort((a, b) => a - b)
  const mid = Math.floor(sorted.length / 2)
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2
}

const meanOf = (values: number[]): number | undefined =>
  values.length > 0 ? values.reduce((sum, v) => sum + v, 0) / values.length : undefined

const DYNAMICS_MEDIANS = [
  ['formPower', 'formPowerMed'],
  ['legSpringStiffness', 'legSpringStiffnessMed'],
  ['groundContactTime', 'groundContactTimeMed'],
  ['verticalOscillation', 'verticalOscillationMed'],
  ['stepLength', 'stepLengthMed'],
] as const satisfies ReadonlyArray<readonly [DynamicsMetric, keyof RunningDynamics]>

const DYNAMICS_MEANS = [
  ['airPowerPct', 'airPowerPctMean'],
  ['formPowerRatio', 'formPowerRatioMean'],
] as const satisfies ReadonlyArray<readonly [DynamicsMetric, keyof RunningDynamics]>

/** Running dynamics over the samples that report them; undefined when none does. */
export function summarizeRunningDynamics(samples: readonly Sample[]): RunningDynamics | undefined {
  const dynamics: RunningDynamics = {}
  for (const [metric, field] of DYNAMICS_MEDIANS) {
    const value = medianOf(valuesOf(samples, metric))
    if (value !== undefined) dynamics[field] = value
  }
  for (const [metric, field] of DYNAMICS_MEANS) {
    const value = meanOf(valuesOf(samples, metric))
    if (value !== undefined) dynamics[field] = value
  }
  return Object.keys(dynamics).length > 0 ? dynamics : undefined
}

type HrPoint = { t: number; hr: number }

const hrPoints = (samples: readonly Sample[]): HrPoint[] =>
  samples.flatMap((s) => (s.heartRate !== undefined ? [{ t: s.timestamp, hr: s.heartRate }] : []))

const mean = (values: readonly number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length

/**
 * Aerobic decoupling: mean HR of the second half over the first half, in percent.
 * Needs 8 minutes of HR and at least 10 readings per half.
 */
export function hrDriftPct(samples: readonly Sample[]): number | undefined {
  const points = hrPoints(samples)
  if (points.length < 20) return undefined

  const t0 = points[0].t
  const total = points[points.length - 1].t - t0
  if (total < 480) return undefined

  const midpoint = total / 2
  const first = points.filter((p) => p.t - t0 <= midpoint).map((p) => p.hr)
  const second = points.filter((p) => p.t - t0 > midpoint).map((p) => p.hr)
  if (first.length < 10 || second.length < 10) return undefined

  const hr1 = mean(first)
  return hr1 > 0 ? (mean(second) / hr1 - 1) * 100 : undefined
}

/** Mean HR over the last 5 s minus the first 5 s; blocks shorter than 30 s are skipped. */
export function hrDeltaFirstLast5s(samples: readonly Sample[]): number | undefined {
  const points = hrPoints(samples)
  if (points.length < 4) return undefined

  const t0 = points[0].t
  const total = points[points.length - 1].t - t0
  if (total < 30) return undefined

  const head = points.filter((p) => p.t - t0 <= 5).map((p) => p.hr)
  const tail = points.filter((p) => p.t - t0 >= total - 5).map((p) => p.hr)
  return mean(tail) - mean(head)
}

export function zoneDistribution(
  stream: SampleStream,
  block: Block,
  opts: AggregateOptions,
): Record<string, number> {
  const metric: SampleMetric = opts.zoneTable.metric === 'power' ? 'power' : 'heartRate'
  const seconds = new Map<string, number>(opts.zoneTable.zones.map((zone) => [zone.name, 0]))
  let total = 0

  for (let i = block.startIndex; i <= block.endIndex; i++) {
    const value = stream.samples[i][metric]
    if (value === undefined) continue
    const weight = sampleTimeWeight(stream, i, opts.zoneWeightCapS)
    if (weight <= 0) continue
    const zone = zoneFor(opts.zoneTable, value)
    seconds.set(zone, (seconds.get(zone) ?? 0) + weight)
    total += weight
  }

  if (total === 0) return {}

  const distribution: Record<string, number> = {}
  for (const [zone, sec] of seconds) {
    distribution[zone] = sec / total
  }
  return distribution
}

export function aggregateBlockStats(stream: SampleStream, block: Block, opts: AggregateOptions): BlockStats {
  const samples = blockSamples(stream, block)
  let durationS = 0
  for (let i = block.startIndex; i <= block.endIndex; i++) durationS += stream.steps[i]

  const startOffsetS = stream.samples[block.startIndex].timestamp
  const endOffsetS = stream.samples[block.endIndex].timestamp + stream.steps[block.endIndex]

  const power = summarizeMetric(samples, 'power')
  const heartRate = summarizeMetric(samples, 'heartRate')
  const pace = summarizeMetric(samples, 'pace')
  const cadence = summarizeMetric(samples, 'cadence')
  const distanceM = distanceCovered(samples)
  const drift = hrDriftPct(samples)
  const delta = hrDeltaFirstLast5s(samples)
  const runningDynamics = summarizeRunningDynamics(samples)

  return {
    durationS,
    startOffsetS,
    endOffsetS,
    ...(power ? { power } : {}),
    ...(heartRate ? { heartRate } : {}),
    ...(pace ? { pace } : {}),
    ...(cadence ? { cadence } : {}),
    ...(distanceM !== undefined ? { distanceM } : {}),
    ...(drift !== undefined ? { hrDriftPct: drift } : {}),
    ...(delta !== undefined ? { hrDeltaFirstLast5s: delta } : {}),
    ...(runningDynamics ? { runningDynamics } : {}),
    zoneDistribution: zoneDistribution(stream, block, opts),
  }
}
