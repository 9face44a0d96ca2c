import type { SegmentationResult } from '../block-segmentation/block-segmentation.types'
import { distanceCovered, summarizeMetric, summarizeRunningDynamics } from '../block-stats/block-stats.aggregate'
import type { MetricSummary, RunningDynamics } from '../block-stats/block-stats.types'
import { activeDurationS, elapsedDurationS } from '../samples/sample-timing'
import type { SampleStream } from '../samples/samples.types'
import type {
  ActivityTotals,
  AnalyzedBlock,
  BlockDocument,
  BlockDocumentBlock,
  DocumentWarning,
  RunningDynamicsFields,
} from './block-document.types'

export const round = (value: number, digits: number): number => Number(value.toFixed(digits))

const SECONDS_DIGITS = 3
const METRIC_DIGITS = 1
const FRACTION_DIGITS = 4

const metricFields = <K extends string>(
  summary: MetricSummary | undefined,
  keys: { min?: K; avg?: K; max?: K },
): Partial<Record<K, number>> => {
  const out: Partial<Record<K, number>> = {}
  if (!summary) return out
  if (keys.min) out[keys.min] = round(summary.min, METRIC_DIGITS)
  if (keys.avg) out[keys.avg] = round(summary.avg, METRIC_DIGITS)
  if (keys.max) out[keys.max] = round(summary.max, METRIC_DIGITS)
  return out
}

const roundedField = <K extends string>(
  key: K,
  value: number | undefined,
  digits: number,
): Partial<Record<K, number>> => {
  const out: Partial<Record<K, number>> = {}
  if (value !== undefined) out[key] = round(value, digits)
  return out
}

function toRunningDynamicsFields(dynamics: RunningDynamics): RunningDynamicsFields {
  return {
    ...roundedField('form_power_med', dynamics.formPowerMed, METRIC_DIGITS),
    ...roundedField('lss_med', dynamics.legSpringStiffnessMed, METRIC_DIGITS),
    ...roundedField('gct_med', dynamics.groundContactTimeMed, METRIC_DIGITS),
    ...roundedField('vert_osc_med', dynamics.verticalOscillationMed, METRIC_DIGITS),
    ...roundedField('step_length_med', dynamics.stepLengthMed, 3),
    ...roundedField('air_power_pct_mean', dynamics.airPowerPctMean, 2),
    ...roundedField('form_power_ratio_mean', dynamics.formPowerRatioMean, 2),
  }
}

function toDocumentBlock({ block, stats, compliance }: AnalyzedBlock): BlockDocumentBlock {
  const zoneDistribution: Record<string, number> = {}
  for (const [zone, fraction] of Object.entries(stats.zoneDistribution)) {
    zoneDistribution[zone] = round(fraction, FRACTION_DIGITS)
  }

  return {
    phase: block.phase,
    start_s: round(stats.startOffsetS, SECONDS_DIGITS),
    end_s: round(stats.endOffsetS, SECONDS_DIGITS),
    duration_s: round(stats.durationS, SECONDS_DIGITS),
    sample_count: block.sampleCount,
    ...metricFields(stats.power, { avg: 'avg_power', min: 'min_power', max: 'max_power' }),
    ...metricFields(stats.heartRate, { avg: 'avg_hr', min: 'min_hr', max: 'max_hr' }),
    ...metricFields(stats.pace, { avg: 'avg_pace', min: 'min_pace', max: 'max_pace' }),
    ...metricFields(stats.cadence, { avg: 'avg_cadence' }),
    ...(stats.distanceM !== undefined ? { distance_m: round(stats.distanceM, METRIC_DIGITS) } : {}),
    ...(stats.hrDriftPct !== undefined ? { hr_drift_pct: round(stats.hrDriftPct, 2) } : {}),
    ...(stats.hrDeltaFirstLast5s !== undefined
      ? { hr_delta_first_last_5s: round(stats.hrDeltaFirstLast5s, METRIC_DIGITS) }
      : {}),
    ...(stats.runningDynamics ? { running_dynamics: toRunningDynamicsFields(stats.runningDynamics) } : {}),
    zone_distribution: zoneDistribution,
    ...(compliance
      ? {
          target: { ...compliance.target },
          compliance_pct: round(compliance.compliancePct, METRIC_DIGITS),
          achieved_avg: compliance.achievedAvg === null ? null : round(compliance.achievedAvg, METRIC_DIGITS),
          pct_time_below: round(compliance.pctTimeBelow, METRIC_DIGITS),
          pct_time_above: round(compliance.pctTimeAbove, METRIC_DIGITS),
        }
      : {}),
  }
}

export function activityTotals(stream: SampleStream): ActivityTotals {
  const gapS = stream.gaps.reduce((sum, gap) => sum + (gap.end - gap.start), 0)
  const distanceM = distanceCovered(stream.samples)
  const power = summarizeMetric(stream.samples, 'power')
  const heartRate = summarizeMetric(stream.samples, 'heartRate')
  const dynamics = summarizeRunningDynamics(stream.samples)

  return {
    duration_s: round(activeDurationS(stream), SECONDS_DIGITS),
    elapsed_s: round(elapsedDurationS(stream), SECONDS_DIGITS),
    gap_s: round(gapS, SECONDS_DIGITS),
    ...(distanceM !== undefined ? { distance_m: round(distanceM, METRIC_DIGITS) } : {}),
    ...(power ? { avg_power: round(power.avg, METRIC_DIGITS) } : {}),
    ...(heartRate ? { avg_hr: round(heartRate.avg, METRIC_DIGITS) } : {}),
    ...(dynamics ? { running_dynamics: toRunningDynamicsFields(dynamics) } : {}),
  }
}

/**
 * Assembles the canonical document. No decisions are made here: blocks keep the
 * segmenter's chronological order and every value comes from the aggregator or scorer.
 */
export function emitBlockDocument(input: {
  stream: SampleStream
  segmentation: SegmentationResult
  blocks: readonly AnalyzedBlock[]
  warnings?: readonly DocumentWarning[]
}): BlockDocument {
  const { stream, segmentation } = input
  const thresholds = segmentation.thresholds

  return {
    activity_totals: activityTotals(stream),
    primary_signal: segmentation.signal,
    thresholds: thresholds
      ? {
          work: round(thresholds.work, METRIC_DIGITS),
          rest: round(thresholds.rest, METRIC_DIGITS),
          source: thresholds.source,
        }
      : null,
    gaps: stream.gaps.map((gap) => ({
      start_s: round(gap.start, SECONDS_DIGITS),
      end_s: round(gap.end, SECONDS_DIGITS),
    })),
    warnings: [...(input.warnings ?? [])],
    blocks: input.blocks.map(toDocumentBlock),
  }
}
