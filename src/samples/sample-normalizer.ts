import type { Gap, RawRecord, Sample, SampleStream } from './samples.types'

export type NormalizeOptions = {
  gapThresholdS: number
}

const toSeconds = (value: RawRecord['timestamp']): number | null => {
  if (value instanceof Date) {
    const ms = value.getTime()
    return Number.isFinite(ms) ? ms / 1000 : null
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim()) {
    const ms = Date.parse(value.trim())
    return Number.isFinite(ms) ? ms / 1000 : null
  }
  return null
}

// zero is what most sensors report when they have nothing to say
const positive = (value: number | null | undefined): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined

const nonNegative = (value: number | null | undefined): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined

/** Share of `part` in `power`; explicit values win over the derived one. */
const shareOfPower = (
  explicit: number | null | undefined,
  part: number | undefined,
  power: number | undefined,
  scale: number,
): number | undefined => {
  const given = nonNegative(explicit)
  if (given !== undefined) return given
  return part !== undefined && power !== undefined ? (scale * part) / power : undefined
}

type SampleDynamics = Pick<
  Sample,
  | 'formPower'
  | 'legSpringStiffness'
  | 'groundContactTime'
  | 'verticalOscillation'
  | 'stepLength'
  | 'airPowerPct'
  | 'formPowerRatio'
>

function runningDynamicsOf(record: RawRecord, power: number | undefined): SampleDynamics {
  const formPower = positive(record.formPower)
  const legSpringStiffness = positive(record.legSpringStiffness)
  const groundContactTime = positive(record.groundContactTime)
  const verticalOscillation = positive(record.verticalOscillation)
  const stepLength = positive(record.stepLength)
  const airPowerPct = shareOfPower(record.airPowerPct, nonNegative(record.airPower), power, 100)
  const formPowerRatio = shareOfPower(record.formPowerRatio, formPower, power, 1)

  return {
    ...(formPower !== undefined ? { formPower } : {}),
    ...(legSpringStiffness !== undefined ? { legSpringStiffness } : {}),
    ...(groundContactTime !== undefined ? { groundContactTime } : {}),
    ...(verticalOscillation !== undefined ? { verticalOscillation } : {}),
    ...(stepLength !== undefined ? { stepLength } : {}),
    ...(airPowerPct !== undefined ? { airPowerPct } : {}),
    ...(formPowerRatio !== undefined ? { formPowerRatio } : {}),
  }
}

const paceOf = (record: RawRecord): number | undefined => {
  const pace = positive(record.pace)
  if (pace !== undefined) return pace
  const speed = positive(record.speed)
  return speed !== undefined ? 1000 / speed : undefined
}

/**
 * Turns decoder records into a strictly increasing Sample sequence.
 *
 * - records without a usable timestamp, or not later than the last accepted one, are dropped
 *   (a lap marker they carry moves to the next accepted sample)
 * - steps longer than `gapThresholdS` become explicit gaps; shorter ones are held by the
 *   preceding sample, nothing is interpolated
 * - missing or non-positive metric values stay absent; air power share and form power
 *   ratio are derived from power when the decoder only reports absolute values
 */
export function normalizeSamples(records: readonly RawRecord[], opts: NormalizeOptions): SampleStream {
  const samples: Sample[] = []
  const gaps: Gap[] = []
  const steps: number[] = []

  let origin: number | null = null
  let pendingLap = false
  let droppedRecords = 0

  for (const record of records) {
    const absolute = toSeconds(record.timestamp)
    if (absolute === null) {
      droppedRecords++
      if (record.lapMarker === true) pendingLap = true
      continue
    }

    if (origin === null) origin = absolute
    const timestamp = absolute - origin

    const previous = samples.length > 0 ? samples[samples.length - 1] : null
    if (previous && timestamp <= previous.timestamp) {
      droppedRecords++
      if (record.lapMarker === true) pendingLap = true
      continue
    }

    if (previous) {
      const step = timestamp - previous.timestamp
      if (step > opts.gapThresholdS) {
        gaps.push({
          startIndex: samples.length - 1,
          endIndex: samples.length,
          start: previous.timestamp,
          end: timestamp,
        })
        steps.push(0)
      } else {
        steps.push(step)
      }
    }

    const power = positive(record.power)
    const heartRate = positive(record.heartRate)
    const pace = paceOf(record)
    const cadence = positive(record.cadence)
    const distance = nonNegative(record.distance)

    samples.push(
      Object.freeze({
        timestamp,
        lapMarker: record.lapMarker === true || pendingLap,
        ...(power !== undefined ? { power } : {}),
        ...(heartRate !== undefined ? { heartRate } : {}),
        ...(pace !== undefined ? { pace } : {}),
        ...(cadence !== undefined ? { cadence } : {}),
        ...(distance !== undefined ? { distance } : {}),
        ...runningDynamicsOf(record, power),
      }),
    )
    pendingLap = false
  }

  if (samples.length > 0) steps.push(0)

  return { samples, gaps, steps, droppedRecords }
}
