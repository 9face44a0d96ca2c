/** One record as handed over by the external recording decoder. Every field may be missing. */
export type RawRecord = {
  timestamp?: number | string | Date | null // seconds, ISO string or Date
  power?: number | null // W
  heartRate?: number | null // bpm
  speed?: number | null // m/s
  pace?: number | null // sec/km
  cadence?: number | null // spm
  distance?: number | null // cumulative m
  lapMarker?: boolean | null
  // running dynamics, as reported by footpod or watch
  formPower?: number | null // W
  legSpringStiffness?: number | null // kN/m
  groundContactTime?: number | null // ms
  verticalOscillation?: number | null // cm
  stepLength?: number | null // m
  airPower?: number | null // W
  airPowerPct?: number | null // % of power
  formPowerRatio?: number | null // form power / power
}

export type Sample = {
  readonly timestamp: number // seconds from activity start
  readonly power?: number
  readonly heartRate?: number
  readonly pace?: number
  readonly cadence?: number
  readonly distance?: number
  readonly lapMarker: boolean
  readonly formPower?: number
  readonly legSpringStiffness?: number
  readonly groundContactTime?: number
  readonly verticalOscillation?: number
  readonly stepLength?: number
  readonly airPowerPct?: number
  readonly formPowerRatio?: number
}

export type SampleMetric = 'power' | 'heartRate' | 'pace' | 'cadence'

export type DynamicsMetric =
  | 'formPower'
  | 'legSpringStiffness'
  | 'groundContactTime'
  | 'verticalOscillation'
  | 'stepLength'
  | 'airPowerPct'
  | 'formPowerRatio'

/** A hole in the recording between two consecutive samples, longer than the gap threshold. */
export type Gap = {
  readonly startIndex: number
  readonly endIndex: number
  readonly start: number
  readonly end: number
}

export type SampleStream = {
  readonly samples: readonly Sample[]
  readonly gaps: readonly Gap[]
  /** steps[i]: active seconds from sample i to i + 1; 0 across a gap and for the last sample. */
  readonly steps: readonly number[]
  readonly droppedRecords: number
}
