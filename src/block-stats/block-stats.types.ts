export type MetricSummary = {
  min: number
  avg: number
  max: number
}

/** Medians of the form metrics; the two power shares are means. Fields without data stay absent. */
export type RunningDynamics = {
  formPowerMed?: number
  legSpringStiffnessMed?: number
  groundContactTimeMed?: number
  verticalOscillationMed?: number
  stepLengthMed?: number
  airPowerPctMean?: number
  formPowerRatioMean?: number
}

export type BlockStats = {
  durationS: number // active seconds, gaps excluded
  startOffsetS: number
  endOffsetS: number
  power?: MetricSummary
  heartRate?: MetricSummary
  pace?: MetricSummary
  cadence?: MetricSummary
  distanceM?: number
  hrDriftPct?: number
  hrDeltaFirstLast5s?: number
  runningDynamics?: RunningDynamics
  /** zone name -> fraction of weighted time; empty when the zone metric is never present */
  zoneDistribution: Record<string, number>
}
