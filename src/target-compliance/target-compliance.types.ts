export type TargetMetric = 'power' | 'pace'

export type Target = {
  metric: TargetMetric
  lower: number
  upper: number
}

export type ComplianceResult = {
  target: Target
  achievedAvg: number | null
  compliancePct: number
  /** share of time on the easy side of the band (lower power, slower pace) */
  pctTimeBelow: number
  pctTimeAbove: number
}

/** Targets for a whole activity: one for every work block, or per work-block ordinal. */
export type TargetPrescription = {
  everyWorkBlock?: Target
  byWorkOrdinal?: Readonly<Record<number, Target>>
}
