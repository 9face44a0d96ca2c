import type { ZoneTable } from '../zones/zone-table.types'

export type SignalOverride = 'power' | 'pace'

export type AnalysisConfig = {
  zoneTable: ZoneTable
  primarySignalOverride: SignalOverride | null
  minBlockDurationS: number
  workThreshold: number | null // units follow the primary signal
  restThreshold: number | null
  gapThresholdS: number
  zoneWeightCapS: number
  minActivityDurationS: number
  tauAtlDays: number
  tauCtlDays: number
}

/** Options a single analysis request may override; load time constants stay global. */
export type AnalysisConfigOverrides = Partial<Omit<AnalysisConfig, 'tauAtlDays' | 'tauCtlDays'>>
