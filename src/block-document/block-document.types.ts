import type { Block, Phase, PrimarySignal } from '../block-segmentation/block-segmentation.types'
import type { BlockStats } from '../block-stats/block-stats.types'
import type { ComplianceResult, TargetMetric } from '../target-compliance/target-compliance.types'

export type AnalyzedBlock = {
  block: Block
  stats: BlockStats
  compliance: ComplianceResult | null
}

export type DocumentWarning = {
  code: 'MalformedTarget'
  block_index: number
  message: string
}

// Wire shape below is snake_case: it is consumed outside this service.

export type RunningDynamicsFields = {
  form_power_med?: number
  lss_med?: number
  gct_med?: number
  vert_osc_med?: number
  step_length_med?: number
  air_power_pct_mean?: number
  form_power_ratio_mean?: number
}

export type BlockDocumentBlock = {
  phase: Phase
  start_s: number
  end_s: number
  duration_s: number
  sample_count: number
  avg_power?: number
  min_power?: number
  max_power?: number
  avg_hr?: number
  min_hr?: number
  max_hr?: number
  avg_pace?: number
  min_pace?: number
  max_pace?: number
  avg_cadence?: number
  distance_m?: number
  hr_drift_pct?: number
  hr_delta_first_last_5s?: number
  running_dynamics?: RunningDynamicsFields
  zone_distribution: Record<string, number>
  target?: { metric: TargetMetric; lower: number; upper: number }
  compliance_pct?: number
  achieved_avg?: number | null
  pct_time_below?: number
  pct_time_above?: number
}

export type ActivityTotals = {
  duration_s: number
  elapsed_s: number
  gap_s: number
  distance_m?: number
  avg_power?: number
  avg_hr?: number
  running_dynamics?: RunningDynamicsFields
}

export type BlockDocument = {
  activity_totals: ActivityTotals
  primary_signal: PrimarySignal
  thresholds: { work: number; rest: number; source: 'configured' | 'derived' } | null
  gaps: Array<{ start_s: number; end_s: number }>
  warnings: DocumentWarning[]
  blocks: BlockDocumentBlock[]
}
