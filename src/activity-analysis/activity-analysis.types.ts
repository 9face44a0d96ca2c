import type { BlockDocument } from '../block-document/block-document.types'
import type { AnalysisConfigOverrides } from '../config/analysis-config.types'
import type { RawRecord } from '../samples/samples.types'
import type { TargetPrescription } from '../target-compliance/target-compliance.types'
import type { TrainingContextDto } from '../training-load/training-load.types'

export type AnalyzeOptions = {
  config?: AnalysisConfigOverrides
  targets?: TargetPrescription
}

export type FinalizeOptions = {
  stress?: number
  criticalPower?: number
}

export type AthleteAnalysisInput = AnalyzeOptions & {
  records: readonly RawRecord[]
  athleteId?: string
  /** wall-clock start of the activity; defaults to now */
  startedAt?: Date
  finalize?: FinalizeOptions
}

export type AthleteAnalysisResult = {
  block_document: BlockDocument
  /** athlete's load as of the activity start, before this activity counts */
  training_context?: TrainingContextDto
  training_load_after?: TrainingContextDto
  training_stress?: number
}
