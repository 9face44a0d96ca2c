export type PrimarySignal = 'power' | 'pace' | 'heart_rate'

export type Phase = 'warmup' | 'work' | 'rest' | 'cooldown'

export type Block = {
  phase: Phase
  startIndex: number
  endIndex: number // inclusive
  sampleCount: number
}

export type EffortThresholds = {
  work: number
  rest: number
  source: 'configured' | 'derived'
}

export type SegmentationResult = {
  signal: PrimarySignal
  thresholds: EffortThresholds | null
  /** a configured override named a metric the activity never recorded */
  overrideIgnored: boolean
  blocks: Block[]
}
