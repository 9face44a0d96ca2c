import { Inject, Injectable, InternalServerErrorException, Logger } from '@nestjs/common'
import { emitBlockDocument } from '../block-document/block-document.emitter'
import { blockDocumentSchema } from '../block-document/block-document.schema'
import type { AnalyzedBlock, BlockDocument, DocumentWarning } from '../block-document/block-document.types'
import type { Block } from '../block-segmentation/block-segmentation.types'
import { segmentBlocks } from '../block-segmentation/block-segmenter'
import { aggregateBlockStats } from '../block-stats/block-stats.aggregate'
import { InsufficientDataError, MalformedTargetError } from '../common/analysis.errors'
import type { Clock } from '../common/clock'
import { CLOCK } from '../common/clock'
import { ANALYSIS_CONFIG, resolveAnalysisConfig } from '../config/analysis-config'
import type { AnalysisConfig } from '../config/analysis-config.types'
import { normalizeSamples } from '../samples/sample-normalizer'
import { activeDurationS } from '../samples/sample-timing'
import type { RawRecord, SampleStream } from '../samples/samples.types'
import { evaluateTargetCompliance, targetForWorkBlock } from '../target-compliance/target-compliance.evaluate'
import type { ComplianceResult, Target } from '../target-compliance/target-compliance.types'
import { presentTrainingContext } from '../training-load/training-load.presenter'
import { TrainingLoadService } from '../training-load/training-load.service'
import type { FinalizedActivity } from '../training-load/training-load.types'
import type {
  AnalyzeOptions,
  AthleteAnalysisInput,
  AthleteAnalysisResult,
  FinalizeOptions,
} from './activity-analysis.types'

@Injectable()
export class ActivityAnalysisService {
  private readonly logger = new Logger(ActivityAnalysisService.name)

  constructor(
    @Inject(ANALYSIS_CONFIG) private readonly config: AnalysisConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly trainingLoadService: TrainingLoadService,
  ) {}

  /**
   * normalize → segment → aggregate → score → emit, for one activity.
   * Pure with respect to the service: nothing is stored.
   */
  analyzeActivity(records: readonly RawRecord[], options: AnalyzeOptions = {}): BlockDocument {
    const config = resolveAnalysisConfig(this.config, options.config)

    const stream = normalizeSamples(records, { gapThresholdS: config.gapThresholdS })
    if (stream.droppedRecords > 0) {
      this.logger.warn(`Dropped ${stream.droppedRecords} records without a usable, increasing timestamp`)
    }

    const activeS = activeDurationS(stream)
    if (stream.samples.length < 2 || activeS < config.minActivityDurationS) {
      throw new InsufficientDataError(activeS, config.minActivityDurationS)
    }

    const segmentation = segmentBlocks(stream, {
      primarySignalOverride: config.primarySignalOverride,
      workThreshold: config.workThreshold,
      restThreshold: config.restThreshold,
      minBlockDurationS: config.minBlockDurationS,
    })
    if (segmentation.overrideIgnored) {
      this.logger.warn(
        `Primary signal override '${config.primarySignalOverride}' has no samples, using ${segmentation.signal}`,
      )
    }

    const warnings: DocumentWarning[] = []
    let workOrdinal = 0
    const blocks: AnalyzedBlock[] = segmentation.blocks.map((block, index) => {
      const stats = aggregateBlockStats(stream, block, {
        zoneTable: config.zoneTable,
        zoneWeightCapS: config.zoneWeightCapS,
      })
      const target = block.phase === 'work' ? targetForWorkBlock(options.targets, workOrdinal++) : null
      const compliance = target
        ? this.scoreBlock(stream, block, target, config.zoneWeightCapS, index, warnings)
        : null
      return { block, stats, compliance }
    })

    const document = emitBlockDocument({ stream, segmentation, blocks, warnings })

    const parsed = blockDocumentSchema.safeParse(document)
    if (!parsed.success) {
      throw new InternalServerErrorException({
        message: 'Invalid block document',
        issues: parsed.error.issues,
      })
    }

    this.logger.debug(
      `Segmented ${stream.samples.length} samples on ${segmentation.signal} into ` +
        `${blocks.length} blocks (${blocks.map((b) => b.block.phase).join(',')})`,
    )
    return parsed.data
  }

  /**
   * Analysis plus the athlete's training context: the snapshot as of the activity start,
   * and, when asked, the load after folding this activity in.
   */
  async analyzeForAthlete(input: AthleteAnalysisInput): Promise<AthleteAnalysisResult> {
    const document = this.analyzeActivity(input.records, {
      ...(input.config ? { config: input.config } : {}),
      ...(input.targets ? { targets: input.targets } : {}),
    })
    if (input.athleteId === undefined) return { block_document: document }

    const startedAt = input.startedAt ?? this.clock.now()
    const before = this.trainingLoadService.getSnapshot(input.athleteId, startedAt)
    const result: AthleteAnalysisResult = {
      block_document: document,
      training_context: presentTrainingContext(before),
    }
    if (!input.finalize) return result

    const finalized = await this.trainingLoadService.finalizeActivity(
      input.athleteId,
      this.toFinalizedActivity(document, startedAt, input.finalize),
    )
    return {
      ...result,
      training_load_after: presentTrainingContext(finalized.snapshot),
      training_stress: Number(finalized.stress.toFixed(1)),
    }
  }

  private toFinalizedActivity(document: BlockDocument, startedAt: Date, opts: FinalizeOptions): FinalizedActivity {
    const totals = document.activity_totals
    const completedAt = new Date(startedAt.getTime() + totals.elapsed_s * 1000)
    return {
      completedAt,
      durationS: totals.duration_s,
      ...(totals.distance_m !== undefined ? { distanceM: totals.distance_m } : {}),
      ...(totals.avg_power !== undefined ? { avgPower: totals.avg_power } : {}),
      ...(opts.stress !== undefined ? { stress: opts.stress } : {}),
      ...(opts.criticalPower !== undefined && totals.avg_power !== undefined
        ? {
            power: {
              durationS: totals.duration_s,
              avgPower: totals.avg_power,
              criticalPower: opts.criticalPower,
            },
          }
        : {}),
    }
  }

  private scoreBlock(
    stream: SampleStream,
    block: Block,
    target: Target,
    zoneWeightCapS: number,
    blockIndex: number,
    warnings: DocumentWarning[],
  ): ComplianceResult | null {
    try {
      return evaluateTargetCompliance(stream, block, target, { zoneWeightCapS })
    } catch (err) {
      if (!(err instanceof MalformedTargetError)) throw err
      this.logger.warn(`Block ${blockIndex}: ${err.message}`)
      warnings.push({ code: err.code, block_index: blockIndex, message: err.message })
      return null
    }
  }
}
