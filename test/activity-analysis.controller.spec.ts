import { BadRequestException, ValidationPipe } from '@nestjs/common'
import { Test } from '@nestjs/testing'
import { ActivityAnalysisController } from '../src/activity-analysis/activity-analysis.controller'
import { ActivityAnalysisService } from '../src/activity-analysis/activity-analysis.service'
import { AnalyzeActivityDto } from '../src/activity-analysis/dto/analyze-activity.dto'
import { CLOCK } from '../src/common/clock'
import { ANALYSIS_CONFIG, DEFAULT_ANALYSIS_CONFIG } from '../src/config/analysis-config'
import { TrainingLoadService } from '../src/training-load/training-load.service'
import { intervalWorkout } from './fixtures/synthetic-activity'

describe('ActivityAnalysisController', () => {
  let controller: ActivityAnalysisController
  let trainingLoad: TrainingLoadService

  beforeEach(async () => {
    const mod = await Test.createTestingModule({
      controllers: [ActivityAnalysisController],
      providers: [
        ActivityAnalysisService,
        TrainingLoadService,
        { provide: CLOCK, useValue: { now: () => new Date('2025-03-01T12:00:00.000Z') } },
        { provide: ANALYSIS_CONFIG, useValue: DEFAULT_ANALYSIS_CONFIG },
      ],
    }).compile()

    controller = mod.get(ActivityAnalysisController)
    trainingLoad = mod.get(TrainingLoadService)
  })

  it('maps per-ordinal targets from the request body', async () => {
    const result = await controller.analyze({
      records: intervalWorkout(),
      targets: { byWorkOrdinal: [{ ordinal: 2, metric: 'power', lower: 280, upper: 320 }] },
    })

    const scored = result.block_document.blocks.flatMap((b, i) => (b.target ? [i] : []))
    expect(scored).toEqual([5])
  })

  it('finalizes into the athlete load when asked', async () => {
    await controller.analyze({
      records: intervalWorkout(),
      athleteId: 'athlete-1',
      startedAtIso: '2025-03-01T07:00:00.000Z',
      finalize: { stress: 70 },
    })

    const snapshot = trainingLoad.getSnapshot('athlete-1', new Date('2025-03-01T07:21:59.000Z'))
    expect(snapshot.atl).toBeCloseTo(70 * (1 - Math.exp(-1 / 7)), 10)
  })

  describe('request validation', () => {
    const pipe = new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true })
    const validate = (body: object) => pipe.transform(body, { type: 'body', metatype: AnalyzeActivityDto })

    it('accepts records with missing fields and string timestamps', async () => {
      const dto = await validate({
        records: [{ timestamp: '2025-03-01T07:00:00Z', power: 200 }, { timestamp: 1 }, {}],
      })
      expect(dto).toBeInstanceOf(AnalyzeActivityDto)
    })

    it('rejects a record with a non-numeric metric', async () => {
      await expect(validate({ records: [{ timestamp: 0, power: 'high' }] })).rejects.toThrow(BadRequestException)
    })

    it('rejects an unknown target metric', async () => {
      await expect(
        validate({ records: [], targets: { everyWorkBlock: { metric: 'heart_rate', lower: 150, upper: 160 } } }),
      ).rejects.toThrow(BadRequestException)
    })

    it('lets an inverted target band through to the analysis', async () => {
      const dto = await validate({ records: [], targets: { everyWorkBlock: { metric: 'power', lower: 310, upper: 290 } } })
      expect(dto).toBeInstanceOf(AnalyzeActivityDto)
    })
  })
})
