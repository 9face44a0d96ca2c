import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  Post,
  Put,
  Query,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common'
import { FinalizeActivityDto } from './dto/finalize-activity.dto'
import { ReplayHistoryDto } from './dto/replay-history.dto'
import { SeedTrainingLoadDto } from './dto/seed-training-load.dto'
import { toFinalizedActivity } from './training-load.mapper'
import { presentTrainingContext } from './training-load.presenter'
import { TrainingLoadService } from './training-load.service'

@Controller('athletes/:athleteId/training-load')
export class TrainingLoadController {
  constructor(private readonly trainingLoadService: TrainingLoadService) {}

  private parseAsOf(asOf?: string): Date | undefined {
    if (asOf === undefined || asOf === '') return undefined
    const parsed = new Date(asOf)
    if (Number.isNaN(parsed.getTime())) throw new BadRequestException('asOf must be an ISO date')
    return parsed
  }

  @Get()
  getSnapshot(@Param('athleteId') athleteId: string, @Query('asOf') asOf?: string) {
    return presentTrainingContext(this.trainingLoadService.getSnapshot(athleteId, this.parseAsOf(asOf)))
  }

  @Post()
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async finalize(@Param('athleteId') athleteId: string, @Body() dto: FinalizeActivityDto) {
    const result = await this.trainingLoadService.finalizeActivity(athleteId, toFinalizedActivity(dto))
    return {
      training_stress: Number(result.stress.toFixed(1)),
      training_load: presentTrainingContext(result.snapshot),
    }
  }

  @Put()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async seed(@Param('athleteId') athleteId: string, @Body() dto: SeedTrainingLoadDto) {
    const snapshot = await this.trainingLoadService.seedState(athleteId, {
      atl: dto.atl,
      ctl: dto.ctl,
      ...(dto.asOfIso !== undefined ? { asOf: new Date(dto.asOfIso) } : {}),
    })
    return presentTrainingContext(snapshot)
  }

  @Post('replay')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  async replay(@Param('athleteId') athleteId: string, @Body() dto: ReplayHistoryDto) {
    const snapshot = await this.trainingLoadService.replayHistory(
      athleteId,
      dto.activities.map(toFinalizedActivity),
    )
    return presentTrainingContext(snapshot)
  }
}
