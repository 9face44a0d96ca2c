import { Body, Controller, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { AnalyzeActivityDto } from './dto/analyze-activity.dto'
import { toAthleteAnalysisInput } from './activity-analysis.mapper'
import { ActivityAnalysisService } from './activity-analysis.service'

@Controller('activities')
export class ActivityAnalysisController {
  constructor(private readonly activityAnalysisService: ActivityAnalysisService) {}

  @Post('analyze')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  analyze(@Body() dto: AnalyzeActivityDto) {
    return this.activityAnalysisService.analyzeForAthlete(toAthleteAnalysisInput(dto))
  }
}
