import { Module } from '@nestjs/common'
import { TrainingLoadModule } from '../training-load/training-load.module'
import { ActivityAnalysisController } from './activity-analysis.controller'
import { ActivityAnalysisService } from './activity-analysis.service'

@Module({
  imports: [TrainingLoadModule],
  controllers: [ActivityAnalysisController],
  providers: [ActivityAnalysisService],
})
export class ActivityAnalysisModule {}
