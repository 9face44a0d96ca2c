import { Module } from '@nestjs/common'
import { APP_FILTER } from '@nestjs/core'
import { ActivityAnalysisModule } from './activity-analysis/activity-analysis.module'
import { AppController } from './app.controller'
import { AnalysisErrorFilter } from './common/analysis-error.filter'
import { AnalysisConfigModule } from './config/analysis-config.module'
import { TrainingLoadModule } from './training-load/training-load.module'

@Module({
  imports: [AnalysisConfigModule, TrainingLoadModule, ActivityAnalysisModule],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: AnalysisErrorFilter }],
})
export class AppModule {}
