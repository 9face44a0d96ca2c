import { Global, Module } from '@nestjs/common'
import { CLOCK, SystemClock } from '../common/clock'
import { ANALYSIS_CONFIG, loadAnalysisConfig } from './analysis-config'

@Global()
@Module({
  providers: [
    { provide: ANALYSIS_CONFIG, useFactory: () => loadAnalysisConfig() },
    { provide: CLOCK, useClass: SystemClock },
  ],
  exports: [ANALYSIS_CONFIG, CLOCK],
})
export class AnalysisConfigModule {}
