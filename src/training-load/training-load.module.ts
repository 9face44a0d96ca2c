import { Module } from '@nestjs/common'
import { TrainingLoadController } from './training-load.controller'
import { TrainingLoadService } from './training-load.service'

@Module({
  controllers: [TrainingLoadController],
  providers: [TrainingLoadService],
  exports: [TrainingLoadService],
})
export class TrainingLoadModule {}
