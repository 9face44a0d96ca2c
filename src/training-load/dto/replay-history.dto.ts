import { Type } from 'class-transformer'
import { IsArray, ValidateNested } from 'class-validator'
import { FinalizeActivityDto } from './finalize-activity.dto'

export class ReplayHistoryDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => FinalizeActivityDto)
  activities!: FinalizeActivityDto[]
}
