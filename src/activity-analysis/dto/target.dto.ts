import { Type } from 'class-transformer'
import { IsArray, IsIn, IsInt, IsNumber, IsOptional, Min, ValidateNested } from 'class-validator'
import type { TargetMetric } from '../../target-compliance/target-compliance.types'

export class TargetDto {
  @IsIn(['power', 'pace'])
  metric!: TargetMetric

  // lower > upper is accepted here and reported as a document warning
  @IsNumber()
  lower!: number

  @IsNumber()
  upper!: number
}

export class WorkTargetDto extends TargetDto {
  /** 0-based position among the activity's work blocks */
  @IsInt()
  @Min(0)
  ordinal!: number
}

export class TargetsDto {
  @ValidateNested()
  @Type(() => TargetDto)
  @IsOptional()
  everyWorkBlock?: TargetDto

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WorkTargetDto)
  @IsOptional()
  byWorkOrdinal?: WorkTargetDto[]
}
