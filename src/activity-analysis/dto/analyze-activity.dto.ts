import { Type } from 'class-transformer'
import {
  IsArray,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator'
import { AnalysisConfigOverridesDto } from './analysis-config-overrides.dto'
import { RawRecordDto } from './raw-record.dto'
import { TargetsDto } from './target.dto'

/** Present: the analyzed activity is also folded into the athlete's training load. */
export class FinalizeOptionsDto {
  @IsNumber()
  @Min(0)
  @IsOptional()
  stress?: number

  // used with the activity's average power when no stress value is given
  @IsNumber()
  @IsPositive()
  @IsOptional()
  criticalPower?: number
}

export class AnalyzeActivityDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RawRecordDto)
  records!: RawRecordDto[]

  @IsString()
  @IsNotEmpty()
  @IsOptional()
  athleteId?: string

  @IsISO8601()
  @IsOptional()
  startedAtIso?: string

  @ValidateNested()
  @Type(() => TargetsDto)
  @IsOptional()
  targets?: TargetsDto

  @ValidateNested()
  @Type(() => AnalysisConfigOverridesDto)
  @IsOptional()
  config?: AnalysisConfigOverridesDto

  @ValidateNested()
  @Type(() => FinalizeOptionsDto)
  @IsOptional()
  finalize?: FinalizeOptionsDto
}
