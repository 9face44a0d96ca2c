import { Type } from 'class-transformer'
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  ValidateNested,
} from 'class-validator'
import type { SignalOverride } from '../../config/analysis-config.types'
import type { ZoneMetric } from '../../zones/zone-table.types'

export class ZoneDto {
  @IsString()
  @IsNotEmpty()
  name!: string

  @IsNumber()
  lower!: number

  // null: open-ended last zone
  @IsNumber()
  @IsOptional()
  upper!: number | null
}

export class ZoneTableDto {
  @IsIn(['heart_rate', 'power'])
  metric!: ZoneMetric

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ZoneDto)
  zones!: ZoneDto[]
}

/** Athlete profile zones as inclusive `[low, high]` bpm pairs. */
export class HrZonesDto {
  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  z1!: number[]

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  z2!: number[]

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  z3!: number[]

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  z4!: number[]

  @IsArray()
  @ArrayMinSize(2)
  @ArrayMaxSize(2)
  @IsNumber({}, { each: true })
  z5!: number[]
}

export class AnalysisConfigOverridesDto {
  @ValidateNested()
  @Type(() => ZoneTableDto)
  @IsOptional()
  zoneTable?: ZoneTableDto

  // used when no zoneTable is given
  @ValidateNested()
  @Type(() => HrZonesDto)
  @IsOptional()
  hrZones?: HrZonesDto

  @IsIn(['power', 'pace'])
  @IsOptional()
  primarySignalOverride?: SignalOverride | null

  @IsNumber()
  @IsPositive()
  @IsOptional()
  minBlockDurationS?: number

  @IsNumber()
  @IsOptional()
  workThreshold?: number | null

  @IsNumber()
  @IsOptional()
  restThreshold?: number | null

  @IsNumber()
  @IsPositive()
  @IsOptional()
  gapThresholdS?: number

  @IsNumber()
  @IsPositive()
  @IsOptional()
  zoneWeightCapS?: number

  @IsNumber()
  @IsPositive()
  @IsOptional()
  minActivityDurationS?: number
}
