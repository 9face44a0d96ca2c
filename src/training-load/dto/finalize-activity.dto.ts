import { IsISO8601, IsNotEmpty, IsNumber, IsOptional, IsPositive, Min } from 'class-validator'

export class FinalizeActivityDto {
  @IsISO8601()
  @IsNotEmpty()
  completedAtIso!: string

  @IsNumber()
  @Min(0)
  @IsOptional()
  stress?: number

  // power-based stress (RSS) when no stress value is given; duration and power also feed the weekly summary
  @IsNumber()
  @Min(0)
  @IsOptional()
  durationS?: number

  @IsNumber()
  @Min(0)
  @IsOptional()
  avgPower?: number

  @IsNumber()
  @IsPositive()
  @IsOptional()
  criticalPower?: number

  @IsNumber()
  @Min(0)
  @IsOptional()
  distanceM?: number
}
