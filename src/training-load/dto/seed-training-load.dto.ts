import { IsISO8601, IsNumber, IsOptional, Min } from 'class-validator'

export class SeedTrainingLoadDto {
  @IsNumber()
  @Min(0)
  atl!: number

  @IsNumber()
  @Min(0)
  ctl!: number

  @IsISO8601()
  @IsOptional()
  asOfIso?: string
}
