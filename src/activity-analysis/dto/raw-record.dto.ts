import { Allow, IsBoolean, IsNumber, IsOptional } from 'class-validator'

/** One decoded sensor record. Anything may be missing; the normalizer decides what is usable. */
export class RawRecordDto {
  // seconds or ISO string
  @Allow()
  timestamp?: number | string | null

  @IsNumber()
  @IsOptional()
  power?: number | null

  @IsNumber()
  @IsOptional()
  heartRate?: number | null

  @IsNumber()
  @IsOptional()
  speed?: number | null

  @IsNumber()
  @IsOptional()
  pace?: number | null

  @IsNumber()
  @IsOptional()
  cadence?: number | null

  @IsNumber()
  @IsOptional()
  distance?: number | null

  @IsBoolean()
  @IsOptional()
  lapMarker?: boolean | null

  @IsNumber()
  @IsOptional()
  formPower?: number | null

  @IsNumber()
  @IsOptional()
  legSpringStiffness?: number | null

  @IsNumber()
  @IsOptional()
  groundContactTime?: number | null

  @IsNumber()
  @IsOptional()
  verticalOscillation?: number | null

  @IsNumber()
  @IsOptional()
  stepLength?: number | null

  @IsNumber()
  @IsOptional()
  airPower?: number | null

  @IsNumber()
  @IsOptional()
  airPowerPct?: number | null

  @IsNumber()
  @IsOptional()
  formPowerRatio?: number | null
}
