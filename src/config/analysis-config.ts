import { InvalidConfigurationError } from '../common/analysis.errors'
import { DEFAULT_HR_ZONE_TABLE } from '../zones/zone-table'
import { analysisConfigSchema } from './analysis-config.schema'
import type { AnalysisConfig, AnalysisConfigOverrides } from './analysis-config.types'

export const ANALYSIS_CONFIG = Symbol('ANALYSIS_CONFIG')

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  zoneTable: DEFAULT_HR_ZONE_TABLE,
  primarySignalOverride: null,
  minBlockDurationS: 15,
  workThreshold: null,
  restThreshold: null,
  gapThresholdS: 10,
  zoneWeightCapS: 5,
  minActivityDurationS: 60,
  tauAtlDays: 7,
  tauCtlDays: 42,
}

const readNumber = (raw: string | undefined): number | undefined => {
  if (raw === undefined || raw.trim() === '') return undefined
  return Number(raw)
}

const readString = (raw: string | undefined): string | undefined => {
  const value = raw?.trim().toLowerCase()
  return value ? value : undefined
}

// null is a real value here (explicitly "no override"), so only undefined falls back
const orElse = <T>(value: T | undefined, fallback: T): T => (value === undefined ? fallback : value)

function parseConfig(candidate: unknown): AnalysisConfig {
  const parsed = analysisConfigSchema.safeParse(candidate)
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      `Analysis configuration is invalid: ${JSON.stringify(parsed.error.format())}`,
    )
  }
  return parsed.data
}

/**
 * Defaults overlaid with environment variables. Called once at start-up, so a bad
 * value fails the boot instead of the first request.
 */
export function loadAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const base = DEFAULT_ANALYSIS_CONFIG
  return parseConfig({
    zoneTable: base.zoneTable,
    primarySignalOverride: orElse<unknown>(readString(env.PRIMARY_SIGNAL_OVERRIDE), base.primarySignalOverride),
    minBlockDurationS: orElse(readNumber(env.MIN_BLOCK_DURATION_S), base.minBlockDurationS),
    workThreshold: orElse(readNumber(env.WORK_THRESHOLD), base.workThreshold),
    restThreshold: orElse(readNumber(env.REST_THRESHOLD), base.restThreshold),
    gapThresholdS: orElse(readNumber(env.GAP_THRESHOLD_S), base.gapThresholdS),
    zoneWeightCapS: orElse(readNumber(env.ZONE_WEIGHT_CAP_S), base.zoneWeightCapS),
    minActivityDurationS: orElse(readNumber(env.MIN_ACTIVITY_DURATION_S), base.minActivityDurationS),
    tauAtlDays: orElse(readNumber(env.TAU_ATL_DAYS), base.tauAtlDays),
    tauCtlDays: orElse(readNumber(env.TAU_CTL_DAYS), base.tauCtlDays),
  })
}

export function resolveAnalysisConfig(
  base: AnalysisConfig,
  overrides?: AnalysisConfigOverrides,
): AnalysisConfig {
  if (!overrides) return base
  return parseConfig({
    zoneTable: orElse(overrides.zoneTable, base.zoneTable),
    primarySignalOverride: orElse(overrides.primarySignalOverride, base.primarySignalOverride),
    minBlockDurationS: orElse(overrides.minBlockDurationS, base.minBlockDurationS),
    workThreshold: orElse(overrides.workThreshold, base.workThreshold),
    restThreshold: orElse(overrides.restThreshold, base.restThreshold),
    gapThresholdS: orElse(overrides.gapThresholdS, base.gapThresholdS),
    zoneWeightCapS: orElse(overrides.zoneWeightCapS, base.zoneWeightCapS),
    minActivityDurationS: orElse(overrides.minActivityDurationS, base.minActivityDurationS),
    tauAtlDays: base.tauAtlDays,
    tauCtlDays: base.tauCtlDays,
  })
}
