import { InvalidConfigurationError } from '../common/analysis.errors'
import { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig, resolveAnalysisConfig } from './analysis-config'

describe('analysis configuration', () => {
  it('uses the defaults with an empty environment', () => {
    expect(loadAnalysisConfig({})).toEqual(DEFAULT_ANALYSIS_CONFIG)
  })

  it('reads overrides from the environment', () => {
    const config = loadAnalysisConfig({
      PRIMARY_SIGNAL_OVERRIDE: 'Pace',
      MIN_BLOCK_DURATION_S: '20',
      WORK_THRESHOLD: '270',
      REST_THRESHOLD: '330',
      TAU_ATL_DAYS: '5',
    })

    expect(config).toMatchObject({
      primarySignalOverride: 'pace',
      minBlockDurationS: 20,
      workThreshold: 270,
      restThreshold: 330,
      tauAtlDays: 5,
      tauCtlDays: 42,
    })
  })

  it('fails on values that are not numbers', () => {
    expect(() => loadAnalysisConfig({ GAP_THRESHOLD_S: 'ten' })).toThrow(InvalidConfigurationError)
  })

  it('fails on an unknown signal override', () => {
    expect(() => loadAnalysisConfig({ PRIMARY_SIGNAL_OVERRIDE: 'cadence' })).toThrow(InvalidConfigurationError)
  })

  it('requires both thresholds or neither', () => {
    expect(() => loadAnalysisConfig({ WORK_THRESHOLD: '250' })).toThrow(InvalidConfigurationError)
  })

  describe('resolveAnalysisConfig', () => {
    it('returns the base unchanged without overrides', () => {
      expect(resolveAnalysisConfig(DEFAULT_ANALYSIS_CONFIG)).toBe(DEFAULT_ANALYSIS_CONFIG)
    })

    it('overlays request options but keeps the load time constants', () => {
      const config = resolveAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, {
        minBlockDurationS: 30,
        primarySignalOverride: 'power',
      })
      expect(config).toEqual({ ...DEFAULT_ANALYSIS_CONFIG, minBlockDurationS: 30, primarySignalOverride: 'power' })
    })

    it('rejects a malformed zone table', () => {
      expect(() =>
        resolveAnalysisConfig(DEFAULT_ANALYSIS_CONFIG, {
          zoneTable: {
            metric: 'heart_rate',
            zones: [
              { name: 'A', lower: 0, upper: 120 },
              { name: 'B', lower: 130, upper: null },
            ],
          },
        }),
      ).toThrow(InvalidConfigurationError)
    })
  })
})
