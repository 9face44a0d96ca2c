import { NoPrimarySignalError } from '../common/analysis.errors'
import type { SignalOverride } from '../config/analysis-config.types'
import type { Sample } from '../samples/samples.types'
import type { PrimarySignal } from './block-segmentation.types'

export const signalValue = (sample: Sample, signal: PrimarySignal): number | undefined => {
  switch (signal) {
    case 'power':
      return sample.power
    case 'pace':
      return sample.pace
    case 'heart_rate':
      return sample.heartRate
  }
}

/** Pace is the only signal where a smaller number means a harder effort. */
export const harderIsLower = (signal: PrimarySignal): boolean => signal === 'pace'

export const signalCoverage = (samples: readonly Sample[], signal: PrimarySignal): number => {
  if (samples.length === 0) return 0
  const present = samples.filter((s) => signalValue(s, signal) !== undefined).length
  return present / samples.length
}

export type SignalSelection = {
  signal: PrimarySignal
  overrideIgnored: boolean
}

export function selectPrimarySignal(
  samples: readonly Sample[],
  override: SignalOverride | null,
): SignalSelection {
  const power = signalCoverage(samples, 'power')
  const pace = signalCoverage(samples, 'pace')

  if (override !== null) {
    const coverage = override === 'power' ? power : pace
    if (coverage > 0) return { signal: override, overrideIgnored: false }
  }
  const overrideIgnored = override !== null

  if (power >= 0.5) return { signal: 'power', overrideIgnored }
  if (pace >= 0.5) return { signal: 'pace', overrideIgnored }
  if (power > 0 || pace > 0) {
    return { signal: power >= pace ? 'power' : 'pace', overrideIgnored }
  }
  if (signalCoverage(samples, 'heart_rate') > 0) return { signal: 'heart_rate', overrideIgnored }

  throw new NoPrimarySignalError()
}
