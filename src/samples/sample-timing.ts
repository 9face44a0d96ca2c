import type { SampleStream } from './samples.types'

/** cumulative[i] = active seconds before sample i; length is samples.length + 1. */
export const cumulativeActiveTime = (stream: SampleStream): number[] => {
  const cumulative = [0]
  stream.steps.forEach((step, i) => cumulative.push(cumulative[i] + step))
  return cumulative
}

/** Active seconds covered by samples `startIndex..endIndex` (inclusive). */
export const spanDurationS = (cumulative: readonly number[], startIndex: number, endIndex: number): number =>
  cumulative[endIndex + 1] - cumulative[startIndex]

export const activeDurationS = (stream: SampleStream): number =>
  stream.steps.reduce((sum, step) => sum + step, 0)

export const elapsedDurationS = (stream: SampleStream): number => {
  const { samples } = stream
  return samples.length > 1 ? samples[samples.length - 1].timestamp - samples[0].timestamp : 0
}

/** Time weight of one sample for time-in-zone and time-in-band accounting. */
export const sampleTimeWeight = (stream: SampleStream, index: number, capS: number): number =>
  Math.min(stream.steps[index] ?? 0, capS)
