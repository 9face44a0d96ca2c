import type { Block } from '../block-segmentation/block-segmentation.types'
import { MalformedTargetError } from '../common/analysis.errors'
import { sampleTimeWeight } from '../samples/sample-timing'
import type { SampleStream } from '../samples/samples.types'
import type { ComplianceResult, Target, TargetPrescription } from './target-compliance.types'

export type ComplianceOptions = {
  zoneWeightCapS: number
}

export function targetForWorkBlock(prescription: TargetPrescription | undefined, ordinal: number): Target | null {
  if (!prescription) return null
  return prescription.byWorkOrdinal?.[ordinal] ?? prescription.everyWorkBlock ?? null
}

export function assertWellFormedTarget(target: Target): void {
  if (!Number.isFinite(target.lower) || !Number.isFinite(target.upper) || target.lower > target.upper) {
    throw new MalformedTargetError(target.lower, target.upper)
  }
}

const toPct = (part: number, total: number): number =>
  total > 0 ? Math.min(100, Math.max(0, (100 * part) / total)) : 0

/**
 * Share of the block's time spent inside the target band, so a block that averages on
 * target while swinging in and out of the band still scores low.
 *
 * Only work blocks are scored; any other phase returns null.
 */
export function evaluateTargetCompliance(
  stream: SampleStream,
  block: Block,
  target: Target,
  opts: ComplianceOptions,
): ComplianceResult | null {
  assertWellFormedTarget(target)
  if (block.phase !== 'work') return null

  const lowerIsHarder = target.metric === 'pace'
  const weighted = { inBand: 0, below: 0, above: 0, total: 0 }
  const counted = { inBand: 0, below: 0, above: 0, total: 0 }
  let sum = 0

  for (let i = block.startIndex; i <= block.endIndex; i++) {
    const value = stream.samples[i][target.metric]
    if (value === undefined) continue
    sum += value

    const weight = sampleTimeWeight(stream, i, opts.zoneWeightCapS)
    let bucket: 'inBand' | 'below' | 'above'
    if (value < target.lower) bucket = lowerIsHarder ? 'above' : 'below'
    else if (value > target.upper) bucket = lowerIsHarder ? 'below' : 'above'
    else bucket = 'inBand'

    weighted[bucket] += weight
    weighted.total += weight
    counted[bucket] += 1
    counted.total += 1
  }

  if (counted.total === 0) {
    return { target, achievedAvg: null, compliancePct: 0, pctTimeBelow: 0, pctTimeAbove: 0 }
  }

  // a block made of a single sample (or only gap-bounded samples) has no weighted time
  const basis = weighted.total > 0 ? weighted : counted
  return {
    target,
    achievedAvg: sum / counted.total,
    compliancePct: toPct(basis.inBand, basis.total),
    pctTimeBelow: toPct(basis.below, basis.total),
    pctTimeAbove: toPct(basis.above, basis.total),
  }
}
