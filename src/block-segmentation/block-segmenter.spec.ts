import { buildRecords, intervalWorkout, paceIntervalWorkout } from '../../test/fixtures/synthetic-activity'
import { normalizeSamples } from '../samples/sample-normalizer'
import type { RawRecord } from '../samples/samples.types'
import { segmentBlocks, type SegmenterOptions } from './block-segmenter'

const configured: SegmenterOptions = {
  primarySignalOverride: null,
  workThreshold: 250,
  restThreshold: 180,
  minBlockDurationS: 15,
}

const segment = (records: RawRecord[], opts: Partial<SegmenterOptions> = {}) =>
  segmentBlocks(normalizeSamples(records, { gapThresholdS: 10 }), { ...configured, ...opts })

const spans = (records: RawRecord[], opts: Partial<SegmenterOptions> = {}) =>
  segment(records, opts).blocks.map((b) => [b.phase, b.startIndex, b.endIndex])

const INTERVAL_BLOCKS = [
  ['warmup', 0, 299],
  ['work', 300, 419],
  ['rest', 420, 479],
  ['work', 480, 599],
  ['rest', 600, 659],
  ['work', 660, 779],
  ['rest', 780, 839],
  ['work', 840, 959],
  ['rest', 960, 1019],
  ['cooldown', 1020, 1319],
]

describe('segmentBlocks', () => {
  it('splits a 4 × interval workout into ten phases', () => {
    expect(spans(intervalWorkout())).toEqual(INTERVAL_BLOCKS)
  })

  it('gives the same blocks with thresholds derived from the activity', () => {
    const result = segment(intervalWorkout(), { workThreshold: null, restThreshold: null })
    expect(result.thresholds?.source).toBe('derived')
    expect(result.blocks.map((b) => [b.phase, b.startIndex, b.endIndex])).toEqual(INTERVAL_BLOCKS)
  })

  it('covers every sample exactly once', () => {
    const { blocks } = segment(intervalWorkout())
    expect(blocks[0].startIndex).toBe(0)
    expect(blocks[blocks.length - 1].endIndex).toBe(1319)
    blocks.slice(1).forEach((block, i) => expect(block.startIndex).toBe(blocks[i].endIndex + 1))
    expect(blocks.reduce((sum, b) => sum + b.sampleCount, 0)).toBe(1320)
  })

  it('absorbs a 3 s drop inside a work interval', () => {
    const dip = { power: 100 }
    const records = intervalWorkout({ patch: { 350: dip, 351: dip, 352: dip } })
    expect(spans(records)).toEqual(INTERVAL_BLOCKS)
  })

  it('absorbs a 3 s spike above the work threshold inside a rest interval', () => {
    const spike = { power: 320 }
    const records = intervalWorkout({ patch: { 440: spike, 441: spike, 442: spike } })
    expect(spans(records)).toEqual(INTERVAL_BLOCKS)
  })

  it('keeps the interval structure when work power keeps dipping into the dead zone', () => {
    const patch: Record<number, { power: number }> = {}
    for (const start of [300, 480, 660, 840]) {
      for (let i = start + 5; i < start + 120; i += 10) patch[i] = { power: 245 }
    }
    expect(spans(intervalWorkout({ patch }))).toEqual(INTERVAL_BLOCKS)
  })

  it('emits a single work block for a steady activity', () => {
    const records = buildRecords([{ durationS: 600, power: 200 }])
    const result = segment(records, { workThreshold: null, restThreshold: null })
    expect(result.thresholds).toBeNull()
    expect(result.blocks).toEqual([{ phase: 'work', startIndex: 0, endIndex: 599, sampleCount: 600 }])
  })

  it('emits a single work block when effort never reaches the work threshold', () => {
    const records = buildRecords([{ durationS: 300, power: 160 }, { durationS: 300, power: 200 }])
    expect(spans(records)).toEqual([['work', 0, 599]])
  })

  it('emits a single work block for an activity shorter than the minimum block', () => {
    const records = buildRecords([{ durationS: 5, power: 300 }, { durationS: 5, power: 120 }])
    expect(spans(records)).toEqual([['work', 0, 9]])
  })

  it('splits a phase at a lap marker without relabelling it', () => {
    const records = buildRecords([{ durationS: 100, power: 300 }, { durationS: 100, power: 300, lap: true }])
    expect(spans(records)).toEqual([
      ['work', 0, 99],
      ['work', 100, 199],
    ])
  })

  it('uses lap markers to separate the final rest from the cooldown', () => {
    expect(spans(intervalWorkout({ laps: true }))).toEqual(INTERVAL_BLOCKS)
  })

  it('segments on pace with faster meaning harder', () => {
    const result = segment(paceIntervalWorkout(), { workThreshold: 270, restThreshold: 330 })
    expect(result.signal).toBe('pace')
    expect(result.blocks.map((b) => [b.phase, b.startIndex, b.endIndex])).toEqual(INTERVAL_BLOCKS)
  })

  it('is deterministic', () => {
    const stream = normalizeSamples(intervalWorkout(), { gapThresholdS: 10 })
    expect(segmentBlocks(stream, configured)).toEqual(segmentBlocks(stream, configured))
  })

  it('does not split blocks at a gap', () => {
    const records = intervalWorkout().map((r, i) =>
      i >= 700 ? { ...r, timestamp: r.timestamp + 60 } : r,
    )
    const stream = normalizeSamples(records, { gapThresholdS: 10 })
    expect(stream.gaps).toHaveLength(1)
    expect(segmentBlocks(stream, configured).blocks.map((b) => [b.phase, b.startIndex, b.endIndex])).toEqual(
      INTERVAL_BLOCKS,
    )
  })
})
