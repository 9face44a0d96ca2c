import type { EffortThresholds } from './block-segmentation.types'
import {
  classifyLevel,
  detectEffortRuns,
  type EffortLevel,
  levelAfterLap,
  mergeRuns,
  nextMachineState,
} from './effort-state-machine'

const power: EffortThresholds = { work: 250, rest: 180, source: 'configured' }
const pace: EffortThresholds = { work: 270, rest: 330, source: 'configured' }

const repeat = (level: EffortLevel, count: number): EffortLevel[] => Array.from({ length: count }, () => level)
const secondsCumulative = (n: number): number[] => Array.from({ length: n + 1 }, (_, i) => i)

const runsOf = (levels: EffortLevel[], minDurationS: number, laps: number[] = []) =>
  detectEffortRuns(
    levels,
    levels.map((_, i) => laps.includes(i)),
    secondsCumulative(levels.length),
    { minDurationS },
  ).map(({ state, startIndex, endIndex }) => [state, startIndex, endIndex])

describe('effort state machine', () => {
  describe('classifyLevel', () => {
    it('places power values against both thresholds', () => {
      expect(classifyLevel(300, power, false)).toBe('high')
      expect(classifyLevel(250, power, false)).toBe('high')
      expect(classifyLevel(200, power, false)).toBe('mid')
      expect(classifyLevel(180, power, false)).toBe('low')
      expect(classifyLevel(undefined, power, false)).toBe('none')
    })

    it('treats faster pace as harder', () => {
      expect(classifyLevel(240, pace, true)).toBe('high')
      expect(classifyLevel(300, pace, true)).toBe('mid')
      expect(classifyLevel(400, pace, true)).toBe('low')
    })
  })

  describe('nextMachineState', () => {
    it('opens a candidate on the opposite side', () => {
      expect(nextMachineState({ kind: 'steady', state: 'low' }, 'high', 7)).toEqual({
        kind: 'candidate',
        state: 'low',
        candidate: 'high',
        since: 7,
      })
    })

    it('ignores same-side, dead-zone and missing samples while steady', () => {
      const steady = { kind: 'steady', state: 'low' } as const
      expect(nextMachineState(steady, 'low', 1)).toBe(steady)
      expect(nextMachineState(steady, 'mid', 1)).toBe(steady)
      expect(nextMachineState(steady, 'none', 1)).toBe(steady)
    })

    it('keeps a candidate through missing and dead-zone samples', () => {
      const candidate = { kind: 'candidate', state: 'low', candidate: 'high', since: 3 } as const
      expect(nextMachineState(candidate, 'none', 4)).toBe(candidate)
      expect(nextMachineState(candidate, 'mid', 4)).toBe(candidate)
      expect(nextMachineState(candidate, 'high', 4)).toBe(candidate)
    })

    it('drops a candidate on a sample back past the current threshold', () => {
      const rising = { kind: 'candidate', state: 'low', candidate: 'high', since: 3 } as const
      const falling = { kind: 'candidate', state: 'high', candidate: 'low', since: 3 } as const
      expect(nextMachineState(rising, 'low', 4)).toEqual({ kind: 'steady', state: 'low' })
      expect(nextMachineState(falling, 'high', 4)).toEqual({ kind: 'steady', state: 'high' })
    })
  })

  describe('detectEffortRuns', () => {
    it('places the boundary at the first sample of a sustained change', () => {
      const levels = [...repeat('low', 5), ...repeat('high', 5), ...repeat('low', 5)]
      expect(runsOf(levels, 3)).toEqual([
        ['low', 0, 4],
        ['high', 5, 9],
        ['low', 10, 14],
      ])
    })

    it('absorbs an excursion shorter than the minimum duration', () => {
      const levels = [...repeat('low', 5), ...repeat('high', 2), ...repeat('low', 5)]
      expect(runsOf(levels, 3)).toEqual([['low', 0, 11]])
    })

    it('keeps counting persistence through a dead-zone sample', () => {
      const levels: EffortLevel[] = ['low', 'low', 'low', 'high', 'mid', 'high', 'high']
      expect(runsOf(levels, 3)).toEqual([
        ['low', 0, 2],
        ['high', 3, 6],
      ])
    })

    it('restarts persistence after a sample back on the current side', () => {
      const levels: EffortLevel[] = ['low', 'low', 'high', 'low', 'high', 'high', 'high', 'high']
      expect(runsOf(levels, 3)).toEqual([
        ['low', 0, 3],
        ['high', 4, 7],
      ])
    })

    it('lets missing samples count towards persistence', () => {
      const levels: EffortLevel[] = ['low', 'high', 'none', 'none', 'high']
      expect(runsOf(levels, 3)).toEqual([
        ['low', 0, 0],
        ['high', 1, 4],
      ])
    })

    it('switches the opening run when the activity starts hard', () => {
      expect(runsOf(repeat('high', 5), 3)).toEqual([['high', 0, 4]])
    })

    it('cuts at lap markers without merging across them', () => {
      const runs = detectEffortRuns(repeat('high', 6), repeat('high', 6).map((_, i) => i === 3), secondsCumulative(6), {
        minDurationS: 2,
      })
      expect(runs).toEqual([
        { state: 'high', startIndex: 0, endIndex: 2, lapStart: false },
        { state: 'high', startIndex: 3, endIndex: 5, lapStart: true },
      ])
    })

    it('returns no runs for no samples', () => {
      expect(detectEffortRuns([], [], [0], { minDurationS: 3 })).toEqual([])
    })
  })

  describe('levelAfterLap', () => {
    it('takes the majority over the following window', () => {
      const levels: EffortLevel[] = ['low', 'high', 'high', 'low', 'low', 'low']
      expect(levelAfterLap(levels, secondsCumulative(6), 1, 3)).toBe('high')
      expect(levelAfterLap(levels, secondsCumulative(6), 2, 3)).toBe('low')
    })

    it('returns null on a tie or a window without high or low samples', () => {
      const levels: EffortLevel[] = ['high', 'low', 'mid', 'none']
      expect(levelAfterLap(levels, secondsCumulative(4), 0, 2)).toBeNull()
      expect(levelAfterLap(levels, secondsCumulative(4), 2, 2)).toBeNull()
    })
  })

  it('merges neighbouring runs of one state unless a lap separates them', () => {
    expect(
      mergeRuns([
        { state: 'low', startIndex: 0, endIndex: 2, lapStart: false },
        { state: 'low', startIndex: 3, endIndex: 5, lapStart: false },
        { state: 'low', startIndex: 6, endIndex: 8, lapStart: true },
      ]),
    ).toEqual([
      { state: 'low', startIndex: 0, endIndex: 5, lapStart: false },
      { state: 'low', startIndex: 6, endIndex: 8, lapStart: true },
    ])
  })
})
