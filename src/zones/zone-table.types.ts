export type ZoneMetric = 'heart_rate' | 'power'

export type Zone = {
  name: string
  lower: number
  upper: number | null // null = open-ended, last zone only
}

export type ZoneTable = {
  metric: ZoneMetric
  zones: Zone[]
}

/** Inclusive `[low, high]` bpm tuples as stored on athlete profiles. */
export type HrZonesProfile = {
  z1: [number, number]
  z2: [number, number]
  z3: [number, number]
  z4: [number, number]
  z5: [number, number]
}
