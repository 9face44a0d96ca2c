import type { HrZonesProfile, Zone, ZoneTable } from './zone-table.types'

export const DEFAULT_HR_ZONE_TABLE: ZoneTable = {
  metric: 'heart_rate',
  zones: [
    { name: 'Z1', lower: 0, upper: 120 },
    { name: 'Z2', lower: 120, upper: 140 },
    { name: 'Z3', lower: 140, upper: 155 },
    { name: 'Z4', lower: 155, upper: 170 },
    { name: 'Z5', lower: 170, upper: null },
  ],
}

/**
 * Name of the zone whose `[lower, upper)` band holds `value`.
 * Values below the first zone land in the first zone, values past the last bound in the last one.
 */
export function zoneFor(table: ZoneTable, value: number): string {
  for (const zone of table.zones) {
    if (zone.upper === null || value < zone.upper) return zone.name
  }
  return table.zones[table.zones.length - 1].name
}

/**
 * Profile zones are inclusive integer ranges (z2 = [121, 140]); the table uses half-open
 * bands, so each zone ends where the next one starts and Z5 stays open.
 */
export function zoneTableFromHrZones(hrZones: HrZonesProfile): ZoneTable {
  const ranges = [hrZones.z1, hrZones.z2, hrZones.z3, hrZones.z4, hrZones.z5]
  const zones: Zone[] = ranges.map(([low], i) => {
    const next = ranges[i + 1]
    return {
      name: `Z${i + 1}`,
      lower: low,
      upper: next ? next[0] : null,
    }
  })
  return { metric: 'heart_rate', zones }
}
