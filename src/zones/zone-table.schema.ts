import { z } from 'zod'
import type { HrZonesProfile, ZoneTable } from './zone-table.types'

const zoneSchema = z.object({
  name: z.string().min(1),
  lower: z.number().finite(),
  upper: z.number().finite().nullable(),
})

export const zoneTableSchema = z
  .object({
    metric: z.enum(['heart_rate', 'power']),
    zones: z.array(zoneSchema).min(1),
  })
  .superRefine((table, ctx) => {
    const names = new Set<string>()
    table.zones.forEach((zone, i) => {
      if (names.has(zone.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['zones', i, 'name'], message: 'Duplicate zone name' })
      }
      names.add(zone.name)

      const isLast = i === table.zones.length - 1
      if (zone.upper === null) {
        if (!isLast) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['zones', i, 'upper'], message: 'Only the last zone may be open-ended' })
        }
      } else if (zone.upper <= zone.lower) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['zones', i], message: 'Zone upper bound must be above its lower bound' })
      }

      const next = table.zones[i + 1]
      if (next && zone.upper !== next.lower) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['zones', i + 1, 'lower'],
          message: 'Zones must be contiguous (upper bound equals the next lower bound)',
        })
      }
    })
  }) satisfies z.ZodType<ZoneTable>

const bpmRange = z.tuple([z.number(), z.number()])

export const hrZonesProfileSchema = z.object({
  z1: bpmRange,
  z2: bpmRange,
  z3: bpmRange,
  z4: bpmRange,
  z5: bpmRange,
}) satisfies z.ZodType<HrZonesProfile>
