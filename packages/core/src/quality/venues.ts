import { readFileSync } from 'node:fs'
import { z } from 'zod'

const VenueTiersSchema = z.object({
  top: z.array(z.string().min(1)),
  q2: z.array(z.string().min(1)),
  highQuality: z.array(z.string().min(1)),
  q3: z.array(z.string().min(1)),
  reputable: z.array(z.string().min(1)),
})

export type VenueTiers = z.infer<typeof VenueTiersSchema>

/** Tier order and points; the first tier with a substring match wins. */
export const VENUE_TIER_POINTS: ReadonlyArray<[keyof VenueTiers, number]> = [
  ['top', 15],
  ['q2', 12],
  ['highQuality', 10],
  ['q3', 8],
  ['reputable', 5],
]

export const UNRANKED_VENUE_POINTS = 2

let cached: VenueTiers | null = null

export function loadVenueTiers(): VenueTiers {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(new URL('../../data/venue-tiers.json', import.meta.url), 'utf-8'))
    const lower = (names: string[]) => names.map(n => n.toLowerCase())
    const tiers = VenueTiersSchema.parse(raw)
    cached = {
      top: lower(tiers.top),
      q2: lower(tiers.q2),
      highQuality: lower(tiers.highQuality),
      q3: lower(tiers.q3),
      reputable: lower(tiers.reputable),
    }
  }
  return cached
}
