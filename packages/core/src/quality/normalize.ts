/**
 * Normalization at the enrichment API boundary: raw JSON in, canonical
 * {@link Enrichment} out. Venue arrives as either text or an object.
 */

import type { Result } from '../common/result.js'
import { Ok, Err } from '../common/result.js'
import { KnowledgeBaseError } from '../common/errors.js'
import { RawEnrichmentSchema } from './schemas.js'
import type { Enrichment } from './schemas.js'

/** Canonical DOI form used as the lookup key: lowercase, no resolver prefix. */
export function normalizeDoi(doi: string): string {
  return doi
    .trim()
    .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
    .replace(/^doi:\s*/i, '')
    .toLowerCase()
}

function pickVenue(
  venue: string | { name?: string | null } | null | undefined,
  publicationVenue: { name?: string | null } | null | undefined,
): string | null {
  const candidates = [
    typeof venue === 'string' ? venue : venue?.name,
    publicationVenue?.name,
  ]
  for (const candidate of candidates) {
    const trimmed = candidate?.trim()
    if (trimmed) return trimmed
  }
  return null
}

export function normalizeEnrichment(raw: unknown): Result<Enrichment, KnowledgeBaseError> {
  const parsed = RawEnrichmentSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(KnowledgeBaseError.parse(`Malformed enrichment record: ${parsed.error.issues[0]?.message ?? 'invalid'}`))
  }
  const r = parsed.data

  const citationCount = typeof r.citationCount === 'number' && Number.isFinite(r.citationCount)
    ? Math.max(0, Math.floor(r.citationCount))
    : 0

  const authorHIndexes = (r.authors ?? [])
    .map(a => a.hIndex)
    .filter((h): h is number => typeof h === 'number' && Number.isFinite(h) && h >= 0)

  const externalIdCount = Object.values(r.externalIds ?? {})
    .filter(v => v !== null && v !== undefined && v !== '')
    .length

  return Ok({
    citationCount,
    venue: pickVenue(r.venue, r.publicationVenue),
    authorHIndexes,
    externalIdCount,
    publicationTypes: r.publicationTypes ?? [],
    fieldsOfStudy: r.fieldsOfStudy ?? [],
  })
}
