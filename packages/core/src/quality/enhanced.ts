/**
 * Enhanced quality scoring: local metadata plus enrichment from the
 * bibliographic metadata API (citations, venue, author h-index, cross-validation).
 */

import type { CoreFactors, Enrichment, QualityFactors, QualityInput, QualityScore, StudyType } from './schemas.js'
import { emptyFactors, finalizeScore } from './factors.js'
import { loadVenueTiers, UNRANKED_VENUE_POINTS, VENUE_TIER_POINTS } from './venues.js'

const STUDY_TYPE_WEIGHTS: Record<StudyType, number> = {
  systematic_review: 1.0,
  meta_analysis: 1.0,
  rct: 0.75,
  cohort: 0.5,
  case_control: 0.375,
  cross_sectional: 0.25,
  case_report: 0.125,
  study: 0.1,
}

const CROSS_VALIDATED_STUDY_TYPES: ReadonlySet<StudyType> = new Set(['systematic_review', 'meta_analysis', 'rct'])

export function citationImpactPoints(citationCount: number): number {
  if (citationCount >= 1000) return 25
  if (citationCount >= 500) return 20
  if (citationCount >= 100) return 15
  if (citationCount >= 50) return 10
  if (citationCount >= 20) return 7
  if (citationCount >= 5) return 4
  if (citationCount >= 1) return 2
  return 0
}

export function venuePrestigePoints(venue: string | null): number {
  if (!venue) return 0
  const name = venue.trim().toLowerCase()
  if (!name || name === 'unknown') return 0
  const tiers = loadVenueTiers()
  for (const [tier, points] of VENUE_TIER_POINTS) {
    if (tiers[tier].some(v => name.includes(v))) return points
  }
  return UNRANKED_VENUE_POINTS
}

export function authorAuthorityPoints(hIndexes: number[]): number {
  if (hIndexes.length === 0) return 0
  const max = Math.max(...hIndexes)
  if (max >= 50) return 10
  if (max >= 30) return 8
  if (max >= 15) return 6
  if (max >= 5) return 4
  if (max >= 1) return 2
  return 0
}

export function crossValidationPoints(enrichment: Enrichment, studyType: StudyType): number {
  let points = 0
  if (enrichment.externalIdCount > 0) points += 3
  if (enrichment.publicationTypes.length > 0) points += 2
  if (enrichment.fieldsOfStudy.length > 0) points += 2
  if (CROSS_VALIDATED_STUDY_TYPES.has(studyType)) points += 3
  return Math.min(10, points)
}

export function enhancedStudyTypePoints(studyType: StudyType): number {
  return Math.floor(20 * STUDY_TYPE_WEIGHTS[studyType])
}

export function enhancedRecencyPoints(year: number | null, currentYear: number): number {
  if (!year) return 0
  const age = currentYear - year
  if (age <= 0) return 10
  if (age === 1) return 8
  if (age === 2) return 6
  if (age === 3) return 4
  if (age === 4) return 2
  return 0
}

export function enhancedSampleSizePoints(sampleSize: number | null): number {
  if (!sampleSize || sampleSize <= 0) return 0
  if (sampleSize >= 10_000) return 5
  if (sampleSize >= 1_000) return 4
  if (sampleSize >= 500) return 3
  if (sampleSize >= 100) return 2
  if (sampleSize >= 50) return 1
  return 0
}

export function calculateEnhancedQuality(
  input: QualityInput,
  enrichment: Enrichment,
  now: Date = new Date(),
): QualityScore {
  const currentYear = now.getUTCFullYear()
  const core: CoreFactors = {
    studyType: enhancedStudyTypePoints(input.studyType),
    recency: enhancedRecencyPoints(input.year, currentYear),
    sampleSize: enhancedSampleSizePoints(input.sampleSize),
    fullText: input.hasFullText ? 5 : 0,
  }
  const factors: QualityFactors = {
    ...emptyFactors(),
    citationImpact: citationImpactPoints(enrichment.citationCount),
    venuePrestige: venuePrestigePoints(enrichment.venue),
    authorAuthority: authorAuthorityPoints(enrichment.authorHIndexes),
    crossValidation: crossValidationPoints(enrichment, input.studyType),
    core,
  }

  const apiParts: string[] = []
  if (factors.citationImpact > 0) apiParts.push(`${enrichment.citationCount} citations (+${factors.citationImpact})`)
  if (factors.venuePrestige > 0) apiParts.push(`${enrichment.venue} (+${factors.venuePrestige})`)
  if (factors.authorAuthority > 0) apiParts.push(`Max author h-index ${Math.max(...enrichment.authorHIndexes)} (+${factors.authorAuthority})`)
  if (factors.crossValidation > 0) apiParts.push(`Cross-validated (+${factors.crossValidation})`)

  return finalizeScore('enhanced', factors, input, apiParts)
}
