/**
 * Zod schemas and types for quality scoring.
 */

import { z } from 'zod'

export const StudyTypeSchema = z.enum([
  'systematic_review',
  'meta_analysis',
  'rct',
  'cohort',
  'case_control',
  'cross_sectional',
  'case_report',
  'study',
])
export type StudyType = z.infer<typeof StudyTypeSchema>

export const ScoreModeSchema = z.enum(['basic', 'enhanced'])
export type ScoreMode = z.infer<typeof ScoreModeSchema>

/** Upper bound of each additive factor. The factors either mode fills sum to at most 100. */
export const FACTOR_BOUNDS = {
  baseline: 50,
  citationImpact: 25,
  venuePrestige: 15,
  authorAuthority: 10,
  crossValidation: 10,
  studyType: 20,
  recency: 10,
  sampleSize: 5,
  fullText: 5,
} as const

const factor = (max: number) => z.number().int().min(0).max(max)

export const CoreFactorsSchema = z.object({
  studyType: factor(FACTOR_BOUNDS.studyType),
  recency: factor(FACTOR_BOUNDS.recency),
  sampleSize: factor(FACTOR_BOUNDS.sampleSize),
  fullText: factor(FACTOR_BOUNDS.fullText),
})
export type CoreFactors = z.infer<typeof CoreFactorsSchema>

export const QualityFactorsSchema = z.object({
  baseline: factor(FACTOR_BOUNDS.baseline),
  citationImpact: factor(FACTOR_BOUNDS.citationImpact),
  venuePrestige: factor(FACTOR_BOUNDS.venuePrestige),
  authorAuthority: factor(FACTOR_BOUNDS.authorAuthority),
  crossValidation: factor(FACTOR_BOUNDS.crossValidation),
  core: CoreFactorsSchema,
})
export type QualityFactors = z.infer<typeof QualityFactorsSchema>

export const QualityScoreSchema = z.object({
  score: z.number().int().min(0).max(100),
  mode: ScoreModeSchema,
  factors: QualityFactorsSchema,
  explanation: z.string(),
})
export type QualityScore = z.infer<typeof QualityScoreSchema>

/** Local metadata the scorer works from. */
export interface QualityInput {
  title: string
  abstract: string
  year: number | null
  doi: string | null
  studyType: StudyType
  sampleSize: number | null
  hasFullText: boolean
}

// --- Enrichment API boundary ---

const VenueObjectSchema = z.object({ name: z.string().nullish() }).passthrough()

/**
 * Raw enrichment record as the metadata API returns it. Loose on purpose:
 * fields are optional, nullable, and venue may be text or an object.
 */
export const RawEnrichmentSchema = z.object({
  citationCount: z.number().nullish(),
  venue: z.union([z.string(), VenueObjectSchema]).nullish(),
  publicationVenue: VenueObjectSchema.nullish(),
  authors: z.array(z.object({ hIndex: z.number().nullish() }).passthrough()).nullish(),
  externalIds: z.record(z.unknown()).nullish(),
  publicationTypes: z.array(z.string()).nullish(),
  fieldsOfStudy: z.array(z.string()).nullish(),
}).passthrough()

/** Canonical enrichment shape consumed by the enhanced scorer. */
export interface Enrichment {
  citationCount: number
  venue: string | null
  authorHIndexes: number[]
  externalIdCount: number
  publicationTypes: string[]
  fieldsOfStudy: string[]
}

export const FailureReasonSchema = z.enum([
  'rate_limited',
  'transient',
  'permanent',
  'not_found',
  'no_identifier',
  'malformed',
  'degraded',
])
export type FailureReason = z.infer<typeof FailureReasonSchema>

/** Per-document outcome of a scoring pass, stored in checkpoints until persisted. */
export const ScoredDocumentSchema = z.object({
  documentId: z.string(),
  quality: QualityScoreSchema,
  fallbackReason: FailureReasonSchema.nullable(),
})
export type ScoredDocument = z.infer<typeof ScoredDocumentSchema>
