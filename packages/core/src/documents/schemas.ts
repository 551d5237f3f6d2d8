/**
 * Zod schemas and types for source documents and knowledge-base records.
 */

import { z } from 'zod'
import { DocumentIdSchema, FingerprintSchema, TimestampSchema } from '../common/index.js'
import {
  StudyTypeSchema,
  ScoreModeSchema,
  QualityFactorsSchema,
} from '../quality/schemas.js'

/** A document as the import adapter supplies it. */
export const SourceDocumentSchema = z.object({
  sourceKey: z.string().min(1),
  title: z.string().default(''),
  authors: z.array(z.string()).default([]),
  year: z.number().int().nullable().default(null),
  doi: z.string().nullable().default(null),
  journal: z.string().nullable().default(null),
  abstract: z.string().default(''),
  fullText: z.string().nullable().default(null),
})

export type SourceDocument = z.infer<typeof SourceDocumentSchema>
export type SourceDocumentInput = z.input<typeof SourceDocumentSchema>

export const DocumentRecordSchema = z.object({
  id: DocumentIdSchema,
  sourceKey: z.string().min(1),
  title: z.string(),
  authors: z.array(z.string()),
  year: z.number().int().nullable(),
  doi: z.string().nullable(),
  journal: z.string().nullable(),
  abstract: z.string(),
  studyType: StudyTypeSchema,
  sampleSize: z.number().int().nullable(),
  hasFullText: z.boolean(),
  contentFingerprint: FingerprintSchema,
  embeddingIndex: z.number().int().nonnegative().nullable(),
  embeddingModelId: z.string().nullable(),
  embeddingDim: z.number().int().positive().nullable(),
  qualityScore: z.number().int().min(0).max(100).nullable(),
  qualityMode: ScoreModeSchema.nullable(),
  qualityFactors: QualityFactorsSchema.nullable(),
  qualityExplanation: z.string().nullable(),
  /** Hash of the inputs the stored quality score was computed from. */
  qualityFingerprint: z.string().nullable(),
  removed: z.boolean(),
  createdAt: TimestampSchema,
  updatedAt: TimestampSchema,
})

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>

export const KB_FORMAT_VERSION = '1'
