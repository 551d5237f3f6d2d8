/**
 * Content fingerprints: SHA-256 over the normalized text fields that feed the
 * embedding. Fields are hashed in a fixed order, so the result does not depend
 * on how the source object orders its keys.
 */

import { createHash } from 'node:crypto'
import type { QualityInput } from '../quality/schemas.js'

export interface FingerprintInput {
  title: string
  abstract: string
  fullText: string | null
}

/** NFC, collapsed whitespace, trimmed. Case is kept: it reaches the embedding. */
export function normalizeText(text: string | null | undefined): string {
  if (!text) return ''
  return text.normalize('NFC').replace(/\s+/g, ' ').trim()
}

export function computeFingerprint(doc: FingerprintInput): string {
  const canonical = JSON.stringify([
    normalizeText(doc.title),
    normalizeText(doc.abstract),
    normalizeText(doc.fullText),
  ])
  return createHash('sha256').update(canonical).digest('hex')
}

/** Fingerprint of the metadata a quality score depends on (not the text). */
export function computeQualityFingerprint(input: Pick<QualityInput, 'doi' | 'year' | 'studyType' | 'sampleSize' | 'hasFullText'>): string {
  const canonical = JSON.stringify([
    input.doi?.trim().toLowerCase() ?? null,
    input.year,
    input.studyType,
    input.sampleSize,
    input.hasFullText,
  ])
  return createHash('sha256').update(canonical).digest('hex')
}

export function hasChanged(oldHash: string | null | undefined, newHash: string): boolean {
  return oldHash !== newHash
}
