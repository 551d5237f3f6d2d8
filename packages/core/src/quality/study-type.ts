/**
 * Study-type classification and RCT sample-size extraction from title + abstract.
 */

import type { StudyType } from './schemas.js'

const RCT_TERMS = ['randomized', 'randomised', 'randomized controlled', 'randomised controlled']

/** Checked in evidence-hierarchy order; the first match wins. */
export function detectStudyType(text: string): StudyType {
  const lower = text.toLowerCase()

  if (lower.includes('systematic review') || lower.includes('meta-analysis') || lower.includes('meta analysis')) {
    return 'systematic_review'
  }
  if (RCT_TERMS.some(term => lower.includes(term)) || /\brct\b/.test(lower)) {
    return 'rct'
  }
  if (lower.includes('cohort')) return 'cohort'
  if (lower.includes('case-control') || lower.includes('case control')) return 'case_control'
  if (lower.includes('cross-sectional') || lower.includes('cross sectional')) return 'cross_sectional'
  if (lower.includes('case report') || lower.includes('case series')) return 'case_report'
  return 'study'
}

const SAMPLE_SIZE_PATTERNS: RegExp[] = [
  /randomi[sz]ed\s+(\d+)\s+patients?/,
  /(\d+)\s+patients?\s+were\s+randomi[sz]ed/,
  /randomi[sz]ed\s+n\s*=\s*(\d+)/,
  /n\s*=\s*(\d+)\s*were\s+randomi[sz]ed/,
  /enrolled\s+and\s+randomi[sz]ed\s+(\d+)/,
  /(\d+)\s+participants?\s+were\s+randomly/,
  /(\d+)\s+subjects?\s+were\s+randomi[sz]ed/,
  /enrolling\s+(\d+)\s+patients?/,
  /trial\s+with\s+(\d+)\s+patients?/,
]

export const MIN_SAMPLE_SIZE = 10
export const MAX_SAMPLE_SIZE = 100_000

/** Only RCTs carry a sample size; implausible values are discarded. */
export function extractSampleSize(text: string, studyType: StudyType): number | null {
  if (studyType !== 'rct') return null

  const lower = text.toLowerCase().replace(/(\d),(\d{3})/g, '$1$2')
  for (const pattern of SAMPLE_SIZE_PATTERNS) {
    const match = pattern.exec(lower)
    if (!match) continue
    const n = Number.parseInt(match[1], 10)
    if (n >= MIN_SAMPLE_SIZE && n <= MAX_SAMPLE_SIZE) return n
  }
  return null
}
