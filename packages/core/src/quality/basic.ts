/**
 * Basic quality scoring: local metadata only, no network, always available.
 */

import type { CoreFactors, QualityFactors, QualityInput, QualityScore, StudyType } from './schemas.js'
import { finalizeScore, emptyFactors } from './factors.js'

const BASIC_BASELINE = 50

const BASIC_STUDY_TYPE_POINTS: Record<StudyType, number> = {
  rct: 20,
  systematic_review: 15,
  meta_analysis: 15,
  cohort: 10,
  case_control: 8,
  cross_sectional: 5,
  case_report: 2,
  study: 0,
}

export function basicRecencyPoints(year: number | null, currentYear: number): number {
  if (!year) return 0
  const age = currentYear - year
  if (age <= 1) return 10
  if (age <= 3) return 7
  if (age <= 5) return 4
  if (age <= 10) return 2
  return 0
}

export function basicSampleSizePoints(sampleSize: number | null): number {
  if (!sampleSize || sampleSize <= 0) return 0
  if (sampleSize >= 10_000) return 5
  if (sampleSize >= 1_000) return 4
  if (sampleSize >= 100) return 3
  if (sampleSize >= 50) return 2
  return 1
}

export function calculateBasicQuality(input: QualityInput, now: Date = new Date()): QualityScore {
  const core: CoreFactors = {
    studyType: BASIC_STUDY_TYPE_POINTS[input.studyType],
    recency: basicRecencyPoints(input.year, now.getUTCFullYear()),
    sampleSize: basicSampleSizePoints(input.sampleSize),
    fullText: input.hasFullText ? 5 : 0,
  }
  const factors: QualityFactors = { ...emptyFactors(), baseline: BASIC_BASELINE, core }
  return finalizeScore('basic', factors, input)
}
