/**
 * Additive factor bookkeeping shared by both scoring modes.
 */

import { FACTOR_BOUNDS } from './schemas.js'
import type { QualityFactors, QualityInput, QualityScore, ScoreMode } from './schemas.js'

export function emptyFactors(): QualityFactors {
  return {
    baseline: 0,
    citationImpact: 0,
    venuePrestige: 0,
    authorAuthority: 0,
    crossValidation: 0,
    core: { studyType: 0, recency: 0, sampleSize: 0, fullText: 0 },
  }
}

export function sumFactors(f: QualityFactors): number {
  return f.baseline + f.citationImpact + f.venuePrestige + f.authorAuthority + f.crossValidation +
    f.core.studyType + f.core.recency + f.core.sampleSize + f.core.fullText
}

const clamp = (value: number, max: number) => Math.max(0, Math.min(max, Math.round(value)))

function boundFactors(f: QualityFactors): QualityFactors {
  return {
    baseline: clamp(f.baseline, FACTOR_BOUNDS.baseline),
    citationImpact: clamp(f.citationImpact, FACTOR_BOUNDS.citationImpact),
    venuePrestige: clamp(f.venuePrestige, FACTOR_BOUNDS.venuePrestige),
    authorAuthority: clamp(f.authorAuthority, FACTOR_BOUNDS.authorAuthority),
    crossValidation: clamp(f.crossValidation, FACTOR_BOUNDS.crossValidation),
    core: {
      studyType: clamp(f.core.studyType, FACTOR_BOUNDS.studyType),
      recency: clamp(f.core.recency, FACTOR_BOUNDS.recency),
      sampleSize: clamp(f.core.sampleSize, FACTOR_BOUNDS.sampleSize),
      fullText: clamp(f.core.fullText, FACTOR_BOUNDS.fullText),
    },
  }
}

function describe(f: QualityFactors, input: QualityInput, extra: string[]): string[] {
  const parts: string[] = []
  if (f.baseline > 0) parts.push(`Baseline (+${f.baseline})`)
  parts.push(...extra)
  if (f.core.studyType > 0) parts.push(`${input.studyType.replace(/_/g, ' ')} (+${f.core.studyType})`)
  if (f.core.recency > 0) parts.push(`Year ${input.year} (+${f.core.recency})`)
  if (f.core.sampleSize > 0) parts.push(`N=${input.sampleSize} (+${f.core.sampleSize})`)
  if (f.core.fullText > 0) parts.push(`Full text (+${f.core.fullText})`)
  return parts
}

/**
 * Bound each factor, then total. Neither mode can exceed 100 within the bounds,
 * so the clamp to [0, 100] never breaks the factors-sum-to-score invariant.
 */
export function finalizeScore(
  mode: ScoreMode,
  factors: QualityFactors,
  input: QualityInput,
  apiParts: string[] = [],
): QualityScore {
  const bounded = boundFactors(factors)
  const score = Math.max(0, Math.min(100, sumFactors(bounded)))
  const parts = describe(bounded, input, apiParts)
  const tag = mode === 'basic' ? '[Basic scoring - no API data]' : '[Enhanced scoring]'
  const explanation = parts.length > 0
    ? `Quality: ${score}/100. ${parts.join('; ')}. ${tag}`
    : `Quality: ${score}/100. No contributing factors. ${tag}`
  return { score, mode, factors: bounded, explanation }
}
