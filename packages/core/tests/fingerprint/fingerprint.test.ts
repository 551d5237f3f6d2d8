import { describe, it, expect } from 'vitest'
import { createHash } from 'node:crypto'
import {
  computeFingerprint,
  computeQualityFingerprint,
  hasChanged,
  normalizeText,
} from '../../src/fingerprint/index.js'

describe('normalizeText', () => {
  it('collapses whitespace and trims', () => {
    expect(normalizeText('  Heart \n\t failure  ')).toBe('Heart failure')
  })

  it('treats null and undefined as empty', () => {
    expect(normalizeText(null)).toBe('')
    expect(normalizeText(undefined)).toBe('')
  })

  it('composes decomposed characters (NFC)', () => {
    expect(normalizeText('Cafe\u0301')).toBe('Caf\u00e9')
  })

  it('keeps case', () => {
    expect(normalizeText('ACE Inhibitors')).toBe('ACE Inhibitors')
  })
})

describe('computeFingerprint', () => {
  it('is sha256 over the normalized field triple', () => {
    const expected = createHash('sha256')
      .update(JSON.stringify(['A title', 'An abstract', '']))
      .digest('hex')
    expect(computeFingerprint({ title: 'A title', abstract: 'An abstract', fullText: null })).toBe(expected)
  })

  it('is deterministic', () => {
    const doc = { title: 'Statins', abstract: 'Outcomes', fullText: 'Body' }
    expect(computeFingerprint(doc)).toBe(computeFingerprint({ ...doc }))
  })

  it('ignores whitespace-only edits', () => {
    expect(computeFingerprint({ title: 'Statins  and  outcomes', abstract: 'x ', fullText: null }))
      .toBe(computeFingerprint({ title: 'Statins and outcomes', abstract: 'x', fullText: null }))
  })

  it('changes when any text field changes', () => {
    const base = { title: 'T', abstract: 'A', fullText: null }
    const hash = computeFingerprint(base)
    expect(computeFingerprint({ ...base, title: 'T2' })).not.toBe(hash)
    expect(computeFingerprint({ ...base, abstract: 'A2' })).not.toBe(hash)
    expect(computeFingerprint({ ...base, fullText: 'F' })).not.toBe(hash)
  })

  it('does not let text move between fields unnoticed', () => {
    expect(computeFingerprint({ title: 'ab', abstract: '', fullText: null }))
      .not.toBe(computeFingerprint({ title: 'a', abstract: 'b', fullText: null }))
  })
})

describe('computeQualityFingerprint', () => {
  const input = {
    doi: '10.1000/ABC',
    year: 2020,
    studyType: 'rct' as const,
    sampleSize: 120,
    hasFullText: false,
  }

  it('ignores DOI case and surrounding whitespace', () => {
    expect(computeQualityFingerprint({ ...input, doi: ' 10.1000/abc ' })).toBe(computeQualityFingerprint(input))
  })

  it('changes with the scoring inputs', () => {
    const hash = computeQualityFingerprint(input)
    expect(computeQualityFingerprint({ ...input, year: 2021 })).not.toBe(hash)
    expect(computeQualityFingerprint({ ...input, hasFullText: true })).not.toBe(hash)
  })
})

describe('hasChanged', () => {
  it('reports a missing old hash as changed', () => {
    expect(hasChanged(undefined, 'abc')).toBe(true)
    expect(hasChanged(null, 'abc')).toBe(true)
  })

  it('compares exactly', () => {
    expect(hasChanged('abc', 'abc')).toBe(false)
    expect(hasChanged('abc', 'abd')).toBe(true)
  })
})
