import { describe, it, expect } from 'vitest'
import { normalizeDoi, normalizeEnrichment } from '../../src/quality/index.js'

describe('normalizeDoi', () => {
  it('strips resolver prefixes and lowercases', () => {
    expect(normalizeDoi('https://doi.org/10.1000/ABC.1')).toBe('10.1000/abc.1')
    expect(normalizeDoi(' http://dx.doi.org/10.5555/Y ')).toBe('10.5555/y')
    expect(normalizeDoi('doi: 10.1/X')).toBe('10.1/x')
    expect(normalizeDoi('10.1/plain')).toBe('10.1/plain')
  })
})

describe('normalizeEnrichment', () => {
  it('maps a full record into the canonical shape', () => {
    const result = normalizeEnrichment({
      paperId: 'abc',
      citationCount: 12.7,
      venue: { name: ' BMJ ' },
      authors: [{ hIndex: 10 }, { hIndex: null }, { name: 'No index' }],
      externalIds: { DOI: '10.1/x', PubMed: '', MAG: null, CorpusId: 5 },
      publicationTypes: null,
    })

    expect(result).toEqual({
      ok: true,
      value: {
        citationCount: 12,
        venue: 'BMJ',
        authorHIndexes: [10],
        externalIdCount: 2,
        publicationTypes: [],
        fieldsOfStudy: [],
      },
    })
  })

  it('accepts venue as plain text', () => {
    const result = normalizeEnrichment({ venue: 'Cell' })
    expect(result.ok && result.value.venue).toBe('Cell')
  })

  it('falls back to publicationVenue when venue is empty', () => {
    const result = normalizeEnrichment({ venue: '', publicationVenue: { name: 'Nature Medicine' } })
    expect(result.ok && result.value.venue).toBe('Nature Medicine')
  })

  it('clamps negative citation counts to zero', () => {
    const result = normalizeEnrichment({ citationCount: -3 })
    expect(result.ok && result.value.citationCount).toBe(0)
  })

  it('rejects records of the wrong shape', () => {
    const notObject = normalizeEnrichment('nope')
    expect(notObject.ok).toBe(false)
    if (!notObject.ok) {
      expect(notObject.error.code).toBe('PARSE_ERROR')
      expect(notObject.error.message.startsWith('Malformed enrichment record: ')).toBe(true)
    }
    expect(normalizeEnrichment({ citationCount: 'many' }).ok).toBe(false)
    expect(normalizeEnrichment({ authors: 'Smith' }).ok).toBe(false)
  })
})
