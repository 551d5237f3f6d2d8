import { describe, it, expect } from 'vitest'
import { detectStudyType, extractSampleSize } from '../../src/quality/index.js'

describe('detectStudyType', () => {
  it('recognizes each design', () => {
    expect(detectStudyType('Exercise for depression: a systematic review')).toBe('systematic_review')
    expect(detectStudyType('A meta-analysis of statin trials')).toBe('systematic_review')
    expect(detectStudyType('A randomised controlled trial of telehealth')).toBe('rct')
    expect(detectStudyType('Results of an RCT in primary care')).toBe('rct')
    expect(detectStudyType('A prospective cohort study')).toBe('cohort')
    expect(detectStudyType('A case-control analysis')).toBe('case_control')
    expect(detectStudyType('A cross sectional survey of nurses')).toBe('cross_sectional')
    expect(detectStudyType('Case report: a rare presentation')).toBe('case_report')
    expect(detectStudyType('Notes on hospital staffing')).toBe('study')
  })

  it('takes the strongest design when several are mentioned', () => {
    expect(detectStudyType('Randomized trial nested in a cohort')).toBe('rct')
    expect(detectStudyType('Systematic review of randomized trials')).toBe('systematic_review')
  })

  it('does not read rct inside other words', () => {
    expect(detectStudyType('Sub-arctic clinics')).toBe('study')
  })
})

describe('extractSampleSize', () => {
  it('reads common trial phrasings', () => {
    expect(extractSampleSize('We randomized 1,250 patients to two arms', 'rct')).toBe(1250)
    expect(extractSampleSize('In total 320 patients were randomised.', 'rct')).toBe(320)
    expect(extractSampleSize('n = 240 were randomised to placebo', 'rct')).toBe(240)
    expect(extractSampleSize('A multicentre trial with 88 patients', 'rct')).toBe(88)
  })

  it('discards implausible sizes', () => {
    expect(extractSampleSize('We randomized 8 patients', 'rct')).toBeNull()
    expect(extractSampleSize('We randomized 250000 patients', 'rct')).toBeNull()
  })

  it('only applies to RCTs', () => {
    expect(extractSampleSize('We randomized 300 patients', 'cohort')).toBeNull()
  })

  it('returns null when nothing matches', () => {
    expect(extractSampleSize('A randomized trial of sleep hygiene', 'rct')).toBeNull()
  })
})
