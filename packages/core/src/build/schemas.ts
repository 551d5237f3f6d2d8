/**
 * Types for build runs: modes, stages and the end-of-run report.
 */

import { z } from 'zod'
import type { IntegrityReport } from '../indexing/index.js'
import type { FailureReason, ScoringSummary } from '../quality/index.js'

export const BuildModeSchema = z.enum(['incremental', 'rebuild', 'quality-upgrade'])
export type BuildMode = z.infer<typeof BuildModeSchema>

/** Checkpointable boundaries of one build, in order. */
export const BUILD_STAGES = [
  'diff',
  'extract',
  'score',
  'persist-scores',
  'embed',
  'persist-embeddings',
  'merge-index',
  'verify',
] as const
export type BuildStage = typeof BUILD_STAGES[number]

export const BuildStageSchema = z.enum(BUILD_STAGES)

export function stageOrder(stage: BuildStage): number {
  return BUILD_STAGES.indexOf(stage)
}

export interface BuildCounts {
  total: number
  new: number
  changed: number
  unchanged: number
  removed: number
  revived: number
  duplicates: number
  scored: number
  embedded: number
  cacheHits: number
  cacheBackfilled: number
  appendedRows: number
  replacedRows: number
}

export interface DocumentFailure {
  documentId: string
  reason: FailureReason
}

export interface BuildReport {
  runId: string
  mode: BuildMode
  /** Stage an interrupted run was resumed at, or null for a fresh run. */
  resumedFrom: BuildStage | null
  counts: BuildCounts
  quality: ScoringSummary | null
  /** Documents that fell back to basic scoring, with the reason. */
  failures: DocumentFailure[]
  integrity: IntegrityReport
  backupDir: string | null
  durationMs: number
}

export interface BuildProgress {
  stage: BuildStage
  done: number
  total: number
}

export function emptyCounts(): BuildCounts {
  return {
    total: 0,
    new: 0,
    changed: 0,
    unchanged: 0,
    removed: 0,
    revived: 0,
    duplicates: 0,
    scored: 0,
    embedded: 0,
    cacheHits: 0,
    cacheBackfilled: 0,
    appendedRows: 0,
    replacedRows: 0,
  }
}
