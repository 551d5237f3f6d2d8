/**
 * Cross-checks the metadata store against the vector index. Every record with
 * an embedding index must point at a distinct, existing row, and every row must
 * be claimed by exactly one record.
 */

import type { DocumentRecord } from '../documents/index.js'

export type IntegrityIssue =
  | { kind: 'count_mismatch'; records: number; rows: number }
  | { kind: 'duplicate_index'; embeddingIndex: number; documentIds: string[] }
  | { kind: 'out_of_range'; documentId: string; embeddingIndex: number }
  | { kind: 'unclaimed_rows'; rows: number[] }
  | { kind: 'unindexed'; documentIds: string[] }
  | { kind: 'dimension_mismatch'; documentIds: string[]; expected: number }

export interface IntegrityReport {
  ok: boolean
  indexedRecords: number
  indexRows: number
  issues: IntegrityIssue[]
  /** Human-readable summary with the suggested fix, empty when ok. */
  diagnosis: string
}

const MAX_LISTED = 10

function preview(items: Array<string | number>): string {
  const shown = items.slice(0, MAX_LISTED).join(', ')
  return items.length > MAX_LISTED ? `${shown} and ${items.length - MAX_LISTED} more` : shown
}

function describeIssue(issue: IntegrityIssue): string {
  switch (issue.kind) {
    case 'count_mismatch':
      return `metadata has ${issue.records} indexed records but the vector index has ${issue.rows} rows`
    case 'duplicate_index':
      return `embedding index ${issue.embeddingIndex} is claimed by ${issue.documentIds.join(', ')}`
    case 'out_of_range':
      return `document ${issue.documentId} points at row ${issue.embeddingIndex}, past the end of the index`
    case 'unclaimed_rows':
      return `index rows ${preview(issue.rows)} belong to no document`
    case 'unindexed':
      return `documents ${preview(issue.documentIds)} have no embedding`
    case 'dimension_mismatch':
      return `documents ${preview(issue.documentIds)} were embedded with a dimension other than ${issue.expected}`
  }
}

export function verifyKnowledgeBase(
  records: readonly DocumentRecord[],
  index: { size: number; dimensions: number },
): IntegrityReport {
  const issues: IntegrityIssue[] = []
  const claims = new Map<number, string[]>()
  const unindexed: string[] = []
  const wrongDims: string[] = []

  for (const record of records) {
    if (record.embeddingIndex === null) {
      if (!record.removed) unindexed.push(record.id)
      continue
    }
    const owners = claims.get(record.embeddingIndex) ?? []
    owners.push(record.id)
    claims.set(record.embeddingIndex, owners)
    if (record.embeddingIndex >= index.size) {
      issues.push({ kind: 'out_of_range', documentId: record.id, embeddingIndex: record.embeddingIndex })
    }
    if (record.embeddingDim !== null && record.embeddingDim !== index.dimensions) {
      wrongDims.push(record.id)
    }
  }

  let indexedRecords = 0
  for (const owners of claims.values()) indexedRecords += owners.length
  if (indexedRecords !== index.size) {
    issues.push({ kind: 'count_mismatch', records: indexedRecords, rows: index.size })
  }

  for (const [embeddingIndex, documentIds] of claims) {
    if (documentIds.length > 1) issues.push({ kind: 'duplicate_index', embeddingIndex, documentIds })
  }

  const unclaimed: number[] = []
  for (let row = 0; row < index.size; row++) {
    if (!claims.has(row)) unclaimed.push(row)
  }
  if (unclaimed.length > 0) issues.push({ kind: 'unclaimed_rows', rows: unclaimed })
  if (unindexed.length > 0) issues.push({ kind: 'unindexed', documentIds: unindexed })
  if (wrongDims.length > 0) issues.push({ kind: 'dimension_mismatch', documentIds: wrongDims, expected: index.dimensions })

  const diagnosis = issues.length === 0
    ? ''
    : `Knowledge base is inconsistent: ${issues.map(describeIssue).join('; ')}. ` +
      'Run a full rebuild (mode "rebuild" with confirm) to regenerate the index from the metadata store.'

  return { ok: issues.length === 0, indexedRecords, indexRows: index.size, issues, diagnosis }
}
