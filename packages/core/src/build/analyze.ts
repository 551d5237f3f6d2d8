/**
 * Dry run: report what a build would do without writing anything.
 */

import { existsSync } from 'node:fs'
import type Database from 'better-sqlite3'
import { CheckpointManager } from '../checkpoint/index.js'
import { KnowledgeBaseError, errorMessage, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { resolveKnowledgeBasePaths } from '../config/index.js'
import type { KnowledgeBaseConfig } from '../config/index.js'
import { DocumentRepository } from '../documents/index.js'
import type { DocumentRecord, ModelState } from '../documents/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'
import { FingerprintStore, diffDocuments } from '../fingerprint/index.js'
import { FlatVectorIndex, verifyKnowledgeBase } from '../indexing/index.js'
import type { IntegrityReport } from '../indexing/index.js'
import { ScoredDocumentSchema } from '../quality/index.js'
import { openDatabase } from '../storage/index.js'
import { collectDocuments } from './documents.js'
import type { DocumentSource } from './documents.js'

export interface KnowledgeBaseAnalysis {
  documents: {
    total: number
    new: number
    changed: number
    unchanged: number
    removed: number
    revived: number
    duplicates: number
  }
  /** Interrupted build the next run would resume, if any. */
  pendingCheckpoint: { operation: string; stage: string; completed: number } | null
  model: {
    stored: ModelState | null
    active: ModelState
    matches: boolean
  }
  /** Null when the knowledge base does not exist yet. */
  integrity: IntegrityReport | null
  indexStatus: 'ok' | 'missing' | 'corrupt'
}

function readRecords(path: string): Result<{ records: DocumentRecord[]; stored: ModelState | null }, KnowledgeBaseError> {
  if (!existsSync(path)) return Ok({ records: [], stored: null })
  let db: Database.Database
  try {
    db = openDatabase(path, { readonly: true })
  } catch (err) {
    return Err(KnowledgeBaseError.db(`Cannot open metadata store ${path}: ${errorMessage(err)}`))
  }
  try {
    const repo = new DocumentRepository(db)
    return Ok({ records: unwrap(repo.list()), stored: unwrap(repo.getModelState()) })
  } catch (err) {
    return Err(err instanceof KnowledgeBaseError ? err : KnowledgeBaseError.db(errorMessage(err)))
  } finally {
    db.close()
  }
}

export async function analyzeKnowledgeBase(
  config: KnowledgeBaseConfig,
  documents: DocumentSource,
  embeddingClient: Pick<EmbeddingClient, 'providerFingerprint' | 'dimensions'>,
): Promise<Result<KnowledgeBaseAnalysis, KnowledgeBaseError>> {
  const paths = resolveKnowledgeBasePaths(config.rootDir)

  const collected = await collectDocuments(documents)
  if (!collected.ok) return collected

  const store = readRecords(paths.metadataDb)
  if (!store.ok) return store
  const { records, stored } = store.value

  const fingerprints = await FingerprintStore.load(paths.fingerprints)
  const diff = diffDocuments(collected.value, records, fingerprints)

  // detect() would delete a corrupt checkpoint; a dry run only reads it
  const pending = await new CheckpointManager(paths.checkpoint, ScoredDocumentSchema).peek()

  const loaded = await FlatVectorIndex.load(paths.index)
  let integrity: IntegrityReport | null = null
  if (loaded.status === 'ok') {
    integrity = verifyKnowledgeBase(records, loaded.index)
  } else if (records.length > 0) {
    integrity = verifyKnowledgeBase(records, { size: 0, dimensions: embeddingClient.dimensions })
  }

  const active: ModelState = { modelId: embeddingClient.providerFingerprint, dimensions: embeddingClient.dimensions }
  return Ok({
    documents: {
      total: collected.value.length - diff.duplicateKeys.length,
      new: diff.added.length,
      changed: diff.changed.length,
      unchanged: diff.unchanged.length,
      removed: diff.removed.length,
      revived: diff.revived.length,
      duplicates: diff.duplicateKeys.length,
    },
    pendingCheckpoint: pending
      ? { operation: pending.operation, stage: pending.stage, completed: pending.completedIds.length }
      : null,
    model: {
      stored,
      active,
      matches: stored === null || (stored.modelId === active.modelId && stored.dimensions === active.dimensions),
    },
    integrity,
    indexStatus: loaded.status,
  })
}
