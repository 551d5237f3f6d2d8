/**
 * Query path: embed the query, exact L2 search, map rows back to documents.
 * Tombstoned documents and documents under `minQuality` are skipped.
 */

import { existsSync } from 'node:fs'
import { KnowledgeBaseError, errorMessage, unwrap } from '../common/index.js'
import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { resolveKnowledgeBasePaths } from '../config/index.js'
import type { KnowledgeBaseConfig } from '../config/index.js'
import { DocumentRepository } from '../documents/index.js'
import type { DocumentRecord } from '../documents/index.js'
import type { EmbeddingClient } from '../embeddings/index.js'
import { FlatVectorIndex } from '../indexing/index.js'
import { openDatabase } from '../storage/index.js'

export interface SearchOptions {
  k?: number
  /** Minimum quality score (0-100); unscored documents are excluded when set. */
  minQuality?: number
  signal?: AbortSignal
}

export interface SearchHit {
  document: DocumentRecord
  /** Squared L2 distance to the query; smaller is closer. */
  distance: number
}

const DEFAULT_K = 10

export async function searchKnowledgeBase(
  config: KnowledgeBaseConfig,
  embeddingClient: EmbeddingClient,
  query: string,
  options: SearchOptions = {},
): Promise<Result<SearchHit[], KnowledgeBaseError>> {
  const k = options.k ?? DEFAULT_K
  if (!query.trim()) return Err(KnowledgeBaseError.validation('Search query is empty'))
  if (!Number.isInteger(k) || k <= 0) return Err(KnowledgeBaseError.validation(`k must be a positive integer, got ${k}`))

  const paths = resolveKnowledgeBasePaths(config.rootDir)
  if (!existsSync(paths.metadataDb)) {
    return Err(KnowledgeBaseError.notFound('Knowledge base', paths.rootDir))
  }

  let records: DocumentRecord[]
  try {
    const db = openDatabase(paths.metadataDb, { readonly: true })
    try {
      const repo = new DocumentRepository(db)
      const stored = unwrap(repo.getModelState())
      if (stored && (stored.modelId !== embeddingClient.providerFingerprint || stored.dimensions !== embeddingClient.dimensions)) {
        return Err(KnowledgeBaseError.modelMismatch(
          `Index was built with ${stored.modelId}; the query model is ${embeddingClient.providerFingerprint}. Search with the build model or rebuild.`,
        ))
      }
      records = unwrap(repo.list())
    } finally {
      db.close()
    }
  } catch (err) {
    return Err(err instanceof KnowledgeBaseError ? err : KnowledgeBaseError.db(`Cannot read metadata store: ${errorMessage(err)}`))
  }

  const loaded = await FlatVectorIndex.load(paths.index)
  if (loaded.status === 'missing') return Ok([])
  if (loaded.status === 'corrupt') {
    return Err(KnowledgeBaseError.integrity(`Vector index is corrupt: ${loaded.reason}. Run a confirmed full rebuild.`))
  }

  let queryVector: number[] | undefined
  try {
    queryVector = (await embeddingClient.embed([query], options.signal)).embeddings[0]
  } catch (err) {
    return Err(KnowledgeBaseError.api(`Failed to embed query: ${errorMessage(err)}`))
  }
  if (!queryVector || queryVector.length !== loaded.index.dimensions) {
    return Err(KnowledgeBaseError.modelMismatch('Query embedding does not match the index dimensions'))
  }

  const byRow = new Map<number, DocumentRecord>()
  for (const record of records) {
    if (record.removed || record.embeddingIndex === null) continue
    if (options.minQuality !== undefined && (record.qualityScore ?? -1) < options.minQuality) continue
    byRow.set(record.embeddingIndex, record)
  }

  const hits = loaded.index.search(queryVector, k, row => byRow.has(row))
  return Ok(hits.flatMap(hit => {
    const document = byRow.get(hit.row)
    return document ? [{ document, distance: hit.distance }] : []
  }))
}
