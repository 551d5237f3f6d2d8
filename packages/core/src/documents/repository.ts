/**
 * Document repository: the knowledge-base metadata store.
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 * Multi-row writes run in a single transaction.
 */

import type Database from 'better-sqlite3'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeBaseError, errorMessage } from '../common/index.js'
import { QualityFactorsSchema, StudyTypeSchema, ScoreModeSchema } from '../quality/schemas.js'
import type { QualityScore, StudyType } from '../quality/schemas.js'
import type { DocumentRecord, SourceDocument } from './schemas.js'

interface DocumentRow {
  id: string
  source_key: string
  title: string
  authors_json: string
  year: number | null
  doi: string | null
  journal: string | null
  abstract: string
  study_type: string
  sample_size: number | null
  has_full_text: number
  content_fingerprint: string
  embedding_index: number | null
  embedding_model_id: string | null
  embedding_dim: number | null
  quality_score: number | null
  quality_mode: string | null
  quality_factors_json: string | null
  quality_explanation: string | null
  quality_fingerprint: string | null
  removed: number
  created_at: string
  updated_at: string
}

export interface DocumentContent {
  id: string
  source: SourceDocument
  fingerprint: string
  studyType: StudyType
  sampleSize: number | null
}

export interface QualityUpdate {
  documentId: string
  quality: QualityScore
  qualityFingerprint: string
}

export interface EmbeddingAssignment {
  documentId: string
  embeddingIndex: number
  modelId: string
  dimensions: number
}

export interface ModelState {
  modelId: string
  dimensions: number
}

export type BuildRunStatus = 'running' | 'completed' | 'failed' | 'cancelled'

export const DOCUMENT_ID_WIDTH = 4

const RETIRED_MAX_ID_KEY = 'retired_max_document_id'

export function formatDocumentId(n: number): string {
  return String(n).padStart(DOCUMENT_ID_WIDTH, '0')
}

function parseAuthors(json: string): string[] {
  try {
    const parsed: unknown = JSON.parse(json)
    return Array.isArray(parsed) ? parsed.filter((a): a is string => typeof a === 'string') : []
  } catch {
    return []
  }
}

function rowToRecord(row: DocumentRow): DocumentRecord {
  let qualityFactors: DocumentRecord['qualityFactors'] = null
  if (row.quality_factors_json) {
    try {
      const parsed = QualityFactorsSchema.safeParse(JSON.parse(row.quality_factors_json))
      if (parsed.success) qualityFactors = parsed.data
    } catch {
      console.warn(`[documents] unreadable quality factors for ${row.id}`)
    }
  }

  const studyType = StudyTypeSchema.safeParse(row.study_type)
  const qualityMode = ScoreModeSchema.safeParse(row.quality_mode)

  return {
    id: row.id,
    sourceKey: row.source_key,
    title: row.title,
    authors: parseAuthors(row.authors_json),
    year: row.year,
    doi: row.doi,
    journal: row.journal,
    abstract: row.abstract,
    studyType: studyType.success ? studyType.data : 'study',
    sampleSize: row.sample_size,
    hasFullText: row.has_full_text === 1,
    contentFingerprint: row.content_fingerprint,
    embeddingIndex: row.embedding_index,
    embeddingModelId: row.embedding_model_id,
    embeddingDim: row.embedding_dim,
    qualityScore: row.quality_score,
    qualityMode: qualityMode.success ? qualityMode.data : null,
    qualityFactors,
    qualityExplanation: row.quality_explanation,
    qualityFingerprint: row.quality_fingerprint,
    removed: row.removed === 1,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export class DocumentRepository {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  /** All records, tombstones included, in creation order. */
  list(): Result<DocumentRecord[], KnowledgeBaseError> {
    try {
      const rows = this.db
        .prepare<[], DocumentRow>('SELECT * FROM documents ORDER BY CAST(id AS INTEGER) ASC')
        .all()
      return Ok(rows.map(rowToRecord))
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to list documents: ${errorMessage(err)}`))
    }
  }

  getById(id: string): Result<DocumentRecord, KnowledgeBaseError> {
    try {
      const row = this.db.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE id = ?').get(id)
      if (!row) return Err(KnowledgeBaseError.notFound('Document', id))
      return Ok(rowToRecord(row))
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to get document: ${errorMessage(err)}`))
    }
  }

  getByEmbeddingIndexes(indexes: number[]): Result<Map<number, DocumentRecord>, KnowledgeBaseError> {
    try {
      const stmt = this.db.prepare<[number], DocumentRow>('SELECT * FROM documents WHERE embedding_index = ?')
      const found = new Map<number, DocumentRecord>()
      for (const index of indexes) {
        const row = stmt.get(index)
        if (row) found.set(index, rowToRecord(row))
      }
      return Ok(found)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to look up rows: ${errorMessage(err)}`))
    }
  }

  /** Next sequential id, never reusing one that was ever assigned. */
  nextId(): Result<string, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare<[], { maxId: number | null }>('SELECT MAX(CAST(id AS INTEGER)) AS maxId FROM documents')
        .get()
      // Tombstones dropped by a rebuild leave their high-water mark behind
      const retired = this.db
        .prepare<[string], { value: string }>('SELECT value FROM kb_state WHERE key = ?')
        .get(RETIRED_MAX_ID_KEY)
      const highest = Math.max(row?.maxId ?? 0, retired ? Number.parseInt(retired.value, 10) || 0 : 0)
      return Ok(formatDocumentId(highest + 1))
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to allocate id: ${errorMessage(err)}`))
    }
  }

  /** Insert new records without an index row yet. */
  insertDocuments(docs: DocumentContent[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare(`
        INSERT INTO documents (id, source_key, title, authors_json, year, doi, journal, abstract, study_type, sample_size, has_full_text, content_fingerprint, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      this.db.transaction(() => {
        for (const doc of docs) {
          const s = doc.source
          stmt.run(doc.id, s.sourceKey, s.title, JSON.stringify(s.authors), s.year, s.doi, s.journal, s.abstract, doc.studyType, doc.sampleSize, s.fullText ? 1 : 0, doc.fingerprint, now, now)
        }
      })()
      return Ok(docs.length)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to insert documents: ${errorMessage(err)}`))
    }
  }

  /** Refresh bibliographic fields and fingerprint; clears a tombstone. Keeps id and index row. */
  updateContent(docs: DocumentContent[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare(`
        UPDATE documents SET title = ?, authors_json = ?, year = ?, doi = ?, journal = ?, abstract = ?, study_type = ?, sample_size = ?, has_full_text = ?, content_fingerprint = ?, removed = 0, updated_at = ?
        WHERE id = ?
      `)
      let changes = 0
      this.db.transaction(() => {
        for (const doc of docs) {
          const s = doc.source
          changes += stmt.run(s.title, JSON.stringify(s.authors), s.year, s.doi, s.journal, s.abstract, doc.studyType, doc.sampleSize, s.fullText ? 1 : 0, doc.fingerprint, now, doc.id).changes
        }
      })()
      return Ok(changes)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to update documents: ${errorMessage(err)}`))
    }
  }

  saveQualityScores(updates: QualityUpdate[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare(`
        UPDATE documents SET quality_score = ?, quality_mode = ?, quality_factors_json = ?, quality_explanation = ?, quality_fingerprint = ?, updated_at = ?
        WHERE id = ?
      `)
      let changes = 0
      this.db.transaction(() => {
        for (const u of updates) {
          changes += stmt.run(u.quality.score, u.quality.mode, JSON.stringify(u.quality.factors), u.quality.explanation, u.qualityFingerprint, now, u.documentId).changes
        }
      })()
      return Ok(changes)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to save quality scores: ${errorMessage(err)}`))
    }
  }

  assignEmbeddings(assignments: EmbeddingAssignment[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare(`
        UPDATE documents SET embedding_index = ?, embedding_model_id = ?, embedding_dim = ?, updated_at = ?
        WHERE id = ?
      `)
      let changes = 0
      this.db.transaction(() => {
        for (const a of assignments) {
          changes += stmt.run(a.embeddingIndex, a.modelId, a.dimensions, now, a.documentId).changes
        }
      })()
      return Ok(changes)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to assign embeddings: ${errorMessage(err)}`))
    }
  }

  /**
   * Full-rebuild repack: drop tombstones, clear every index assignment, then assign
   * the new dense sequence. One transaction, so a crash leaves the old mapping.
   */
  repackEmbeddings(assignments: EmbeddingAssignment[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      let changes = 0
      this.db.transaction(() => {
        const retired = this.db
          .prepare<[], { maxId: number | null }>('SELECT MAX(CAST(id AS INTEGER)) AS maxId FROM documents WHERE removed = 1')
          .get()
        if (retired?.maxId) {
          this.db.prepare(`
            INSERT INTO kb_state (key, value, updated_at) VALUES (?, ?, ?)
            ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
            WHERE CAST(excluded.value AS INTEGER) > CAST(kb_state.value AS INTEGER)
          `).run(RETIRED_MAX_ID_KEY, String(retired.maxId), now)
        }
        this.db.prepare('DELETE FROM documents WHERE removed = 1').run()
        this.db.prepare('UPDATE documents SET embedding_index = NULL').run()
        const stmt = this.db.prepare(`
          UPDATE documents SET embedding_index = ?, embedding_model_id = ?, embedding_dim = ?, updated_at = ?
          WHERE id = ?
        `)
        for (const a of assignments) {
          changes += stmt.run(a.embeddingIndex, a.modelId, a.dimensions, now, a.documentId).changes
        }
      })()
      return Ok(changes)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to repack embeddings: ${errorMessage(err)}`))
    }
  }

  markRemoved(ids: string[]): Result<number, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare('UPDATE documents SET removed = 1, updated_at = ? WHERE id = ?')
      let changes = 0
      this.db.transaction(() => {
        for (const id of ids) changes += stmt.run(now, id).changes
      })()
      return Ok(changes)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to mark documents removed: ${errorMessage(err)}`))
    }
  }

  getState(key: string): Result<string | null, KnowledgeBaseError> {
    try {
      const row = this.db.prepare<[string], { value: string }>('SELECT value FROM kb_state WHERE key = ?').get(key)
      return Ok(row?.value ?? null)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to read state ${key}: ${errorMessage(err)}`))
    }
  }

  setState(entries: Record<string, string>): Result<void, KnowledgeBaseError> {
    try {
      const now = new Date().toISOString()
      const stmt = this.db.prepare(`
        INSERT INTO kb_state (key, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `)
      this.db.transaction(() => {
        for (const [key, value] of Object.entries(entries)) stmt.run(key, value, now)
      })()
      return Ok(undefined)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to write state: ${errorMessage(err)}`))
    }
  }

  /** Embedding model the index was built with, or null for an empty knowledge base. */
  getModelState(): Result<ModelState | null, KnowledgeBaseError> {
    const modelId = this.getState('embedding_model_id')
    if (!modelId.ok) return modelId
    const dims = this.getState('embedding_dim')
    if (!dims.ok) return dims
    if (modelId.value === null || dims.value === null) return Ok(null)
    return Ok({ modelId: modelId.value, dimensions: Number.parseInt(dims.value, 10) })
  }

  setModelState(state: ModelState): Result<void, KnowledgeBaseError> {
    return this.setState({
      embedding_model_id: state.modelId,
      embedding_dim: String(state.dimensions),
    })
  }

  startRun(runId: string, mode: string): Result<void, KnowledgeBaseError> {
    try {
      this.db.prepare(
        `INSERT INTO build_runs (run_id, mode, status, started_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(run_id) DO UPDATE SET status = excluded.status, finished_at = NULL, error = NULL`,
      ).run(runId, mode, 'running', new Date().toISOString())
      return Ok(undefined)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to record build start: ${errorMessage(err)}`))
    }
  }

  finishRun(
    runId: string,
    status: BuildRunStatus,
    counters: Record<string, number>,
    error?: string,
  ): Result<void, KnowledgeBaseError> {
    try {
      this.db.prepare(
        'UPDATE build_runs SET status = ?, counters_json = ?, error = ?, finished_at = ? WHERE run_id = ?',
      ).run(status, JSON.stringify(counters), error ?? null, new Date().toISOString(), runId)
      return Ok(undefined)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to record build finish: ${errorMessage(err)}`))
    }
  }

  getRun(runId: string): Result<{ status: string; mode: string; error: string | null } | null, KnowledgeBaseError> {
    try {
      const row = this.db
        .prepare<[string], { status: string; mode: string; error: string | null }>('SELECT status, mode, error FROM build_runs WHERE run_id = ?')
        .get(runId)
      return Ok(row ?? null)
    } catch (err) {
      return Err(KnowledgeBaseError.db(`Failed to read build run: ${errorMessage(err)}`))
    }
  }
}
