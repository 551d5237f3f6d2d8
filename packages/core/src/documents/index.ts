/**
 * Documents: source document shape and the knowledge-base metadata store.
 */

export { SourceDocumentSchema, DocumentRecordSchema, KB_FORMAT_VERSION } from './schemas.js'
export type { SourceDocument, SourceDocumentInput, DocumentRecord } from './schemas.js'
export { DocumentRepository, formatDocumentId, DOCUMENT_ID_WIDTH } from './repository.js'
export type {
  DocumentContent,
  QualityUpdate,
  EmbeddingAssignment,
  ModelState,
  BuildRunStatus,
} from './repository.js'
