/**
 * Conversions between incoming source documents, stored records and the
 * inputs the scorer and embedder consume.
 */

import { KnowledgeBaseError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { SourceDocumentSchema } from '../documents/index.js'
import type { DocumentContent, DocumentRecord, SourceDocument, SourceDocumentInput } from '../documents/index.js'
import type { IncomingDocument } from '../fingerprint/index.js'
import { detectStudyType, extractSampleSize } from '../quality/index.js'
import type { QualityInput } from '../quality/index.js'

export type DocumentSource = Iterable<SourceDocumentInput> | AsyncIterable<SourceDocumentInput>

/** Drain and validate the import adapter's output. Any invalid record fails the whole batch. */
export async function collectDocuments(source: DocumentSource): Promise<Result<SourceDocument[], KnowledgeBaseError>> {
  const documents: SourceDocument[] = []
  let position = 0
  try {
    for await (const input of source) {
      const parsed = SourceDocumentSchema.safeParse(input)
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        return Err(KnowledgeBaseError.validation(
          `Source document #${position} is invalid: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`,
        ))
      }
      documents.push(parsed.data)
      position++
    }
  } catch (err) {
    // The source library is unreachable: nothing is attempted
    return Err(err instanceof KnowledgeBaseError
      ? err
      : KnowledgeBaseError.io(`Failed to read source documents: ${errorMessage(err)}`))
  }
  return Ok(documents)
}

export function toDocumentContent(id: string, incoming: IncomingDocument): DocumentContent {
  const { source } = incoming
  const text = `${source.title} ${source.abstract}`
  const studyType = detectStudyType(text)
  return {
    id,
    source,
    fingerprint: incoming.fingerprint,
    studyType,
    sampleSize: extractSampleSize(text, studyType),
  }
}

export function qualityInputFor(record: DocumentRecord): QualityInput {
  return {
    title: record.title,
    abstract: record.abstract,
    year: record.year,
    doi: record.doi,
    studyType: record.studyType,
    sampleSize: record.sampleSize,
    hasFullText: record.hasFullText,
  }
}
