/**
 * Partition an incoming document set against the knowledge base.
 */

import type { SourceDocument, DocumentRecord } from '../documents/schemas.js'
import { computeFingerprint, hasChanged } from './fingerprint.js'
import type { FingerprintStore } from './fingerprint-store.js'

export interface IncomingDocument {
  source: SourceDocument
  fingerprint: string
}

export interface MatchedDocument extends IncomingDocument {
  record: DocumentRecord
}

export interface DocumentDiff {
  added: IncomingDocument[]
  changed: MatchedDocument[]
  unchanged: MatchedDocument[]
  /** Tombstoned records whose source key came back. */
  revived: MatchedDocument[]
  /** Live records absent from the incoming set. */
  removed: DocumentRecord[]
  /** Incoming source keys seen more than once; only the first is kept. */
  duplicateKeys: string[]
}

export function diffDocuments(
  incoming: SourceDocument[],
  existing: DocumentRecord[],
  fingerprints: FingerprintStore,
): DocumentDiff {
  const bySourceKey = new Map(existing.map(record => [record.sourceKey, record]))
  const seen = new Set<string>()

  const diff: DocumentDiff = {
    added: [],
    changed: [],
    unchanged: [],
    revived: [],
    removed: [],
    duplicateKeys: [],
  }

  for (const source of incoming) {
    if (seen.has(source.sourceKey)) {
      diff.duplicateKeys.push(source.sourceKey)
      continue
    }
    seen.add(source.sourceKey)

    const fingerprint = computeFingerprint(source)
    const record = bySourceKey.get(source.sourceKey)

    if (!record) {
      diff.added.push({ source, fingerprint })
    } else if (record.removed) {
      diff.revived.push({ source, fingerprint, record })
    } else if (hasChanged(fingerprints.get(record.id), fingerprint)) {
      // Includes records the store has no entry for (lost or corrupt store)
      diff.changed.push({ source, fingerprint, record })
    } else {
      diff.unchanged.push({ source, fingerprint, record })
    }
  }

  for (const record of existing) {
    if (!record.removed && !seen.has(record.sourceKey)) {
      diff.removed.push(record)
    }
  }

  if (diff.duplicateKeys.length > 0) {
    console.warn(`[fingerprint] ${diff.duplicateKeys.length} duplicate source key(s) ignored: ${diff.duplicateKeys.slice(0, 5).join(', ')}`)
  }

  return diff
}
