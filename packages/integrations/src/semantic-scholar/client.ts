/**
 * Semantic Scholar Graph API: batch paper lookup by DOI for enhanced quality
 * scoring. One POST /paper/batch covers up to 500 papers.
 */

import { z } from 'zod'
import { PermanentApiError, normalizeDoi } from '@refkb/core'
import type { QualityEnrichmentClient } from '@refkb/core'
import { fetchWithTimeout, throwForStatus } from '../common/index.js'

export const SEMANTIC_SCHOLAR_MAX_BATCH = 500

export const PAPER_FIELDS = [
  'citationCount',
  'venue',
  'publicationVenue',
  'authors.hIndex',
  'externalIds',
  'publicationTypes',
  'fieldsOfStudy',
] as const

/** Entries are aligned with the request ids; null marks an unknown paper. */
const BatchResponseSchema = z.array(z.unknown())

export interface SemanticScholarClientConfig {
  baseUrl?: string
  apiKey?: string
  timeoutMs?: number
}

export class SemanticScholarClient implements QualityEnrichmentClient {
  readonly name = 'semantic-scholar'
  readonly maxBatchSize = SEMANTIC_SCHOLAR_MAX_BATCH
  private readonly baseUrl: string
  private readonly apiKey: string | undefined
  private readonly timeoutMs: number

  constructor(config: SemanticScholarClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'https://api.semanticscholar.org/graph/v1').replace(/\/+$/, '')
    this.apiKey = config.apiKey
    this.timeoutMs = config.timeoutMs ?? 10_000
  }

  async fetchBatch(dois: string[], signal?: AbortSignal): Promise<Map<string, unknown>> {
    const keys = dois.map(normalizeDoi)
    const results = new Map<string, unknown>()
    if (keys.length === 0) return results
    if (keys.length > this.maxBatchSize) {
      throw new PermanentApiError(`Batch of ${keys.length} exceeds the ${this.maxBatchSize}-paper limit`)
    }

    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.apiKey) headers['x-api-key'] = this.apiKey

    const response = await fetchWithTimeout(
      `${this.baseUrl}/paper/batch?fields=${PAPER_FIELDS.join(',')}`,
      {
        method: 'POST',
        headers,
        body: JSON.stringify({ ids: keys.map(doi => `DOI:${doi}`) }),
      },
      this.timeoutMs,
      signal,
    )
    if (!response.ok) await throwForStatus(response, 'Semantic Scholar')

    let body: unknown
    try {
      body = await response.json()
    } catch {
      throw new PermanentApiError('Semantic Scholar returned a body that is not JSON')
    }
    const parsed = BatchResponseSchema.safeParse(body)
    if (!parsed.success || parsed.data.length !== keys.length) {
      throw new PermanentApiError(`Semantic Scholar batch response does not match the ${keys.length} requested ids`)
    }

    keys.forEach((doi, i) => results.set(doi, parsed.data[i] ?? null))
    return results
  }
}
