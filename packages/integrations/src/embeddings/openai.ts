/**
 * OpenAI embedding client: calls OpenAI embeddings API with L2 normalization.
 * Requires explicit opt-in; never auto-detected.
 */

import OpenAI from 'openai'
import { KnowledgeBaseError } from '@refkb/core'
import type { EmbeddingClient, EmbedResult } from '@refkb/core'
import { l2Normalize } from '../common/index.js'

const MAX_BATCH_SIZE = 2048

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  readonly maxBatchSize = MAX_BATCH_SIZE
  private readonly client: OpenAI

  constructor(options: {
    apiKey: string
    model?: string
    dimensions?: number
    baseUrl?: string
  }) {
    this.modelName = options.model ?? 'text-embedding-3-small'
    this.dimensions = options.dimensions ?? 1536
    this.providerFingerprint = `openai:${this.modelName}:${this.dimensions}`
    this.client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl })
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Process in batches respecting API limit
    for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
      if (signal?.aborted) throw KnowledgeBaseError.cancelled()
      const batch = texts.slice(i, i + MAX_BATCH_SIZE)
      const response = await this.client.embeddings.create(
        {
          model: this.modelName,
          input: batch,
          dimensions: this.dimensions,
        },
        { signal },
      )

      // Sort by index to preserve order (API may return unordered)
      const sorted = [...response.data].sort((a, b) => a.index - b.index)
      for (const item of sorted) {
        allEmbeddings.push(l2Normalize(item.embedding))
      }
    }

    return { embeddings: allEmbeddings }
  }
}
