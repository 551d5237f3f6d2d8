/**
 * Ollama embedding client: calls /api/embed for local vector embeddings.
 * L2-normalizes each vector before returning.
 */

import { z } from 'zod'
import { KnowledgeBaseError, errorMessage } from '@refkb/core'
import type { EmbeddingClient, EmbedResult } from '@refkb/core'
import { fetchWithTimeout, l2Normalize } from '../common/index.js'

const MAX_BATCH_SIZE = 50
const MAX_BATCH_CHARS = 100_000
const TIMEOUT_MS = 30_000
const DEFAULT_BASE_URL = 'http://localhost:11434'

const EmbedResponseSchema = z.object({ embeddings: z.array(z.array(z.number())) })
const ShowResponseSchema = z.object({ digest: z.string().optional() }).passthrough()

export interface OllamaEmbeddingOptions {
  model: string
  baseUrl?: string
  dimensions: number
  providerFingerprint?: string
}

export class OllamaEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly dimensions: number
  readonly providerFingerprint: string
  readonly maxBatchSize = MAX_BATCH_SIZE
  private readonly baseUrl: string

  constructor(options: OllamaEmbeddingOptions) {
    this.modelName = options.model
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')
    this.dimensions = options.dimensions
    this.providerFingerprint = options.providerFingerprint ?? `ollama:${options.model}:unknown`
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult> {
    if (texts.length === 0) {
      return { embeddings: [] }
    }

    const allEmbeddings: number[][] = []

    // Process in batches respecting size limits
    let batchStart = 0
    while (batchStart < texts.length) {
      let batchEnd = batchStart
      let batchChars = 0

      while (batchEnd < texts.length && batchEnd - batchStart < MAX_BATCH_SIZE) {
        const textChars = texts[batchEnd].length
        if (batchChars + textChars > MAX_BATCH_CHARS && batchEnd > batchStart) break
        batchChars += textChars
        batchEnd++
      }

      allEmbeddings.push(...await requestEmbeddings(this.baseUrl, this.modelName, texts.slice(batchStart, batchEnd), signal))
      batchStart = batchEnd
    }

    return { embeddings: allEmbeddings }
  }

  /**
   * Smoke-test the model, check its dimensions against the configured ones and
   * pin the model digest into the provider fingerprint.
   */
  static async create(options: { model: string; baseUrl?: string; dimensions: number }): Promise<OllamaEmbeddingClient> {
    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '')

    let probe: number[][]
    try {
      probe = await requestEmbeddings(baseUrl, options.model, ['test'])
    } catch (err) {
      throw KnowledgeBaseError.api(
        `Ollama embedding model "${options.model}" not available. Try: ollama pull ${options.model}\n${errorMessage(err)}`,
      )
    }
    const detected = probe[0]?.length ?? 0
    if (detected !== options.dimensions) {
      throw KnowledgeBaseError.modelMismatch(
        `Ollama model "${options.model}" produces ${detected}-dimensional vectors; configuration says ${options.dimensions}. ` +
        'Set embedding.dimensions to match the model.',
      )
    }

    let fingerprint = `ollama:${options.model}:unknown`
    try {
      const showResp = await fetchWithTimeout(`${baseUrl}/api/show`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ name: options.model }),
      }, TIMEOUT_MS)
      if (showResp.ok) {
        const show = ShowResponseSchema.safeParse(await showResp.json())
        if (show.success && show.data.digest) {
          fingerprint = `ollama:${options.model}:${show.data.digest.slice(0, 12)}`
        }
      }
    } catch (err) {
      console.warn(`[embeddings] could not read the Ollama model digest, using an unversioned fingerprint: ${errorMessage(err)}`)
    }

    return new OllamaEmbeddingClient({
      model: options.model,
      baseUrl,
      dimensions: detected,
      providerFingerprint: fingerprint,
    })
  }
}

async function requestEmbeddings(baseUrl: string, model: string, texts: string[], signal?: AbortSignal): Promise<number[][]> {
  const response = await fetchWithTimeout(`${baseUrl}/api/embed`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ model, input: texts }),
  }, TIMEOUT_MS, signal)

  if (!response.ok) {
    const body = await response.text().catch(() => '')
    throw new Error(`Ollama embed failed (${response.status}): ${body.slice(0, 200)}`)
  }

  const data = EmbedResponseSchema.safeParse(await response.json())
  if (!data.success) {
    throw new Error('Ollama embed response missing embeddings array')
  }
  return data.data.embeddings.map(l2Normalize)
}
