/**
 * Embedding client interface: framework-agnostic contract for vector embedding providers.
 * Concrete implementations live in @refkb/integrations (Ollama, OpenAI).
 */

export interface EmbeddingClient {
  /** Embed one or more texts into vectors. Each vector is L2-normalized. */
  embed(texts: string[], signal?: AbortSignal): Promise<EmbedResult>
  readonly modelName: string
  readonly dimensions: number
  /**
   * Model identity used for cache invalidation and index compatibility.
   * Format: "${provider}:${model}:${version}"
   */
  readonly providerFingerprint: string
  /** Largest number of texts the provider accepts in one call. */
  readonly maxBatchSize?: number
}

export interface EmbedResult {
  /** Each vector already L2-normalized by the client. */
  embeddings: number[][]
}

/** Title is repeated for emphasis, then the abstract. */
export function buildEmbeddingText(doc: { title: string; abstract: string }): string {
  return `${doc.title} ${doc.title} ${doc.abstract}`.trim()
}
