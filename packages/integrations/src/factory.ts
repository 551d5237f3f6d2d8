/**
 * Wires configured providers into the collaborators a build needs.
 */

import { Ok, Err, KnowledgeBaseError, errorMessage } from '@refkb/core'
import type { BuildCollaborators, EmbeddingClient, KnowledgeBaseConfig, Result } from '@refkb/core'
import { OllamaEmbeddingClient, OpenAIEmbeddingClient } from './embeddings/index.js'
import { SemanticScholarClient } from './semantic-scholar/index.js'
import { ZoteroLocalClient } from './zotero/index.js'

export async function createEmbeddingClient(
  config: KnowledgeBaseConfig,
): Promise<Result<EmbeddingClient, KnowledgeBaseError>> {
  const { embedding } = config
  switch (embedding.provider) {
    case 'openai':
      if (!embedding.apiKey) {
        return Err(KnowledgeBaseError.validation('embedding.apiKey (or OPENAI_API_KEY) is required for the openai provider'))
      }
      return Ok(new OpenAIEmbeddingClient({
        apiKey: embedding.apiKey,
        model: embedding.model,
        dimensions: embedding.dimensions,
        baseUrl: embedding.baseUrl,
      }))
    case 'ollama':
      try {
        return Ok(await OllamaEmbeddingClient.create({
          model: embedding.model,
          baseUrl: embedding.baseUrl,
          dimensions: embedding.dimensions,
        }))
      } catch (err) {
        return Err(err instanceof KnowledgeBaseError ? err : KnowledgeBaseError.api(errorMessage(err)))
      }
  }
}

export async function createCollaborators(
  config: KnowledgeBaseConfig,
): Promise<Result<BuildCollaborators, KnowledgeBaseError>> {
  const embeddingClient = await createEmbeddingClient(config)
  if (!embeddingClient.ok) return embeddingClient

  const enrichmentClient = config.quality.mode === 'enhanced'
    ? new SemanticScholarClient({
        baseUrl: config.quality.baseUrl,
        apiKey: config.quality.apiKey,
        timeoutMs: config.quality.requestTimeoutMs,
      })
    : null

  return Ok({ embeddingClient: embeddingClient.value, enrichmentClient })
}

export function createZoteroSource(config: KnowledgeBaseConfig): ZoteroLocalClient {
  return new ZoteroLocalClient({
    baseUrl: config.import.zoteroApiUrl,
    pageSize: config.import.pageSize,
  })
}
