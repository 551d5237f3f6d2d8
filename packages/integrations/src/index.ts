/**
 * @refkb/integrations: external collaborators for the knowledge base.
 *
 * Embedding providers (Ollama, OpenAI), the Semantic Scholar enrichment
 * client used by enhanced quality scoring, and the Zotero local-API reader
 * that supplies source documents.
 */

export { OllamaEmbeddingClient, OpenAIEmbeddingClient } from './embeddings/index.js'
export type { OllamaEmbeddingOptions } from './embeddings/index.js'

export { SemanticScholarClient, SEMANTIC_SCHOLAR_MAX_BATCH, PAPER_FIELDS } from './semantic-scholar/index.js'
export type { SemanticScholarClientConfig } from './semantic-scholar/index.js'

export { ZoteroLocalClient, toSourceDocument, formatCreator, parseYear } from './zotero/index.js'
export type { ZoteroLocalClientConfig, ZoteroItem, ZoteroCreator } from './zotero/index.js'

export { fetchWithTimeout, parseRetryAfter, throwForStatus, l2Normalize } from './common/index.js'

export { createCollaborators, createEmbeddingClient, createZoteroSource } from './factory.js'
