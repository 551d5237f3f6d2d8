/**
 * Embeddings: provider contract, persistent cache, float32 codec, batch sizing.
 */

export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export { buildEmbeddingText } from './embedding-client.js'
export { EmbeddingCache } from './embedding-cache.js'
export type { EmbeddingCacheStats, EmbeddingCachePaths } from './embedding-cache.js'
export { packRows, unpackRows, l2DistanceSquared } from './vector-codec.js'
export { optimalBatchSize } from './batch-size.js'
