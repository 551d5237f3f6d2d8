/**
 * @refkb/core
 *
 * Framework-agnostic core of the reference knowledge base: change detection,
 * embedding cache, checkpoints, quality scoring, vector index and the build
 * orchestrator that ties them together.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './storage/index.js'
export * from './documents/index.js'
export * from './fingerprint/index.js'
export * from './embeddings/index.js'
export * from './checkpoint/index.js'
export * from './quality/index.js'
export * from './indexing/index.js'
export * from './build/index.js'
export * from './search/index.js'
