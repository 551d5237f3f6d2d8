/**
 * Configuration: schema, defaults, layered loading, on-disk layout.
 */

export {
  KnowledgeBaseConfigSchema,
  EmbeddingConfigSchema,
  QualityConfigSchema,
  RetryConfigSchema,
  CheckpointConfigSchema,
  ImportConfigSchema,
  EmbeddingProviderSchema,
  QualityModeSchema,
} from './schemas.js'
export type {
  KnowledgeBaseConfig,
  KnowledgeBaseConfigInput,
  EmbeddingConfig,
  QualityConfig,
  RetryConfig,
  CheckpointConfig,
  ImportConfig,
  EmbeddingProvider,
  QualityMode,
} from './schemas.js'
export { loadConfig, parseConfig, configFromEnv } from './load.js'
export { resolveKnowledgeBasePaths, CONFIG_FILE_NAME } from './paths.js'
export type { KnowledgeBasePaths } from './paths.js'
