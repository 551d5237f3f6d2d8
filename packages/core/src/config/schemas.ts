/**
 * Zod schemas and types for knowledge-base configuration.
 * Every field has a default so an empty object is a valid configuration.
 */

import { z } from 'zod'

export const EmbeddingProviderSchema = z.enum(['ollama', 'openai'])
export type EmbeddingProvider = z.infer<typeof EmbeddingProviderSchema>

export const QualityModeSchema = z.enum(['basic', 'enhanced'])
export type QualityMode = z.infer<typeof QualityModeSchema>

export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderSchema.default('ollama'),
  model: z.string().min(1).default('nomic-embed-text'),
  dimensions: z.number().int().positive().default(768),
  baseUrl: z.string().url().optional(),
  apiKey: z.string().min(1).optional(),
  maxBatchSize: z.number().int().positive().default(256),
})

export const QualityConfigSchema = z.object({
  mode: QualityModeSchema.default('enhanced'),
  workers: z.number().int().min(1).max(16).default(3),
  minDelayMs: z.number().int().nonnegative().default(100),
  batchSize: z.number().int().min(1).max(500).default(100),
  failureThreshold: z.number().min(0).max(1).default(0.5),
  failureWindow: z.number().int().min(2).default(20),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  baseUrl: z.string().url().default('https://api.semanticscholar.org/graph/v1'),
  apiKey: z.string().min(1).optional(),
})

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(5),
  baseDelayMs: z.number().int().nonnegative().default(100),
  maxDelayMs: z.number().int().nonnegative().default(10_000),
  jitter: z.number().min(0).max(1).default(0.1),
})

export const CheckpointConfigSchema = z.object({
  interval: z.number().int().positive().default(50),
})

export const ImportConfigSchema = z.object({
  zoteroApiUrl: z.string().url().default('http://127.0.0.1:23119/api'),
  pageSize: z.number().int().min(1).max(100).default(100),
})

export const KnowledgeBaseConfigSchema = z.object({
  rootDir: z.string().min(1).default('kb_data'),
  embedding: EmbeddingConfigSchema.default({}),
  quality: QualityConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  checkpoint: CheckpointConfigSchema.default({}),
  import: ImportConfigSchema.default({}),
})

export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>
export type QualityConfig = z.infer<typeof QualityConfigSchema>
export type RetryConfig = z.infer<typeof RetryConfigSchema>
export type CheckpointConfig = z.infer<typeof CheckpointConfigSchema>
export type ImportConfig = z.infer<typeof ImportConfigSchema>
export type KnowledgeBaseConfig = z.infer<typeof KnowledgeBaseConfigSchema>
export type KnowledgeBaseConfigInput = z.input<typeof KnowledgeBaseConfigSchema>
