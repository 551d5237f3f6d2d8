/**
 * Configuration loading: config file < environment < explicit overrides.
 * An invalid configuration is fatal and surfaces before any build work starts.
 */

import { z } from 'zod'
import { Ok, Err } from '../common/index.js'
import type { Result } from '../common/index.js'
import { KnowledgeBaseError } from '../common/index.js'
import { readJsonFile } from '../storage/index.js'
import { KnowledgeBaseConfigSchema } from './schemas.js'
import type { KnowledgeBaseConfig, KnowledgeBaseConfigInput } from './schemas.js'
import { resolveKnowledgeBasePaths } from './paths.js'

type Env = Record<string, string | undefined>

const ConfigFileSchema = z.record(z.unknown())

type ConfigLayer = Record<string, unknown>

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function mergeLayers(base: ConfigLayer, overlay: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base }
  for (const [key, value] of Object.entries(overlay)) {
    if (value === undefined) continue
    const existing = merged[key]
    merged[key] = isPlainObject(existing) && isPlainObject(value)
      ? mergeLayers(existing, value)
      : value
  }
  return merged
}

/** Configuration values taken from environment variables. */
export function configFromEnv(env: Env): ConfigLayer {
  const layer: ConfigLayer = {}
  const embedding: ConfigLayer = {}
  const quality: ConfigLayer = {}

  if (env.REFKB_EMBEDDING_PROVIDER) embedding.provider = env.REFKB_EMBEDDING_PROVIDER
  if (env.REFKB_EMBEDDING_MODEL) embedding.model = env.REFKB_EMBEDDING_MODEL
  if (env.OPENAI_API_KEY) embedding.apiKey = env.OPENAI_API_KEY
  if (env.REFKB_QUALITY_MODE) quality.mode = env.REFKB_QUALITY_MODE
  if (env.SEMANTIC_SCHOLAR_API_KEY) quality.apiKey = env.SEMANTIC_SCHOLAR_API_KEY

  if (Object.keys(embedding).length > 0) layer.embedding = embedding
  if (Object.keys(quality).length > 0) layer.quality = quality
  return layer
}

export function parseConfig(input: unknown): Result<KnowledgeBaseConfig, KnowledgeBaseError> {
  const parsed = KnowledgeBaseConfigSchema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    return Err(KnowledgeBaseError.validation(`Invalid configuration: ${details}`))
  }
  return Ok(parsed.data)
}

export async function loadConfig(
  rootDir: string,
  overrides: KnowledgeBaseConfigInput = {},
  env: Env = process.env,
): Promise<Result<KnowledgeBaseConfig, KnowledgeBaseError>> {
  const paths = resolveKnowledgeBasePaths(rootDir)

  const fileResult = await readJsonFile(paths.configFile, ConfigFileSchema)
  if (!fileResult.ok) {
    return Err(KnowledgeBaseError.validation(`Cannot load ${paths.configFile}: ${fileResult.error.message}`))
  }

  let merged: ConfigLayer = fileResult.value ?? {}
  merged = mergeLayers(merged, configFromEnv(env))
  merged = mergeLayers(merged, { ...overrides })
  merged.rootDir = paths.rootDir

  return parseConfig(merged)
}
