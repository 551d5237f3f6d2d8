import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import {
  CONFIG_FILE_NAME,
  configFromEnv,
  loadConfig,
  parseConfig,
  resolveKnowledgeBasePaths,
} from '../../src/config/index.js'

describe('parseConfig', () => {
  it('fills every default from an empty object', () => {
    const result = parseConfig({})
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.value.rootDir).toBe('kb_data')
    expect(result.value.embedding).toMatchObject({ provider: 'ollama', model: 'nomic-embed-text', dimensions: 768 })
    expect(result.value.quality).toMatchObject({
      mode: 'enhanced',
      workers: 3,
      minDelayMs: 100,
      batchSize: 100,
      failureThreshold: 0.5,
    })
    expect(result.value.retry).toEqual({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 10_000, jitter: 0.1 })
    expect(result.value.checkpoint.interval).toBe(50)
  })

  it('names every invalid field', () => {
    const result = parseConfig({ quality: { workers: 0, batchSize: 900 } })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
    expect(result.error.message).toContain('quality.workers')
    expect(result.error.message).toContain('quality.batchSize')
  })
})

describe('configFromEnv', () => {
  it('maps known variables into nested layers', () => {
    expect(configFromEnv({
      REFKB_EMBEDDING_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-secret',
      REFKB_QUALITY_MODE: 'basic',
      UNRELATED: 'x',
    })).toEqual({
      embedding: { provider: 'openai', apiKey: 'test-secret' },
      quality: { mode: 'basic' },
    })
  })

  it('returns an empty layer when nothing is set', () => {
    expect(configFromEnv({})).toEqual({})
  })
})

describe('loadConfig', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-config-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('layers file < environment < overrides and pins rootDir', async () => {
    await writeFile(join(tempDir, CONFIG_FILE_NAME), JSON.stringify({
      rootDir: '/somewhere/else',
      quality: { mode: 'basic', workers: 2 },
      embedding: { model: 'from-file' },
    }))

    const result = await loadConfig(
      tempDir,
      { quality: { workers: 5 } },
      { REFKB_QUALITY_MODE: 'enhanced', REFKB_EMBEDDING_MODEL: 'from-env' },
    )
    expect(result.ok).toBe(true)
    if (!result.ok) return

    expect(result.value.rootDir).toBe(resolveKnowledgeBasePaths(tempDir).rootDir)
    expect(result.value.quality.mode).toBe('enhanced')
    expect(result.value.quality.workers).toBe(5)
    expect(result.value.embedding.model).toBe('from-env')
  })

  it('uses defaults when there is no config file', async () => {
    const result = await loadConfig(tempDir, {}, {})
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.quality.batchSize).toBe(100)
  })

  it('fails before any work on an unreadable config file', async () => {
    await writeFile(join(tempDir, CONFIG_FILE_NAME), '{ not json')
    const result = await loadConfig(tempDir, {}, {})
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR')
  })
})

describe('resolveKnowledgeBasePaths', () => {
  it('keeps every artifact under the root', () => {
    const paths = resolveKnowledgeBasePaths('/tmp/kb')
    expect(paths.metadataDb).toBe(join('/tmp/kb', 'metadata.db'))
    expect(paths.index).toBe(join('/tmp/kb', 'index.bin'))
    expect(paths.checkpoint).toBe(join('/tmp/kb', '.build-checkpoint.json'))
    expect(paths.backupsDir).toBe(join('/tmp/kb', 'backups'))
  })
})
