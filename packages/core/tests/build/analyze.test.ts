import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { existsSync } from 'node:fs'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { BuildOrchestrator, analyzeKnowledgeBase } from '../../src/build/index.js'
import { unwrap } from '../../src/common/index.js'
import { parseConfig, resolveKnowledgeBasePaths } from '../../src/config/index.js'
import type { KnowledgeBaseConfig } from '../../src/config/index.js'
import { FakeEmbeddingClient } from '../helpers/fakes.js'
import { makeSource } from '../helpers/records.js'

const deps = { sleep: async () => {}, freeMemory: () => 1024 ** 3 }

describe('analyzeKnowledgeBase', () => {
  let tempDir: string
  let config: KnowledgeBaseConfig

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-analyze-'))
    config = unwrap(parseConfig({
      rootDir: join(tempDir, 'kb'),
      quality: { mode: 'basic', minDelayMs: 0 },
      embedding: { dimensions: 4, maxBatchSize: 4 },
    }))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('reports everything as new for a knowledge base that does not exist yet', async () => {
    const client = new FakeEmbeddingClient()
    const result = await analyzeKnowledgeBase(config, [makeSource('a'), makeSource('b'), makeSource('a')], client)

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.documents).toEqual({
      total: 2,
      new: 2,
      changed: 0,
      unchanged: 0,
      removed: 0,
      revived: 0,
      duplicates: 1,
    })
    expect(result.value.pendingCheckpoint).toBeNull()
    expect(result.value.model).toEqual({
      stored: null,
      active: { modelId: 'fake:fake-embed:v1', dimensions: 4 },
      matches: true,
    })
    expect(result.value.integrity).toBeNull()
    expect(result.value.indexStatus).toBe('missing')
    expect(client.calls).toEqual([])
    expect(existsSync(resolveKnowledgeBasePaths(config.rootDir).metadataDb)).toBe(false)
  })

  it('previews the diff against a built knowledge base without changing it', async () => {
    const docs = [makeSource('a'), makeSource('b'), makeSource('c')]
    const orchestrator = new BuildOrchestrator(config, { embeddingClient: new FakeEmbeddingClient() }, deps)
    unwrap(await orchestrator.build(docs))

    const next = [{ ...docs[0], abstract: 'Rewritten' }, docs[1], makeSource('d')]
    const result = await orchestrator.analyze(next)

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.documents).toMatchObject({ total: 3, new: 1, changed: 1, unchanged: 1, removed: 1 })
    expect(result.value.model.matches).toBe(true)
    expect(result.value.integrity?.ok).toBe(true)
    expect(result.value.indexStatus).toBe('ok')

    // Running the analysis twice gives the same answer
    const again = await orchestrator.analyze(next)
    expect(again.ok && again.value.documents).toEqual(result.value.documents)
  })

  it('flags a model change and an interrupted build', async () => {
    const controller = new AbortController()
    const client = new FakeEmbeddingClient({ beforeBatch: () => controller.abort() })
    const docs = Array.from({ length: 6 }, (_, i) => makeSource(`k${i}`))
    unwrap(await new BuildOrchestrator(config, { embeddingClient: new FakeEmbeddingClient() }, deps).build(docs.slice(0, 1)))
    await new BuildOrchestrator(config, { embeddingClient: client }, deps).build(docs, { signal: controller.signal })

    const result = await analyzeKnowledgeBase(config, docs, new FakeEmbeddingClient({ modelName: 'other-embed' }))

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.pendingCheckpoint).toEqual({ operation: 'incremental', stage: 'embed', completed: 4 })
    expect(result.value.model).toEqual({
      stored: { modelId: 'fake:fake-embed:v1', dimensions: 4 },
      active: { modelId: 'fake:other-embed:v1', dimensions: 4 },
      matches: false,
    })
    // The five inserted documents are not embedded yet
    expect(result.value.integrity?.ok).toBe(false)
  })

  it('rejects invalid source documents', async () => {
    const result = await analyzeKnowledgeBase(config, [{ sourceKey: 'a' }, { sourceKey: '' }], new FakeEmbeddingClient())

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('VALIDATION_ERROR')
  })
})
