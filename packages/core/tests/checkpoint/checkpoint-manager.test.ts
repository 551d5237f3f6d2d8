import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { z } from 'zod'
import { CheckpointManager } from '../../src/checkpoint/index.js'

const ScoreSchema = z.object({ score: z.number() })
type Score = z.infer<typeof ScoreSchema>

const items = (n: number) => Array.from({ length: n }, (_, i) => ({ id: `doc-${i}` }))

describe('CheckpointManager', () => {
  let tempDir: string
  let path: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-ckpt-'))
    path = join(tempDir, 'checkpoint.json')
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('finds nothing when no run was interrupted', async () => {
    const manager = new CheckpointManager(path, ScoreSchema)
    expect(await manager.detect()).toBeNull()
    expect(manager.status).toBe('idle')
  })

  it('persists on begin and flushes every interval items', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema, { interval: 2 })
    await manager.begin({ runId: 'run-1', operation: 'incremental', stage: 'score' })
    expect(existsSync(path)).toBe(true)

    await manager.record('doc-0', { score: 70 })
    const afterOne = await new CheckpointManager<Score>(path, ScoreSchema).peek()
    expect(afterOne?.completedIds).toEqual([])

    await manager.record('doc-1', { score: 65 })
    const afterTwo = await new CheckpointManager<Score>(path, ScoreSchema).peek()
    expect(afterTwo?.completedIds).toEqual(['doc-0', 'doc-1'])
    expect(afterTwo?.partialResults).toEqual({ 'doc-0': { score: 70 }, 'doc-1': { score: 65 } })
  })

  it('tells whether the next items reach a flush', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema, { interval: 3 })
    await manager.begin({ runId: 'run-1', operation: 'incremental', stage: 'embed' })
    expect(manager.flushesWithin(2)).toBe(false)

    await manager.record('doc-0')
    expect(manager.flushesWithin(2)).toBe(true)

    await manager.record('doc-1')
    await manager.record('doc-2')
    expect(manager.flushesWithin(1)).toBe(false)
  })

  it('resumes after the last committed item with nothing lost or repeated', async () => {
    const all = items(300)
    const first = new CheckpointManager<Score>(path, ScoreSchema, { interval: 50 })
    await first.begin({ runId: 'run-2', operation: 'incremental', stage: 'score' })
    for (const item of all.slice(0, 150)) {
      await first.record(item.id, { score: 60 })
    }
    // Simulated crash: no complete(), no interrupt()

    const second = new CheckpointManager<Score>(path, ScoreSchema, { interval: 50 })
    const detected = await second.detect()
    expect(detected?.runId).toBe('run-2')
    expect(second.status).toBe('interrupted')
    if (!detected) return
    second.adopt(detected)

    const resume = second.resume(all)
    expect(resume.nextIndex).toBe(150)
    expect(resume.remaining).toBe(150)
    expect(resume.results.size).toBe(150)
    expect(second.isCompleted('doc-149')).toBe(true)
    expect(second.isCompleted('doc-150')).toBe(false)

    for (const item of all.slice(resume.nextIndex)) {
      await second.record(item.id, { score: 61 })
    }
    expect(second.resume(all).remaining).toBe(0)
    expect(second.current?.completedIds).toHaveLength(300)
  })

  it('loses at most one interval of work on a crash', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema, { interval: 50 })
    await manager.begin({ runId: 'run-3', operation: 'incremental', stage: 'score' })
    for (const item of items(149)) {
      await manager.record(item.id)
    }

    const detected = await new CheckpointManager<Score>(path, ScoreSchema).detect()
    expect(detected?.completedIds).toHaveLength(100)
  })

  it('deletes the file on complete and keeps it on interrupt', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema, { interval: 100 })
    await manager.begin({ runId: 'run-4', operation: 'rebuild', stage: 'embed' })
    await manager.record('doc-0')
    await manager.interrupt()
    expect(manager.status).toBe('interrupted')

    const persisted = await new CheckpointManager<Score>(path, ScoreSchema).peek()
    expect(persisted?.completedIds).toEqual(['doc-0'])

    await manager.complete()
    expect(existsSync(path)).toBe(false)
    expect(manager.status).toBe('completed')
  })

  it('clears per-item state when a stage advances and keeps markers', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema)
    await manager.begin({ runId: 'run-5', operation: 'incremental', stage: 'score' })
    await manager.record('doc-0', { score: 50 })
    manager.setMarker('baseRowCount', 12)
    await manager.advance('embed')

    const persisted = await new CheckpointManager<Score>(path, ScoreSchema).peek()
    expect(persisted?.stage).toBe('embed')
    expect(persisted?.completedIds).toEqual([])
    expect(persisted?.partialResults).toEqual({})
    expect(persisted?.markers).toEqual({ baseRowCount: 12 })
    expect(manager.getMarker('baseRowCount')).toBe(12)
  })

  it('treats a corrupted file as absent and removes it', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    await writeFile(path, '{"version":1,"runId":')

    const manager = new CheckpointManager<Score>(path, ScoreSchema)
    expect(await manager.detect()).toBeNull()
    expect(existsSync(path)).toBe(false)
    expect(warn).toHaveBeenCalledOnce()
  })

  it('treats results of the wrong shape as corrupted', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const manager = new CheckpointManager<Score>(path, ScoreSchema)
    await manager.begin({ runId: 'run-6', operation: 'incremental', stage: 'score' })
    const raw = z.record(z.unknown()).parse(JSON.parse(await readFile(path, 'utf-8')))
    await writeFile(path, JSON.stringify({ ...raw, partialResults: { x: { score: 'high' } } }))

    expect(await new CheckpointManager<Score>(path, ScoreSchema).detect()).toBeNull()
  })

  it('discard drops the file without resuming', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema)
    await manager.begin({ runId: 'run-7', operation: 'incremental', stage: 'diff' })
    await manager.discard()
    expect(existsSync(path)).toBe(false)
    expect(manager.status).toBe('idle')
  })

  it('refuses to record before begin or adopt', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema)
    await expect(manager.record('doc-0')).rejects.toThrow('Checkpoint not started')
  })

  it('serializes concurrent flushes so the last snapshot wins', async () => {
    const manager = new CheckpointManager<Score>(path, ScoreSchema, { interval: 1000 })
    await manager.begin({ runId: 'run-8', operation: 'incremental', stage: 'score' })
    const writes: Promise<void>[] = []
    for (const item of items(5)) {
      await manager.record(item.id)
      writes.push(manager.flush())
    }
    await Promise.all(writes)

    const persisted = await new CheckpointManager<Score>(path, ScoreSchema).peek()
    expect(persisted?.completedIds).toHaveLength(5)
  })
})
