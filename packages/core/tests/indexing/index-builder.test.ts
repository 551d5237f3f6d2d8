import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { FlatVectorIndex, IndexBuilder } from '../../src/indexing/index.js'

describe('IndexBuilder', () => {
  let tempDir: string
  let path: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-builder-'))
    path = join(tempDir, 'index.bin')
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('opens a missing index as empty', async () => {
    const result = await new IndexBuilder(path, 3).open()
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.size).toBe(0)
      expect(result.value.dimensions).toBe(3)
    }
  })

  it('refuses a corrupt index', async () => {
    await writeFile(path, Buffer.alloc(4))
    const result = await new IndexBuilder(path, 3).open()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('INTEGRITY_ERROR')
  })

  it('refuses an index built for another dimension', async () => {
    await new IndexBuilder(path, 2).rebuild([[1, 0]])
    const result = await new IndexBuilder(path, 3).open()
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.code).toBe('MODEL_MISMATCH')
  })

  it('merges appends and replacements in one write', async () => {
    const builder = new IndexBuilder(path, 2)
    const index = await builder.rebuild([[1, 0], [0, 1]])

    const first = await builder.merge(index, { append: [[1, 1], [2, 2]], replace: [{ row: 0, vector: [0.5, 0.5] }] })
    expect(first).toBe(2)

    const reopened = await builder.open()
    expect(reopened.ok).toBe(true)
    if (!reopened.ok) return
    expect(reopened.value.size).toBe(4)
    expect([...reopened.value.reconstruct(0)]).toEqual([0.5, 0.5])
    expect([...reopened.value.reconstruct(3)]).toEqual([2, 2])
  })

  it('append and replaceRows persist', async () => {
    const builder = new IndexBuilder(path, 2)
    const index = new FlatVectorIndex(2)
    expect(await builder.append(index, [[1, 0]])).toBe(0)
    await builder.replaceRows(index, [{ row: 0, vector: [0, 1] }])

    const loaded = await FlatVectorIndex.load(path)
    expect(loaded.status).toBe('ok')
    if (loaded.status === 'ok') expect([...loaded.index.reconstruct(0)]).toEqual([0, 1])
  })

  it('verifies what is on disk', async () => {
    const builder = new IndexBuilder(path, 2)
    expect(await builder.verify(0)).toEqual({ status: 'ok', rows: 0 })
    expect(await builder.verify(2)).toEqual({ status: 'size_mismatch', expected: 2, actual: 0 })

    await builder.rebuild([[1, 0], [0, 1]])
    expect(await builder.verify(2)).toEqual({ status: 'ok', rows: 2 })
    expect(await builder.verify(3)).toEqual({ status: 'size_mismatch', expected: 3, actual: 2 })
    expect(await new IndexBuilder(path, 4).verify(2)).toEqual({ status: 'dimension_mismatch', expected: 4, actual: 2 })

    await writeFile(path, 'garbage')
    expect((await builder.verify(2)).status).toBe('corrupt')
  })
})
