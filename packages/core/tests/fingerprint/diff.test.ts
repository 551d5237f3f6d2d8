import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { FingerprintStore, computeFingerprint, diffDocuments } from '../../src/fingerprint/index.js'
import { makeRecord, makeSource } from '../helpers/records.js'

describe('FingerprintStore', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-fp-'))
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('loads a missing store as empty', async () => {
    const store = await FingerprintStore.load(join(tempDir, 'fingerprints.json'))
    expect(store.origin).toBe('missing')
    expect(store.size).toBe(0)
  })

  it('loads a corrupt store as empty and warns', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const path = join(tempDir, 'fingerprints.json')
    await writeFile(path, '{"version":1,"entries":')

    const store = await FingerprintStore.load(path)
    expect(store.origin).toBe('corrupt')
    expect(store.size).toBe(0)
    expect(warn).toHaveBeenCalledOnce()
  })

  it('round-trips entries sorted by id', async () => {
    const path = join(tempDir, 'fingerprints.json')
    const store = await FingerprintStore.load(path)
    const a = computeFingerprint({ title: 'a', abstract: '', fullText: null })
    const b = computeFingerprint({ title: 'b', abstract: '', fullText: null })
    store.set('0002', b)
    store.set('0001', a)
    await store.save()

    const saved: unknown = JSON.parse(await readFile(path, 'utf-8'))
    expect(saved).toMatchObject({ version: 1, entries: { '0001': a, '0002': b } })

    const reloaded = await FingerprintStore.load(path)
    expect(reloaded.origin).toBe('loaded')
    expect(reloaded.get('0001')).toBe(a)
    reloaded.delete('0001')
    expect(reloaded.get('0001')).toBeUndefined()
    expect(reloaded.size).toBe(1)
  })
})

describe('diffDocuments', () => {
  let tempDir: string
  let store: FingerprintStore

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'kb-diff-'))
    store = await FingerprintStore.load(join(tempDir, 'fingerprints.json'))
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(tempDir, { recursive: true, force: true })
  })

  it('partitions into added, changed, unchanged and removed', () => {
    const keep = makeSource('keep')
    const edit = makeSource('edit')
    const gone = makeSource('gone')
    const existing = [makeRecord('0001', keep), makeRecord('0002', edit), makeRecord('0003', gone)]
    for (const record of existing) store.set(record.id, record.contentFingerprint)

    const editedSource = { ...edit, abstract: 'A revised abstract' }
    const fresh = makeSource('fresh')
    const diff = diffDocuments([keep, editedSource, fresh], existing, store)

    expect(diff.added.map(d => d.source.sourceKey)).toEqual(['fresh'])
    expect(diff.changed.map(d => d.record.id)).toEqual(['0002'])
    expect(diff.changed[0].fingerprint).toBe(computeFingerprint(editedSource))
    expect(diff.unchanged.map(d => d.record.id)).toEqual(['0001'])
    expect(diff.removed.map(r => r.id)).toEqual(['0003'])
    expect(diff.revived).toEqual([])
    expect(diff.duplicateKeys).toEqual([])
  })

  it('treats records without a stored fingerprint as changed', () => {
    const source = makeSource('k')
    const diff = diffDocuments([source], [makeRecord('0001', source)], store)
    expect(diff.changed.map(d => d.record.id)).toEqual(['0001'])
    expect(diff.unchanged).toEqual([])
  })

  it('revives a tombstoned record whose key returns', () => {
    const source = makeSource('back')
    const record = makeRecord('0004', source, { removed: true })
    store.set(record.id, record.contentFingerprint)

    const diff = diffDocuments([source], [record], store)
    expect(diff.revived.map(d => d.record.id)).toEqual(['0004'])
    expect(diff.removed).toEqual([])
  })

  it('does not report an already removed record again', () => {
    const record = makeRecord('0005', makeSource('old'), { removed: true })
    expect(diffDocuments([], [record], store).removed).toEqual([])
  })

  it('keeps the first of duplicate source keys', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const first = makeSource('dup', { title: 'First' })
    const second = makeSource('dup', { title: 'Second' })

    const diff = diffDocuments([first, second], [], store)
    expect(diff.added.map(d => d.source.title)).toEqual(['First'])
    expect(diff.duplicateKeys).toEqual(['dup'])
  })
})
