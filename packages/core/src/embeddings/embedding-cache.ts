/**
 * Persistent embedding cache keyed by content fingerprint.
 *
 * Two files: a JSON metadata file (fingerprint → row, model id, timestamp, plus a
 * checksum of the data file) and a raw little-endian float32 file holding the
 * rows. Nothing on disk is ever evaluated as code. Any load problem yields an
 * empty cache: the cache is rebuildable, the source documents are not touched.
 *
 * Entries are only reused when their model id matches the active model. Quality
 * scores play no part in the key, so rescoring never invalidates a vector.
 */

import { createHash } from 'node:crypto'
import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { KnowledgeBaseError, FingerprintSchema, errorMessage } from '../common/index.js'
import { readJsonFile, writeFileAtomic, writeJsonAtomic, isMissingFile } from '../storage/index.js'
import { packRows, unpackRows } from './vector-codec.js'

const CacheMetaSchema = z.object({
  version: z.literal(1),
  dimensions: z.number().int().positive(),
  dataSha256: z.string(),
  updatedAt: z.string(),
  entries: z.array(z.object({
    fingerprint: FingerprintSchema,
    row: z.number().int().nonnegative(),
    modelId: z.string().min(1),
    createdAt: z.string(),
  })),
})

interface CacheEntry {
  row: number
  modelId: string
  createdAt: string
}

export interface EmbeddingCacheStats {
  size: number
  hits: number
  misses: number
  modelMisses: number
  hitRate: number
}

export interface EmbeddingCachePaths {
  metaPath: string
  dataPath: string
}

export class EmbeddingCache {
  private entries = new Map<string, CacheEntry>()
  private rows: Float32Array[] = []
  private hits = 0
  private misses = 0
  private modelMisses = 0
  private dirty = false

  constructor(
    private readonly paths: EmbeddingCachePaths,
    readonly dimensions: number,
  ) {}

  /** Load from disk; returns an empty cache (with a warning) on any problem. */
  static async load(paths: EmbeddingCachePaths, dimensions: number): Promise<EmbeddingCache> {
    const cache = new EmbeddingCache(paths, dimensions)

    const meta = await readJsonFile(paths.metaPath, CacheMetaSchema)
    if (!meta.ok) {
      console.warn(`[embedding-cache] ignoring unreadable cache metadata: ${meta.error.message}`)
      return cache
    }
    if (!meta.value) return cache

    if (meta.value.dimensions !== dimensions) {
      console.warn(`[embedding-cache] cache holds ${meta.value.dimensions}-d vectors, model produces ${dimensions}-d; starting empty`)
      return cache
    }

    let data: Buffer
    try {
      data = await readFile(paths.dataPath)
    } catch (err) {
      if (!isMissingFile(err)) {
        console.warn(`[embedding-cache] ignoring unreadable cache data: ${errorMessage(err)}`)
      } else {
        console.warn('[embedding-cache] metadata present but vector file missing; starting empty')
      }
      return cache
    }

    const checksum = createHash('sha256').update(data).digest('hex')
    if (checksum !== meta.value.dataSha256) {
      console.warn('[embedding-cache] vector file does not match its metadata checksum; starting empty')
      return cache
    }

    const rows = unpackRows(data, dimensions)
    if (!rows) {
      console.warn('[embedding-cache] vector file length is not a whole number of rows; starting empty')
      return cache
    }

    for (const entry of meta.value.entries) {
      if (entry.row >= rows.length) {
        console.warn(`[embedding-cache] entry points past the vector file (row ${entry.row}); starting empty`)
        return new EmbeddingCache(paths, dimensions)
      }
      cache.entries.set(entry.fingerprint, { row: entry.row, modelId: entry.modelId, createdAt: entry.createdAt })
    }
    cache.rows = rows

    console.log(`[embedding-cache] loaded ${cache.entries.size} cached embeddings`)
    return cache
  }

  /** O(1) lookup. A vector cached under another model counts as a miss. */
  get(fingerprint: string, modelId: string): Float32Array | undefined {
    const entry = this.entries.get(fingerprint)
    if (!entry) {
      this.misses++
      return undefined
    }
    if (entry.modelId !== modelId) {
      this.misses++
      this.modelMisses++
      return undefined
    }
    this.hits++
    return this.rows[entry.row]
  }

  /** Lookup without touching hit/miss counters. */
  has(fingerprint: string, modelId: string): boolean {
    return this.entries.get(fingerprint)?.modelId === modelId
  }

  /** Like get(), without touching hit/miss counters. */
  peek(fingerprint: string, modelId: string): Float32Array | undefined {
    const entry = this.entries.get(fingerprint)
    return entry?.modelId === modelId ? this.rows[entry.row] : undefined
  }

  put(fingerprint: string, vector: ArrayLike<number>, modelId: string): void {
    if (vector.length !== this.dimensions) {
      throw KnowledgeBaseError.modelMismatch(
        `Embedding has ${vector.length} dimensions, cache expects ${this.dimensions}`,
      )
    }

    const row = Float32Array.from(vector)
    const createdAt = new Date().toISOString()
    const existing = this.entries.get(fingerprint)
    if (existing) {
      this.rows[existing.row] = row
      this.entries.set(fingerprint, { row: existing.row, modelId, createdAt })
    } else {
      this.rows.push(row)
      this.entries.set(fingerprint, { row: this.rows.length - 1, modelId, createdAt })
    }
    this.dirty = true
  }

  /**
   * Drop entries whose fingerprint is no longer live or whose model is not the
   * active one. Returns the number removed. Rows are compacted on the next save.
   */
  prune(liveFingerprints: ReadonlySet<string>, modelId: string): number {
    let removed = 0
    for (const [fingerprint, entry] of this.entries) {
      if (!liveFingerprints.has(fingerprint) || entry.modelId !== modelId) {
        this.entries.delete(fingerprint)
        removed++
      }
    }
    if (removed > 0) this.dirty = true
    return removed
  }

  size(): number {
    return this.entries.size
  }

  hitRate(): number {
    const lookups = this.hits + this.misses
    return lookups === 0 ? 0 : this.hits / lookups
  }

  stats(): EmbeddingCacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      modelMisses: this.modelMisses,
      hitRate: this.hitRate(),
    }
  }

  resetStats(): void {
    this.hits = 0
    this.misses = 0
    this.modelMisses = 0
  }

  get isDirty(): boolean {
    return this.dirty
  }

  /**
   * Persist both files. The data file is written first; the metadata (with the
   * data checksum) last, so a crash between the two fails the checksum on load
   * instead of pairing new rows with old offsets.
   */
  async save(): Promise<void> {
    if (!this.dirty) return

    const compacted: Float32Array[] = []
    const entries: Array<{ fingerprint: string; row: number; modelId: string; createdAt: string }> = []
    for (const [fingerprint, entry] of this.entries) {
      entries.push({ fingerprint, row: compacted.length, modelId: entry.modelId, createdAt: entry.createdAt })
      compacted.push(this.rows[entry.row])
    }

    const data = packRows(compacted, this.dimensions)
    await writeFileAtomic(this.paths.dataPath, data)
    await writeJsonAtomic(this.paths.metaPath, {
      version: 1,
      dimensions: this.dimensions,
      dataSha256: createHash('sha256').update(data).digest('hex'),
      updatedAt: new Date().toISOString(),
      entries,
    })

    this.rows = compacted
    this.entries = new Map(entries.map(e => [e.fingerprint, { row: e.row, modelId: e.modelId, createdAt: e.createdAt }]))
    this.dirty = false
  }
}
