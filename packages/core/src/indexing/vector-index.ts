/**
 * Flat L2 vector index. Row i is the vector of the document whose
 * embedding_index is i; rows are only appended or overwritten in place.
 *
 * File layout (little-endian):
 *   0  magic "RFKBVIDX" (8 bytes)
 *   8  format version   (uint32)
 *   12 dimensions       (uint32)
 *   16 row count        (uint32)
 *   20 rows             (count * dimensions float32)
 */

import { readFile } from 'node:fs/promises'
import { KnowledgeBaseError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { isMissingFile, writeFileAtomic } from '../storage/index.js'
import { l2DistanceSquared } from '../embeddings/vector-codec.js'

export const INDEX_MAGIC = 'RFKBVIDX'
export const INDEX_FORMAT_VERSION = 1
const HEADER_BYTES = 20

export interface VectorHit {
  row: number
  /** Squared L2 distance; smaller is closer. */
  distance: number
}

export type IndexLoadResult =
  | { status: 'ok'; index: FlatVectorIndex }
  | { status: 'missing' }
  | { status: 'corrupt'; reason: string }

export class FlatVectorIndex {
  private data: Float32Array
  private rows = 0

  constructor(readonly dimensions: number, initialCapacity = 64) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw KnowledgeBaseError.validation(`Index dimensions must be a positive integer, got ${dimensions}`)
    }
    this.data = new Float32Array(Math.max(1, initialCapacity) * dimensions)
  }

  get size(): number {
    return this.rows
  }

  /** Append vectors; returns the row index of the first one. */
  add(vectors: ReadonlyArray<ArrayLike<number>>): number {
    for (const v of vectors) this.checkDimensions(v)
    const first = this.rows
    this.ensureCapacity(this.rows + vectors.length)
    vectors.forEach((v, i) => this.data.set(Array.from(v), (first + i) * this.dimensions))
    this.rows += vectors.length
    return first
  }

  /** Overwrite existing rows in place. */
  replaceRows(entries: ReadonlyArray<{ row: number; vector: ArrayLike<number> }>): void {
    for (const { row, vector } of entries) {
      this.checkRow(row)
      this.checkDimensions(vector)
    }
    for (const { row, vector } of entries) {
      this.data.set(Array.from(vector), row * this.dimensions)
    }
  }

  reconstruct(row: number): Float32Array {
    this.checkRow(row)
    return this.data.slice(row * this.dimensions, (row + 1) * this.dimensions)
  }

  /** Exact k nearest rows by L2 distance. `accept` filters rows (e.g. removed documents). */
  search(query: ArrayLike<number>, k: number, accept?: (row: number) => boolean): VectorHit[] {
    this.checkDimensions(query)
    if (k <= 0) return []
    const hits: VectorHit[] = []
    for (let row = 0; row < this.rows; row++) {
      if (accept && !accept(row)) continue
      const vec = this.data.subarray(row * this.dimensions, (row + 1) * this.dimensions)
      hits.push({ row, distance: l2DistanceSquared(query, vec) })
    }
    hits.sort((a, b) => a.distance - b.distance || a.row - b.row)
    return hits.slice(0, k)
  }

  toBuffer(): Buffer {
    const buf = Buffer.alloc(HEADER_BYTES + this.rows * this.dimensions * 4)
    buf.write(INDEX_MAGIC, 0, 'ascii')
    buf.writeUInt32LE(INDEX_FORMAT_VERSION, 8)
    buf.writeUInt32LE(this.dimensions, 12)
    buf.writeUInt32LE(this.rows, 16)
    const values = this.rows * this.dimensions
    for (let i = 0; i < values; i++) {
      buf.writeFloatLE(this.data[i], HEADER_BYTES + i * 4)
    }
    return buf
  }

  static fromBuffer(buf: Buffer): Result<FlatVectorIndex, KnowledgeBaseError> {
    if (buf.byteLength < HEADER_BYTES) {
      return Err(KnowledgeBaseError.integrity(`Index file truncated: ${buf.byteLength} bytes`))
    }
    if (buf.toString('ascii', 0, 8) !== INDEX_MAGIC) {
      return Err(KnowledgeBaseError.integrity('Index file has an unknown header'))
    }
    const version = buf.readUInt32LE(8)
    if (version !== INDEX_FORMAT_VERSION) {
      return Err(KnowledgeBaseError.integrity(`Unsupported index format version ${version}`))
    }
    const dimensions = buf.readUInt32LE(12)
    const count = buf.readUInt32LE(16)
    if (dimensions === 0) {
      return Err(KnowledgeBaseError.integrity('Index file declares zero dimensions'))
    }
    const expected = HEADER_BYTES + count * dimensions * 4
    if (buf.byteLength !== expected) {
      return Err(KnowledgeBaseError.integrity(`Index file size ${buf.byteLength} does not match ${count} rows of ${dimensions} dimensions (${expected} bytes)`))
    }

    const index = new FlatVectorIndex(dimensions, count)
    const values = count * dimensions
    for (let i = 0; i < values; i++) {
      index.data[i] = buf.readFloatLE(HEADER_BYTES + i * 4)
    }
    index.rows = count
    return Ok(index)
  }

  async save(path: string): Promise<void> {
    await writeFileAtomic(path, this.toBuffer())
  }

  static async load(path: string): Promise<IndexLoadResult> {
    let buf: Buffer
    try {
      buf = await readFile(path)
    } catch (err) {
      if (isMissingFile(err)) return { status: 'missing' }
      return { status: 'corrupt', reason: `Failed to read index: ${errorMessage(err)}` }
    }
    const parsed = FlatVectorIndex.fromBuffer(buf)
    return parsed.ok
      ? { status: 'ok', index: parsed.value }
      : { status: 'corrupt', reason: parsed.error.message }
  }

  private ensureCapacity(rows: number): void {
    const needed = rows * this.dimensions
    if (needed <= this.data.length) return
    const grown = new Float32Array(Math.max(needed, this.data.length * 2))
    grown.set(this.data.subarray(0, this.rows * this.dimensions))
    this.data = grown
  }

  private checkDimensions(vector: ArrayLike<number>): void {
    if (vector.length !== this.dimensions) {
      throw KnowledgeBaseError.modelMismatch(`Vector has ${vector.length} dimensions, index expects ${this.dimensions}`)
    }
  }

  private checkRow(row: number): void {
    if (!Number.isInteger(row) || row < 0 || row >= this.rows) {
      throw KnowledgeBaseError.validation(`Row ${row} is outside the index (size ${this.rows})`)
    }
  }
}
