/**
 * Owns the on-disk vector index: creation, full rebuild, incremental merge and
 * post-write verification. Every write goes through an atomic file replace.
 */

import type { Result } from '../common/index.js'
import { Ok, Err } from '../common/index.js'
import { KnowledgeBaseError } from '../common/index.js'
import { FlatVectorIndex } from './vector-index.js'

export type IndexVerification =
  | { status: 'ok'; rows: number }
  | { status: 'size_mismatch'; expected: number; actual: number }
  | { status: 'dimension_mismatch'; expected: number; actual: number }
  | { status: 'corrupt'; reason: string }

export interface IndexMerge {
  /** New rows, appended in order. */
  append: ReadonlyArray<ArrayLike<number>>
  /** Existing rows overwritten in place (changed documents keep their row). */
  replace: ReadonlyArray<{ row: number; vector: ArrayLike<number> }>
}

export class IndexBuilder {
  constructor(
    readonly path: string,
    readonly dimensions: number,
  ) {}

  /** Load the index; a missing file yields an empty one, an unreadable one an error. */
  async open(): Promise<Result<FlatVectorIndex, KnowledgeBaseError>> {
    const loaded = await FlatVectorIndex.load(this.path)
    switch (loaded.status) {
      case 'missing':
        return Ok(new FlatVectorIndex(this.dimensions))
      case 'corrupt':
        return Err(KnowledgeBaseError.integrity(`Vector index at ${this.path} is corrupt: ${loaded.reason}`))
      case 'ok':
        if (loaded.index.dimensions !== this.dimensions) {
          return Err(KnowledgeBaseError.modelMismatch(
            `Vector index has ${loaded.index.dimensions} dimensions but the embedding model produces ${this.dimensions}`,
          ))
        }
        return Ok(loaded.index)
    }
  }

  /** Replace the index with exactly `vectors`, row i = vectors[i]. */
  async rebuild(vectors: ReadonlyArray<ArrayLike<number>>): Promise<FlatVectorIndex> {
    const index = new FlatVectorIndex(this.dimensions, vectors.length)
    index.add(vectors)
    await index.save(this.path)
    console.log(`[index] rebuilt with ${index.size} rows`)
    return index
  }

  /** Apply appends and in-place replacements, then persist once. Returns the first appended row. */
  async merge(index: FlatVectorIndex, changes: IndexMerge): Promise<number> {
    if (changes.replace.length > 0) index.replaceRows(changes.replace)
    const first = changes.append.length > 0 ? index.add(changes.append) : index.size
    await index.save(this.path)
    console.log(`[index] merged: ${changes.append.length} appended, ${changes.replace.length} replaced, ${index.size} total`)
    return first
  }

  async append(index: FlatVectorIndex, vectors: ReadonlyArray<ArrayLike<number>>): Promise<number> {
    return this.merge(index, { append: vectors, replace: [] })
  }

  async replaceRows(index: FlatVectorIndex, entries: IndexMerge['replace']): Promise<void> {
    await this.merge(index, { append: [], replace: entries })
  }

  /** Re-read the file from disk and check it holds `expectedRows` rows. */
  async verify(expectedRows: number): Promise<IndexVerification> {
    const loaded = await FlatVectorIndex.load(this.path)
    if (loaded.status === 'missing') {
      return expectedRows === 0
        ? { status: 'ok', rows: 0 }
        : { status: 'size_mismatch', expected: expectedRows, actual: 0 }
    }
    if (loaded.status === 'corrupt') return { status: 'corrupt', reason: loaded.reason }
    if (loaded.index.dimensions !== this.dimensions) {
      return { status: 'dimension_mismatch', expected: this.dimensions, actual: loaded.index.dimensions }
    }
    if (loaded.index.size !== expectedRows) {
      return { status: 'size_mismatch', expected: expectedRows, actual: loaded.index.size }
    }
    return { status: 'ok', rows: expectedRows }
  }
}
