/**
 * Persistent fingerprint store: one content hash per document id.
 * A missing or unreadable store loads as empty, which makes every document look
 * changed and forces reprocessing instead of failing the run.
 */

import { z } from 'zod'
import { FingerprintSchema } from '../common/index.js'
import { readJsonFile, writeJsonAtomic } from '../storage/index.js'

const FingerprintFileSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  entries: z.record(FingerprintSchema),
})

export type FingerprintStoreOrigin = 'loaded' | 'missing' | 'corrupt'

export class FingerprintStore {
  private entries: Map<string, string>

  private constructor(
    private readonly path: string,
    entries: Map<string, string>,
    readonly origin: FingerprintStoreOrigin,
  ) {
    this.entries = entries
  }

  static async load(path: string): Promise<FingerprintStore> {
    const result = await readJsonFile(path, FingerprintFileSchema)
    if (!result.ok) {
      console.warn(`[fingerprint] store unreadable, every document will be reprocessed: ${result.error.message}`)
      return new FingerprintStore(path, new Map(), 'corrupt')
    }
    if (!result.value) {
      return new FingerprintStore(path, new Map(), 'missing')
    }
    return new FingerprintStore(path, new Map(Object.entries(result.value.entries)), 'loaded')
  }

  get(documentId: string): string | undefined {
    return this.entries.get(documentId)
  }

  set(documentId: string, fingerprint: string): void {
    this.entries.set(documentId, fingerprint)
  }

  delete(documentId: string): void {
    this.entries.delete(documentId)
  }

  get size(): number {
    return this.entries.size
  }

  async save(): Promise<void> {
    const sorted = [...this.entries.entries()].sort(([a], [b]) => a.localeCompare(b))
    await writeJsonAtomic(this.path, {
      version: 1,
      updatedAt: new Date().toISOString(),
      entries: Object.fromEntries(sorted),
    })
  }
}
