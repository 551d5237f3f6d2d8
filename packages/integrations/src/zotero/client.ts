/**
 * Zotero local API reader: pages through the library of a running Zotero
 * desktop app and yields source documents for the build.
 */

import { z } from 'zod'
import { KnowledgeBaseError, errorMessage } from '@refkb/core'
import type { SourceDocumentInput } from '@refkb/core'
import { fetchWithTimeout } from '../common/index.js'
import { NON_REFERENCE_ITEM_TYPES, ZoteroItemSchema } from './types.js'
import type { ZoteroCreator, ZoteroItem, ZoteroLocalClientConfig } from './types.js'

const PageSchema = z.array(z.unknown())

export class ZoteroLocalClient {
  private readonly baseUrl: string
  private readonly pageSize: number
  private readonly timeoutMs: number

  constructor(config: ZoteroLocalClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? 'http://127.0.0.1:23119/api').replace(/\/+$/, '')
    this.pageSize = config.pageSize ?? 100
    this.timeoutMs = config.timeoutMs ?? 30_000
  }

  /** Every top-level reference in the local library, page by page. */
  async *documents(signal?: AbortSignal): AsyncGenerator<SourceDocumentInput> {
    let start = 0
    let skipped = 0
    for (;;) {
      const page = await this.fetchPage(start, signal)
      for (const raw of page) {
        const item = ZoteroItemSchema.safeParse(raw)
        if (!item.success) {
          skipped++
          continue
        }
        if (NON_REFERENCE_ITEM_TYPES.has(item.data.data.itemType)) continue
        yield toSourceDocument(item.data)
      }
      if (page.length < this.pageSize) break
      start += this.pageSize
    }
    if (skipped > 0) {
      console.warn(`[zotero] skipped ${skipped} item(s) that did not match the expected shape`)
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<SourceDocumentInput> {
    return this.documents()
  }

  private async fetchPage(start: number, signal?: AbortSignal): Promise<unknown[]> {
    const url = `${this.baseUrl}/users/0/items?start=${start}&limit=${this.pageSize}&format=json`
    let response: Response
    try {
      response = await fetchWithTimeout(url, { headers: { Accept: 'application/json' } }, this.timeoutMs, signal)
    } catch (err) {
      if (err instanceof KnowledgeBaseError) throw err
      throw KnowledgeBaseError.api(`Could not reach the Zotero local API at ${this.baseUrl}. Is Zotero running with the local API enabled? ${errorMessage(err)}`)
    }
    if (!response.ok) {
      throw KnowledgeBaseError.api(`Zotero local API responded ${response.status} for ${url}`)
    }
    const parsed = PageSchema.safeParse(await response.json())
    if (!parsed.success) {
      throw KnowledgeBaseError.api('Zotero local API returned a page that is not an item array')
    }
    return parsed.data
  }
}

export function formatCreator(creator: ZoteroCreator): string | null {
  if (creator.lastName) {
    return creator.firstName ? `${creator.lastName}, ${creator.firstName}` : creator.lastName
  }
  return creator.name?.trim() || null
}

export function parseYear(date: string | undefined): number | null {
  const match = date?.match(/\b(\d{4})\b/)
  return match ? Number(match[1]) : null
}

export function toSourceDocument(item: ZoteroItem): SourceDocumentInput {
  const data = item.data
  const authors = (data.creators ?? [])
    .map(formatCreator)
    .filter((name): name is string => name !== null)
  return {
    sourceKey: data.key ?? item.key,
    title: data.title ?? '',
    authors,
    year: parseYear(data.date),
    doi: data.DOI?.trim() || null,
    journal: data.publicationTitle?.trim() || null,
    abstract: data.abstractNote ?? '',
  }
}
