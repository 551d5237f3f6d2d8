import { z } from 'zod'

export interface ZoteroLocalClientConfig {
  /** Local API root, e.g. http://127.0.0.1:23119/api */
  baseUrl?: string
  /** Items per page (the local API caps this at 100). */
  pageSize?: number
  timeoutMs?: number
}

export const ZoteroCreatorSchema = z.object({
  creatorType: z.string().optional(),
  firstName: z.string().optional(),
  lastName: z.string().optional(),
  name: z.string().optional(),
})

export const ZoteroItemSchema = z.object({
  key: z.string(),
  data: z.object({
    key: z.string().optional(),
    itemType: z.string(),
    title: z.string().optional(),
    creators: z.array(ZoteroCreatorSchema).optional(),
    date: z.string().optional(),
    DOI: z.string().optional(),
    publicationTitle: z.string().optional(),
    abstractNote: z.string().optional(),
  }).passthrough(),
}).passthrough()

export type ZoteroCreator = z.infer<typeof ZoteroCreatorSchema>
export type ZoteroItem = z.infer<typeof ZoteroItemSchema>

/** Item types that are children of a reference rather than references. */
export const NON_REFERENCE_ITEM_TYPES: ReadonlySet<string> = new Set(['attachment', 'note', 'annotation'])
