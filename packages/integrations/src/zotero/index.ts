export { ZoteroLocalClient, toSourceDocument, formatCreator, parseYear } from './client.js'
export { ZoteroItemSchema, NON_REFERENCE_ITEM_TYPES } from './types.js'
export type { ZoteroLocalClientConfig, ZoteroItem, ZoteroCreator } from './types.js'
