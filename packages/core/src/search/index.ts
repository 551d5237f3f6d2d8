export { searchKnowledgeBase } from './search.js'
export type { SearchOptions, SearchHit } from './search.js'
