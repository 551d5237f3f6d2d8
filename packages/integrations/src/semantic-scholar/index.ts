export { SemanticScholarClient, SEMANTIC_SCHOLAR_MAX_BATCH, PAPER_FIELDS } from './client.js'
export type { SemanticScholarClientConfig } from './client.js'
