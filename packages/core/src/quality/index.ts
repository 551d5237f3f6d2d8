export * from './schemas.js'
export * from './study-type.js'
export * from './factors.js'
export * from './basic.js'
export * from './enhanced.js'
export * from './venues.js'
export * from './normalize.js'
export * from './retry-policy.js'
export * from './failure-monitor.js'
export * from './worker-pool.js'
export type { QualityEnrichmentClient } from './enrichment-client.js'
export * from './scorer.js'
