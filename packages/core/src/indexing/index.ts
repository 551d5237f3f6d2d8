export * from './vector-index.js'
export * from './index-builder.js'
export * from './integrity.js'
