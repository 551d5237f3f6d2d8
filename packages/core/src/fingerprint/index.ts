export { computeFingerprint, computeQualityFingerprint, normalizeText, hasChanged } from './fingerprint.js'
export type { FingerprintInput } from './fingerprint.js'
export { FingerprintStore } from './fingerprint-store.js'
export type { FingerprintStoreOrigin } from './fingerprint-store.js'
export { diffDocuments } from './diff.js'
export type { DocumentDiff, IncomingDocument, MatchedDocument } from './diff.js'
