/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { KnowledgeBaseError, errorMessage } from './errors.js'
export type { ErrorCode } from './errors.js'

export { TimestampSchema, FingerprintSchema, DocumentIdSchema } from './schemas.js'
