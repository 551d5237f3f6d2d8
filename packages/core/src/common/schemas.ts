/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime()

/** SHA-256 hex digest. */
export const FingerprintSchema = z.string().regex(/^[0-9a-f]{64}$/, 'Fingerprint must be a sha256 hex digest')

/** Zero-padded sequential document id: 0001, 0002, ... */
export const DocumentIdSchema = z.string().regex(/^\d{4,}$/, 'Document id must be at least 4 digits')
