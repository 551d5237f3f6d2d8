/**
 * Typed error class for knowledge-base operations.
 */

export type ErrorCode =
  | 'DB_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'IO_ERROR'
  | 'PARSE_ERROR'
  | 'API_ERROR'
  | 'RATE_LIMITED'
  | 'MODEL_MISMATCH'
  | 'INTEGRITY_ERROR'
  | 'CONFIRMATION_REQUIRED'
  | 'LOCKED'
  | 'CANCELLED'

export class KnowledgeBaseError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'KnowledgeBaseError'
    this.code = code
  }

  static notFound(entity: string, id: string): KnowledgeBaseError {
    return new KnowledgeBaseError('NOT_FOUND', `${entity} not found: ${id}`)
  }

  static validation(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('VALIDATION_ERROR', message)
  }

  static db(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('DB_ERROR', message)
  }

  static io(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('IO_ERROR', message)
  }

  static parse(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('PARSE_ERROR', message)
  }

  static api(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('API_ERROR', message)
  }

  static rateLimited(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('RATE_LIMITED', message)
  }

  static modelMismatch(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('MODEL_MISMATCH', message)
  }

  static integrity(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('INTEGRITY_ERROR', message)
  }

  static confirmationRequired(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('CONFIRMATION_REQUIRED', message)
  }

  static locked(message: string): KnowledgeBaseError {
    return new KnowledgeBaseError('LOCKED', message)
  }

  static cancelled(message = 'Operation cancelled'): KnowledgeBaseError {
    return new KnowledgeBaseError('CANCELLED', message)
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
