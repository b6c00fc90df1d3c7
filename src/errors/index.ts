/**
 * Error taxonomy for the knowledge graph index
 *
 * Only these errors leave the service boundary. Provider failures are
 * recovered inside the embedding and extraction services and never reach
 * callers of ingest or query.
 */

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'PROVIDER_ERROR'
  | 'INTEGRITY_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'STORAGE_ERROR';

// Single validation problem, addressed by a JSON pointer-like path
export interface ValidationIssue {
  path: string;
  message: string;
}

export class KnowledgeGraphError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KnowledgeGraphError';
    this.code = code;
  }
}

/** Invalid chunk sizing or missing storage settings; never retried. */
export class ConfigurationError extends KnowledgeGraphError {
  constructor(message: string) {
    super('CONFIGURATION_ERROR', message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Failure of a remote embedding or extraction call (timeout, malformed
 * response, non-2xx status, policy rejection).
 */
export class ProviderError extends KnowledgeGraphError {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, options?: { cause?: unknown; status?: number }) {
    super('PROVIDER_ERROR', message, options);
    this.name = 'ProviderError';
    this.provider = provider;
    this.status = options?.status;
  }
}

/** A relation that points at an entity outside its own batch. */
export class IntegrityError extends KnowledgeGraphError {
  public readonly danglingRelations: number;

  constructor(message: string, danglingRelations: number) {
    super('INTEGRITY_ERROR', message);
    this.name = 'IntegrityError';
    this.danglingRelations = danglingRelations;
  }
}

export class NotFoundError extends KnowledgeGraphError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends KnowledgeGraphError {
  public readonly errors: ValidationIssue[];

  constructor(message: string, errors: ValidationIssue[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/** Any failure reading or writing the durable store; the operation is aborted. */
export class StorageError extends KnowledgeGraphError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_ERROR', message, { cause });
    this.name = 'StorageError';
  }
}

/**
 * Render an unknown thrown value as a message for logs
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
