/**
 * Error hierarchy for movie-shelf.
 *
 * Everything the app raises on purpose extends MovieShelfError, so the menu
 * loop can tell a reportable failure from a programming error:
 *
 * ```typescript
 * try {
 *   storage.updateMovie('Heat', 8.3);
 * } catch (e) {
 *   if (e instanceof NotFoundError) out.error(e.message);
 *   else throw e;
 * }
 * ```
 */

export const ErrorCode = {
  STORAGE_READ: 'STORAGE_READ',
  STORAGE_WRITE: 'STORAGE_WRITE',
  NOT_FOUND: 'NOT_FOUND',
  EMPTY_COLLECTION: 'EMPTY_COLLECTION',
  VALIDATION: 'VALIDATION',
  ENRICHMENT_UNAVAILABLE: 'ENRICHMENT_UNAVAILABLE',
  CONFIG: 'CONFIG',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class MovieShelfError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MovieShelfError';
    this.code = code;
    this.details = details;
  }
}

/** Backing file is unreadable or its content is malformed */
export class StorageReadError extends MovieShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.STORAGE_READ, details);
    this.name = 'StorageReadError';
  }
}

export class StorageWriteError extends MovieShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.STORAGE_WRITE, details);
    this.name = 'StorageWriteError';
  }
}

export class NotFoundError extends MovieShelfError {
  public readonly title: string;

  constructor(title: string) {
    super(`Movie "${title}" does not exist.`, ErrorCode.NOT_FOUND, { title });
    this.name = 'NotFoundError';
    this.title = title;
  }
}

export class EmptyCollectionError extends MovieShelfError {
  constructor(operation: string) {
    super(`No movies available for ${operation}.`, ErrorCode.EMPTY_COLLECTION, { operation });
    this.name = 'EmptyCollectionError';
  }
}

export class ValidationError extends MovieShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.VALIDATION, details);
    this.name = 'ValidationError';
  }
}

export class EnrichmentUnavailableError extends MovieShelfError {
  public readonly reason: string;

  constructor(title: string, reason: string) {
    super(`Could not fetch details for "${title}": ${reason}`, ErrorCode.ENRICHMENT_UNAVAILABLE, { title, reason });
    this.name = 'EnrichmentUnavailableError';
    this.reason = reason;
  }
}

export class ConfigError extends MovieShelfError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIG, details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
