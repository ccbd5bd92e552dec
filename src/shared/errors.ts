export class LedeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'LedeError';
  }
}

export class ConfigError extends LedeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends LedeError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    details?: Record<string, unknown>,
  ) {
    super(message, 'FETCH_ERROR', { kind, ...details });
    this.name = 'FetchError';
  }
}

/**
 * Raised only when a document cannot be parsed at all. "No item found" is a
 * normal null result, not an error.
 */
export class ExtractionError extends LedeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXTRACTION_ERROR', details);
    this.name = 'ExtractionError';
  }
}

export class PersistenceError extends LedeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_ERROR', details);
    this.name = 'PersistenceError';
  }
}

export class NotificationError extends LedeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOTIFICATION_ERROR', details);
    this.name = 'NotificationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
