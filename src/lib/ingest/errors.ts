import type { IngestStats } from './types';

export interface IngestErrorOptions extends ErrorOptions {
  details?: Record<string, unknown>;
}

export class IngestError extends Error {
  readonly code: string;

  readonly details: Record<string, unknown>;

  constructor(code: string, message: string, options: IngestErrorOptions = {}) {
    const { details, ...errorOptions } = options;
    super(message, errorOptions);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details ?? {};
  }
}

export class ConfigurationError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super('CONFIGURATION_INVALID', message, options);
  }
}

export class SourceFetchError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super('SOURCE_FETCH_FAILED', message, options);
  }
}

export class TranslationError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super('TRANSLATION_FAILED', message, options);
  }
}

export class PersistenceError extends IngestError {
  constructor(message: string, options: IngestErrorOptions = {}) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class StoreUnavailableError extends IngestError {
  readonly stats: IngestStats;

  constructor(message: string, stats: IngestStats, options: IngestErrorOptions = {}) {
    super('STORE_UNAVAILABLE', message, options);
    this.stats = stats;
  }
}

/** Log fields for any thrown value; `fallbackCode` applies to foreign errors. */
export function errorMeta(error: unknown, fallbackCode: string): Record<string, unknown> {
  if (error instanceof IngestError) {
    return {
      code: error.code,
      error: error.message,
      stack: error.stack,
      ...error.details,
    };
  }
  return {
    code: fallbackCode,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  };
}
