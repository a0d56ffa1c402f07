export class GleanerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'GleanerError';
  }
}

/**
 * The text service failed or answered with something unusable.
 * `retryable` marks failures a caller may reasonably try again.
 */
export class LlmError extends GleanerError {
  constructor(
    message: string,
    public readonly retryable: boolean,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class TimeoutError extends GleanerError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, 'TIMEOUT_ERROR');
    this.name = 'TimeoutError';
  }
}

export class RecordValidationError extends GleanerError {
  constructor(
    message: string,
    public readonly issues: readonly string[],
  ) {
    super(message, 'RECORD_VALIDATION_ERROR');
    this.name = 'RecordValidationError';
  }
}

export class StoreError extends GleanerError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORE_ERROR', cause);
    this.name = 'StoreError';
  }
}

export class ExtractionCancelledError<T = unknown> extends GleanerError {
  constructor(
    message: string,
    public readonly records: readonly T[],
  ) {
    super(message, 'EXTRACTION_CANCELLED');
    this.name = 'ExtractionCancelledError';
  }
}

export class SchemaValidationError extends GleanerError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends GleanerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
