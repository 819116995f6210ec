export class QuarryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'QuarryError';
  }
}

export class ValidationError extends QuarryError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[] = [],
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export type ProviderFailureKind = 'timeout' | 'auth' | 'quota' | 'transport' | 'http' | 'empty';

export class ProviderError extends QuarryError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly kind: ProviderFailureKind,
    cause?: Error,
  ) {
    super(message, 'PROVIDER_ERROR', cause);
    this.name = 'ProviderError';
  }
}

export class ParseError extends QuarryError {
  constructor(
    message: string,
    public readonly provider: string,
    cause?: Error,
  ) {
    super(message, 'PARSE_ERROR', cause);
    this.name = 'ParseError';
  }
}

export class CacheError extends QuarryError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_ERROR', cause);
    this.name = 'CacheError';
  }
}

export class SchemaValidationError extends QuarryError {
  constructor(
    message: string,
    public readonly validationErrors: readonly string[],
  ) {
    super(message, 'SCHEMA_VALIDATION_ERROR');
    this.name = 'SchemaValidationError';
  }
}

export class ConfigurationError extends QuarryError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
