/**
 * Error types
 *
 * Every error here describes bad input data. None of them is transient, so
 * callers skip or report the offending value instead of retrying.
 */

export type CredentialErrorCode = 'record_construction' | 'query_validation' | 'codec' | 'config';

export class CredentialError extends Error {
  readonly code: CredentialErrorCode;
  readonly retryable = false;

  constructor(code: CredentialErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when raw fields cannot form a valid account.
 */
export class RecordConstructionError extends CredentialError {
  constructor(message: string) {
    super('record_construction', message);
  }
}

export class QueryValidationError extends CredentialError {
  constructor(message: string) {
    super('query_validation', message);
  }
}

export class CodecError extends CredentialError {
  constructor(message: string) {
    super('codec', message);
  }
}

export class ConfigError extends CredentialError {
  constructor(message: string) {
    super('config', message);
  }
}

export function isCredentialError(error: unknown): error is CredentialError {
  return error instanceof CredentialError;
}
