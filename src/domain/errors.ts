/**
 * Application error types
 * Each error carries a stable code so the CLI and the run summary can tell them apart
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or malformed environment values, or an unusable CSV file.
 * Fatal: raised before any row is processed.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
  }
}

export type ValidationReason =
  | 'invalid date format'
  | 'invalid ticket format'
  | 'invalid hours format'
  | 'hours must be positive'
  | 'hours exceeds maximum';

/**
 * A single timesheet row failed a format or range check
 */
export class ValidationError extends AppError {
  constructor(
    public readonly row: number,
    public readonly reason: ValidationReason,
    public readonly value: string
  ) {
    super(`Row ${row}: ${reason} (${value})`, 'VALIDATION_ERROR', { row, reason, value });
  }
}

/**
 * Network failure or timeout while talking to Jira; no HTTP status is available
 */
export class TransportError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSPORT_ERROR', details);
  }
}

export type ApiErrorKind = 'auth' | 'not_found' | 'rate_limited' | 'http';

/**
 * Non-2xx response from the Jira REST API
 */
export class ApiError extends AppError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly kind: ApiErrorKind,
    public readonly bodyExcerpt: string
  ) {
    super(message, 'API_ERROR', { status, kind, bodyExcerpt });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
