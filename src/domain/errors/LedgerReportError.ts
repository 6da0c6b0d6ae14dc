export type ErrorClass =
  | 'AuthorizationError'
  | 'InvalidQueryError'
  | 'TransientServiceError'
  | 'FetchExhaustedError'
  | 'FetchCancelledError'
  | 'MalformedRecordError'
  | 'DependencyFailedError'
  | 'ConfigurationError';

export abstract class LedgerReportError extends Error {
  abstract readonly errorClass: ErrorClass;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Expired or invalid credential. Never retried; the caller refreshes and reruns. */
export class AuthorizationError extends LedgerReportError {
  readonly errorClass = 'AuthorizationError';
  readonly retryable = false;

  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class InvalidQueryError extends LedgerReportError {
  readonly errorClass = 'InvalidQueryError';
  readonly retryable = false;

  constructor(
    message: string,
    readonly query?: string,
  ) {
    super(message);
  }
}

export class TransientServiceError extends LedgerReportError {
  readonly errorClass = 'TransientServiceError';
  readonly retryable = true;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class FetchExhaustedError extends LedgerReportError {
  readonly errorClass = 'FetchExhaustedError';
  readonly retryable = false;

  constructor(
    readonly lastError: TransientServiceError,
    readonly attempts: number,
  ) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`, { cause: lastError });
  }
}

export class FetchCancelledError extends LedgerReportError {
  readonly errorClass = 'FetchCancelledError';
  readonly retryable = false;

  constructor(message = 'Fetch cancelled') {
    super(message);
  }
}

export interface RecordIssue {
  path: string;
  message: string;
}

export class MalformedRecordError extends LedgerReportError {
  readonly errorClass = 'MalformedRecordError';
  readonly retryable = false;

  constructor(
    readonly entity: string,
    readonly recordId: string | null,
    readonly issues: RecordIssue[],
  ) {
    super(
      `${entity} ${recordId ?? '(no id)'} is malformed: ${issues.map((issue) => `${issue.path} ${issue.message}`).join('; ')}`,
    );
  }
}

export class DependencyFailedError extends LedgerReportError {
  readonly errorClass = 'DependencyFailedError';
  readonly retryable = false;

  constructor(
    readonly dependency: string,
    readonly dependencyError: ErrorClass | 'Error',
  ) {
    super(`Requires ${dependency}, which failed with ${dependencyError}`);
  }
}

export class ConfigurationError extends LedgerReportError {
  readonly errorClass = 'ConfigurationError';
  readonly retryable = false;

  constructor(readonly missing: string[]) {
    super(`Missing required configuration: ${missing.join(', ')}`);
  }
}

export const errorClassOf = (error: unknown): ErrorClass | 'Error' =>
  error instanceof LedgerReportError ? error.errorClass : 'Error';
