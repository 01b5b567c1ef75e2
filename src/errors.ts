/** Stable machine-readable error codes surfaced to administrative callers. */
export type ErrorCode =
  | 'INVALID_IDENTIFIER'
  | 'NOT_FOUND'
  | 'CONNECTOR_ERROR'
  | 'PROVIDER_ERROR'
  | 'REQUEST_ABORTED';

/** Base class for every error the core raises on purpose. */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  /** HTTP status the admin / request layer maps this error to */
  abstract readonly statusCode: number;
}

/** Empty or malformed user identifier. Raised before any state is touched. */
export class InvalidIdentifierError extends AppError {
  readonly code = 'INVALID_IDENTIFIER' as const;
  readonly statusCode = 400;

  constructor(readonly userId: unknown) {
    super('userId must be a non-empty string');
    this.name = 'InvalidIdentifierError';
  }
}

/** Export / summary requested for a user that has no history. */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;

  constructor(readonly userId: string) {
    super(`No conversation history for user ${userId}`);
    this.name = 'NotFoundError';
  }
}

/** A record-system connector could not complete a call. Absorbed into an error-flagged fact. */
export class ConnectorError extends AppError {
  readonly code = 'CONNECTOR_ERROR' as const;
  readonly statusCode = 502;

  constructor(
    readonly source: string,
    message: string,
    readonly httpStatus?: number,
  ) {
    super(`${source}: ${message}`);
    this.name = 'ConnectorError';
  }
}

/** The text-completion capability failed for this request. */
export class ProviderError extends AppError {
  readonly code = 'PROVIDER_ERROR' as const;
  readonly statusCode = 503;
  override readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'ProviderError';
    this.cause = cause;
  }
}

/** The request was cancelled by the caller or ran past REQUEST_TIMEOUT_MS before its commit. */
export class RequestAbortedError extends AppError {
  readonly code = 'REQUEST_ABORTED' as const;
  readonly statusCode: number;

  constructor(readonly reason: 'cancelled' | 'timeout') {
    super(reason === 'timeout' ? 'Request timed out' : 'Request cancelled');
    this.name = 'RequestAbortedError';
    this.statusCode = reason === 'timeout' ? 504 : 499;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
