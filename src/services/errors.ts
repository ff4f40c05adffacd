/**
 * Error taxonomy. Domain errors are recoverable at the request boundary and carry
 * a stable code; InfrastructureError wraps persistence/connectivity failures and
 * is never shown to clients in detail.
 */

export type SessionErrorCode =
  | 'INSUFFICIENT_QUESTIONS'
  | 'INVALID_INDEX'
  | 'SESSION_CLOSED'
  | 'ANSWER_MISSING'
  | 'UPSTREAM_UNAVAILABLE'
  | 'INCOMPLETE_ANSWERS'
  | 'SESSION_NOT_FOUND'
  | 'FEEDBACK_IN_PROGRESS'
  | 'ANSWER_CHANGED';

const STATUS_BY_CODE: Record<SessionErrorCode, number> = {
  INSUFFICIENT_QUESTIONS: 422,
  INVALID_INDEX: 400,
  SESSION_CLOSED: 409,
  ANSWER_MISSING: 409,
  UPSTREAM_UNAVAILABLE: 502,
  INCOMPLETE_ANSWERS: 409,
  SESSION_NOT_FOUND: 404,
  FEEDBACK_IN_PROGRESS: 409,
  ANSWER_CHANGED: 409,
};

export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly status: number;
  /** Extra machine-readable context returned to the client (e.g. missing indices) */
  readonly details?: Record<string, unknown>;

  constructor(
    code: SessionErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SessionError';
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.details = options?.details;
  }
}

export function isSessionError(error: unknown, code?: SessionErrorCode): error is SessionError {
  return error instanceof SessionError && (code === undefined || error.code === code);
}

export class InfrastructureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InfrastructureError';
  }
}

/** Generic HTTP-level error for auth/account flows (401, 403, 404, 409). */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
  }
}
