import type { ZodIssue } from 'zod';

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const OrcaErrorCode = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  AUTHENTICATION_FAILED: 'AUTHENTICATION_FAILED',
  NETWORK_FAILURE: 'NETWORK_FAILURE',
  SERVER_ERROR: 'SERVER_ERROR',
  INVALID_RESPONSE: 'INVALID_RESPONSE',
} as const;

export type OrcaErrorCode = (typeof OrcaErrorCode)[keyof typeof OrcaErrorCode];

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/**
 * Base class for every failure the client reports. Callers can switch on
 * `code` instead of `instanceof` when errors cross a serialization boundary.
 */
export class OrcaError extends Error {
  readonly code: OrcaErrorCode;

  constructor(message: string, code: OrcaErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrcaError';
    this.code = code;
  }
}

/**
 * Caller-supplied parameters are malformed. Raised before any I/O.
 */
export class ValidationError extends OrcaError {
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message, OrcaErrorCode.VALIDATION_FAILED);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * The credentials or token were rejected, or login returned no token.
 */
export class AuthenticationError extends OrcaError {
  /** HTTP status when the rejection came from a response */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, OrcaErrorCode.AUTHENTICATION_FAILED, options);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

/**
 * The transport failed before any HTTP response was received.
 */
export class NetworkError extends OrcaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, OrcaErrorCode.NETWORK_FAILURE, options);
    this.name = 'NetworkError';
  }
}

/**
 * The server answered with a non-success status, or with a body that could
 * not be read as the expected document.
 */
export class ServerError extends OrcaError {
  readonly status: number;
  /** Raw response body, truncated */
  readonly body: string;

  constructor(
    message: string,
    status: number,
    body: string,
    code: typeof OrcaErrorCode.SERVER_ERROR | typeof OrcaErrorCode.INVALID_RESPONSE = OrcaErrorCode.SERVER_ERROR,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = 'ServerError';
    this.status = status;
    this.body = body;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isOrcaError(err: unknown): err is OrcaError {
  return err instanceof OrcaError;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
