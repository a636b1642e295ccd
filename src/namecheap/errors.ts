import type { ApiError } from './types';

/**
 * Base class for everything the Namecheap client raises
 */
export class NamecheapError extends Error {
  code: string;
  details: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'NamecheapError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * One or more errors returned inside a Status="ERROR" response.
 * The list is kept in document order and never retried here.
 */
export class NamecheapApiError extends NamecheapError {
  readonly errors: ReadonlyArray<ApiError>;

  constructor(errors: ReadonlyArray<ApiError>) {
    const message = errors.length > 0
      ? errors.map((e) => `${e.message} (${e.code})`).join('; ')
      : 'Unknown API error';

    super(message, errors.length > 0 ? String(errors[0].code) : 'UNKNOWN', { errors });
    this.name = 'NamecheapApiError';
    this.errors = errors;
  }

  /**
   * Whether the service reported the given error number
   */
  hasCode(code: number): boolean {
    return this.errors.some((e) => e.code === code);
  }
}

/**
 * The document does not have the shape of an ApiResponse
 */
export class MalformedResponseError extends NamecheapError {
  readonly path: string;
  readonly reason: string;

  constructor(reason: string, path: string) {
    super(`Malformed response at ${path}: ${reason}`, 'MALFORMED_RESPONSE', { path });
    this.name = 'MalformedResponseError';
    this.path = path;
    this.reason = reason;
  }
}

export type TransportErrorCode = 'HTTP_ERROR' | 'NETWORK_ERROR' | 'TIMEOUT';

/**
 * The HTTP exchange itself failed; no response document was decoded
 */
export class NamecheapTransportError extends NamecheapError {
  declare code: TransportErrorCode;

  constructor(message: string, code: TransportErrorCode, details?: unknown) {
    super(message, code, details);
    this.name = 'NamecheapTransportError';
  }
}
