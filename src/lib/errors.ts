import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { getLogger } from '../middleware/logging';
import {
  MalformedResponseError,
  NamecheapApiError,
  NamecheapError,
  NamecheapTransportError,
} from '../namecheap/errors';

/**
 * Custom HTTP error class with status code and optional details
 */
export class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Upstream error (502)
 * The Namecheap API answered with an error or with a document we cannot read
 */
export class UpstreamError extends HttpError {
  constructor(name: string, message: string, details?: unknown) {
    super(502, message, details);
    this.name = name;
  }
}

/**
 * Gateway timeout error (504)
 */
export class GatewayTimeoutError extends HttpError {
  constructor(message = 'Upstream request timed out', details?: unknown) {
    super(504, message, details);
    this.name = 'GatewayTimeout';
  }
}

/**
 * Error response format
 */
interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
  status: number;
}

/**
 * Translate client-library errors into their HTTP counterpart
 */
export function toHttpError(err: NamecheapError): HttpError {
  if (err instanceof NamecheapApiError) {
    return new UpstreamError('UpstreamApiError', err.message, { errors: err.errors });
  }
  if (err instanceof MalformedResponseError) {
    return new UpstreamError('MalformedResponse', err.message, { path: err.path });
  }
  if (err instanceof NamecheapTransportError && err.code === 'TIMEOUT') {
    return new GatewayTimeoutError(err.message);
  }
  return new UpstreamError('UpstreamUnavailable', err.message);
}

/**
 * Global error handler middleware
 * Catches all errors and formats them consistently
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const log = getLogger(req);
  const httpError = err instanceof NamecheapError ? toHttpError(err) : err;

  log.error({
    event: 'error',
    errorName: err.name,
    errorMessage: err.message,
    path: req.path,
    method: req.method,
    ...(httpError instanceof HttpError ? { status: httpError.status, details: httpError.details } : {}),
    ...(process.env.NODE_ENV === 'development' ? { stack: err.stack } : {}),
  });

  // Handle Zod validation errors
  if (httpError instanceof ZodError) {
    const response: ErrorResponse = {
      error: 'ValidationError',
      message: 'Request validation failed',
      details: httpError.issues.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
      status: 400,
    };

    res.status(400).json(response);
    return;
  }

  // Unparseable request body (raised by express.json)
  if ('type' in httpError && httpError.type === 'entity.parse.failed') {
    const response: ErrorResponse = {
      error: 'ValidationError',
      message: 'Request body is not valid JSON',
      status: 400,
    };

    res.status(400).json(response);
    return;
  }

  // Handle custom HTTP errors
  if (httpError instanceof HttpError) {
    const response: ErrorResponse = {
      error: httpError.name,
      message: httpError.message,
      details: httpError.details,
      status: httpError.status,
    };

    res.status(httpError.status).json(response);
    return;
  }

  // Handle unknown errors
  const response: ErrorResponse = {
    error: 'InternalError',
    message: process.env.NODE_ENV === 'production'
      ? 'An unexpected error occurred'
      : err.message,
    status: 500,
  };

  res.status(500).json(response);
}

/**
 * 404 handler for unknown routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  const response: ErrorResponse = {
    error: 'NotFoundError',
    message: 'The requested endpoint does not exist',
    status: 404,
  };

  res.status(404).json(response);
}

/**
 * Async route wrapper to catch errors
 * Eliminates need for try-catch in every route
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
