/**
 * Structured Logging
 *
 * Provides the shared pino logger and request-scoped logging with:
 * - Unique request IDs (UUID v4)
 * - Request/response logging with latency
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import pino from 'pino';

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: pino.Logger;
    }
  }
}

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
  redact: ['params.ApiKey'],
});

/**
 * Logging middleware
 *
 * Attaches unique request ID and logger to each request.
 * Logs request start and completion with latency.
 */
export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.id = randomUUID();
  req.log = logger.child({
    reqId: req.id,
    method: req.method,
    path: req.path,
  });

  const log = req.log;
  log.info({
    event: 'request_start',
    url: req.url,
    userAgent: req.get('user-agent'),
  });

  res.on('finish', () => {
    const logContext = {
      event: 'request_finish',
      status: res.statusCode,
      latency: Date.now() - startTime,
    };

    // Log with appropriate level based on status code
    if (res.statusCode >= 500) {
      log.error(logContext);
    } else if (res.statusCode >= 400) {
      log.warn(logContext);
    } else {
      log.info(logContext);
    }
  });

  next();
}

/**
 * Get logger from request
 */
export function getLogger(req: Request): pino.Logger {
  return req.log || logger;
}
