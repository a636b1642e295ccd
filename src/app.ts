import express, { Express, Request, Response, NextFunction } from 'express';
import { createPricingRouter, type PricingService } from './routes/pricing';
import { asyncHandler, errorHandler, notFoundHandler } from './lib/errors';
import { loggingMiddleware } from './middleware/logging';
import { getMetrics, incHttpRequest, observeHttpDuration } from './metrics';

export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Create and configure Express application
 */
export function createApp(service: PricingService): Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Structured logging middleware (adds req.id and req.log)
  app.use(loggingMiddleware);

  // Metrics middleware (track request duration and count)
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - startTime) / 1000; // seconds
      // Every unmatched path shares one label
      const route = typeof req.route?.path === 'string' ? req.route.path : UNMATCHED_ROUTE;

      incHttpRequest(route, req.method, res.statusCode);
      observeHttpDuration(route, req.method, duration);
    });

    next();
  });

  // Metrics endpoint (no auth required for monitoring)
  app.get('/metrics', asyncHandler(async (_req: Request, res: Response) => {
    res.set('Content-Type', 'text/plain');
    res.send(await getMetrics());
  }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use('/', createPricingRouter(service));

  // 404 handler (must come before error handler)
  app.use(notFoundHandler);

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}

export default createApp;
