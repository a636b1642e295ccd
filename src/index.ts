/**
 * HTTP server entry point
 *
 * IMPORTANT: dotenv must be loaded BEFORE any other imports
 * to ensure environment variables are available to all modules
 */

import dotenv from 'dotenv';
dotenv.config();

import http from 'http';
import { createApp } from './app';
import { validateConfig, loadNamecheapConfig, PORT, NODE_ENV } from './config';
import { logger } from './middleware/logging';
import { NamecheapClient } from './namecheap/client';

function startServer(): void {
  try {
    // Validate configuration before starting
    validateConfig();

    const config = loadNamecheapConfig();
    const client = new NamecheapClient(config);
    const app = createApp(client);

    http.createServer(app).listen(PORT, () => {
      logger.info({
        event: 'server_start',
        url: `http://localhost:${PORT}`,
        environment: NODE_ENV,
        namecheap: client.getBaseUrl(),
        endpoints: ['GET /health', 'GET /metrics', 'GET /pricing', 'POST /check', 'POST /search'],
      });
    });
  } catch (error) {
    logger.fatal({ event: 'server_start_failed', error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

startServer();
