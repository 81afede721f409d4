import express, { Application } from 'express';
import { createApiRoutes } from './routes/api.js';
import { Registry } from './types.js';

/**
 * Server configuration
 */
export interface ServerOptions {
  /** Largest accepted request body (default: 5mb) */
  maxBodySize?: string;
}

/**
 * Create and configure the Express application
 */
export function createApp(registry: Registry, options: ServerOptions = {}): Application {
  const app = express();

  // Middleware
  app.use(express.text({
    type: ['text/plain', 'application/sql'],
    limit: options.maxBodySize ?? '5mb'
  }));

  // API routes
  app.use('/api', createApiRoutes(registry));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      tables: registry.size
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
