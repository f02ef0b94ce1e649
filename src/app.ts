import express, { Application } from 'express';
import { CloneConfig } from './config.js';
import { RunnerOverrides } from './runner.js';
import { createApiRoutes } from './routes/api.js';

/**
 * Create and configure the Express application
 */
export function createApp(config: CloneConfig, overrides: RunnerOverrides = {}): Application {
  const app = express();

  // Middleware
  app.use(express.json());

  // API routes
  app.use('/api', createApiRoutes(config, overrides));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      repositoryRoot: config.repositoryRoot
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
