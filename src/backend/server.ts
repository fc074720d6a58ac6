/**
 * Express server setup - main entry point for the HTTP API.
 * Configures middleware, mounts routes, and starts the HTTP server.
 */

import { config, createLLMClientFromConfig } from './config';

import express, { Application } from 'express';
import cors from 'cors';
import { createApiRouter, ApiDependencies } from './routes';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { resumeParser } from '../main/resumeParser';
import { loggers } from '../shared/logging/logger';

/**
 * Build the Express application around the given collaborators
 */
export function createApp(deps: ApiDependencies): Application {
  const app: Application = express();

  // Allow listed origins and any localhost origin
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      if (!origin) {
        return callback(null, true);
      }
      if (config.cors.origins.includes(origin) || /^https?:\/\/localhost(:\d+)?$/.test(origin)) {
        return callback(null, true);
      }
      callback(new Error('Not allowed by CORS'));
    },
  };

  app.use(cors(corsOptions));
  app.use(express.json({ limit: config.server.bodyLimit }));
  if (!config.server.isTest) {
    app.use(requestLogger);
  }

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  app.use('/api', createApiRouter(deps));
  app.use(errorHandler);

  return app;
}

export const start = (): void => {
  const app = createApp({
    generator: createLLMClientFromConfig(),
    parser: resumeParser
  });

  app.listen(config.server.port, () => {
    loggers.http.info({ port: config.server.port }, `Server listening on port ${config.server.port}`);
  });
};

// Start server when run directly
if (require.main === module) {
  start();
}
