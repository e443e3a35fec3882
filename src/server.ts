import cors from 'cors';
import express, { type Express } from 'express';
import helmet from 'helmet';

import { createApiRouter, type ApiDeps } from './api/routes/index.js';
import { createHealthRoutes, type HealthCheck } from './api/routes/health.routes.js';
import { errorMiddleware } from './middleware/index.js';

export interface ServerDeps extends ApiDeps {
  healthChecks: Record<string, HealthCheck>;
}

export function createApp(deps: ServerDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  app.use(createHealthRoutes(deps.healthChecks));
  app.use(createApiRouter(deps));
  app.use(errorMiddleware);

  return app;
}
