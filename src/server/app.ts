import express, { type Express } from 'express';
import { buildLiveness } from './metrics/health.js';
import { makeCorsMiddleware } from './api/cors.js';
import { makeCurrentRoute } from './api/current-route.js';
import { makeLessonRoute } from './api/lesson-route.js';
import { errorHandler, requestLog } from './api/request-log.js';
import { makeStatusRoute } from './api/status-route.js';
import type { TrackingContext } from './api/types.js';

export const API_PREFIX = '/api/tracking';

export interface AppOptions {
  corsOrigins: readonly string[];
}

export function createApp(ctx: TrackingContext, options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestLog());
  app.use(makeCorsMiddleware(options.corsOrigins));
  app.use(express.json());

  // Container health check.
  app.get('/health', (_req, res) => {
    res.json(buildLiveness());
  });

  app.use(API_PREFIX, makeStatusRoute(ctx));
  app.use(API_PREFIX, makeLessonRoute(ctx));
  app.use(API_PREFIX, makeCurrentRoute(ctx));

  app.use(errorHandler());
  return app;
}
