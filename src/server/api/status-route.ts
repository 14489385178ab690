import { Router } from 'express';
import { buildLiveness, buildTrackingStatus } from '../metrics/health.js';
import type { TrackingContext } from './types.js';

export function makeStatusRoute(ctx: TrackingContext): Router {
  const router = Router();
  router.get('/health', (_req, res) => {
    res.json(buildLiveness());
  });
  router.get('/status', (_req, res) => {
    const now = ctx.now ? ctx.now() : Date.now();
    res.json(buildTrackingStatus(ctx.counters, ctx.storeDriver, ctx.startedAt, now));
  });
  return router;
}
