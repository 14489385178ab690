import { Router } from 'express';
import type { TrackingContext } from './types.js';
import { asyncRoute, sendFailure } from './respond.js';
import { serializeCurrent } from './serialize.js';

export function makeCurrentRoute(ctx: TrackingContext): Router {
  const router = Router();
  router.get('/user/:userId/current', asyncRoute(async (req, res) => {
    const result = await ctx.service.getCurrent(req.params.userId.trim());
    if (!result.ok) return sendFailure(res, result.error);
    return res.json(serializeCurrent(result.value));
  }));
  return router;
}
