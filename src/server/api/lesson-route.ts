import { Router } from 'express';
import type { TrackingContext } from './types.js';
import { asyncRoute, sendFailure } from './respond.js';
import { parseEnterLessonBody, parseTabRefBody } from './schemas.js';
import { describeExit, serializeExit, serializeFocus } from './serialize.js';

export function makeLessonRoute(ctx: TrackingContext): Router {
  const router = Router();

  router.post('/lesson/enter', asyncRoute(async (req, res) => {
    const input = parseEnterLessonBody(req.body);
    if (!input.ok) return sendFailure(res, input.error);

    const result = await ctx.service.enterLesson(input.value);
    if (!result.ok) return sendFailure(res, result.error);
    return res.json({ ok: true, message: 'Current lesson set successfully', data: serializeFocus(result.value) });
  }));

  router.post('/lesson/exit', asyncRoute(async (req, res) => {
    const ref = parseTabRefBody(req.body);
    if (!ref.ok) return sendFailure(res, ref.error);

    const result = await ctx.service.exitLesson(ref.value);
    if (!result.ok) return sendFailure(res, result.error);
    return res.json({ ok: true, message: describeExit(result.value), data: serializeExit(result.value) });
  }));

  router.post('/lesson/focus', asyncRoute(async (req, res) => {
    const ref = parseTabRefBody(req.body);
    if (!ref.ok) return sendFailure(res, ref.error);

    const result = await ctx.service.updateFocus(ref.value);
    if (!result.ok) return sendFailure(res, result.error);
    return res.json({ ok: true, message: 'Focus updated', data: serializeFocus(result.value) });
  }));

  return router;
}
