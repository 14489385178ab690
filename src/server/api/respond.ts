import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ErrorCode, describeError, type TrackingError } from '../errors.js';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.STORE_ERROR]: 500,
  [ErrorCode.ENRICHMENT_UNAVAILABLE]: 500
};

export function sendFailure(res: Response, error: TrackingError): Response {
  return res.status(STATUS_BY_CODE[error.code]).json({ ok: false, error: describeError(error) });
}

/** Forwards a rejected handler promise to the Express error handler. */
export function asyncRoute(handler: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}
