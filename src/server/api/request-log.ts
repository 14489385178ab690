import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ErrorCode, isTrackingError } from '../errors.js';
import { createLogger } from '../logger.js';
import { sendFailure } from './respond.js';

const logger = createLogger('http');

export function requestLog(): RequestHandler {
  return (req, res, next) => {
    const startedAt = process.hrtime.bigint();
    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      logger.info({ method: req.method, path: req.originalUrl, status: res.statusCode, durationMs }, 'request completed');
    });
    next();
  };
}

interface HttpError {
  status: number;
  type?: unknown;
}

function isHttpError(err: unknown): err is HttpError {
  return typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number';
}

// body-parser tags its failures with a `type` such as entity.parse.failed or entity.too.large.
function describeBodyError(err: HttpError): string {
  if (err.type === 'entity.parse.failed') return 'malformed JSON body';
  return typeof err.type === 'string' ? `request body rejected: ${err.type}` : 'request body rejected';
}

export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (isTrackingError(err)) {
      sendFailure(res, err);
      return;
    }
    if (isHttpError(err) && err.status >= 400 && err.status < 500) {
      logger.debug({ status: err.status, type: err.type }, 'request body rejected');
      res.status(err.status).json({ ok: false, error: { code: ErrorCode.VALIDATION_ERROR, message: describeBodyError(err) } });
      return;
    }
    logger.error({ err }, 'unhandled request error');
    res.status(500).json({ ok: false, error: { code: 'internal_error', message: 'internal error' } });
  };
}
