import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { HttpError, isHttpError } from '../core/httpError.js';
import type { Logger } from '../core/logger.js';

const RETRY_AFTER_SEC = '5';

export function createErrorHandler(log: Logger) {
  // Note: keep the 4-arg signature for Express error middleware.
  return function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
    const normalized = normalizeError(err);
    const requestId = res.getHeader('x-request-id');

    if (normalized.status >= 500 && normalized.status !== 503) {
      log.error('request_failed', { requestId, path: req.path, error: err instanceof Error ? err.stack || err.message : String(err) });
    }

    if (res.headersSent) {
      res.end();
      return;
    }

    if (normalized.status === 503) res.setHeader('Retry-After', RETRY_AFTER_SEC);
    res.status(normalized.status).json({
      error: normalized.message,
      code: normalized.code,
      ...(typeof requestId === 'string' ? { requestId } : {}),
    });
  };
}

function readField(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null) return undefined;
  return Reflect.get(err, key);
}

export function normalizeError(err: unknown): HttpError {
  if (isHttpError(err)) return err;

  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') return new HttpError(413, 'FILE_TOO_LARGE', 'Uploaded file is too large');
    return new HttpError(400, 'BAD_UPLOAD', err.message);
  }

  // body-parser marks its errors with `type`
  const type = readField(err, 'type');
  if (type === 'entity.parse.failed') return new HttpError(400, 'INVALID_JSON', 'Invalid JSON');
  if (type === 'entity.too.large') return new HttpError(413, 'BODY_TOO_LARGE', 'Request body is too large');

  const status = readField(err, 'status');
  const code = readField(err, 'code');
  const exposable = typeof status === 'number' && status >= 400 && status < 500;
  return new HttpError(
    typeof status === 'number' ? status : 500,
    typeof code === 'string' ? code : 'INTERNAL_ERROR',
    exposable && err instanceof Error ? err.message : 'Unexpected server error'
  );
}
