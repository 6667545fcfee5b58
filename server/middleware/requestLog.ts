import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import type { Logger } from '../core/logger.js';

const SENSITIVE = /^(authorization|cookie|x-api-key|x-auth-token)$/i;
const REQUEST_ID = /^[\w.-]{1,128}$/;

function redactHeaders(h: Request['headers']) {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(h)) {
    out[key] = SENSITIVE.test(key) ? '***' : value;
  }
  return out;
}

function requestIdFrom(req: Request): string {
  const header = req.headers['x-request-id'];
  if (typeof header === 'string' && REQUEST_ID.test(header)) return header;
  return randomUUID();
}

const QUIET_PATHS = new Set(['/ping', '/health', '/metrics']);

function isQuietRequest(req: Request, statusCode: number) {
  if (req.method === 'OPTIONS') return true;
  if ((req.method === 'GET' || req.method === 'HEAD') && QUIET_PATHS.has(req.path) && statusCode < 400) return true;
  return false;
}

export function createRequestLogger(log: Logger) {
  return function requestLogger(req: Request, res: Response, next: NextFunction) {
    const id = requestIdFrom(req);
    res.setHeader('x-request-id', id);
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const shouldQuiet = process.env.VERBOSE_REQUEST_LOGS !== '1' && isQuietRequest(req, res.statusCode);
      if (shouldQuiet) return;
      const durMs = Number((process.hrtime.bigint() - start) / 1_000_000n);
      log.info('http_request', {
        id,
        ip: req.ip,
        m: req.method,
        u: req.originalUrl || req.url,
        s: res.statusCode,
        durMs,
        ...(process.env.VERBOSE_REQUEST_LOGS === '1' ? { h: redactHeaders(req.headers) } : {}),
      });
    });

    next();
  };
}
