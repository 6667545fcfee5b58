import type { Express, Request, Response } from 'express';
import client from 'prom-client';
import { wrap } from '../core/wrap.js';

/**
 * Prometheus exposition of every registry handed in (job metrics, HTTP
 * metrics, process defaults).
 */
export function mountPromMetrics(app: Express, registries: client.Registry[]) {
  const merged = client.Registry.merge(registries);

  app.get(
    '/metrics',
    wrap(async (_req: Request, res: Response) => {
      res.setHeader('Content-Type', merged.contentType);
      res.setHeader('Cache-Control', 'no-store');
      res.end(await merged.metrics());
    })
  );
}
