import type { Express, Request, Response } from 'express';
import type { ConversionService } from '../core/ConversionService.js';
import { setNoStore } from '../core/http.js';

export type SystemDeps = {
  service: ConversionService;
  startedAt?: number;
};

export function setupSystemRoutes(app: Express, deps: SystemDeps) {
  const { service } = deps;
  const startedAt = deps.startedAt ?? Date.now();

  app.get('/ping', (_req: Request, res: Response) => {
    setNoStore(res);
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.get('/health', (_req: Request, res: Response) => res.json({ ok: true }));

  app.get('/api/stats', (_req: Request, res: Response) => {
    setNoStore(res);
    res.json({
      ...service.stats(),
      process: {
        uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
        rssBytes: process.memoryUsage().rss,
        node: process.version,
      },
    });
  });
}
