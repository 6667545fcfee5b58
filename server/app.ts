import express from 'express';
import type { Express } from 'express';
import client from 'prom-client';
import type { AppConfig } from './core/config.js';
import type { Logger } from './core/logger.js';
import type { ConversionService } from './core/ConversionService.js';
import { applySecurity } from './middleware/security.js';
import { createRequestLogger } from './middleware/requestLog.js';
import { createErrorHandler } from './middleware/error.js';
import { createHttpMetrics } from './middleware/httpMetrics.js';
import { createConvertRateLimit, globalRateLimit } from './middleware/rateLimit.js';
import { setupConvertRoutes } from './routes/convert.js';
import { setupDownloadRoutes } from './routes/download.js';
import { setupJobRoutes } from './routes/jobs.js';
import { setupFormatRoutes } from './routes/formats.js';
import { setupSystemRoutes } from './routes/system.js';
import { mountPromMetrics } from './routes/metricsProm.js';
import { HttpError } from './core/httpError.js';

export type AppDeps = {
  cfg: AppConfig;
  log: Logger;
  service: ConversionService;
  /** Extra registries exposed on /metrics, e.g. process defaults. */
  registries?: client.Registry[];
};

export function createApp(deps: AppDeps): Express {
  const { cfg, log, service } = deps;
  const app = express();
  app.disable('x-powered-by');
  if (cfg.trustProxy) app.set('trust proxy', 1);

  applySecurity(app, cfg.corsOrigin);
  app.use(globalRateLimit);
  app.use(createRequestLogger(log));

  const httpRegistry = new client.Registry();
  const metrics = createHttpMetrics(httpRegistry);

  setupConvertRoutes(app, {
    cfg,
    log,
    service,
    convertRateLimit: createConvertRateLimit(cfg.convertMaxPerMin),
    metrics,
  });
  setupDownloadRoutes(app, { log, service, metrics });
  setupJobRoutes(app, { service });
  setupFormatRoutes(app);
  setupSystemRoutes(app, { service });
  mountPromMetrics(app, [service.metrics.registry, httpRegistry, ...(deps.registries ?? [])]);

  app.use((req, _res, next) => next(new HttpError(404, 'NOT_FOUND', `Cannot ${req.method} ${req.path}`)));
  app.use(createErrorHandler(log));
  return app;
}
