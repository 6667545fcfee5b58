import type { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import hpp from 'hpp';
import type { AppConfig } from '../core/config.js';

export function applySecurity(app: Express, corsOrigin: AppConfig['corsOrigin']) {
  app.use(helmet({
    // JSON API and file downloads; no pages to protect with a CSP
    contentSecurityPolicy: false,
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    crossOriginEmbedderPolicy: false,
    crossOriginResourcePolicy: false,
  }));
  app.use(cors({
    origin: corsOrigin,
    exposedHeaders: ['Content-Disposition', 'Content-Length', 'Content-Type', 'Retry-After', 'X-Request-Id'],
    maxAge: 86400,
  }));
  app.use(hpp());
}
