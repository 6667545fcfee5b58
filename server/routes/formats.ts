import type { Express, Request, Response } from 'express';
import { inputFormats, outputFormats } from '../core/formats.js';
import { setPublicCache } from '../core/http.js';

const CATALOG_MAX_AGE_SEC = 3600;

export function setupFormatRoutes(app: Express) {
  app.get('/api/formats', (_req: Request, res: Response) => {
    setPublicCache(res, CATALOG_MAX_AGE_SEC);
    res.json({ input: inputFormats, output: outputFormats });
  });
}
