import fs from 'node:fs';
import type { Stats } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import type { Express, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../core/logger.js';
import type { ConversionService } from '../core/ConversionService.js';
import { TERMINAL_STATUSES, type JobEntry } from '../core/jobTypes.js';
import { contentTypeFor } from '../core/formats.js';
import { badRequest, notFound } from '../core/httpError.js';
import { errorMessage } from '../core/errors.js';
import { setDownloadHeaders, setNoStore } from '../core/http.js';
import { wrap } from '../core/wrap.js';

export type DownloadDeps = {
  log: Logger;
  service: ConversionService;
  metrics: (route: string) => RequestHandler;
};

async function statFile(filePath: string): Promise<Stats | undefined> {
  try {
    const st = await fs.promises.stat(filePath);
    return st.isFile() ? st : undefined;
  } catch (err) {
    if (typeof err === 'object' && err !== null && Reflect.get(err, 'code') === 'ENOENT') return undefined;
    throw err;
  }
}

/** Reasons a known job cannot be downloaded yet, or at all. */
function notDownloadable(res: Response, entry: JobEntry): boolean {
  if (entry.abandoned) {
    res.status(410).json({ error: 'Job was rejected and will not run', code: 'JOB_ABANDONED', job_id: entry.id });
    return true;
  }
  if (entry.status === 'failed') {
    res.status(409).json({ error: entry.error ?? 'Conversion failed', job_id: entry.id, status: entry.status });
    return true;
  }
  if (!TERMINAL_STATUSES.has(entry.status)) {
    res.status(202).json({ error: 'Job not complete', job_id: entry.id, status: entry.status });
    return true;
  }
  return false;
}

export function setupDownloadRoutes(app: Express, deps: DownloadDeps) {
  const { log, service, metrics } = deps;

  app.get(
    '/api/download',
    metrics('download'),
    wrap(async (req: Request, res: Response) => {
      setNoStore(res);
      const id = typeof req.query.id === 'string' ? req.query.id.trim() : '';
      if (!id) throw badRequest('Missing job ID', 'MISSING_ID');

      const entry = service.getJob(id);
      if (!entry) throw notFound('Job not found', 'JOB_NOT_FOUND');
      if (notDownloadable(res, entry)) return;

      const outputPath = entry.outputPath;
      if (!outputPath) throw notFound('Output file not available', 'FILE_MISSING');
      const st = await statFile(outputPath);
      if (!st) throw notFound('Output file not available', 'FILE_MISSING');

      res.setHeader('Content-Type', contentTypeFor(outputPath));
      setDownloadHeaders(res, path.basename(outputPath), st.size);

      try {
        await pipeline(fs.createReadStream(outputPath), res);
      } catch (err) {
        // client disconnects mid-transfer surface here as premature close
        log.warn('download_stream_failed', { id, error: errorMessage(err) });
        if (!res.headersSent) throw err;
        res.destroy();
      }
    })
  );
}
