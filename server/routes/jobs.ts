import type { Express, Request, Response } from 'express';
import type { ConversionService } from '../core/ConversionService.js';
import { notFound } from '../core/httpError.js';
import { setNoStore } from '../core/http.js';

export type JobsDeps = {
  service: ConversionService;
};

export function setupJobRoutes(app: Express, deps: JobsDeps) {
  const { service } = deps;

  app.get('/api/jobs/:id', (req: Request, res: Response) => {
    setNoStore(res);
    const entry = service.getJob(req.params.id);
    if (!entry) throw notFound('Job not found', 'JOB_NOT_FOUND');
    res.json({
      job_id: entry.id,
      status: entry.status,
      from: entry.from,
      to: entry.to,
      abandoned: entry.abandoned,
      ...(entry.error ? { error: entry.error } : {}),
      created_at: new Date(entry.createdAt).toISOString(),
      updated_at: new Date(entry.updatedAt).toISOString(),
    });
  });
}
