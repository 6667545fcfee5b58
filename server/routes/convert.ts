import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import express from 'express';
import type { Express, Request, RequestHandler, Response } from 'express';
import multer from 'multer';
import type { AppConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { ConversionService, WaitOutcome } from '../core/ConversionService.js';
import type { ConversionRequest } from '../core/jobTypes.js';
import { ConvertFormFields, ConvertJsonBody, parseBody, resolveFormats } from '../core/validate.js';
import { detectFormat } from '../core/formats.js';
import { HttpError } from '../core/httpError.js';
import { errorMessage } from '../core/errors.js';
import { setNoStore } from '../core/http.js';
import { wrap } from '../core/wrap.js';

export type ConvertDeps = {
  cfg: AppConfig;
  log: Logger;
  service: ConversionService;
  convertRateLimit: RequestHandler;
  metrics: (route: string) => RequestHandler;
};

const SAFE_EXT = /^\.[a-z0-9]{1,10}$/i;

function uploadExtension(originalName: string): string {
  const ext = path.extname(originalName);
  return SAFE_EXT.test(ext) ? ext.toLowerCase() : '';
}

export function setupConvertRoutes(app: Express, deps: ConvertDeps) {
  const { cfg, log, service, convertRateLimit, metrics } = deps;

  const upload = multer({
    storage: multer.diskStorage({
      destination: cfg.tmpDir,
      filename: (_req, file, cb) => cb(null, `convert_upload_${randomUUID()}${uploadExtension(file.originalname)}`),
    }),
    limits: { fileSize: cfg.maxUploadBytes, files: 1, fields: 8 },
  });
  const uploadSingle = upload.single('file');
  // Anything that is not multipart is read as JSON, whatever its Content-Type says.
  const jsonBody = express.json({ limit: cfg.maxUploadBytes, type: () => true });

  const readBody: RequestHandler = (req, res, next) => {
    if (!req.is('multipart/form-data')) {
      jsonBody(req, res, next);
      return;
    }
    uploadSingle(req, res, (err?: unknown) => {
      // busboy reports a malformed body as a plain Error; filesystem errors carry errno
      if (err && !(err instanceof multer.MulterError) && typeof Reflect.get(Object(err), 'errno') !== 'number') {
        log.debug('upload_parse_failed', { error: errorMessage(err) });
        next(new HttpError(400, 'BAD_UPLOAD', 'Failed to parse form'));
        return;
      }
      next(err);
    });
  };

  async function discardUpload(filePath: string) {
    try {
      await fs.rm(filePath, { force: true });
    } catch (err) {
      log.warn('upload_remove_failed', { path: filePath, error: errorMessage(err) });
    }
  }

  async function requestFromUpload(req: Request): Promise<ConversionRequest> {
    const file = req.file;
    if (!file) throw new HttpError(400, 'NO_FILE', 'No file provided');
    try {
      const fields = parseBody(ConvertFormFields, req.body);
      const { from, to } = resolveFormats(fields.from || detectFormat(file.originalname), fields.to);
      return { from, to, payload: { kind: 'file', path: file.path, originalName: file.originalname } };
    } catch (err) {
      await discardUpload(file.path);
      throw err;
    }
  }

  function requestFromJson(req: Request): ConversionRequest {
    const body = parseBody(ConvertJsonBody, req.body);
    const { from, to } = resolveFormats(body.from, body.to);
    return { from, to, payload: { kind: 'content', content: body.content } };
  }

  function sendOutcome(res: Response, outcome: WaitOutcome) {
    switch (outcome.kind) {
      case 'done':
        return res.json({ job_id: outcome.jobId, status: 'done' });
      case 'failed':
        return res.status(422).json({ error: outcome.error, job_id: outcome.jobId });
      case 'timeout':
        return res.status(504).json({ error: 'Conversion timeout', job_id: outcome.jobId });
      case 'aborted':
        // client is gone; the job keeps running and stays downloadable
        return undefined;
    }
  }

  app.post(
    '/api/convert',
    convertRateLimit,
    metrics('convert'),
    readBody,
    wrap(async (req: Request, res: Response) => {
      setNoStore(res);
      const request = req.is('multipart/form-data') ? await requestFromUpload(req) : requestFromJson(req);

      const controller = new AbortController();
      const onClose = () => {
        if (!res.writableFinished) controller.abort();
      };
      res.on('close', onClose);
      try {
        const outcome = await service.submitAndWait(request, { signal: controller.signal });
        sendOutcome(res, outcome);
      } finally {
        res.off('close', onClose);
      }
    })
  );
}
