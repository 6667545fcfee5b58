import fs from 'node:fs';
import request from 'supertest';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { ConversionService } from '../core/ConversionService.js';
import type { AppConfig } from '../core/config.js';
import { FakeConverter, deferred, eventually, makeTempDir, mockLogger, removeDir, testConfig } from './helpers.js';

describe('conversion API', () => {
  let dir: string;
  let converter: FakeConverter;
  let service: ConversionService;
  let app: Express;

  function setup(overrides: Partial<AppConfig> = {}, { start = true, newId }: { start?: boolean; newId?: () => string } = {}) {
    const cfg = testConfig(dir, overrides);
    const log = mockLogger();
    service = new ConversionService({ log, converter, newId }, cfg);
    if (start) service.start();
    app = createApp({ cfg, log, service });
  }

  const uploads = () => fs.readdirSync(dir).filter((f) => f.startsWith('convert_upload_'));

  beforeEach(() => {
    dir = makeTempDir();
    converter = new FakeConverter();
  });

  afterEach(async () => {
    await service.stop();
    removeDir(dir);
  });

  describe('POST /api/convert', () => {
    it('converts markdown to html and serves the result for download', async () => {
      setup();
      const res = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: '# Hi' });

      expect(res.status).toBe(200);
      expect(res.headers['cache-control']).toBe('no-store');
      expect(res.body).toEqual({ job_id: expect.any(String), status: 'done' });
      const id: string = res.body.job_id;

      const dl = await request(app).get('/api/download').query({ id });
      expect(dl.status).toBe(200);
      expect(dl.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(dl.headers['cache-control']).toBe('no-store');
      expect(dl.headers['content-disposition']).toBe(
        `attachment; filename="convert_output_${id}.html"; filename*=UTF-8''convert_output_${id}.html`
      );
      expect(dl.text).toBe('<html><body># Hi</body></html>');
    });

    it('normalizes format names', async () => {
      setup();
      const res = await request(app).post('/api/convert').send({ from: ' Markdown ', to: 'HTML', content: 'x' });
      expect(res.status).toBe(200);
      expect(converter.calls[0]).toMatchObject({ from: 'markdown', to: 'html' });
    });

    it('reads a JSON body whatever the content type says', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .set('Content-Type', 'text/plain')
        .send(JSON.stringify({ from: 'markdown', to: 'plain', content: 'hello' }));
      expect(res.status).toBe(200);
      expect(converter.calls[0]?.outputPath).toMatch(/\.txt$/);
    });

    it('requires both formats', async () => {
      setup();
      const res = await request(app).post('/api/convert').send({ from: 'markdown', content: 'x' });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Missing format specification', code: 'MISSING_FORMAT' });
    });

    it('rejects formats outside the catalog', async () => {
      setup();
      const badSource = await request(app).post('/api/convert').send({ from: 'klingon', to: 'html', content: 'x' });
      expect(badSource.status).toBe(400);
      expect(badSource.body.error).toBe('Unsupported source format: klingon');

      const badTarget = await request(app).post('/api/convert').send({ from: 'markdown', to: 'twiki', content: 'x' });
      expect(badTarget.status).toBe(400);
      expect(badTarget.body.error).toBe('Unsupported target format: twiki');
      expect(converter.calls).toHaveLength(0);
    });

    it('answers 400 for malformed JSON', async () => {
      setup();
      const res = await request(app).post('/api/convert').set('Content-Type', 'application/json').send('{"from": "markdown",');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Invalid JSON', code: 'INVALID_JSON' });
    });

    it('rejects non-string content', async () => {
      setup();
      const res = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 42 });
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'content must be a string', code: 'INVALID_REQUEST' });
    });

    it('returns 422 with the converter error', async () => {
      converter.failWith = { success: false, error: 'pandoc failed: exit code 2, stderr: bad', errorType: 'CONVERTER_FAILED', exitCode: 2 };
      setup();
      const res = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 'x' });
      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: 'pandoc failed: exit code 2, stderr: bad', job_id: expect.any(String) });
    });

    it('returns 504 when the wait runs out', async () => {
      const gate = deferred();
      converter.gate = gate.promise;
      setup({ waitTimeoutMs: 50 });
      const res = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 'x' });
      expect(res.status).toBe(504);
      expect(res.body).toEqual({ error: 'Conversion timeout', job_id: expect.any(String) });

      gate.resolve();
      const id: string = res.body.job_id;
      await eventually(() => service.getJob(id)?.status === 'done');
      const dl = await request(app).get('/api/download').query({ id });
      expect(dl.status).toBe(200);
    });

    it('keeps converting after the client disconnects', async () => {
      const gate = deferred();
      converter.gate = gate.promise;
      setup({}, { newId: () => 'job-left-behind' });

      await expect(
        request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 'x' }).timeout(150)
      ).rejects.toThrow('Timeout of 150ms exceeded');
      expect(service.getJob('job-left-behind')?.status).toBe('processing');

      gate.resolve();
      await eventually(() => service.getJob('job-left-behind')?.status === 'done');
      const res = await request(app).get('/api/jobs/job-left-behind');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ job_id: 'job-left-behind', status: 'done', abandoned: false });
      const dl = await request(app).get('/api/download').query({ id: 'job-left-behind' });
      expect(dl.status).toBe(200);
      expect(dl.text).toBe('<html><body>x</body></html>');
    });

    it('returns 503 with Retry-After when the queue is full', async () => {
      setup({ queueCapacity: 1 }, { start: false });
      await service.submit({ from: 'markdown', to: 'html', payload: { kind: 'content', content: 'first' } });

      const res = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 'second' });
      expect(res.status).toBe(503);
      expect(res.headers['retry-after']).toBe('5');
      expect(res.body).toMatchObject({ error: 'Queue full, try again later', code: 'QUEUE_FULL' });
    });
  });

  describe('file uploads', () => {
    it('infers the source format from the file name', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .field('to', 'html')
        .attach('file', Buffer.from('# Uploaded'), 'notes.md');

      expect(res.status).toBe(200);
      expect(converter.calls[0]).toMatchObject({ from: 'markdown', to: 'html' });
      expect(converter.inputsSeen).toEqual(['# Uploaded']);
      await eventually(() => uploads().length === 0);
    });

    it('prefers an explicit source format', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .field('from', 'gfm')
        .field('to', 'html')
        .attach('file', Buffer.from('text'), 'notes.txt');
      expect(res.status).toBe(200);
      expect(converter.calls[0]?.from).toBe('gfm');
    });

    it('falls back to markdown for unknown extensions', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .field('to', 'html')
        .attach('file', Buffer.from('text'), 'notes.unknownext');
      expect(res.status).toBe(200);
      expect(converter.calls[0]?.from).toBe('markdown');
    });

    it('requires a file part', async () => {
      setup();
      const res = await request(app).post('/api/convert').field('from', 'markdown').field('to', 'html');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'No file provided', code: 'NO_FILE' });
    });

    it('removes the upload when validation fails', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .field('to', 'html')
        .attach('file', Buffer.from('%PDF-1.4'), 'paper.pdf');
      expect(res.status).toBe(400);
      expect(res.body.error).toBe('Unsupported source format: pdf');
      expect(uploads()).toEqual([]);
    });

    it('answers 400 when the multipart boundary is missing', async () => {
      setup();
      const res = await request(app).post('/api/convert').set('Content-Type', 'multipart/form-data').send('--x\r\n');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Failed to parse form', code: 'BAD_UPLOAD' });
      expect(converter.calls).toHaveLength(0);
    });

    it('answers 400 for a truncated multipart body', async () => {
      setup();
      const res = await request(app)
        .post('/api/convert')
        .set('Content-Type', 'multipart/form-data; boundary=XYZ')
        .send('--XYZ\r\nContent-Disposition: form-data; name="to"\r\n\r\nhtml\r\n--XYZ\r\nContent-Disposition: form-data; name="file"; filename="cut.md"\r\n\r\n# half a fi');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Failed to parse form', code: 'BAD_UPLOAD' });
      expect(converter.calls).toHaveLength(0);
    });

    it('answers 413 for oversized uploads', async () => {
      setup({ maxUploadBytes: 16 });
      const res = await request(app)
        .post('/api/convert')
        .field('to', 'html')
        .attach('file', Buffer.alloc(64, 'a'), 'big.md');
      expect(res.status).toBe(413);
      expect(res.body).toMatchObject({ code: 'FILE_TOO_LARGE' });
      expect(converter.calls).toHaveLength(0);
    });
  });

  describe('GET /api/download', () => {
    it('requires an id', async () => {
      setup();
      const res = await request(app).get('/api/download');
      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: 'Missing job ID' });
    });

    it('answers 404 for unknown jobs', async () => {
      setup();
      const res = await request(app).get('/api/download').query({ id: 'nope' });
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: 'Job not found' });
    });

    it('answers 202 before the job is complete', async () => {
      setup({}, { start: false });
      const job = await service.submit({ from: 'markdown', to: 'html', payload: { kind: 'content', content: 'x' } });
      const res = await request(app).get('/api/download').query({ id: job.id });
      expect(res.status).toBe(202);
      expect(res.body).toEqual({ error: 'Job not complete', job_id: job.id, status: 'queued' });
    });

    it('answers 409 for failed jobs', async () => {
      converter.failWith = { success: false, error: 'pandoc failed: exit code 1, stderr: nope', errorType: 'CONVERTER_FAILED', exitCode: 1 };
      setup();
      const outcome = await service.submitAndWait({ from: 'markdown', to: 'html', payload: { kind: 'content', content: 'x' } });
      const res = await request(app).get('/api/download').query({ id: outcome.jobId });
      expect(res.status).toBe(409);
      expect(res.body).toEqual({ error: 'pandoc failed: exit code 1, stderr: nope', job_id: outcome.jobId, status: 'failed' });
    });

    it('answers 410 for jobs rejected by a full queue', async () => {
      const ids = ['job-accepted', 'job-rejected'];
      setup({ queueCapacity: 1 }, { start: false, newId: () => ids.shift() ?? 'job-extra' });
      await service.submit({ from: 'markdown', to: 'html', payload: { kind: 'content', content: 'a' } });
      const rejected = await request(app).post('/api/convert').send({ from: 'markdown', to: 'html', content: 'b' });
      expect(rejected.status).toBe(503);

      const res = await request(app).get('/api/download').query({ id: 'job-rejected' });
      expect(res.status).toBe(410);
      expect(res.body).toEqual({ error: 'Job was rejected and will not run', code: 'JOB_ABANDONED', job_id: 'job-rejected' });
    });

    it('answers 404 when the output file has been removed', async () => {
      setup();
      const outcome = await service.submitAndWait({ from: 'markdown', to: 'html', payload: { kind: 'content', content: 'x' } });
      if (outcome.kind !== 'done') throw new Error(`expected done, got ${outcome.kind}`);
      fs.rmSync(outcome.outputPath);

      const res = await request(app).get('/api/download').query({ id: outcome.jobId });
      expect(res.status).toBe(404);
      expect(res.body).toMatchObject({ error: 'Output file not available', code: 'FILE_MISSING' });
    });
  });
});
