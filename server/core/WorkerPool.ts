import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';
import type { JobStore } from './JobStore.js';
import type { WorkQueue } from './WorkQueue.js';
import type { DocumentConverter } from './Converter.js';
import type { JobMetrics } from './metrics.js';
import type { JobRecord, JobResult } from './jobTypes.js';
import { JobNotFoundError, QueueClosedError, errorMessage } from './errors.js';
import { extensionFor } from './formats.js';

export type WorkerPoolOptions = {
  workerCount: number;
  jobTimeoutMs: number;
  tmpDir: string;
};

export type WorkerPoolDeps = {
  log: Logger;
  queue: WorkQueue<JobRecord>;
  store: JobStore;
  converter: DocumentConverter;
  metrics?: JobMetrics;
};

export function outputPathFor(tmpDir: string, job: Pick<JobRecord, 'id' | 'to'>): string {
  return path.join(tmpDir, `convert_output_${job.id}${extensionFor(job.to)}`);
}

/**
 * Worker Pool - fixed set of async loops draining the work queue
 *
 * Each loop takes one job at a time: mark processing, materialize input,
 * run the converter under the job deadline, record done/failed, then hand
 * the result to whoever is waiting on the job's slot.
 */
export class WorkerPool {
  private readonly log: Logger;
  private readonly queue: WorkQueue<JobRecord>;
  private readonly store: JobStore;
  private readonly converter: DocumentConverter;
  private readonly metrics?: JobMetrics;
  private readonly options: WorkerPoolOptions;

  private controller: AbortController | undefined;
  private loops: Promise<void>[] = [];
  private active = 0;

  constructor(deps: WorkerPoolDeps, options: WorkerPoolOptions) {
    this.log = deps.log;
    this.queue = deps.queue;
    this.store = deps.store;
    this.converter = deps.converter;
    this.metrics = deps.metrics;
    this.options = options;
  }

  get inFlight(): number {
    return this.active;
  }

  get running(): boolean {
    return this.controller !== undefined && !this.controller.signal.aborted;
  }

  get size(): number {
    return this.options.workerCount;
  }

  start(): void {
    if (this.running) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loops = Array.from({ length: this.options.workerCount }, (_, i) => this.loop(i + 1, controller.signal));
    this.log.info('worker_pool_started', { workers: this.options.workerCount });
  }

  /**
   * Abort idle waits and running conversions, then wait for every loop to exit.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort(new Error('worker pool stopped'));
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = undefined;
    this.log.info('worker_pool_stopped');
  }

  private async loop(workerId: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let job: JobRecord;
      try {
        job = await this.queue.take(signal);
      } catch (err) {
        if (signal.aborted || err instanceof QueueClosedError) break;
        this.log.error('worker_take_failed', { workerId, error: errorMessage(err) });
        continue;
      }

      this.active += 1;
      try {
        await this.process(job, workerId, signal);
      } catch (err) {
        // process() reports its own failures; anything here is unexpected
        this.log.error('worker_job_crashed', { workerId, id: job.id, error: errorMessage(err) });
        job.result.deliver({ ok: false, error: `Internal error: ${errorMessage(err)}`, code: 'CONVERTER_FAILED' });
      } finally {
        this.active -= 1;
      }
    }
  }

  private async process(job: JobRecord, workerId: number, signal: AbortSignal): Promise<void> {
    const started = Date.now();
    let inputPath: string | undefined = job.payload.kind === 'file' ? job.payload.path : undefined;

    try {
      try {
        this.store.setStatus(job.id, 'processing');
      } catch (err) {
        const error = err instanceof JobNotFoundError ? 'Job expired before processing started' : errorMessage(err);
        this.log.warn('job_skipped', { workerId, id: job.id, error });
        job.result.deliver({ ok: false, error, code: 'CONVERTER_ABORTED' });
        return;
      }
      this.log.info('job_processing', { workerId, id: job.id, from: job.from, to: job.to, waitMs: started - job.createdAt });

      if (job.payload.kind === 'content') {
        const materialized = path.join(this.options.tmpDir, `convert_input_${randomUUID()}${extensionFor(job.from)}`);
        try {
          await fs.writeFile(materialized, job.payload.content, 'utf8');
          inputPath = materialized;
        } catch (err) {
          await this.finish(job, { ok: false, error: `failed to write input file: ${errorMessage(err)}`, code: 'INPUT_WRITE_FAILED' }, started);
          return;
        }
      }

      if (!inputPath) {
        await this.finish(job, { ok: false, error: 'No input provided', code: 'INPUT_WRITE_FAILED' }, started);
        return;
      }

      const outputPath = outputPathFor(this.options.tmpDir, job);
      const converted = await this.converter.convert({
        inputPath,
        outputPath,
        from: job.from,
        to: job.to,
        timeoutMs: this.options.jobTimeoutMs,
        signal,
      });

      const result: JobResult = converted.success
        ? { ok: true, outputPath: converted.outputPath }
        : { ok: false, error: converted.error, code: converted.errorType };
      if (!result.ok) await removeQuietly(outputPath, this.log);
      await this.finish(job, result, started);
    } finally {
      if (inputPath) await removeQuietly(inputPath, this.log);
    }
  }

  /**
   * Record the terminal status, then deliver the result. The store update
   * comes first so a woken waiter always finds the final status.
   */
  private async finish(job: JobRecord, result: JobResult, started: number): Promise<void> {
    const durationMs = Date.now() - started;
    try {
      if (result.ok) {
        this.store.setStatus(job.id, 'done', { outputPath: result.outputPath });
      } else {
        this.store.setStatus(job.id, 'failed', { error: result.error });
      }
    } catch (err) {
      // Entry was swept while converting: nobody can download the output any more.
      this.log.warn('job_entry_gone', { id: job.id, error: errorMessage(err) });
      if (result.ok) await removeQuietly(result.outputPath, this.log);
    }

    if (result.ok) {
      this.log.info('job_done', { id: job.id, durationMs });
    } else {
      this.log.warn('job_failed', { id: job.id, code: result.code, durationMs, error: result.error });
    }
    this.metrics?.observeJob(result.ok ? 'done' : 'failed', durationMs / 1000);

    if (!job.result.deliver(result)) {
      this.log.debug('job_result_already_delivered', { id: job.id });
    }
  }
}

async function removeQuietly(filePath: string, log: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    log.warn('temp_file_remove_failed', { path: filePath, error: errorMessage(err) });
  }
}
