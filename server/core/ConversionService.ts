import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import type { DocumentConverter } from './Converter.js';
import type { ConversionRequest, JobEntry, JobRecord, JobResult } from './jobTypes.js';
import type { ConversionErrorCode } from './errors.js';
import { QueueFullError, errorMessage } from './errors.js';
import { HttpError } from './httpError.js';
import { JobStore } from './JobStore.js';
import { WorkQueue } from './WorkQueue.js';
import { WorkerPool } from './WorkerPool.js';
import { Sweeper } from './Sweeper.js';
import { ResultSlot } from './resultSlot.js';
import { createJobMetrics, type JobMetrics } from './metrics.js';

export type ConversionServiceOptions = Pick<
  AppConfig,
  'workerCount' | 'queueCapacity' | 'jobTimeoutMs' | 'waitTimeoutMs' | 'retentionMs' | 'sweepIntervalMs' | 'tmpDir'
>;

export type ConversionServiceDeps = {
  log: Logger;
  converter: DocumentConverter;
  metrics?: JobMetrics;
  newId?: () => string;
};

export type WaitOutcome =
  | { kind: 'done'; jobId: string; outputPath: string }
  | { kind: 'failed'; jobId: string; error: string; code: ConversionErrorCode }
  | { kind: 'timeout'; jobId: string }
  | { kind: 'aborted'; jobId: string };

export type WaitOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

/**
 * Owns the work queue, job store, worker pool and sweeper, and implements the
 * coordinator wait: enqueue, then wait for the job's result, the deadline or
 * the caller's cancellation, whichever comes first. Giving up on the wait
 * never cancels the job; its entry in the store keeps tracking it.
 */
export class ConversionService {
  readonly store: JobStore;
  readonly queue: WorkQueue<JobRecord>;
  readonly pool: WorkerPool;
  readonly sweeper: Sweeper;
  readonly metrics: JobMetrics;

  private readonly log: Logger;
  private readonly options: ConversionServiceOptions;
  private readonly newId: () => string;
  private stopping = false;

  constructor(deps: ConversionServiceDeps, options: ConversionServiceOptions) {
    this.log = deps.log;
    this.options = options;
    this.newId = deps.newId ?? randomUUID;
    this.metrics = deps.metrics ?? createJobMetrics();

    this.store = new JobStore(deps.log);
    this.queue = new WorkQueue<JobRecord>(options.queueCapacity);
    this.pool = new WorkerPool(
      { log: deps.log, queue: this.queue, store: this.store, converter: deps.converter, metrics: this.metrics },
      { workerCount: options.workerCount, jobTimeoutMs: options.jobTimeoutMs, tmpDir: options.tmpDir }
    );
    this.sweeper = new Sweeper(
      { store: this.store, log: deps.log, metrics: this.metrics },
      { intervalMs: options.sweepIntervalMs, retentionMs: options.retentionMs }
    );
    this.metrics.bindQueueGauges({
      queueSize: () => this.queue.size,
      queueCapacity: () => this.queue.capacity,
      inFlight: () => this.pool.inFlight,
      storedJobs: () => this.store.size,
    });
  }

  /** Start workers and the sweeper. A stopped service cannot be restarted. */
  start(): void {
    if (this.stopping) throw new Error('ConversionService was stopped; create a new instance');
    this.pool.start();
    this.sweeper.start();
  }

  /**
   * Stop accepting work, fail whatever is still buffered, and wait for the
   * workers and sweeper to wind down.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    const pending = this.queue.close();
    for (const job of pending) {
      this.log.warn('job_dropped_on_shutdown', { id: job.id });
      job.result.deliver({ ok: false, error: 'Server shutting down', code: 'CONVERTER_ABORTED' });
      if (job.payload.kind === 'file') await removeUpload(job.payload.path, this.log);
    }
    await Promise.all([this.pool.stop(), this.sweeper.stop()]);
  }

  /**
   * Register and enqueue a job without waiting for it.
   * Throws QueueFullError when the queue has no room; the queued entry is
   * then flagged abandoned and left for the sweeper.
   */
  async submit(request: ConversionRequest): Promise<JobRecord> {
    if (this.stopping || this.queue.isClosed) {
      if (request.payload.kind === 'file') await removeUpload(request.payload.path, this.log);
      throw new HttpError(503, 'SHUTTING_DOWN', 'Server is shutting down');
    }

    const job: JobRecord = Object.freeze({
      id: this.newId(),
      from: request.from,
      to: request.to,
      payload: request.payload,
      result: new ResultSlot<JobResult>(),
      createdAt: Date.now(),
    });

    this.store.register({ id: job.id, from: job.from, to: job.to, createdAt: job.createdAt });

    if (!this.queue.offer(job)) {
      this.store.markAbandoned(job.id);
      this.metrics.queueRejected();
      this.log.warn('job_rejected_queue_full', { id: job.id, capacity: this.queue.capacity });
      if (job.payload.kind === 'file') await removeUpload(job.payload.path, this.log);
      throw new QueueFullError();
    }

    this.log.info('job_enqueued', { id: job.id, from: job.from, to: job.to, queueLength: this.queue.size });
    return job;
  }

  async submitAndWait(request: ConversionRequest, options: WaitOptions = {}): Promise<WaitOutcome> {
    const job = await this.submit(request);
    return this.waitFor(job, options);
  }

  async waitFor(job: JobRecord, options: WaitOptions = {}): Promise<WaitOutcome> {
    const timeoutMs = options.timeoutMs ?? this.options.waitTimeoutMs;
    const waited = await job.result.wait(timeoutMs, options.signal);

    let outcome: WaitOutcome;
    if (waited.kind === 'value') {
      const result = waited.value;
      outcome = result.ok
        ? { kind: 'done', jobId: job.id, outputPath: result.outputPath }
        : { kind: 'failed', jobId: job.id, error: result.error, code: result.code };
    } else {
      outcome = { kind: waited.kind, jobId: job.id };
      this.log.warn(waited.kind === 'timeout' ? 'job_wait_timeout' : 'job_wait_aborted', {
        id: job.id,
        timeoutMs,
        status: this.store.get(job.id)?.status,
      });
    }

    this.metrics.waitEnded(outcome.kind);
    return outcome;
  }

  getJob(id: string): JobEntry | undefined {
    return this.store.get(id);
  }

  stats() {
    return {
      queue: {
        size: this.queue.size,
        capacity: this.queue.capacity,
        idleWorkers: this.queue.waitingTakers,
      },
      workers: {
        size: this.pool.size,
        inFlight: this.pool.inFlight,
        running: this.pool.running,
      },
      jobs: this.store.stats(),
      sweeper: {
        running: this.sweeper.running,
        retentionMs: this.options.retentionMs,
        intervalMs: this.options.sweepIntervalMs,
      },
    };
  }
}

async function removeUpload(filePath: string, log: Logger): Promise<void> {
  try {
    await fs.rm(filePath, { force: true });
  } catch (err) {
    log.warn('upload_remove_failed', { path: filePath, error: errorMessage(err) });
  }
}
