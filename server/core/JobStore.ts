import fs from 'node:fs/promises';
import type { Logger } from './logger.js';
import type { JobEntry, JobStatus } from './jobTypes.js';
import { DuplicateJobError, InvalidTransitionError, JobNotFoundError, errorMessage } from './errors.js';

const NEXT_STATUS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['processing'],
  processing: ['done', 'failed'],
  done: [],
  failed: [],
};

export type RegisterParams = {
  id: string;
  from: string;
  to: string;
  createdAt?: number;
};

export type StatusDetails = {
  outputPath?: string;
  error?: string;
};

export type SweepReport = {
  removed: number;
  filesDeleted: number;
  fileErrors: number;
};

export type JobStoreStats = Record<JobStatus, number> & { total: number; abandoned: number };

/**
 * In-memory job status store.
 *
 * Every mutation is a synchronous map operation, so callers on the event loop
 * never observe a half-applied update and nothing holds the map across an
 * await. Entries are frozen snapshots; updates replace them.
 */
export class JobStore {
  private readonly entries = new Map<string, JobEntry>();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  register(params: RegisterParams): JobEntry {
    if (this.entries.has(params.id)) throw new DuplicateJobError(params.id);

    const createdAt = params.createdAt ?? Date.now();
    const entry: JobEntry = Object.freeze({
      id: params.id,
      from: params.from,
      to: params.to,
      status: 'queued',
      abandoned: false,
      createdAt,
      updatedAt: createdAt,
    });
    this.entries.set(entry.id, entry);
    this.log.debug('job_registered', { id: entry.id, from: entry.from, to: entry.to });
    return entry;
  }

  get(id: string): JobEntry | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Apply a forward transition. `done` carries the output path, `failed` the
   * error text; other fields are dropped so an entry never holds both.
   */
  setStatus(id: string, status: JobStatus, details: StatusDetails = {}): JobEntry {
    const current = this.entries.get(id);
    if (!current) throw new JobNotFoundError(id);
    if (!NEXT_STATUS[current.status].includes(status)) {
      throw new InvalidTransitionError(id, current.status, status);
    }

    const next: JobEntry = Object.freeze({
      id: current.id,
      from: current.from,
      to: current.to,
      status,
      abandoned: current.abandoned,
      createdAt: current.createdAt,
      updatedAt: Date.now(),
      ...(status === 'done' && details.outputPath ? { outputPath: details.outputPath } : {}),
      ...(status === 'failed' ? { error: details.error || 'Conversion failed' } : {}),
    });
    this.entries.set(id, next);
    return next;
  }

  /**
   * Flag a queued entry whose enqueue was rejected. It stays until swept so
   * lookups can tell "rejected" from "never existed".
   */
  markAbandoned(id: string): JobEntry {
    const current = this.entries.get(id);
    if (!current) throw new JobNotFoundError(id);
    const next: JobEntry = Object.freeze({ ...current, abandoned: true, updatedAt: Date.now() });
    this.entries.set(id, next);
    return next;
  }

  /**
   * Remove entries older than `maxAgeMs` and delete their output files.
   * File errors are logged and counted, never thrown.
   */
  async sweep(maxAgeMs: number, now = Date.now()): Promise<SweepReport> {
    const expired: JobEntry[] = [];
    for (const [id, entry] of this.entries) {
      if (now - entry.createdAt > maxAgeMs) {
        expired.push(entry);
        this.entries.delete(id);
      }
    }

    const report: SweepReport = { removed: expired.length, filesDeleted: 0, fileErrors: 0 };
    for (const entry of expired) {
      if (!entry.outputPath) continue;
      try {
        await fs.unlink(entry.outputPath);
        report.filesDeleted += 1;
      } catch (err) {
        if (isMissingFile(err)) continue;
        report.fileErrors += 1;
        this.log.warn('sweep_file_delete_failed', { id: entry.id, path: entry.outputPath, error: errorMessage(err) });
      }
    }

    if (report.removed > 0) {
      this.log.info('sweep_complete', { ...report, remaining: this.entries.size });
    }
    return report;
  }

  stats(): JobStoreStats {
    const stats: JobStoreStats = { total: 0, queued: 0, processing: 0, done: 0, failed: 0, abandoned: 0 };
    for (const entry of this.entries.values()) {
      stats.total += 1;
      stats[entry.status] += 1;
      if (entry.abandoned) stats.abandoned += 1;
    }
    return stats;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
