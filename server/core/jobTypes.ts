import type { ConversionErrorCode } from './errors.js';
import type { ResultSlot } from './resultSlot.js';

/**
 * Job states during lifecycle: queued → processing → done | failed
 */
export type JobStatus = 'queued' | 'processing' | 'done' | 'failed';

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set(['done', 'failed']);

/**
 * Document to convert: inline text or an uploaded temp file, never both.
 */
export type JobPayload =
  | { readonly kind: 'content'; readonly content: string }
  | { readonly kind: 'file'; readonly path: string; readonly originalName?: string };

export type JobResult =
  | { readonly ok: true; readonly outputPath: string }
  | { readonly ok: false; readonly error: string; readonly code: ConversionErrorCode };

export type ConversionRequest = {
  from: string;
  to: string;
  payload: JobPayload;
};

/**
 * One conversion request as handed to a worker. Only `result` is ever written,
 * and only once.
 */
export interface JobRecord {
  readonly id: string;
  readonly from: string;
  readonly to: string;
  readonly payload: JobPayload;
  readonly result: ResultSlot<JobResult>;
  readonly createdAt: number;
}

/**
 * Status entry kept in the JobStore for polling and downloads.
 */
export interface JobEntry {
  readonly id: string;
  readonly from: string;
  readonly to: string;
  readonly status: JobStatus;
  readonly outputPath?: string;
  readonly error?: string;
  readonly abandoned: boolean;
  readonly createdAt: number;
  readonly updatedAt: number;
}
