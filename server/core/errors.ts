import { HttpError } from './httpError.js';
import type { JobStatus } from './jobTypes.js';

export type ConversionErrorCode =
  | 'ENGINE_MISSING'
  | 'CONVERTER_MISSING'
  | 'CONVERTER_FAILED'
  | 'CONVERTER_TIMEOUT'
  | 'CONVERTER_ABORTED'
  | 'INPUT_WRITE_FAILED';

export class QueueFullError extends HttpError {
  constructor() {
    super(503, 'QUEUE_FULL', 'Queue full, try again later');
    this.name = 'QueueFullError';
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super('Work queue is closed');
    this.name = 'QueueClosedError';
  }
}

export class JobNotFoundError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
    this.jobId = jobId;
  }
}

export class DuplicateJobError extends Error {
  readonly jobId: string;

  constructor(jobId: string) {
    super(`Job id ${jobId} was already used`);
    this.name = 'DuplicateJobError';
    this.jobId = jobId;
  }
}

export class InvalidTransitionError extends Error {
  readonly jobId: string;
  readonly from: JobStatus;
  readonly to: JobStatus;

  constructor(jobId: string, from: JobStatus, to: JobStatus) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
    this.jobId = jobId;
    this.from = from;
    this.to = to;
  }
}

const MAX_STDERR_CHARS = 4000;

/**
 * Converter diagnostics kept for the client: trimmed, capped, and with
 * absolute temp paths reduced to their file names.
 */
export function summarizeStderr(stderr: string, tmpDir?: string): string {
  let text = stderr.trim();
  if (tmpDir) text = text.split(tmpDir + '/').join('');
  if (text.length > MAX_STDERR_CHARS) text = text.slice(text.length - MAX_STDERR_CHARS);
  return text;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
