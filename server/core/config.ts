import os from 'node:os';
import path from 'node:path';
import { getEnv, getEnvInt, getEnvList, isTrue } from './env.js';

export type AppConfig = {
  port: number;
  corsOrigin: true | string | string[];
  trustProxy: boolean;
  workerCount: number;
  queueCapacity: number;
  jobTimeoutMs: number; // per-conversion deadline, kills the converter
  waitTimeoutMs: number; // how long POST /api/convert waits for a result
  retentionMs: number; // age after which job records and outputs are swept
  sweepIntervalMs: number;
  pandocPath: string;
  pdfEngines: string[]; // preference order for --pdf-engine
  tmpDir: string;
  maxUploadBytes: number;
  convertMaxPerMin: number;
};

export const DEFAULT_PDF_ENGINES = ['xelatex', 'pdflatex', 'luatex'];

function parseCorsOrigin(input: string | undefined): AppConfig['corsOrigin'] {
  if (!input) return true; // allow any by default for dev
  const val = input.trim();
  if (val === '*' || val === 'true') return true;
  // comma-separated list
  const parts = val.split(',').map((s) => s.trim()).filter(Boolean);
  if (parts.length === 0) return true;
  return parts.length > 1 ? parts : parts[0];
}

const positive = (value: number, fallback: number) => (Number.isFinite(value) && value > 0 ? Math.floor(value) : fallback);

// setTimeout fires after 1ms for anything above a signed 32-bit delay
export const MAX_TIMER_MS = 2_147_483_647;

const timerMs = (value: number, fallback: number, max = MAX_TIMER_MS) => Math.min(positive(value, fallback), max);

export function loadConfig(): AppConfig {
  const jobTimeoutMs = timerMs(getEnvInt('JOB_TIMEOUT_MS', 60_000), 60_000, MAX_TIMER_MS - 1000);
  const requestedWait = timerMs(getEnvInt('WAIT_TIMEOUT_MS', 65_000), 65_000);
  return {
    port: positive(getEnvInt('PORT', 8080), 8080),
    corsOrigin: parseCorsOrigin(process.env.CORS_ORIGIN),
    trustProxy: isTrue(process.env.TRUST_PROXY),
    workerCount: positive(getEnvInt('WORKER_COUNT', 8), 8),
    queueCapacity: positive(getEnvInt('QUEUE_CAPACITY', 256), 256),
    jobTimeoutMs,
    // The wait must outlast the job deadline so a timed-out conversion still reports as failed.
    waitTimeoutMs: Math.max(requestedWait, jobTimeoutMs + 1000),
    retentionMs: positive(getEnvInt('RETENTION_MS', 30 * 60_000), 30 * 60_000),
    sweepIntervalMs: timerMs(getEnvInt('SWEEP_INTERVAL_MS', 10 * 60_000), 10 * 60_000),
    pandocPath: getEnv('PANDOC_PATH', 'pandoc'),
    pdfEngines: getEnvList('PDF_ENGINES', DEFAULT_PDF_ENGINES),
    tmpDir: path.resolve(getEnv('TMP_DIR', os.tmpdir())),
    maxUploadBytes: positive(getEnvInt('MAX_UPLOAD_MB', 32), 32) * 1024 * 1024,
    convertMaxPerMin: positive(getEnvInt('CONVERT_MAX_PER_MIN', 60), 60),
  };
}
