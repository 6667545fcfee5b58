import fs from 'node:fs';
import path from 'node:path';
import { isFalse, isTrue } from './env.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_DIR = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), 'logs'));
const LOG_FILE = path.join(LOG_DIR, 'app.log');
const MAX_BYTES = 2_000_000; // 2MB
const BACKUPS = 3;

function fileLoggingEnabled() {
  if (isFalse(process.env.LOG_TO_FILE)) return false;
  if (isTrue(process.env.LOG_TO_FILE)) return true;
  return process.env.NODE_ENV !== 'test';
}

function rotateIfNeeded(filePath: string) {
  if (!fs.existsSync(LOG_DIR)) fs.mkdirSync(LOG_DIR, { recursive: true });
  if (!fs.existsSync(filePath)) return;
  const stat = fs.statSync(filePath);
  if (stat.size < MAX_BYTES) return;
  for (let i = BACKUPS - 1; i >= 0; i--) {
    const src = i === 0 ? filePath : `${filePath}.${i}`;
    const dst = `${filePath}.${i + 1}`;
    if (fs.existsSync(src)) fs.renameSync(src, dst);
  }
}

let fileWriteFailed = false;

function write(line: string) {
  if (fileWriteFailed || !fileLoggingEnabled()) return;
  try {
    rotateIfNeeded(LOG_FILE);
    fs.appendFileSync(LOG_FILE, line + '\n', 'utf8');
  } catch (err) {
    // File sink stays off after the first failure; console output continues.
    fileWriteFailed = true;
    console.error(`logger: file output disabled (${err instanceof Error ? err.message : String(err)})`);
  }
}

function ts() {
  return new Date().toISOString();
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack || arg.message;
  if (arg && typeof arg === 'object') {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function getLogger(name = 'app') {
  const prefix = (lvl: LogLevel) => `${ts()} | ${lvl.toUpperCase()} | ${name} |`;
  const line = (lvl: LogLevel, args: unknown[]) => `${prefix(lvl)} ${args.map(formatArg).join(' ')}`;
  return {
    debug: (...args: unknown[]) => { const msg = line('debug', args); write(msg); if (process.env.NODE_ENV !== 'production') console.debug(msg); },
    info:  (...args: unknown[]) => { const msg = line('info', args);  write(msg); console.log(msg); },
    warn:  (...args: unknown[]) => { const msg = line('warn', args);  write(msg); console.warn(msg); },
    error: (...args: unknown[]) => { const msg = line('error', args); write(msg); console.error(msg); },
  };
}

export type Logger = ReturnType<typeof getLogger>;
