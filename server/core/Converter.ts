import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from './logger.js';
import type { ConversionErrorCode } from './errors.js';
import { summarizeStderr } from './errors.js';
import { findFirstAvailable, type BinaryProbe } from './env.js';

/**
 * Conversion result
 */
export type ConvertResult =
  | { success: true; outputPath: string; engine?: string }
  | { success: false; error: string; errorType: ConversionErrorCode; exitCode?: number };

/**
 * Conversion options
 */
export interface ConvertOptions {
  inputPath: string;
  outputPath: string;
  from: string;
  to: string;
  timeoutMs: number;
  signal?: AbortSignal; // pool shutdown; the deadline is handled by timeoutMs
}

export interface DocumentConverter {
  convert(options: ConvertOptions): Promise<ConvertResult>;
}

export type PandocConverterOptions = {
  pandocPath?: string;
  pdfEngines: readonly string[];
  probe: BinaryProbe;
  killGraceMs?: number;
};

const MAX_STDERR_CHARS = 64 * 1024;
const PDF_TARGETS = new Set(['pdf']);

function humanList(items: readonly string[]): string {
  if (items.length <= 1) return items.join('');
  if (items.length === 2) return `${items[0]} or ${items[1]}`;
  return `${items.slice(0, -1).join(', ')}, or ${items[items.length - 1]}`;
}

export function missingEngineMessage(engines: readonly string[]): string {
  return `PDF conversion requires a LaTeX engine (${humanList(engines)}) to be installed. Please install texlive-latex-recommended and lmodern packages`;
}

/**
 * PandocConverter - runs `pandoc` as a child process
 *
 * Features:
 * - Deadline per conversion (SIGTERM, then SIGKILL after a grace period)
 * - PDF engine selection from a preference list, failing before spawn when none is installed
 * - Captured stderr in failure messages
 */
export class PandocConverter implements DocumentConverter {
  private readonly log: Logger;
  private readonly pandocPath: string;
  private readonly pdfEngines: readonly string[];
  private readonly probe: BinaryProbe;
  private readonly killGraceMs: number;

  constructor(log: Logger, options: PandocConverterOptions) {
    this.log = log;
    this.pandocPath = options.pandocPath ?? 'pandoc';
    this.pdfEngines = options.pdfEngines;
    this.probe = options.probe;
    this.killGraceMs = options.killGraceMs ?? 5000;
  }

  async convert(options: ConvertOptions): Promise<ConvertResult> {
    let engine: string | undefined;
    if (PDF_TARGETS.has(options.to)) {
      engine = findFirstAvailable(this.pdfEngines, this.probe);
      if (!engine) {
        this.log.warn('converter_engine_missing', { to: options.to, engines: this.pdfEngines });
        return { success: false, error: missingEngineMessage(this.pdfEngines), errorType: 'ENGINE_MISSING' };
      }
    }

    const args = this.buildArgs(options, engine);
    this.log.debug('converter_start', { from: options.from, to: options.to, engine });

    const result = await this.run(args, options);
    if (!result.success) return result;

    try {
      await fs.access(options.outputPath);
    } catch {
      return { success: false, error: 'pandoc failed: no output file was produced', errorType: 'CONVERTER_FAILED', exitCode: 0 };
    }
    return { success: true, outputPath: options.outputPath, engine };
  }

  /**
   * Build pandoc command arguments; the output flag stays last.
   */
  buildArgs(options: Pick<ConvertOptions, 'inputPath' | 'outputPath' | 'from' | 'to'>, engine?: string): string[] {
    const args = [
      options.inputPath,
      '-f', options.from,
      '-t', options.to,
      '--standalone',
      '--wrap=none',
    ];
    if (engine) args.push(`--pdf-engine=${engine}`);
    args.push('-o', options.outputPath);
    return args;
  }

  private run(args: string[], options: ConvertOptions): Promise<ConvertResult> {
    return new Promise((resolve) => {
      if (options.signal?.aborted) {
        resolve({ success: false, error: 'Conversion aborted before start', errorType: 'CONVERTER_ABORTED' });
        return;
      }

      const child = spawn(this.pandocPath, args, {
        stdio: ['ignore', 'ignore', 'pipe'],
        windowsHide: true,
      });

      let stderr = '';
      let settled = false;
      let timedOut = false;
      let aborted = false;
      let killTimer: NodeJS.Timeout | undefined;

      const kill = () => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
        }, this.killGraceMs);
        killTimer.unref();
      };

      const deadline = setTimeout(() => {
        timedOut = true;
        this.log.warn('converter_timeout', { timeoutMs: options.timeoutMs, pid: child.pid });
        kill();
      }, options.timeoutMs);

      const onAbort = () => {
        aborted = true;
        kill();
      };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (result: ConvertResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(deadline);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };

      child.stderr?.setEncoding('utf8');
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
        if (stderr.length > MAX_STDERR_CHARS) stderr = stderr.slice(stderr.length - MAX_STDERR_CHARS);
      });

      child.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT') {
          this.log.error('converter_missing', { path: this.pandocPath });
          finish({ success: false, error: `pandoc executable not found (${this.pandocPath})`, errorType: 'CONVERTER_MISSING' });
          return;
        }
        this.log.error('converter_spawn_error', { error: err.message });
        finish({ success: false, error: `Failed to start pandoc: ${err.message}`, errorType: 'CONVERTER_FAILED' });
      });

      child.on('close', (code, signal) => {
        if (timedOut) {
          finish({ success: false, error: `pandoc timed out after ${options.timeoutMs}ms`, errorType: 'CONVERTER_TIMEOUT' });
          return;
        }
        if (aborted) {
          finish({ success: false, error: 'Conversion aborted: server shutting down', errorType: 'CONVERTER_ABORTED' });
          return;
        }
        if (code === 0) {
          finish({ success: true, outputPath: options.outputPath });
          return;
        }
        const detail = summarizeStderr(stderr, path.dirname(options.outputPath));
        const status = code !== null ? `exit code ${code}` : `killed by ${signal ?? 'unknown signal'}`;
        this.log.error('converter_failed', { from: options.from, to: options.to, status });
        finish({
          success: false,
          error: `pandoc failed: ${status}, stderr: ${detail}`,
          errorType: 'CONVERTER_FAILED',
          exitCode: code ?? undefined,
        });
      });
    });
  }
}
