import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../core/logger.js';
import type { ConvertOptions, ConvertResult, DocumentConverter } from '../core/Converter.js';
import type { AppConfig } from '../core/config.js';

export function mockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export function makeTempDir(prefix = 'convert-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function testConfig(tmpDir: string, overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    corsOrigin: true,
    trustProxy: false,
    workerCount: 2,
    queueCapacity: 4,
    jobTimeoutMs: 2000,
    waitTimeoutMs: 3000,
    retentionMs: 30 * 60_000,
    sweepIntervalMs: 10 * 60_000,
    pandocPath: 'pandoc',
    pdfEngines: ['xelatex', 'pdflatex', 'luatex'],
    tmpDir,
    maxUploadBytes: 1024 * 1024,
    convertMaxPerMin: 1000,
    ...overrides,
  };
}

type Deferred<T> = {
  promise: Promise<T>;
  resolve: (value: T) => void;
};

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Converter double that "renders" the input as an HTML document, or fails
 * with a scripted result. `gate` holds every conversion until released.
 */
export class FakeConverter implements DocumentConverter {
  readonly calls: ConvertOptions[] = [];
  readonly inputsSeen: string[] = [];
  gate: Promise<void> | undefined;
  failWith: Extract<ConvertResult, { success: false }> | undefined;

  async convert(options: ConvertOptions): Promise<ConvertResult> {
    this.calls.push(options);
    const input = await fs.promises.readFile(options.inputPath, 'utf8');
    this.inputsSeen.push(input);
    if (this.gate) await this.gate;
    if (this.failWith) return this.failWith;
    await fs.promises.writeFile(options.outputPath, `<html><body>${input}</body></html>`, 'utf8');
    return { success: true, outputPath: options.outputPath };
  }
}

/** Poll until `check` holds or the timeout passes. */
export async function eventually(check: () => boolean, timeoutMs = 2000, stepMs = 5): Promise<void> {
  const until = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > until) throw new Error('condition not met in time');
    await new Promise((r) => setTimeout(r, stepMs));
  }
}
