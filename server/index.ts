import 'dotenv/config';
import type { Server } from 'node:http';
import fs from 'node:fs';
import client from 'prom-client';
import { getLogger } from './core/logger.js';
import { loadConfig } from './core/config.js';
import { createBinaryProbe, findFirstAvailable } from './core/env.js';
import { PandocConverter } from './core/Converter.js';
import { ConversionService } from './core/ConversionService.js';
import { errorMessage } from './core/errors.js';
import { createApp } from './app.js';

const log = getLogger('server');
const cfg = loadConfig();

fs.mkdirSync(cfg.tmpDir, { recursive: true });

const probe = createBinaryProbe();
if (!probe(cfg.pandocPath)) {
  log.warn('pandoc_not_found', { path: cfg.pandocPath });
}
const engine = findFirstAvailable(cfg.pdfEngines, probe);
if (engine) log.info('pdf_engine_detected', { engine });
else log.warn('pdf_engine_missing', { tried: cfg.pdfEngines });

const defaultRegistry = new client.Registry();
client.collectDefaultMetrics({ register: defaultRegistry });

const converter = new PandocConverter(getLogger('converter'), {
  pandocPath: cfg.pandocPath,
  pdfEngines: cfg.pdfEngines,
  probe,
});
const service = new ConversionService(
  { log: getLogger('jobs'), converter },
  {
    workerCount: cfg.workerCount,
    queueCapacity: cfg.queueCapacity,
    jobTimeoutMs: cfg.jobTimeoutMs,
    waitTimeoutMs: cfg.waitTimeoutMs,
    retentionMs: cfg.retentionMs,
    sweepIntervalMs: cfg.sweepIntervalMs,
    tmpDir: cfg.tmpDir,
  }
);
service.start();

export const app = createApp({ cfg, log, service, registries: [defaultRegistry] });

function listen(port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.keepAliveTimeout = 120_000;
    server.headersTimeout = 125_000;
    // a conversion request may wait up to waitTimeoutMs before answering
    server.requestTimeout = cfg.waitTimeoutMs + 30_000;
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      log.info(`convert server listening on http://localhost:${port}`, {
        workers: cfg.workerCount,
        queueCapacity: cfg.queueCapacity,
        tmpDir: cfg.tmpDir,
      });
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
  });
}

let server: Server | undefined;
let shuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info(`shutdown_${signal.toLowerCase()}`, 'Stopping workers and closing server...');
  const closed = new Promise<void>((resolve) => {
    if (!server) return resolve();
    server.close(() => resolve());
    server.closeIdleConnections();
  });
  try {
    await service.stop();
    await closed;
  } catch (err) {
    log.error('shutdown_failed', errorMessage(err));
    process.exitCode = 1;
  }
  process.exit();
}

process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

process.on('unhandledRejection', (reason: unknown) => {
  log.error('unhandled_rejection', reason instanceof Error ? reason.stack || reason.message : String(reason));
});

listen(cfg.port)
  .then((s) => {
    server = s;
  })
  .catch(async (err: unknown) => {
    log.error('fatal_startup', errorMessage(err));
    await service.stop();
    process.exit(1);
  });
