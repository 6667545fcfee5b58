import type { Logger } from './logger.js';
import type { JobStore, SweepReport } from './JobStore.js';
import type { JobMetrics } from './metrics.js';
import { errorMessage } from './errors.js';

export type SweeperOptions = {
  intervalMs: number;
  retentionMs: number;
};

/**
 * Periodic retention sweep over the job store. A failing run is logged and
 * the schedule continues.
 */
export class Sweeper {
  private readonly store: JobStore;
  private readonly log: Logger;
  private readonly metrics?: JobMetrics;
  private readonly options: SweeperOptions;
  private timer: NodeJS.Timeout | undefined;
  private inProgress: Promise<SweepReport | undefined> | undefined;

  constructor(deps: { store: JobStore; log: Logger; metrics?: JobMetrics }, options: SweeperOptions) {
    this.store = deps.store;
    this.log = deps.log;
    this.metrics = deps.metrics;
    this.options = options;
  }

  get running(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.runOnce();
    }, this.options.intervalMs);
    this.timer.unref();
    this.log.info('sweeper_started', { intervalMs: this.options.intervalMs, retentionMs: this.options.retentionMs });
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
      this.log.info('sweeper_stopped');
    }
    await this.inProgress;
  }

  /**
   * One sweep; overlapping calls share the run already in progress.
   * Resolves to undefined when the sweep itself failed.
   */
  runOnce(now?: number): Promise<SweepReport | undefined> {
    if (this.inProgress) return this.inProgress;
    const run = this.store
      .sweep(this.options.retentionMs, now)
      .then((report) => {
        this.metrics?.swept(report.removed, report.fileErrors);
        return report;
      })
      .catch((err: unknown) => {
        this.log.error('sweep_failed', { error: errorMessage(err) });
        return undefined;
      })
      .finally(() => {
        this.inProgress = undefined;
      });
    this.inProgress = run;
    return run;
  }
}
