import client from 'prom-client';

export type JobOutcome = 'done' | 'failed';
export type WaitOutcomeKind = 'done' | 'failed' | 'timeout' | 'aborted';

export type QueueGaugeSources = {
  queueSize: () => number;
  queueCapacity: () => number;
  inFlight: () => number;
  storedJobs: () => number;
};

/**
 * Job metrics on a dedicated prom-client registry, so several services
 * (tests) never collide on metric names.
 */
export function createJobMetrics(registry: client.Registry = new client.Registry()) {
  const jobsTotal = new client.Counter({
    name: 'convert_jobs_total',
    help: 'Conversion jobs finished, by outcome',
    labelNames: ['outcome'] as const,
    registers: [registry],
  });

  const jobDuration = new client.Histogram({
    name: 'convert_job_duration_seconds',
    help: 'Time from processing start to terminal status',
    labelNames: ['outcome'] as const,
    buckets: [0.1, 0.5, 1, 2.5, 5, 10, 30, 60],
    registers: [registry],
  });

  const queueRejections = new client.Counter({
    name: 'convert_queue_rejections_total',
    help: 'Submissions refused because the work queue was full',
    registers: [registry],
  });

  const waitOutcomes = new client.Counter({
    name: 'convert_wait_outcomes_total',
    help: 'How synchronous convert requests ended',
    labelNames: ['outcome'] as const,
    registers: [registry],
  });

  const jobsSwept = new client.Counter({
    name: 'convert_jobs_swept_total',
    help: 'Job records removed by the retention sweeper',
    registers: [registry],
  });

  const sweepFileErrors = new client.Counter({
    name: 'convert_sweep_file_errors_total',
    help: 'Output files the sweeper failed to delete',
    registers: [registry],
  });

  return {
    registry,
    observeJob(outcome: JobOutcome, seconds: number) {
      jobsTotal.inc({ outcome });
      if (Number.isFinite(seconds) && seconds >= 0) jobDuration.observe({ outcome }, seconds);
    },
    queueRejected() {
      queueRejections.inc();
    },
    waitEnded(outcome: WaitOutcomeKind) {
      waitOutcomes.inc({ outcome });
    },
    swept(removed: number, fileErrors: number) {
      if (removed > 0) jobsSwept.inc(removed);
      if (fileErrors > 0) sweepFileErrors.inc(fileErrors);
    },
    bindQueueGauges(sources: QueueGaugeSources) {
      const gauge = (name: string, help: string, read: () => number) =>
        new client.Gauge({
          name,
          help,
          registers: [registry],
          collect() {
            this.set(read());
          },
        });
      gauge('convert_queue_depth', 'Jobs buffered in the work queue', sources.queueSize);
      gauge('convert_queue_capacity', 'Work queue capacity', sources.queueCapacity);
      gauge('convert_jobs_in_flight', 'Jobs currently converting', sources.inFlight);
      gauge('convert_jobs_stored', 'Job records held in memory', sources.storedJobs);
    },
  };
}

export type JobMetrics = ReturnType<typeof createJobMetrics>;
