import cron from 'node-cron';
import { describeError, jsonLogger } from './logger';
import type { IngestLogger, IngestResult } from './types';

export interface CronTask {
  start(): void;
  stop(): void;
}

type ScheduleFn = (
  expression: string,
  callback: () => void,
) => CronTask;

export interface IngestSchedulerOptions {
  enableInternalCron: boolean;
  cronExpression: string;
  jobRunner: (signal: AbortSignal) => Promise<IngestResult>;
  scheduleFn?: ScheduleFn;
  logger?: IngestLogger;
}

export class IngestScheduler {
  private readonly enableInternalCron: boolean;

  private readonly cronExpression: string;

  private readonly jobRunner: (signal: AbortSignal) => Promise<IngestResult>;

  private readonly scheduleFn: ScheduleFn;

  private readonly logger: IngestLogger;

  private task: CronTask | null = null;

  private current: { controller: AbortController; settled: Promise<IngestResult | null> } | null = null;

  constructor(options: IngestSchedulerOptions) {
    this.enableInternalCron = options.enableInternalCron;
    this.cronExpression = options.cronExpression;
    this.jobRunner = options.jobRunner;
    this.scheduleFn =
      options.scheduleFn ?? ((expression, callback) => cron.schedule(expression, callback, { scheduled: false }));
    this.logger = options.logger ?? jsonLogger;
  }

  start(): CronTask | null {
    if (!this.enableInternalCron) {
      return null;
    }
    if (this.task) {
      return this.task;
    }
    this.task = this.scheduleFn(this.cronExpression, () => {
      void this.handleTrigger({ rethrow: false });
    });
    this.task.start();
    return this.task;
  }

  stop(): void {
    if (!this.task) {
      return;
    }
    this.task.stop();
    this.task = null;
  }

  get isRunning(): boolean {
    return this.current !== null;
  }

  async runOnce(): Promise<IngestResult | null> {
    return this.handleTrigger({ rethrow: true });
  }

  /**
   * Stops the cron task, cancels the run in progress and waits for it to wind
   * down. Resolves with that run's result, or null when nothing was running.
   */
  async shutdown(): Promise<IngestResult | null> {
    this.stop();
    const current = this.current;
    if (!current) {
      return null;
    }
    current.controller.abort();
    return current.settled;
  }

  // Cron ticks log failures and wait for the next tick; direct runs rethrow.
  private async handleTrigger({ rethrow }: { rethrow: boolean }): Promise<IngestResult | null> {
    if (this.current) {
      this.logger.info('ingest.run.skipped', { reason: 'previous run still in progress' });
      return null;
    }
    const controller = new AbortController();
    const run = this.jobRunner(controller.signal);
    // Failures are reported below; shutdown only needs to know the run ended.
    const settled = run.catch(() => null);
    this.current = { controller, settled };
    try {
      return await run;
    } catch (error) {
      this.logger.error('ingest.run.failed', {
        code: 'INGEST_RUN_FAILED',
        ...describeError(error),
      });
      if (rethrow) {
        throw error;
      }
      return null;
    } finally {
      this.current = null;
    }
  }
}
