import { getEnv, type AppEnv } from '../src/lib/env';
import { errorMeta } from '../src/lib/ingest/errors';
import { QuotationLoader } from '../src/lib/ingest/loader';
import { jsonLogger } from '../src/lib/ingest/logger';
import { IngestScheduler, type IngestSchedulerOptions } from '../src/lib/ingest/scheduler';
import { createDefaultSources } from '../src/lib/ingest/sources';
import { createTranslator } from '../src/lib/ingest/translator';
import type { FetchFn, IngestLogger, IngestResult } from '../src/lib/ingest/types';
import { closePool, getPool } from '../src/lib/persistence/db';
import { QuotationStore, type Queryable, type QuotationStatistics } from '../src/lib/persistence/service';

export interface IngestApplication {
  env: AppEnv;
  runOnce(options?: { targetCount?: number; signal?: AbortSignal }): Promise<IngestResult>;
  getStatistics(): Promise<QuotationStatistics>;
  printStatistics(): Promise<void>;
  startScheduler(): void;
  stopScheduler(): void;
  /** Cancels a scheduled run in progress, waits for it, then releases the pool. */
  close(): Promise<IngestResult | null>;
}

interface CreateIngestApplicationOptions {
  env?: AppEnv;
  db?: Queryable;
  logger?: IngestLogger;
  fetchImpl?: FetchFn;
  scheduleFn?: IngestSchedulerOptions['scheduleFn'];
}

export interface CliArguments {
  targetCount?: number;
  statsOnly: boolean;
}

export function parseArgs(argv: string[]): CliArguments {
  const args: CliArguments = { statsOnly: false };
  for (const arg of argv) {
    if (arg === '--stats') {
      args.statsOnly = true;
      continue;
    }
    const target = /^--target=(\d+)$/.exec(arg);
    if (target) {
      args.targetCount = Number(target[1]);
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }
  return args;
}

export function createIngestApplication(options: CreateIngestApplicationOptions = {}): IngestApplication {
  const env = options.env ?? getEnv();
  const logger = options.logger ?? jsonLogger;
  const store = new QuotationStore(options.db ?? getPool(env, logger));
  let schemaReady: Promise<void> | null = null;
  const ensureSchema = () => {
    schemaReady ??= store.ensureSchema();
    return schemaReady;
  };

  const loader = new QuotationLoader({
    sources: createDefaultSources(env, { fetch: options.fetchImpl, logger }),
    translator: createTranslator(env, { fetch: options.fetchImpl, logger }),
    sink: store,
    env,
    logger,
  });

  const runOnce = async (runOptions: { targetCount?: number; signal?: AbortSignal } = {}) => {
    await ensureSchema();
    return loader.run({
      targetCount: runOptions.targetCount ?? env.INGEST_TARGET_COUNT,
      signal: runOptions.signal,
    });
  };

  const scheduler = new IngestScheduler({
    enableInternalCron: env.ENABLE_INTERNAL_CRON,
    cronExpression: env.INGEST_CRON,
    jobRunner: (signal) => runOnce({ signal }),
    scheduleFn: options.scheduleFn,
    logger,
  });

  const getStatistics = async () => {
    await ensureSchema();
    return store.getStatistics();
  };

  return {
    env,
    runOnce,
    getStatistics,
    async printStatistics() {
      logger.info('ingest.statistics', { ...(await getStatistics()) });
    },
    startScheduler() {
      scheduler.start();
    },
    stopScheduler() {
      scheduler.stop();
    },
    async close() {
      const interrupted = await scheduler.shutdown();
      if (!options.db) {
        await closePool();
      }
      return interrupted;
    },
  };
}

export async function main(argv: string[] = process.argv.slice(2)) {
  const args = parseArgs(argv);
  const app = createIngestApplication();

  if (args.statsOnly) {
    try {
      await app.printStatistics();
    } finally {
      await app.close();
    }
    return;
  }

  if (app.env.ENABLE_INTERNAL_CRON) {
    console.log(
      JSON.stringify({
        level: 'info',
        message: 'ingest.scheduler.start',
        meta: { cron: app.env.INGEST_CRON },
      }),
    );
    app.startScheduler();

    let stopping = false;
    const shutdown = () => {
      if (stopping) {
        return;
      }
      stopping = true;
      console.log(JSON.stringify({ level: 'info', message: 'ingest.scheduler.stop' }));
      void app.close().then(
        (interrupted) => process.exit(interrupted?.status === 'cancelled' ? 130 : 0),
        (error: unknown) => {
          console.error(
            JSON.stringify({
              level: 'error',
              message: 'ingest.scheduler.stop-failed',
              meta: errorMeta(error, 'SHUTDOWN_FAILED'),
            }),
          );
          process.exit(1);
        },
      );
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
    return;
  }

  const controller = new AbortController();
  const cancel = () => controller.abort();
  process.once('SIGINT', cancel);
  process.once('SIGTERM', cancel);

  try {
    const result = await app.runOnce({ targetCount: args.targetCount, signal: controller.signal });
    if (result.status === 'cancelled') {
      process.exitCode = 130;
    }
  } finally {
    process.off('SIGINT', cancel);
    process.off('SIGTERM', cancel);
    await app.close();
  }
}
