import crypto from 'node:crypto';
import type { AppEnv } from '../env';
import { Deduplicator } from './deduplicator';
import { errorMeta, StoreUnavailableError } from './errors';
import { counterpartOf, type LanguageCode } from './languages';
import { describeError, jsonLogger, warn } from './logger';
import type {
  FetchContext,
  IngestLogger,
  IngestResult,
  IngestRunStatus,
  IngestStats,
  NewQuotationRecord,
  QuotationCandidate,
  QuotationSink,
  SourceAdapter,
  Translator,
} from './types';
import { QuotationValidator } from './validator';

const PROGRESS_INTERVAL = 50;
const AUTHOR_MAX_LENGTH = 255;
const SOURCE_URL_MAX_LENGTH = 500;

type LoaderEnv = Pick<
  AppEnv,
  | 'INGEST_TIMEOUT_MS'
  | 'INGEST_RETRY_LIMIT'
  | 'INGEST_RUN_TIMEOUT_MS'
  | 'INGEST_MAX_CONSECUTIVE_STORE_ERRORS'
  | 'INGEST_DENYLIST'
>;

interface Dependencies {
  sources: SourceAdapter[];
  translator: Translator;
  sink: QuotationSink;
  env: LoaderEnv;
  validator?: QuotationValidator;
  logger?: IngestLogger;
  createRunId?: () => string;
}

export interface RunOptions {
  targetCount: number;
  signal?: AbortSignal;
}

type CandidateOutcome = 'continue' | 'target-reached';

export function createEmptyStats(): IngestStats {
  return {
    fetched: 0,
    rejected: 0,
    rejectedByReason: {
      language: 0,
      length: 0,
      digits: 0,
      characters: 0,
      repetition: 0,
      script: 0,
      source: 0,
    },
    duplicates: 0,
    duplicatesByOrigin: { run: 0, store: 0 },
    translationFailed: 0,
    persisted: 0,
    errors: 0,
    sourceFailures: 0,
  };
}

/**
 * Drives the sources toward `targetCount` persisted rows, sending every
 * candidate through validate → deduplicate → translate → persist.
 */
export class QuotationLoader {
  private readonly sources: SourceAdapter[];

  private readonly translator: Translator;

  private readonly sink: QuotationSink;

  private readonly env: LoaderEnv;

  private readonly validator: QuotationValidator;

  private readonly logger: IngestLogger;

  private readonly createRunId: () => string;

  constructor(deps: Dependencies) {
    this.sources = orderByTrust(deps.sources);
    this.translator = deps.translator;
    this.sink = deps.sink;
    this.env = deps.env;
    this.validator = deps.validator ?? new QuotationValidator({ denylist: deps.env.INGEST_DENYLIST });
    this.logger = deps.logger ?? jsonLogger;
    this.createRunId = deps.createRunId ?? (() => crypto.randomUUID());
  }

  async run(options: RunOptions): Promise<IngestResult> {
    const runId = this.createRunId();
    const stats = createEmptyStats();
    const deduplicator = new Deduplicator();
    const { signal, dispose } = this.withRunTimeout(options.signal);
    const state = { consecutiveStoreFailures: 0 };

    this.logger.info('ingest.run.start', {
      runId,
      targetCount: options.targetCount,
      sources: this.sources.map((source) => source.id),
    });

    let status: IngestRunStatus = 'exhausted';
    try {
      if (options.targetCount <= 0) {
        status = 'target-reached';
      }

      for (const source of this.sources) {
        if (status !== 'exhausted') {
          break;
        }
        if (signal.aborted) {
          status = 'cancelled';
          break;
        }
        status = await this.drainSource(source, options.targetCount, {
          runId,
          stats,
          deduplicator,
          signal,
          state,
        });
      }
    } finally {
      dispose();
    }

    this.logger.info('ingest.run.complete', {
      runId,
      status,
      ...stats,
    });

    return { runId, status, stats };
  }

  private async drainSource(
    source: SourceAdapter,
    targetCount: number,
    run: RunState,
  ): Promise<IngestRunStatus> {
    const context: FetchContext = {
      timeoutMs: this.env.INGEST_TIMEOUT_MS,
      retryLimit: this.env.INGEST_RETRY_LIMIT,
      signal: run.signal,
    };
    const persistedBefore = run.stats.persisted;
    const fetchedBefore = run.stats.fetched;

    try {
      for await (const candidate of source.produce(Number.MAX_SAFE_INTEGER, context)) {
        if (run.signal.aborted) {
          return 'cancelled';
        }
        const outcome = await this.processCandidate(candidate, source, targetCount, run);
        if (outcome === 'target-reached') {
          return 'target-reached';
        }
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      if (run.signal.aborted) {
        this.logger.info('ingest.source.cancelled', { runId: run.runId, source: source.id });
        return 'cancelled';
      }
      run.stats.sourceFailures += 1;
      this.logError('ingest.source.failed', 'SOURCE_FAILED', error, {
        runId: run.runId,
        source: source.id,
      });
    } finally {
      this.logger.info('ingest.source.done', {
        runId: run.runId,
        source: source.id,
        fetched: run.stats.fetched - fetchedBefore,
        persisted: run.stats.persisted - persistedBefore,
      });
    }

    return run.signal.aborted ? 'cancelled' : 'exhausted';
  }

  private async processCandidate(
    candidate: QuotationCandidate,
    source: SourceAdapter,
    targetCount: number,
    run: RunState,
  ): Promise<CandidateOutcome> {
    const { stats } = run;
    stats.fetched += 1;

    const validation = this.validator.validate(candidate, source.trust);
    if (!validation.valid) {
      stats.rejected += 1;
      stats.rejectedByReason[validation.reason] += 1;
      return 'continue';
    }

    const { text, language, author } = validation;
    const key = Deduplicator.keyOf(text, language);
    if (!run.deduplicator.isNew(key)) {
      stats.duplicates += 1;
      stats.duplicatesByOrigin.run += 1;
      return 'continue';
    }
    run.deduplicator.remember(key);

    if (await this.isStored(text, language, run.runId)) {
      stats.duplicates += 1;
      stats.duplicatesByOrigin.store += 1;
      return 'continue';
    }

    const target = counterpartOf(language);
    const translation = await this.translator.translate(text, language, target);
    if (translation.status === 'failed') {
      stats.translationFailed += 1;
      warn(this.logger, 'ingest.translate.skipped', {
        runId: run.runId,
        source: source.id,
        reason: translation.reason,
      });
    }

    const record: NewQuotationRecord = {
      textOriginal: text,
      languageOriginal: language,
      textTranslated: translation.status === 'translated' ? translation.text : null,
      languageTranslated: translation.status === 'translated' ? translation.language : null,
      author: truncate(author, AUTHOR_MAX_LENGTH),
      sourceUrl: truncate(candidate.sourceUrl, SOURCE_URL_MAX_LENGTH),
      isValidated: true,
    };

    const outcome = await this.sink.save(record);
    switch (outcome.status) {
      case 'inserted':
        run.state.consecutiveStoreFailures = 0;
        stats.persisted += 1;
        if (stats.persisted % PROGRESS_INTERVAL === 0) {
          this.logger.info('ingest.run.progress', {
            runId: run.runId,
            persisted: stats.persisted,
            targetCount,
          });
        }
        return stats.persisted >= targetCount ? 'target-reached' : 'continue';
      case 'duplicate':
        run.state.consecutiveStoreFailures = 0;
        stats.duplicates += 1;
        stats.duplicatesByOrigin.store += 1;
        return 'continue';
      case 'error':
        stats.errors += 1;
        this.logError('ingest.persist.failed', 'PERSISTENCE_FAILED', outcome.error, {
          runId: run.runId,
          source: source.id,
          fatal: outcome.fatal,
        });
        run.state.consecutiveStoreFailures = outcome.fatal
          ? run.state.consecutiveStoreFailures + 1
          : 0;
        if (run.state.consecutiveStoreFailures >= this.env.INGEST_MAX_CONSECUTIVE_STORE_ERRORS) {
          throw new StoreUnavailableError('Quotation store is unreachable', { ...stats }, {
            cause: outcome.error,
            details: { runId: run.runId, consecutiveFailures: run.state.consecutiveStoreFailures },
          });
        }
        return 'continue';
    }
  }

  private async isStored(text: string, language: LanguageCode, runId: string): Promise<boolean> {
    try {
      return await this.sink.exists(text, language);
    } catch (error) {
      // The insert's conflict handling still guards uniqueness.
      warn(this.logger, 'ingest.dedupe.lookup-failed', {
        runId,
        ...describeError(error),
      });
      return false;
    }
  }

  private withRunTimeout(external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (external?.aborted) {
      controller.abort();
    }
    external?.addEventListener('abort', onAbort, { once: true });

    const timeoutMs = this.env.INGEST_RUN_TIMEOUT_MS;
    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            this.logger.info('ingest.run.timeout', { timeoutMs });
            controller.abort();
          }, timeoutMs).unref?.()
        : null;

    return {
      signal: controller.signal,
      dispose: () => {
        external?.removeEventListener('abort', onAbort);
        if (timer) {
          clearTimeout(timer);
        }
      },
    };
  }

  private logError(
    message: string,
    fallbackCode: string,
    error: unknown,
    extra: Record<string, unknown> = {},
  ): void {
    this.logger.error(message, { ...errorMeta(error, fallbackCode), ...extra });
  }
}

interface RunState {
  runId: string;
  stats: IngestStats;
  deduplicator: Deduplicator;
  signal: AbortSignal;
  state: { consecutiveStoreFailures: number };
}

function orderByTrust(sources: SourceAdapter[]): SourceAdapter[] {
  return [
    ...sources.filter((source) => source.trust === 'curated'),
    ...sources.filter((source) => source.trust !== 'curated'),
  ];
}

function truncate(value: string | null, maxLength: number): string | null {
  if (value === null) {
    return null;
  }
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}
