import { raceAbort } from '../abort';
import { IngestError, type IngestErrorOptions, SourceFetchError } from '../errors';
import { describeError, errorOnlyLogger, warn } from '../logger';
import { sleep as defaultSleep, type SleepFn } from '../rate-limiter';
import type { FetchContext, FetchFn, IngestLogger } from '../types';

export interface HttpClientOptions {
  fetch?: FetchFn;
  logger?: IngestLogger;
  userAgent?: string;
  retryBaseDelayMs?: number;
  sleep?: SleepFn;
}

export interface RequestOptions {
  accept?: string;
}

/**
 * Outbound GETs for source adapters: per-request timeout, retry with
 * exponential backoff, and a `SourceFetchError` once attempts run out.
 */
export class HttpClient {
  private readonly fetchImpl: FetchFn;

  private readonly logger: IngestLogger;

  private readonly userAgent: string;

  private readonly retryBaseDelayMs: number;

  readonly sleep: SleepFn;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? errorOnlyLogger;
    this.userAgent = options.userAgent ?? 'quotation-ingest/1.0';
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async getText(url: URL | string, context: FetchContext, options: RequestOptions = {}): Promise<string> {
    return this.executeWithRetry(url.toString(), context, options);
  }

  async getJson(url: URL | string, context: FetchContext): Promise<unknown> {
    const body = await this.executeWithRetry(url.toString(), context, {
      accept: 'application/json',
    });
    try {
      const payload: unknown = JSON.parse(body);
      return payload;
    } catch (error) {
      throw this.toSourceError(error, url.toString());
    }
  }

  private async executeWithRetry(
    url: string,
    context: FetchContext,
    options: RequestOptions,
  ): Promise<string> {
    let attempt = 0;
    let lastError: unknown;
    while (attempt <= context.retryLimit) {
      if (context.signal?.aborted) {
        break;
      }
      try {
        return await this.request(url, context, options);
      } catch (error) {
        lastError = error;
        attempt += 1;
        if (attempt > context.retryLimit || context.signal?.aborted) {
          break;
        }
        warn(this.logger, 'ingest.source.retry', {
          code: 'SOURCE_RETRY',
          url,
          attempt,
          retryLimit: context.retryLimit,
          error: describeError(error).error,
        });
        await this.sleep(this.retryBaseDelayMs * 2 ** (attempt - 1));
      }
    }
    throw this.toSourceError(lastError ?? new Error('request aborted'), url);
  }

  // The timer and the run's signal cover the body as well as the headers.
  private async request(url: string, context: FetchContext, options: RequestOptions): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = context.timeoutMs
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, context.timeoutMs).unref?.()
      : null;
    const onAbort = () => controller.abort();
    context.signal?.addEventListener('abort', onAbort, { once: true });
    const abortError = () =>
      timedOut
        ? new IngestError('SOURCE_TIMEOUT', `Request timed out after ${context.timeoutMs} ms`, {
            details: { url, timeoutMs: context.timeoutMs },
          })
        : new IngestError('SOURCE_ABORTED', 'request aborted', { details: { url } });

    try {
      const response = await raceAbort(
        this.fetchImpl(url, {
          signal: controller.signal,
          headers: {
            'User-Agent': this.userAgent,
            Accept: options.accept ?? 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          },
        }),
        controller.signal,
        abortError,
      );

      if (!response.ok) {
        throw new IngestError('SOURCE_HTTP_ERROR', `Request failed (status ${response.status})`, {
          details: { status: response.status, url },
        });
      }
      return await raceAbort(response.text(), controller.signal, abortError);
    } finally {
      context.signal?.removeEventListener('abort', onAbort);
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private toSourceError(error: unknown, url: string): SourceFetchError {
    if (error instanceof SourceFetchError) {
      return error;
    }
    const options: IngestErrorOptions = {
      details: {
        url,
        ...(error instanceof IngestError ? error.details : {}),
      },
    };
    if (error instanceof Error) {
      options.cause = error;
    }
    return new SourceFetchError(describeError(error).error, options);
  }
}
