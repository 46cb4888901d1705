import { z } from 'zod';
import type { AppEnv } from '../env';
import { raceAbort } from './abort';
import { TranslationError } from './errors';
import type { LanguageCode } from './languages';
import { describeError, errorOnlyLogger } from './logger';
import { MinIntervalGate } from './rate-limiter';
import type { FetchFn, IngestLogger, TranslationOutcome, Translator } from './types';

interface GoogleTranslatorOptions {
  endpoint?: string;
  fetch?: FetchFn;
  logger?: IngestLogger;
  gate?: MinIntervalGate;
  minIntervalMs?: number;
  maxRetries?: number;
  requestTimeoutMs?: number;
  userAgent?: string;
}

// translate_a/single answers with nested arrays; only the first element,
// a list of [translated, original, ...] segments, is used.
const segmentsSchema = z.array(z.array(z.unknown())).min(1);
const responseSchema = z.array(z.unknown()).min(1);

const DEFAULT_ENDPOINT = 'https://translate.googleapis.com/translate_a/single';
const DEFAULT_MAX_RETRIES = 1;
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MIN_INTERVAL_MS = 500;

export class GoogleTranslator implements Translator {
  private readonly endpoint: string;

  private readonly fetchImpl: FetchFn;

  private readonly logger: IngestLogger;

  private readonly gate: MinIntervalGate;

  private readonly maxRetries: number;

  private readonly requestTimeoutMs: number;

  private readonly userAgent: string;

  constructor(options: GoogleTranslatorOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
    this.fetchImpl = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? errorOnlyLogger;
    this.gate =
      options.gate ??
      new MinIntervalGate({ intervalMs: options.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS });
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? 'quotation-ingest/1.0';
  }

  async translate(
    text: string,
    source: LanguageCode,
    target: LanguageCode,
  ): Promise<TranslationOutcome> {
    if (source === target) {
      return { status: 'failed', reason: 'same_language' };
    }

    let attempt = 0;
    let lastReason = 'unknown';

    while (attempt <= this.maxRetries) {
      try {
        await this.gate.wait();
        const translated = await this.sendRequest(text, source, target);
        return { status: 'translated', text: translated, language: target };
      } catch (error) {
        lastReason = error instanceof TranslationError ? error.message : describeError(error).error;
        this.logger.error('ingest.translate.error', {
          code: error instanceof TranslationError ? error.code : 'TRANSLATION_REQUEST_ERROR',
          attempt,
          source,
          target,
          ...describeError(error),
        });
      }
      attempt += 1;
    }

    this.logger.error('ingest.translate.max-retries', {
      code: 'TRANSLATION_MAX_RETRIES',
      attempts: attempt,
      source,
      target,
    });
    return { status: 'failed', reason: lastReason };
  }

  private buildRequestUrl(text: string, source: LanguageCode, target: LanguageCode): URL {
    const url = new URL(this.endpoint);
    url.search = new URLSearchParams({
      client: 'gtx',
      sl: source,
      tl: target,
      dt: 't',
      q: text,
    }).toString();
    return url;
  }

  private async sendRequest(
    text: string,
    source: LanguageCode,
    target: LanguageCode,
  ): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.requestTimeoutMs).unref?.();
    const timeoutError = () =>
      new TranslationError(`Translation request timed out after ${this.requestTimeoutMs} ms`, {
        details: { timeoutMs: this.requestTimeoutMs },
      });

    try {
      const response = await raceAbort(
        this.fetchImpl(this.buildRequestUrl(text, source, target).toString(), {
          signal: controller.signal,
          headers: {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
          },
        }),
        controller.signal,
        timeoutError,
      );

      if (!response.ok) {
        throw new TranslationError(`Translation request failed (status ${response.status})`, {
          details: { status: response.status },
        });
      }

      const payload: unknown = await raceAbort(response.json(), controller.signal, timeoutError);
      const translated = this.extractText(payload);
      if (!translated) {
        throw new TranslationError('Translation response contained no text');
      }
      return translated;
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
    }
  }

  private extractText(payload: unknown): string | null {
    const parsed = responseSchema.safeParse(payload);
    if (!parsed.success) {
      return null;
    }
    const segments = segmentsSchema.safeParse(parsed.data[0]);
    if (!segments.success) {
      return null;
    }
    const joined = segments.data
      .map((segment) => (typeof segment[0] === 'string' ? segment[0] : ''))
      .join('')
      .trim();
    return joined.length > 0 ? joined : null;
  }
}

export class DisabledTranslator implements Translator {
  async translate(): Promise<TranslationOutcome> {
    return { status: 'failed', reason: 'disabled' };
  }
}

export function createTranslator(
  env: AppEnv,
  options: { fetch?: FetchFn; logger?: IngestLogger } = {},
): Translator {
  if (!env.TRANSLATE_ENABLED) {
    return new DisabledTranslator();
  }
  return new GoogleTranslator({
    endpoint: env.TRANSLATE_ENDPOINT,
    fetch: options.fetch,
    logger: options.logger,
    minIntervalMs: env.TRANSLATE_MIN_INTERVAL_MS,
    maxRetries: env.TRANSLATE_RETRY_LIMIT,
    requestTimeoutMs: env.TRANSLATE_TIMEOUT_MS,
    userAgent: env.HTTP_USER_AGENT,
  });
}
