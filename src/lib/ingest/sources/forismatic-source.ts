import { z } from 'zod';
import { SourceFetchError } from '../errors';
import type { LanguageCode } from '../languages';
import { errorOnlyLogger, warn } from '../logger';
import { cleanScrapedText } from '../text';
import type { FetchContext, IngestLogger, QuotationCandidate, SourceAdapter } from '../types';
import type { HttpClient } from './http-client';

const quoteSchema = z.object({
  quoteText: z.string(),
  quoteAuthor: z.string().optional(),
  quoteLink: z.string().optional(),
});

interface ForismaticApiSourceOptions {
  http: HttpClient;
  language: LanguageCode;
  baseUrl?: string;
  requestDelayMs?: number;
  maxConsecutiveFailures?: number;
  maxRequests?: number;
  logger?: IngestLogger;
}

/**
 * Forismatic hands out one random quote per request, seeded by `key`, so the
 * adapter walks keys until the limit is met. Individual failed keys are
 * skipped; a streak of them ends the stream.
 */
export class ForismaticApiSource implements SourceAdapter {
  readonly id: string;

  readonly language: LanguageCode;

  readonly trust = 'scraped' as const;

  private readonly http: HttpClient;

  private readonly baseUrl: string;

  private readonly requestDelayMs: number;

  private readonly maxConsecutiveFailures: number;

  private readonly maxRequests: number;

  private readonly logger: IngestLogger;

  constructor(options: ForismaticApiSourceOptions) {
    this.http = options.http;
    this.language = options.language;
    this.id = `forismatic-${options.language}`;
    this.baseUrl = options.baseUrl ?? 'http://api.forismatic.com/api/1.0/';
    this.requestDelayMs = options.requestDelayMs ?? 300;
    this.maxConsecutiveFailures = Math.max(1, options.maxConsecutiveFailures ?? 3);
    this.maxRequests = options.maxRequests ?? 500;
    this.logger = options.logger ?? errorOnlyLogger;
  }

  async *produce(limit: number, context: FetchContext): AsyncGenerator<QuotationCandidate> {
    let failures = 0;
    const requests = Math.min(limit, this.maxRequests);

    for (let key = 1; key <= requests; key += 1) {
      const url = new URL(this.baseUrl);
      url.search = new URLSearchParams({
        method: 'getQuote',
        format: 'json',
        lang: this.language,
        key: String(key),
      }).toString();

      let quote: z.infer<typeof quoteSchema> | null = null;
      try {
        const parsed = quoteSchema.safeParse(await this.http.getJson(url, context));
        if (!parsed.success) {
          throw new SourceFetchError('Unexpected Forismatic response', {
            details: { url: url.toString() },
          });
        }
        quote = parsed.data;
        failures = 0;
      } catch (error) {
        failures += 1;
        if (!(error instanceof SourceFetchError) || failures >= this.maxConsecutiveFailures) {
          throw error;
        }
        warn(this.logger, 'ingest.source.skip', {
          source: this.id,
          key,
          error: error.message,
        });
      }

      if (quote) {
        const author = quote.quoteAuthor?.trim();
        yield {
          text: cleanScrapedText(quote.quoteText),
          language: this.language,
          author: author ? author : null,
          sourceUrl: quote.quoteLink || url.origin,
        };
      }

      if (key < requests) {
        await this.http.sleep(this.requestDelayMs);
      }
    }
  }
}
