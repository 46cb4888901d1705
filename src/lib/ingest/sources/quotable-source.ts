import { z } from 'zod';
import { SourceFetchError } from '../errors';
import { cleanScrapedText } from '../text';
import type { FetchContext, QuotationCandidate, SourceAdapter } from '../types';
import type { HttpClient } from './http-client';

const pageSchema = z.object({
  results: z
    .array(
      z.object({
        content: z.string(),
        author: z.string().nullable().optional(),
      }),
    )
    .default([]),
  totalPages: z.number().optional(),
});

interface QuotableApiSourceOptions {
  http: HttpClient;
  baseUrl?: string;
  pageSize?: number;
  pageDelayMs?: number;
}

const DEFAULT_BASE_URL = 'https://api.quotable.io/quotes';
const DEFAULT_PAGE_SIZE = 100;

export class QuotableApiSource implements SourceAdapter {
  readonly id = 'quotable';

  readonly language = 'en' as const;

  readonly trust = 'scraped' as const;

  private readonly http: HttpClient;

  private readonly baseUrl: string;

  private readonly pageSize: number;

  private readonly pageDelayMs: number;

  constructor(options: QuotableApiSourceOptions) {
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.pageDelayMs = options.pageDelayMs ?? 500;
  }

  async *produce(limit: number, context: FetchContext): AsyncGenerator<QuotationCandidate> {
    let produced = 0;
    let page = 1;

    while (produced < limit) {
      const url = new URL(this.baseUrl);
      url.searchParams.set('page', String(page));
      url.searchParams.set('limit', String(this.pageSize));

      const payload = pageSchema.safeParse(await this.http.getJson(url, context));
      if (!payload.success) {
        throw new SourceFetchError('Unexpected Quotable response', {
          details: { url: url.toString() },
        });
      }

      const { results, totalPages } = payload.data;
      for (const quote of results) {
        if (produced >= limit) {
          return;
        }
        produced += 1;
        yield {
          text: cleanScrapedText(quote.content),
          language: this.language,
          author: quote.author ?? null,
          sourceUrl: url.origin,
        };
      }

      const lastPage = totalPages !== undefined ? page >= totalPages : results.length < this.pageSize;
      if (results.length === 0 || lastPage) {
        return;
      }
      page += 1;
      await this.http.sleep(this.pageDelayMs);
    }
  }
}
