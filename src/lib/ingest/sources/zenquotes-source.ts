import { z } from 'zod';
import { SourceFetchError } from '../errors';
import { cleanScrapedText } from '../text';
import type { FetchContext, QuotationCandidate, SourceAdapter } from '../types';
import type { HttpClient } from './http-client';

const responseSchema = z.array(
  z.object({
    q: z.string(),
    a: z.string().optional(),
  }),
);

// ZenQuotes signs its rate-limit notice as the author of a fake quote.
const NOTICE_AUTHOR = 'zenquotes.io';

export class ZenQuotesApiSource implements SourceAdapter {
  readonly id = 'zenquotes';

  readonly language = 'en' as const;

  readonly trust = 'scraped' as const;

  private readonly http: HttpClient;

  private readonly url: string;

  constructor(options: { http: HttpClient; url?: string }) {
    this.http = options.http;
    this.url = options.url ?? 'https://zenquotes.io/api/quotes';
  }

  async *produce(limit: number, context: FetchContext): AsyncGenerator<QuotationCandidate> {
    const parsed = responseSchema.safeParse(await this.http.getJson(this.url, context));
    if (!parsed.success) {
      throw new SourceFetchError('Unexpected ZenQuotes response', { details: { url: this.url } });
    }

    const origin = new URL(this.url).origin;
    let produced = 0;
    for (const quote of parsed.data) {
      if (produced >= limit) {
        return;
      }
      if (quote.a === NOTICE_AUTHOR) {
        continue;
      }
      produced += 1;
      yield {
        text: cleanScrapedText(quote.q),
        language: this.language,
        author: quote.a ?? null,
        sourceUrl: origin,
      };
    }
  }
}
