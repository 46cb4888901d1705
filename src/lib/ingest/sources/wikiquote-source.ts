import * as cheerio from 'cheerio';
import { IngestError, SourceFetchError } from '../errors';
import type { LanguageCode } from '../languages';
import { errorOnlyLogger, warn } from '../logger';
import { cleanScrapedText } from '../text';
import type { FetchContext, IngestLogger, QuotationCandidate, SourceAdapter } from '../types';
import type { HttpClient } from './http-client';

/** A page title, or a page of anonymous sayings whose title is not an author. */
export type WikiquotePage = string | { title: string; authorless: true };

export const DEFAULT_WIKIQUOTE_PAGES: Record<LanguageCode, WikiquotePage[]> = {
  en: [
    'Mark Twain',
    'Oscar Wilde',
    'Confucius',
    'Benjamin Franklin',
    'Ralph Waldo Emerson',
    'Voltaire',
    'Seneca the Younger',
    'Laozi',
  ],
  ru: [
    'Лев Николаевич Толстой',
    'Антон Павлович Чехов',
    'Фёдор Михайлович Достоевский',
    'Александр Сергеевич Пушкин',
    'Козьма Прутков',
    { title: 'Русские пословицы', authorless: true },
  ],
};

const NAVIGATION_PATTERN = /^(edit|править|ссылки|links|see also|категории|categories|источники|sources)/i;

interface WikiquoteSourceOptions {
  http: HttpClient;
  language: LanguageCode;
  pages?: WikiquotePage[];
  pageDelayMs?: number;
  logger?: IngestLogger;
}

export class WikiquoteSource implements SourceAdapter {
  readonly id: string;

  readonly language: LanguageCode;

  readonly trust = 'scraped' as const;

  private readonly http: HttpClient;

  private readonly pages: Array<{ title: string; author: string | null }>;

  private readonly pageDelayMs: number;

  private readonly logger: IngestLogger;

  constructor(options: WikiquoteSourceOptions) {
    this.http = options.http;
    this.language = options.language;
    this.id = `wikiquote-${options.language}`;
    this.pages = (options.pages ?? DEFAULT_WIKIQUOTE_PAGES[options.language]).map((page) =>
      typeof page === 'string' ? { title: page, author: page } : { title: page.title, author: null },
    );
    this.pageDelayMs = options.pageDelayMs ?? 1_000;
    this.logger = options.logger ?? errorOnlyLogger;
  }

  async *produce(limit: number, context: FetchContext): AsyncGenerator<QuotationCandidate> {
    let produced = 0;
    let failedPages = 0;
    let lastError: unknown = null;

    for (const [index, { title, author }] of this.pages.entries()) {
      if (produced >= limit) {
        return;
      }
      if (index > 0) {
        await this.http.sleep(this.pageDelayMs);
      }

      const pageUrl = this.pageUrl(title);
      let html: string;
      try {
        html = await this.http.getText(pageUrl, context);
      } catch (error) {
        failedPages += 1;
        lastError = error;
        warn(this.logger, 'ingest.source.skip', {
          source: this.id,
          url: pageUrl,
          status: error instanceof IngestError ? error.details.status : undefined,
          error: error instanceof Error ? error.message : String(error),
        });
        continue;
      }

      for (const text of extractQuotes(html)) {
        if (produced >= limit) {
          return;
        }
        produced += 1;
        yield {
          text,
          language: this.language,
          author,
          sourceUrl: pageUrl,
        };
      }
    }

    if (this.pages.length > 0 && failedPages === this.pages.length) {
      throw new SourceFetchError(`Every ${this.id} page failed`, {
        cause: lastError,
        details: { pages: this.pages.length },
      });
    }
  }

  private pageUrl(title: string): string {
    return `https://${this.language}.wikiquote.org/wiki/${encodeURIComponent(title.replace(/ /g, '_'))}`;
  }
}

/**
 * Top-level list items of the article body; nested lists under an item hold
 * its attribution and are dropped.
 */
export function extractQuotes(html: string): string[] {
  const $ = cheerio.load(html);
  let content = $('div.mw-parser-output').first();
  if (content.length === 0) {
    content = $('#mw-content-text').first();
  }
  if (content.length === 0) {
    return [];
  }

  const quotes: string[] = [];
  content.find('ul > li').each((_index, element) => {
    const item = $(element);
    if (item.parents('li').length > 0 || item.closest('nav, .navbox, .toc, .mw-references-wrap').length > 0) {
      return;
    }
    const copy = item.clone();
    copy.find('ul, ol, sup.reference').remove();
    const text = cleanScrapedText(copy.text().replace(/\((citation needed|disputed)\)/gi, ' '));
    if (!text || NAVIGATION_PATTERN.test(text)) {
      return;
    }
    quotes.push(text);
  });
  return quotes;
}
