import { XMLParser } from 'fast-xml-parser';
import { SourceFetchError } from '../errors';
import type { LanguageCode } from '../languages';
import { cleanScrapedText } from '../text';
import type { FetchContext, QuotationCandidate, SourceAdapter } from '../types';
import type { HttpClient } from './http-client';

interface RssFeedSourceOptions {
  http: HttpClient;
  feedUrl: string;
  language: LanguageCode;
  parser?: XMLParser;
}

interface RssItem {
  title?: unknown;
  link?: unknown;
  description?: unknown;
}

export class RssFeedSource implements SourceAdapter {
  readonly id: string;

  readonly language: LanguageCode;

  readonly trust = 'scraped' as const;

  private readonly http: HttpClient;

  private readonly feedUrl: string;

  private readonly parser: XMLParser;

  constructor(options: RssFeedSourceOptions) {
    this.http = options.http;
    this.feedUrl = options.feedUrl;
    this.language = options.language;
    this.id = `rss-${new URL(options.feedUrl).hostname}`;
    this.parser =
      options.parser ??
      new XMLParser({
        ignoreAttributes: false,
        trimValues: true,
      });
  }

  async *produce(limit: number, context: FetchContext): AsyncGenerator<QuotationCandidate> {
    const xml = await this.http.getText(this.feedUrl, context, {
      accept: 'application/rss+xml, application/xml;q=0.9, text/xml;q=0.8',
    });

    const seen = new Set<string>();
    let produced = 0;
    for (const item of this.parseFeed(xml)) {
      if (produced >= limit) {
        return;
      }
      const description = typeof item.description === 'string' ? item.description : '';
      const text = cleanScrapedText(description);
      if (!text || seen.has(text)) {
        continue;
      }
      seen.add(text);

      produced += 1;
      yield {
        text,
        language: this.language,
        author: typeof item.title === 'string' ? cleanScrapedText(item.title) : null,
        sourceUrl: typeof item.link === 'string' && item.link.length > 0 ? item.link : this.feedUrl,
      };
    }
  }

  private parseFeed(xml: string): RssItem[] {
    let parsed: unknown;
    try {
      parsed = this.parser.parse(xml);
    } catch (error) {
      throw new SourceFetchError('Feed is not valid XML', {
        cause: error,
        details: { url: this.feedUrl },
      });
    }
    const channel = readPath(parsed, ['rss', 'channel']);
    return ensureArray(readPath(channel, ['item'])).filter(isRecord);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPath(value: unknown, path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function ensureArray(value: unknown): unknown[] {
  if (value === undefined || value === null) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}
