import type { AppEnv } from '../../env';
import type { FetchFn, IngestLogger, SourceAdapter } from '../types';
import { CuratedListSource } from './curated-source';
import { ForismaticApiSource } from './forismatic-source';
import { HttpClient } from './http-client';
import { QuotableApiSource } from './quotable-source';
import { RssFeedSource } from './rss-source';
import { WikiquoteSource } from './wikiquote-source';
import { ZenQuotesApiSource } from './zenquotes-source';

export { CuratedListSource } from './curated-source';
export { ForismaticApiSource } from './forismatic-source';
export { HttpClient } from './http-client';
export { QuotableApiSource } from './quotable-source';
export { RssFeedSource } from './rss-source';
export { WikiquoteSource } from './wikiquote-source';
export { ZenQuotesApiSource } from './zenquotes-source';

export const DEFAULT_RSS_FEEDS = ['https://www.brainyquote.com/link/quotefu.rss'];

interface CreateSourcesOptions {
  fetch?: FetchFn;
  logger?: IngestLogger;
  rssFeeds?: string[];
}

/**
 * The default registry, in priority order. `INGEST_SOURCES` narrows it to
 * the listed ids; `rss` selects every feed.
 */
export function createDefaultSources(env: AppEnv, options: CreateSourcesOptions = {}): SourceAdapter[] {
  const http = new HttpClient({
    fetch: options.fetch,
    logger: options.logger,
    userAgent: env.HTTP_USER_AGENT,
    retryBaseDelayMs: env.INGEST_RETRY_BASE_DELAY_MS,
  });
  const pageDelayMs = env.INGEST_PAGE_DELAY_MS;

  const sources: SourceAdapter[] = [
    new CuratedListSource({ language: 'en', filePath: env.CURATED_QUOTES_PATH }),
    new CuratedListSource({ language: 'ru', filePath: env.CURATED_QUOTES_PATH }),
    new QuotableApiSource({ http, pageDelayMs }),
    new ZenQuotesApiSource({ http }),
    new ForismaticApiSource({ http, language: 'en', logger: options.logger }),
    new ForismaticApiSource({ http, language: 'ru', logger: options.logger }),
    new WikiquoteSource({ http, language: 'en', pageDelayMs, logger: options.logger }),
    new WikiquoteSource({ http, language: 'ru', pageDelayMs, logger: options.logger }),
    ...(options.rssFeeds ?? DEFAULT_RSS_FEEDS).map(
      (feedUrl) => new RssFeedSource({ http, feedUrl, language: 'en' }),
    ),
  ];

  if (env.INGEST_SOURCES.length === 0) {
    return sources;
  }
  return sources.filter((source) =>
    env.INGEST_SOURCES.some((id) => source.id === id || (id === 'rss' && source.id.startsWith('rss-'))),
  );
}
