import { describe, expect, it } from 'vitest';
import { SourceFetchError } from '../../errors';
import {
  collect,
  createRecordingLogger,
  createTestHttpClient,
  routeFetch,
  testContext,
  textResponse,
} from '../../__tests__/helpers';
import { extractQuotes, WikiquoteSource } from '../wikiquote-source';

const page = `<!DOCTYPE html>
<html>
  <body>
    <div id="mw-content-text">
      <div class="mw-parser-output">
        <div class="toc"><ul><li>Contents</li></ul></div>
        <h2>Quotes</h2>
        <ul>
          <li>The secret of getting ahead is getting started.<sup class="reference">[1]</sup>
            <ul><li>Attributed in a speech</li></ul>
          </li>
          <li>Kindness is the language which the deaf can hear and the blind can see. (citation needed)</li>
          <li>Edit this list</li>
        </ul>
        <div class="navbox"><ul><li>Other authors</li></ul></div>
      </div>
    </div>
  </body>
</html>`;

describe('extractQuotes', () => {
  it('keeps top-level list items and drops attribution and navigation', () => {
    expect(extractQuotes(page)).toEqual([
      'The secret of getting ahead is getting started.',
      'Kindness is the language which the deaf can hear and the blind can see.',
    ]);
  });

  it('returns nothing when the article body is missing', () => {
    expect(extractQuotes('<html><body><ul><li>Stray item</li></ul></body></html>')).toEqual([]);
  });
});

describe('WikiquoteSource', () => {
  it('attributes quotes to the page and skips failed pages', async () => {
    const logger = createRecordingLogger();
    const fetch = routeFetch({
      'https://en.wikiquote.org/wiki/Mark_Twain': () => textResponse(page),
    });
    const source = new WikiquoteSource({
      http: createTestHttpClient(fetch),
      language: 'en',
      pages: ['Missing Page', 'Mark Twain'],
      pageDelayMs: 0,
      logger,
    });

    const items = await collect(source.produce(10, testContext));

    expect(items).toEqual([
      {
        text: 'The secret of getting ahead is getting started.',
        language: 'en',
        author: 'Mark Twain',
        sourceUrl: 'https://en.wikiquote.org/wiki/Mark_Twain',
      },
      {
        text: 'Kindness is the language which the deaf can hear and the blind can see.',
        language: 'en',
        author: 'Mark Twain',
        sourceUrl: 'https://en.wikiquote.org/wiki/Mark_Twain',
      },
    ]);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'ingest.source.skip',
        meta: {
          source: 'wikiquote-en',
          url: 'https://en.wikiquote.org/wiki/Missing_Page',
          status: 404,
          error: 'Request failed (status 404)',
        },
      },
    ]);
  });

  it('leaves the author empty on pages of anonymous sayings', async () => {
    const fetch = routeFetch({
      'https://en.wikiquote.org/wiki/English_proverbs': () => textResponse(page),
    });
    const source = new WikiquoteSource({
      http: createTestHttpClient(fetch),
      language: 'en',
      pages: [{ title: 'English proverbs', authorless: true }],
      logger: createRecordingLogger(),
    });

    const items = await collect(source.produce(1, testContext));

    expect(items).toEqual([
      {
        text: 'The secret of getting ahead is getting started.',
        language: 'en',
        author: null,
        sourceUrl: 'https://en.wikiquote.org/wiki/English_proverbs',
      },
    ]);
  });

  it('encodes non-Latin page titles', async () => {
    const fetch = routeFetch({});
    const source = new WikiquoteSource({
      http: createTestHttpClient(fetch),
      language: 'ru',
      pages: ['Козьма Прутков'],
      logger: createRecordingLogger(),
    });

    await expect(collect(source.produce(10, testContext))).rejects.toBeInstanceOf(SourceFetchError);
    expect(String(fetch.mock.calls[0][0])).toBe(
      `https://ru.wikiquote.org/wiki/${encodeURIComponent('Козьма_Прутков')}`,
    );
  });

  it('fails when every page fails', async () => {
    const source = new WikiquoteSource({
      http: createTestHttpClient(routeFetch({})),
      language: 'en',
      pages: ['One', 'Two'],
      pageDelayMs: 0,
      logger: createRecordingLogger(),
    });

    await expect(collect(source.produce(10, testContext))).rejects.toMatchObject({
      code: 'SOURCE_FETCH_FAILED',
      message: 'Every wikiquote-en page failed',
    });
  });
});
