import { describe, expect, it, vi } from 'vitest';
import { SourceFetchError } from '../../errors';
import {
  createRecordingLogger,
  hangingFetch,
  jsonResponse,
  stalledResponse,
  textResponse,
} from '../../__tests__/helpers';
import { HttpClient } from '../http-client';

function createClient(responses: Array<() => Response | Promise<Response>>) {
  let call = 0;
  const fetch = vi.fn(async (_input: string | URL, _init?: RequestInit) => {
    const next = responses[Math.min(call, responses.length - 1)];
    call += 1;
    return next();
  });
  const sleeps: number[] = [];
  const logger = createRecordingLogger();
  const client = new HttpClient({
    fetch,
    logger,
    userAgent: 'test-agent/1.0',
    retryBaseDelayMs: 100,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { client, fetch, sleeps, logger };
}

describe('HttpClient', () => {
  it('retries a failed request with backoff', async () => {
    const { client, fetch, sleeps, logger } = createClient([
      () => textResponse('busy', 503),
      () => textResponse('<rss/>'),
    ]);

    await expect(client.getText('https://feeds.example/rss', { timeoutMs: 1_000, retryLimit: 1 })).resolves.toBe(
      '<rss/>',
    );
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([100]);
    expect(logger.messages()).toEqual(['ingest.source.retry']);
    expect(fetch.mock.calls[0][1]).toMatchObject({ headers: { 'User-Agent': 'test-agent/1.0' } });
  });

  it('throws a SourceFetchError once attempts run out', async () => {
    const { client, fetch, sleeps } = createClient([() => textResponse('gone', 404)]);

    const failure = client.getText('https://feeds.example/rss', { timeoutMs: 1_000, retryLimit: 2 });

    await expect(failure).rejects.toBeInstanceOf(SourceFetchError);
    await expect(failure).rejects.toMatchObject({
      code: 'SOURCE_FETCH_FAILED',
      message: 'Request failed (status 404)',
      details: { url: 'https://feeds.example/rss', status: 404 },
    });
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('parses JSON bodies', async () => {
    const { client } = createClient([() => jsonResponse({ ok: true })]);

    await expect(client.getJson('https://api.example/quotes', { timeoutMs: 1_000, retryLimit: 0 })).resolves.toEqual({
      ok: true,
    });
  });

  it('reports malformed JSON as a source failure', async () => {
    const { client } = createClient([() => textResponse('not json')]);

    await expect(
      client.getJson('https://api.example/quotes', { timeoutMs: 1_000, retryLimit: 0 }),
    ).rejects.toBeInstanceOf(SourceFetchError);
  });

  it('does not call out once the run is cancelled', async () => {
    const { client, fetch } = createClient([() => textResponse('unused')]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      client.getText('https://feeds.example/rss', { timeoutMs: 1_000, retryLimit: 2, signal: controller.signal }),
    ).rejects.toMatchObject({ message: 'request aborted' });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('times out a request whose headers never arrive', async () => {
    const fetch = hangingFetch();
    const sleeps: number[] = [];
    const client = new HttpClient({
      fetch,
      logger: createRecordingLogger(),
      retryBaseDelayMs: 100,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    });

    await expect(
      client.getText('https://feeds.example/rss', { timeoutMs: 20, retryLimit: 1 }),
    ).rejects.toMatchObject({
      code: 'SOURCE_FETCH_FAILED',
      message: 'Request timed out after 20 ms',
      details: { url: 'https://feeds.example/rss', timeoutMs: 20 },
    });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([100]);
  });

  it('times out a body that stops arriving after the headers', async () => {
    const { client } = createClient([stalledResponse]);

    await expect(
      client.getText('https://feeds.example/rss', { timeoutMs: 20, retryLimit: 0 }),
    ).rejects.toMatchObject({ code: 'SOURCE_FETCH_FAILED', message: 'Request timed out after 20 ms' });
    await expect(
      client.getJson('https://api.example/quotes', { timeoutMs: 20, retryLimit: 0 }),
    ).rejects.toMatchObject({ code: 'SOURCE_FETCH_FAILED', message: 'Request timed out after 20 ms' });
  });

  it('stops reading a body when the run is cancelled', async () => {
    const { client, fetch, logger } = createClient([stalledResponse]);
    const controller = new AbortController();

    const pending = client.getText('https://feeds.example/rss', {
      timeoutMs: 0,
      retryLimit: 2,
      signal: controller.signal,
    });
    await vi.waitFor(() => expect(fetch).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'SOURCE_FETCH_FAILED', message: 'request aborted' });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(logger.messages()).toEqual([]);
  });
});
