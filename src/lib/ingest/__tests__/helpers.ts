import { vi } from 'vitest';
import { Deduplicator } from '../deduplicator';
import type { LanguageCode } from '../languages';
import { HttpClient } from '../sources/http-client';
import type {
  FetchContext,
  FetchFn,
  IngestLogger,
  NewQuotationRecord,
  QuotationCandidate,
  QuotationSink,
  SaveQuotationOutcome,
  SourceAdapter,
  SourceTrust,
  TranslationOutcome,
  Translator,
} from '../types';

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export function createRecordingLogger(): IngestLogger & { entries: LogEntry[]; messages(): string[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    messages: () => entries.map((entry) => entry.message),
    info(message, meta) {
      entries.push({ level: 'info', message, meta });
    },
    warn(message, meta) {
      entries.push({ level: 'warn', message, meta });
    },
    error(message, meta) {
      entries.push({ level: 'error', message, meta });
    },
  };
}

export const testContext: FetchContext = { timeoutMs: 1_000, retryLimit: 0 };

/** In-process stand-in for the quotations table and its uniqueness index. */
export class InMemorySink implements QuotationSink {
  readonly rows: Array<NewQuotationRecord & { id: number }> = [];

  private nextId = 1;

  async exists(text: string, language: LanguageCode): Promise<boolean> {
    const key = Deduplicator.keyOf(text, language);
    return this.rows.some((row) => Deduplicator.keyOf(row.textOriginal, row.languageOriginal) === key);
  }

  async save(record: NewQuotationRecord): Promise<SaveQuotationOutcome> {
    if (await this.exists(record.textOriginal, record.languageOriginal)) {
      return { status: 'duplicate' };
    }
    const id = this.nextId;
    this.nextId += 1;
    this.rows.push({ ...record, id });
    return { status: 'inserted', id, createdAt: new Date(0) };
  }
}

export class StaticSource implements SourceAdapter {
  readonly id: string;

  readonly language: LanguageCode;

  readonly trust: SourceTrust;

  pulled = 0;

  private readonly failAfter: number | undefined;

  constructor(
    id: string,
    private readonly candidates: QuotationCandidate[],
    options: { language?: LanguageCode; trust?: SourceTrust; failAfter?: number } = {},
  ) {
    this.id = id;
    this.language = options.language ?? 'en';
    this.trust = options.trust ?? 'scraped';
    this.failAfter = options.failAfter;
  }

  async *produce(limit: number): AsyncGenerator<QuotationCandidate> {
    for (const candidate of this.candidates.slice(0, limit)) {
      if (this.failAfter !== undefined && this.pulled >= this.failAfter) {
        throw new Error(`${this.id} went away`);
      }
      this.pulled += 1;
      yield candidate;
    }
  }
}

export class DictionaryTranslator implements Translator {
  readonly calls: string[] = [];

  constructor(private readonly dictionary: Record<string, string> = {}) {}

  async translate(text: string, _source: LanguageCode, target: LanguageCode): Promise<TranslationOutcome> {
    this.calls.push(text);
    const translated = this.dictionary[text];
    if (translated === undefined) {
      return { status: 'failed', reason: 'no entry' };
    }
    return { status: 'translated', text: translated, language: target };
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status = 200): Response {
  return new Response(body, { status });
}

/** Headers arrive, the body never does. */
export function stalledResponse(): Response {
  const pending = () => new Promise<never>(() => {});
  return Object.assign(new Response(null, { status: 200 }), { text: pending, json: pending });
}

/** Never answers; rejects only once the request's signal fires. */
export function hangingFetch() {
  return vi.fn(
    (_input: string | URL, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')), {
          once: true,
        });
      }),
  );
}

/** Answers by exact URL; anything unrouted is a 404. */
export function routeFetch(routes: Record<string, () => Response>) {
  return vi.fn(async (input: string | URL, _init?: RequestInit) => {
    const route = routes[String(input)];
    return route ? route() : textResponse('not found', 404);
  });
}

export function createTestHttpClient(fetch: FetchFn, logger?: IngestLogger): HttpClient {
  return new HttpClient({
    fetch,
    logger: logger ?? createRecordingLogger(),
    retryBaseDelayMs: 0,
    sleep: async () => {},
  });
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
