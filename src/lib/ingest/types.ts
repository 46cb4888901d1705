import type { LanguageCode } from './languages';

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type SourceTrust = 'curated' | 'scraped';

export interface QuotationCandidate {
  text: string;
  language: string;
  author?: string | null;
  sourceUrl: string;
}

export interface FetchContext {
  timeoutMs: number;
  retryLimit: number;
  signal?: AbortSignal;
}

export interface SourceAdapter {
  readonly id: string;
  readonly language: LanguageCode;
  readonly trust: SourceTrust;
  produce(limit: number, context: FetchContext): AsyncIterable<QuotationCandidate>;
}

export type RejectionReason =
  | 'language'
  | 'length'
  | 'digits'
  | 'characters'
  | 'repetition'
  | 'script'
  | 'source';

export type ValidationResult =
  | { valid: true; text: string; language: LanguageCode; author: string | null }
  | { valid: false; reason: RejectionReason };

export interface NewQuotationRecord {
  textOriginal: string;
  languageOriginal: LanguageCode;
  textTranslated: string | null;
  languageTranslated: LanguageCode | null;
  author: string | null;
  sourceUrl: string | null;
  isValidated: boolean;
}

export type SaveQuotationOutcome =
  | { status: 'inserted'; id: number; createdAt: Date }
  | { status: 'duplicate' }
  | { status: 'error'; error: Error; fatal: boolean };

export interface QuotationSink {
  exists(text: string, language: LanguageCode): Promise<boolean>;
  save(record: NewQuotationRecord): Promise<SaveQuotationOutcome>;
}

export type TranslationOutcome =
  | { status: 'translated'; text: string; language: LanguageCode }
  | { status: 'failed'; reason: string };

export interface Translator {
  translate(text: string, source: LanguageCode, target: LanguageCode): Promise<TranslationOutcome>;
}

export interface IngestStats {
  fetched: number;
  rejected: number;
  rejectedByReason: Record<RejectionReason, number>;
  duplicates: number;
  duplicatesByOrigin: { run: number; store: number };
  translationFailed: number;
  persisted: number;
  errors: number;
  sourceFailures: number;
}

export type IngestRunStatus = 'target-reached' | 'exhausted' | 'cancelled';

export interface IngestResult {
  runId: string;
  status: IngestRunStatus;
  stats: IngestStats;
}

export interface IngestLogger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn?(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
