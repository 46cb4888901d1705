import { readFile as fsReadFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { PersistenceError } from '../ingest/errors';
import type { LanguageCode } from '../ingest/languages';
import type { NewQuotationRecord, QuotationSink, SaveQuotationOutcome } from '../ingest/types';

export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL('../../../db/schema.sql', import.meta.url));

const UNIQUE_VIOLATION = '23505';

const CONNECTIVITY_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
]);

const insertedRowSchema = z.object({
  id: z.coerce.number().int(),
  created_at: z.coerce.date(),
});

const countRowSchema = z.object({ count: z.coerce.number().int() });

const languageCountRowSchema = z.object({
  language_original: z.string(),
  count: z.coerce.number().int(),
});

const authorCountRowSchema = z.object({
  author: z.string(),
  count: z.coerce.number().int(),
});

const dayCountRowSchema = z.object({
  day: z.string(),
  count: z.coerce.number().int(),
});

const coverageRowSchema = z.object({
  with_author: z.coerce.number().int(),
  without_author: z.coerce.number().int(),
  with_translation: z.coerce.number().int(),
  without_translation: z.coerce.number().int(),
  validated: z.coerce.number().int(),
  not_validated: z.coerce.number().int(),
});

export interface QuotationStatistics {
  total: number;
  byLanguage: Record<string, number>;
  authors: { withAuthor: number; withoutAuthor: number };
  translations: { withTranslation: number; withoutTranslation: number };
  validation: { validated: number; notValidated: number };
  topAuthors: Array<{ author: string; count: number }>;
  recentAdditions: Array<{ day: string; count: number }>;
}

interface QuotationStoreOptions {
  schemaPath?: string;
  readFile?: (path: string) => Promise<string>;
}

export class QuotationStore implements QuotationSink {
  private readonly schemaPath: string;

  private readonly readFile: (path: string) => Promise<string>;

  constructor(
    private readonly db: Queryable,
    options: QuotationStoreOptions = {},
  ) {
    this.schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;
    this.readFile = options.readFile ?? ((path) => fsReadFile(path, 'utf8'));
  }

  async ensureSchema(): Promise<void> {
    const schema = await this.readFile(this.schemaPath);
    await this.db.query(schema);
  }

  async exists(text: string, language: LanguageCode): Promise<boolean> {
    const result = await this.db.query(
      `SELECT 1 FROM quotations
       WHERE lower(text_original) = lower($1) AND language_original = $2
       LIMIT 1`,
      [text, language],
    );
    return result.rows.length > 0;
  }

  /**
   * Inserts the row unless any uniqueness constraint already covers it.
   * Never throws: failures come back as `error`, flagged `fatal` when the
   * store itself is unreachable.
   */
  async save(record: NewQuotationRecord): Promise<SaveQuotationOutcome> {
    try {
      const result = await this.db.query(
        `INSERT INTO quotations (
           text_original, language_original, text_translated,
           language_translated, author, source_url, is_validated
         ) VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT DO NOTHING
         RETURNING id, created_at`,
        [
          record.textOriginal,
          record.languageOriginal,
          record.textTranslated,
          record.languageTranslated,
          record.author,
          record.sourceUrl,
          record.isValidated,
        ],
      );

      if (result.rows.length === 0) {
        return { status: 'duplicate' };
      }
      const row = insertedRowSchema.parse(result.rows[0]);
      return { status: 'inserted', id: row.id, createdAt: row.created_at };
    } catch (error) {
      const code = errorCode(error);
      if (code === UNIQUE_VIOLATION) {
        return { status: 'duplicate' };
      }
      return {
        status: 'error',
        fatal: isConnectivityError(error),
        error: new PersistenceError(error instanceof Error ? error.message : String(error), {
          cause: error,
          details: { code, language: record.languageOriginal },
        }),
      };
    }
  }

  async getStatistics(): Promise<QuotationStatistics> {
    const total = countRowSchema.parse(
      (await this.db.query('SELECT COUNT(*) AS count FROM quotations')).rows[0],
    ).count;

    const byLanguageRows = z.array(languageCountRowSchema).parse(
      (
        await this.db.query(
          `SELECT language_original, COUNT(*) AS count
           FROM quotations
           GROUP BY language_original
           ORDER BY count DESC`,
        )
      ).rows,
    );

    const coverage = coverageRowSchema.parse(
      (
        await this.db.query(
          `SELECT
             COUNT(*) FILTER (WHERE author IS NOT NULL) AS with_author,
             COUNT(*) FILTER (WHERE author IS NULL) AS without_author,
             COUNT(*) FILTER (WHERE text_translated IS NOT NULL) AS with_translation,
             COUNT(*) FILTER (WHERE text_translated IS NULL) AS without_translation,
             COUNT(*) FILTER (WHERE is_validated = TRUE) AS validated,
             COUNT(*) FILTER (WHERE is_validated IS DISTINCT FROM TRUE) AS not_validated
           FROM quotations`,
        )
      ).rows[0],
    );

    const topAuthors = z.array(authorCountRowSchema).parse(
      (
        await this.db.query(
          `SELECT author, COUNT(*) AS count
           FROM quotations
           WHERE author IS NOT NULL
           GROUP BY author
           ORDER BY count DESC, author ASC
           LIMIT 10`,
        )
      ).rows,
    );

    const recentAdditions = z.array(dayCountRowSchema).parse(
      (
        await this.db.query(
          `SELECT to_char(created_at, 'YYYY-MM-DD') AS day, COUNT(*) AS count
           FROM quotations
           WHERE created_at >= CURRENT_DATE - INTERVAL '7 days'
           GROUP BY day
           ORDER BY day DESC`,
        )
      ).rows,
    );

    return {
      total,
      byLanguage: Object.fromEntries(byLanguageRows.map((row) => [row.language_original, row.count])),
      authors: { withAuthor: coverage.with_author, withoutAuthor: coverage.without_author },
      translations: {
        withTranslation: coverage.with_translation,
        withoutTranslation: coverage.without_translation,
      },
      validation: { validated: coverage.validated, notValidated: coverage.not_validated },
      topAuthors,
      recentAdditions,
    };
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isConnectivityError(error: unknown): boolean {
  const code = errorCode(error);
  if (code) {
    return CONNECTIVITY_CODES.has(code) || code.startsWith('08') || code.startsWith('57P');
  }
  const message = error instanceof Error ? error.message : String(error);
  return /connection terminated|connection refused|timeout expired/i.test(message);
}
