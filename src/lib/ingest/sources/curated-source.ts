import { readFile as fsReadFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SourceFetchError } from '../errors';
import type { LanguageCode } from '../languages';
import type { FetchContext, QuotationCandidate, SourceAdapter } from '../types';

export const DEFAULT_CURATED_PATH = fileURLToPath(
  new URL('../../../../data/curated-quotations.json', import.meta.url),
);

const DEFAULT_SOURCE_URL = 'curated:quotations';

const curatedFileSchema = z.object({
  quotations: z.array(
    z.object({
      text: z.string(),
      language: z.string(),
      author: z.string().nullable().optional(),
      source: z.string().optional(),
    }),
  ),
});

type ReadFileFn = (path: string) => Promise<string>;

interface CuratedListSourceOptions {
  language: LanguageCode;
  filePath?: string;
  readFile?: ReadFileFn;
}

export class CuratedListSource implements SourceAdapter {
  readonly id: string;

  readonly language: LanguageCode;

  readonly trust = 'curated' as const;

  private readonly filePath: string;

  private readonly readFile: ReadFileFn;

  constructor(options: CuratedListSourceOptions) {
    this.language = options.language;
    this.id = `curated-${options.language}`;
    this.filePath = options.filePath ?? DEFAULT_CURATED_PATH;
    this.readFile = options.readFile ?? ((path) => fsReadFile(path, 'utf8'));
  }

  async *produce(limit: number, _context: FetchContext): AsyncGenerator<QuotationCandidate> {
    const entries = await this.load();
    let produced = 0;
    for (const entry of entries) {
      if (produced >= limit) {
        return;
      }
      if (entry.language !== this.language) {
        continue;
      }
      produced += 1;
      yield {
        text: entry.text,
        language: entry.language,
        author: entry.author ?? null,
        sourceUrl: entry.source ?? DEFAULT_SOURCE_URL,
      };
    }
  }

  private async load() {
    let raw: string;
    try {
      raw = await this.readFile(this.filePath);
    } catch (error) {
      throw new SourceFetchError(`Could not read curated list: ${this.filePath}`, {
        cause: error,
        details: { path: this.filePath },
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new SourceFetchError(`Curated list is not valid JSON: ${this.filePath}`, {
        cause: error,
        details: { path: this.filePath },
      });
    }

    const parsed = curatedFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new SourceFetchError(`Curated list has an unexpected shape: ${this.filePath}`, {
        details: {
          path: this.filePath,
          issues: parsed.error.issues.map((issue) => issue.message),
        },
      });
    }
    return parsed.data.quotations;
  }
}
