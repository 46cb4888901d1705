const NAMED_ENTITIES: Record<string, string> = {
  nbsp: ' ',
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  laquo: '«',
  raquo: '»',
  mdash: '—',
  ndash: '–',
  hellip: '…',
  lsquo: '‘',
  rsquo: '’',
  ldquo: '“',
  rdquo: '”',
};

export function decodeHtmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z]+);/gi, (match, entity: string) => {
    const lower = entity.toLowerCase();
    if (lower.startsWith('#x')) {
      return safeFromCodePoint(Number.parseInt(lower.slice(2), 16)) ?? match;
    }
    if (lower.startsWith('#')) {
      return safeFromCodePoint(Number.parseInt(lower.slice(1), 10)) ?? match;
    }
    return NAMED_ENTITIES[lower] ?? match;
  });
}

function safeFromCodePoint(codePoint: number): string | null {
  if (!Number.isInteger(codePoint) || codePoint < 0 || codePoint > 0x10ffff) {
    return null;
  }
  return String.fromCodePoint(codePoint);
}

export function stripHtml(html: string): string {
  return decodeHtmlEntities(
    html
      .replace(/<script[\s\S]*?<\/script>/gi, ' ')
      .replace(/<style[\s\S]*?<\/style>/gi, ' ')
      .replace(/<!--([\s\S]*?)-->/g, ' ')
      .replace(/<br\s*\/?>/gi, ' ')
      .replace(/<[^>]+>/g, ' '),
  );
}

/**
 * Trims, collapses internal whitespace and applies NFC. This is the form
 * that gets validated and stored.
 */
export function normalizeText(input: string): string {
  return input.normalize('NFC').replace(/\s+/g, ' ').trim();
}

/**
 * Cleans text taken out of a scraped page: markup, entities and
 * bracketed reference markers such as `[1]` or `[citation needed]`.
 */
export function cleanScrapedText(input: string): string {
  return normalizeText(stripHtml(input).replace(/\[[^\]]*\]/g, ' '));
}

export function foldCase(input: string): string {
  return normalizeText(input).toLowerCase();
}
