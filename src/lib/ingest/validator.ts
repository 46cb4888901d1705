import { DEFAULT_DENYLIST } from '../env';
import { isSupportedLanguage, type LanguageCode } from './languages';
import { normalizeText } from './text';
import type { QuotationCandidate, RejectionReason, SourceTrust, ValidationResult } from './types';

export const MIN_TEXT_LENGTH = 10;
export const MAX_TEXT_LENGTH = 500;

interface TrustThresholds {
  minLength: number;
  maxCharacterRun: number;
}

const THRESHOLDS: Record<SourceTrust, TrustThresholds> = {
  curated: { minLength: MIN_TEXT_LENGTH, maxCharacterRun: 4 },
  scraped: { minLength: 20, maxCharacterRun: 3 },
};

const DIGIT_PATTERN = /\p{N}/u;
// Upper-case words in well-formed numeral shape; "I" stays, it is the pronoun.
const ROMAN_NUMERAL_PATTERN = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/;
const WEB_ADDRESS_PATTERN = /https?:\/\/|www\.|@\w+\.|\b\w+\.(?:com|org|net|ru|info|io)\b/iu;
const DISALLOWED_CHARACTER_PATTERN = /[^\p{L}\p{M}\s.,!?;:\-—–'"«»()…’‘“”]/u;
const REPEATED_SUBSTRING_PATTERN = /(.{2,4})\1{3,}/u;
const CYRILLIC_PATTERN = /\p{Script=Cyrillic}/u;
const AUTHOR_PATTERN = /^[\p{L}\p{M}\s.\-']+$/u;

interface PredicateInput {
  text: string;
  language: LanguageCode;
  sourceUrl: string;
  thresholds: TrustThresholds;
}

type Predicate = [RejectionReason, (input: PredicateInput) => boolean];

export interface QuotationValidatorOptions {
  denylist?: string[];
}

export class QuotationValidator {
  private readonly denylist: string[];

  private readonly predicates: Predicate[] = [
    ['length', ({ text, thresholds }) => {
      const length = Array.from(text).length;
      return length >= thresholds.minLength && length <= MAX_TEXT_LENGTH;
    }],
    ['digits', ({ text }) => !DIGIT_PATTERN.test(text) && !hasRomanNumeral(text)],
    ['characters', ({ text }) =>
      !DISALLOWED_CHARACTER_PATTERN.test(text) && !WEB_ADDRESS_PATTERN.test(text)],
    ['repetition', ({ text, thresholds }) => !this.hasRepetition(text, thresholds.maxCharacterRun)],
    ['script', ({ text, language }) =>
      language === 'ru' ? CYRILLIC_PATTERN.test(text) : !CYRILLIC_PATTERN.test(text)],
    ['source', ({ sourceUrl }) => this.isTrustedSource(sourceUrl)],
  ];

  constructor(options: QuotationValidatorOptions = {}) {
    this.denylist = (options.denylist ?? DEFAULT_DENYLIST)
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0);
  }

  validate(candidate: QuotationCandidate, trust: SourceTrust = 'scraped'): ValidationResult {
    if (!isSupportedLanguage(candidate.language)) {
      return { valid: false, reason: 'language' };
    }

    const input: PredicateInput = {
      text: normalizeText(candidate.text),
      language: candidate.language,
      sourceUrl: candidate.sourceUrl,
      thresholds: THRESHOLDS[trust],
    };

    for (const [reason, passes] of this.predicates) {
      if (!passes(input)) {
        return { valid: false, reason };
      }
    }

    return {
      valid: true,
      text: input.text,
      language: input.language,
      author: normalizeAuthor(candidate.author),
    };
  }

  isValid(candidate: QuotationCandidate, trust: SourceTrust = 'scraped'): boolean {
    return this.validate(candidate, trust).valid;
  }

  isTrustedSource(sourceUrl: string): boolean {
    let hostname: string;
    try {
      hostname = new URL(sourceUrl).hostname.toLowerCase();
    } catch {
      return false;
    }
    if (!hostname) {
      return true;
    }
    return !this.denylist.some((entry) =>
      entry.includes('.')
        ? hostname === entry || hostname.endsWith(`.${entry}`)
        : hostname.includes(entry),
    );
  }

  private hasRepetition(text: string, maxCharacterRun: number): boolean {
    const characterRun = new RegExp(`(.)\\1{${maxCharacterRun},}`, 'u');
    return characterRun.test(text) || REPEATED_SUBSTRING_PATTERN.test(text);
  }
}

function hasRomanNumeral(text: string): boolean {
  return text.split(/\s+/).some((word) => {
    const bare = word.replace(/[^\p{L}]/gu, '');
    return bare.length > 0 && bare !== 'I' && ROMAN_NUMERAL_PATTERN.test(bare);
  });
}

export function normalizeAuthor(author: string | null | undefined): string | null {
  if (!author) {
    return null;
  }
  const normalized = normalizeText(author).replace(/^[—–\-\s]+/, '');
  if (normalized.length < 2 || normalized.length > 100) {
    return null;
  }
  return AUTHOR_PATTERN.test(normalized) ? normalized : null;
}
