export const SUPPORTED_LANGUAGES = ['en', 'ru'] as const;

export type LanguageCode = (typeof SUPPORTED_LANGUAGES)[number];

const COUNTERPARTS: Record<LanguageCode, LanguageCode> = {
  en: 'ru',
  ru: 'en',
};

export function isSupportedLanguage(value: string): value is LanguageCode {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(value);
}

export function counterpartOf(language: LanguageCode): LanguageCode {
  return COUNTERPARTS[language];
}
