export const SUPPORTED_LANGUAGE_CODES = ['en-US', 'da-DK'] as const;

export type SupportedLanguage = (typeof SUPPORTED_LANGUAGE_CODES)[number];

export const DEFAULT_LANGUAGE: SupportedLanguage = 'en-US';
