import i18next from 'i18next';
import enUS from './locales/en-US.json';
import daDK from './locales/da-DK.json';
import { DEFAULT_LANGUAGE, type SupportedLanguage } from './types';

export * from './types';

const resources = {
  'en-US': { translation: enUS },
  'da-DK': { translation: daDK },
} as const;

export type TranslationValues = Record<string, string | number>;

export interface Translator {
  t(key: string, values?: TranslationValues): string;
  exists(key: string): boolean;
  /** Token a yes/no prompt accepts as "yes", compared case-insensitively. */
  readonly affirmative: string;
}

/**
 * Builds an isolated i18next instance; nothing is registered globally.
 */
export async function createTranslator(language: SupportedLanguage = DEFAULT_LANGUAGE): Promise<Translator> {
  const instance = i18next.createInstance();
  await instance.init({
    resources,
    lng: language,
    fallbackLng: DEFAULT_LANGUAGE,
    interpolation: {
      escapeValue: false,
    },
  });

  const t = (key: string, values?: TranslationValues): string => {
    const value = instance.t(key, values);
    return typeof value === 'string' ? value : String(value);
  };

  return {
    t,
    exists: key => instance.exists(key),
    affirmative: t('prompts.affirmative').toLowerCase(),
  };
}
