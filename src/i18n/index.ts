/**
 * 界面语言
 * 语言包以 english 为准，其他语言必须提供同样的键
 */

import i18n from 'i18next';
import { initReactI18next } from 'react-i18next';
import english from './locales/english.json';
import schinese from './locales/schinese.json';

const locales = { english, schinese } satisfies Record<string, typeof english>;

export type LanguageCode = keyof typeof locales;

export const DEFAULT_LANGUAGE: LanguageCode = 'english';
export const LANGUAGE_STORAGE_KEY = 'language';

export const supportedLanguages: readonly { code: LanguageCode; name: string }[] = [
  { code: 'english', name: 'English' },
  { code: 'schinese', name: '简体中文' },
];

export function isLanguageCode(value: string | null): value is LanguageCode {
  return value !== null && Object.hasOwn(locales, value);
}

/**
 * 读取保存的语言，未知值回退到默认语言
 */
export function readSavedLanguage(): LanguageCode {
  const saved = localStorage.getItem(LANGUAGE_STORAGE_KEY);
  return isLanguageCode(saved) ? saved : DEFAULT_LANGUAGE;
}

void i18n.use(initReactI18next).init({
  resources: {
    english: { translation: locales.english },
    schinese: { translation: locales.schinese },
  },
  lng: readSavedLanguage(),
  fallbackLng: DEFAULT_LANGUAGE,
  interpolation: { escapeValue: false },
});

export function changeLanguage(lang: LanguageCode): Promise<void> {
  localStorage.setItem(LANGUAGE_STORAGE_KEY, lang);
  return i18n.changeLanguage(lang).then(
    () => undefined,
    (e: unknown) => {
      console.error('[i18n] 切换语言失败:', e);
    }
  );
}

export { i18n };
