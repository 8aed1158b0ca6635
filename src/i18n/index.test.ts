import { describe, it, expect } from 'vitest';
import { changeLanguage, i18n, isLanguageCode, LANGUAGE_STORAGE_KEY, readSavedLanguage } from './index';

describe('readSavedLanguage', () => {
  it('defaults to english', () => {
    expect(readSavedLanguage()).toBe('english');
  });

  it('ignores unknown saved languages', () => {
    localStorage.setItem(LANGUAGE_STORAGE_KEY, 'klingon');
    expect(readSavedLanguage()).toBe('english');
  });

  it('returns a known saved language', () => {
    localStorage.setItem(LANGUAGE_STORAGE_KEY, 'schinese');
    expect(readSavedLanguage()).toBe('schinese');
  });
});

describe('isLanguageCode', () => {
  it('rejects inherited object keys', () => {
    expect(isLanguageCode('toString')).toBe(false);
    expect(isLanguageCode(null)).toBe(false);
  });
});

describe('changeLanguage', () => {
  it('switches translations and saves the choice', async () => {
    await changeLanguage('schinese');
    expect(localStorage.getItem(LANGUAGE_STORAGE_KEY)).toBe('schinese');
    expect(i18n.t('home.games')).toBe('游戏');

    await changeLanguage('english');
    expect(i18n.t('home.games')).toBe('Games');
  });
});
