/**
 * 设置页面
 * 语言、主题、手柄震动
 */

import { useState, useEffect, useCallback } from 'react';
import { motion } from 'framer-motion';
import { useTranslation } from 'react-i18next';
import { changeLanguage, supportedLanguages } from '../../i18n';
import { useLayoutFocus, useRumble } from '../../hooks';
import { gamepadService } from '../../services/gamepadService';
import { generateGridRows } from '../../utils/gridLayout';
import styles from './Settings.module.css';

type Theme = 'light' | 'dark';

export const THEME_KEY = 'theme';
export const VIBRATION_KEY = 'gamepadVibration';

const LANGUAGE_COLUMNS = 4;

const languageItemId = (code: string) => `lang-${code}`;

// 导航行：返回 / 语言 / 主题 / 震动
const SETTINGS_ROWS: readonly (readonly string[])[] = [
  ['back'],
  ...generateGridRows(supportedLanguages.map(lang => languageItemId(lang.code)), LANGUAGE_COLUMNS),
  ['theme'],
  ['vibration'],
];

export function readTheme(): Theme {
  return localStorage.getItem(THEME_KEY) === 'light' ? 'light' : 'dark';
}

interface SettingsProps {
  onBack: () => void;
}

export function Settings({ onBack }: SettingsProps) {
  const { t, i18n } = useTranslation();
  const { pulse } = useRumble();

  const [theme, setTheme] = useState<Theme>(readTheme);
  const [vibrationEnabled, setVibrationEnabled] = useState(() => gamepadService.isVibrationEnabled());

  // 应用主题
  useEffect(() => {
    document.documentElement.setAttribute('data-theme', theme);
    localStorage.setItem(THEME_KEY, theme);
  }, [theme]);

  const toggleTheme = useCallback(() => {
    setTheme(prev => prev === 'light' ? 'dark' : 'light');
  }, []);

  const toggleVibration = useCallback((gamepadIndex: number | null = null) => {
    const next = !vibrationEnabled;
    setVibrationEnabled(next);
    gamepadService.setVibrationEnabled(next);
    localStorage.setItem(VIBRATION_KEY, next ? 'true' : 'false');

    // 开启时试震一下
    if (next) pulse(gamepadIndex);
  }, [vibrationEnabled, pulse]);

  const handleSelect = useCallback((itemId: string, gamepadIndex: number | null) => {
    if (itemId === 'back') {
      onBack();
    } else if (itemId === 'theme') {
      toggleTheme();
    } else if (itemId === 'vibration') {
      toggleVibration(gamepadIndex);
    } else {
      const lang = supportedLanguages.find(l => languageItemId(l.code) === itemId);
      if (lang) void changeLanguage(lang.code);
    }
  }, [onBack, toggleTheme, toggleVibration]);

  const { isFocused } = useLayoutFocus({
    rows: SETTINGS_ROWS,
    onSelect: handleSelect,
    onCancel: onBack,
  });

  const focusProps = (itemId: string) => ({
    'data-item-id': itemId,
    'data-focused': isFocused(itemId) ? 'true' : 'false',
  });

  return (
    <div className={styles.container}>
      <motion.div
        className={styles.content}
        initial={{ opacity: 0, y: 20 }}
        animate={{ opacity: 1, y: 0 }}
      >
        <div className={styles.header}>
          <button
            type="button"
            className={`${styles.backButton} ${isFocused('back') ? styles.focused : ''}`}
            onClick={onBack}
            {...focusProps('back')}
          >
            ← {t('settings.back')}
          </button>
          <h2 className={styles.title}>{t('settings.title')}</h2>
        </div>

        <div className={styles.card}>
          <div className={styles.section}>
            <span className={styles.label}>{t('settings.language')}</span>
            <div className={styles.languageGrid}>
              {supportedLanguages.map((lang) => (
                <motion.button
                  key={lang.code}
                  type="button"
                  className={`
                    ${styles.languageButton}
                    ${i18n.language === lang.code ? styles.active : ''}
                    ${isFocused(languageItemId(lang.code)) ? styles.focused : ''}
                  `}
                  onClick={() => void changeLanguage(lang.code)}
                  whileHover={{ scale: 1.05 }}
                  whileTap={{ scale: 0.95 }}
                  {...focusProps(languageItemId(lang.code))}
                >
                  {lang.name}
                </motion.button>
              ))}
            </div>
          </div>

          <div className={styles.section}>
            <span className={styles.label}>{t('settings.theme')}</span>
            <motion.button
              type="button"
              className={`${styles.toggle} ${isFocused('theme') ? styles.focused : ''}`}
              onClick={toggleTheme}
              whileHover={{ scale: 1.02 }}
              whileTap={{ scale: 0.98 }}
              {...focusProps('theme')}
            >
              <span className={styles.icon}>{theme === 'light' ? '☀️' : '🌙'}</span>
              <span>{theme === 'light' ? t('settings.lightMode') : t('settings.darkMode')}</span>
              <div className={`${styles.switch} ${theme === 'dark' ? styles.on : ''}`}>
                <div className={styles.switchKnob} />
              </div>
            </motion.button>
          </div>

          <div className={styles.section}>
            <span className={styles.label}>{t('gamepad.vibration')}</span>
            <motion.button
              type="button"
              className={`${styles.toggle} ${isFocused('vibration') ? styles.focused : ''}`}
              onClick={() => toggleVibration()}
              whileHover={{ scale: 1.02 }}
              whileTap={{ scale: 0.98 }}
              {...focusProps('vibration')}
            >
              <span className={styles.icon}>🎮</span>
              <span>{vibrationEnabled ? t('gamepad.vibrationOn') : t('gamepad.vibrationOff')}</span>
              <div className={`${styles.switch} ${vibrationEnabled ? styles.on : ''}`}>
                <div className={styles.switchKnob} />
              </div>
            </motion.button>
          </div>
        </div>
      </motion.div>
    </div>
  );
}
