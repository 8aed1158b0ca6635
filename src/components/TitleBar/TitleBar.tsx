/**
 * 标题栏
 * 游戏 / 最近游玩 / 设置三个按钮
 */

import { useTranslation } from 'react-i18next';
import { FocusIndicator } from '../FocusIndicator/FocusIndicator';
import { useGamepadConnected } from '../../hooks/useInputActions';
import { buttonFocusId } from '../../utils/focusIds';
import type { ButtonKind } from '../../types/launcher';
import styles from './TitleBar.module.css';

const LABEL_KEYS: Record<ButtonKind, string> = {
  GAMES: 'home.games',
  RECENTLY_PLAYED: 'home.recentlyPlayed',
  SETTINGS: 'home.settings',
};

interface TitleBarProps {
  /** 当前展示的列表，对应按钮高亮 */
  activeView: 'GAMES' | 'RECENTLY_PLAYED';
}

export function TitleBar({ activeView }: TitleBarProps) {
  const { t } = useTranslation();
  const gamepadConnected = useGamepadConnected();

  const renderButton = (kind: ButtonKind) => (
    <FocusIndicator
      key={kind}
      focusId={buttonFocusId(kind)}
      variant="glow"
      className={`${styles.button} ${kind === activeView ? styles.active : ''}`}
      label={t(LABEL_KEYS[kind])}
    >
      {kind === 'SETTINGS' ? '⚙️' : t(LABEL_KEYS[kind])}
    </FocusIndicator>
  );

  return (
    <header className={styles.titleBar}>
      <nav className={styles.tabs}>
        {renderButton('GAMES')}
        {renderButton('RECENTLY_PLAYED')}
      </nav>
      <div className={styles.spacer} />
      {gamepadConnected && (
        <span className={styles.gamepadBadge} title={t('gamepad.connected')}>🎮</span>
      )}
      {renderButton('SETTINGS')}
    </header>
  );
}
