/**
 * 首页
 * 背景图 + 标题栏 + 游戏网格，导航由 useHomeNavigation 驱动
 */

import { motion } from 'framer-motion';
import { TitleBar } from '../../components/TitleBar/TitleBar';
import { GameGrid } from '../../components/GameGrid/GameGrid';
import { useHome } from '../../hooks/useHome';
import { useHomeNavigation } from '../../hooks/useHomeNavigation';
import type { ViewportSize } from '../../types/launcher';
import styles from './Home.module.css';

interface HomeProps {
  activeView?: 'GAMES' | 'RECENTLY_PLAYED';
  onCancel?: () => void;
  emptyText?: string;
  /** 网格视口尺寸，不指定时测量 */
  gridViewport?: ViewportSize;
}

export function Home({ activeView = 'GAMES', onCancel, emptyText, gridViewport }: HomeProps) {
  const { config } = useHome();
  useHomeNavigation({ onCancel });

  return (
    <motion.div
      className={styles.container}
      style={{ backgroundImage: `url(${config.backgroundImage})` }}
      initial={{ opacity: 0 }}
      animate={{ opacity: 1 }}
    >
      <div className={styles.overlay}>
        <TitleBar activeView={activeView} />
        <GameGrid viewport={gridViewport} emptyText={emptyText} />
      </div>
    </motion.div>
  );
}
