/**
 * 游戏网格
 * 卡片绝对定位，视口内纵向滚动；焦点移到卡片上时自动滚动到可见
 */

import { useEffect, useMemo, useRef } from 'react';
import { useTranslation } from 'react-i18next';
import { GameTile } from './GameTile';
import { useFocusedId, useGames, useHome } from '../../hooks/useHome';
import { useElementSize } from '../../hooks/useElementSize';
import { gameFocusId } from '../../utils/focusIds';
import { computeGridLayout, scrollOffsetFor } from '../../utils/gridLayout';
import type { ViewportSize } from '../../types/launcher';
import styles from './GameGrid.module.css';

interface GameGridProps {
  /** 指定视口尺寸，不指定时测量容器 */
  viewport?: ViewportSize;
  /** 列表为空时的提示 */
  emptyText?: string;
}

export function GameGrid({ viewport, emptyText }: GameGridProps) {
  const { t } = useTranslation();
  const { config } = useHome();
  const games = useGames();
  const focusedId = useFocusedId();

  const viewportRef = useRef<HTMLDivElement>(null);
  const measured = useElementSize(viewportRef);
  const size = viewport ?? measured;

  const layout = useMemo(
    () => computeGridLayout(games.length, size, config.grid),
    [games.length, size, config.grid]
  );

  useEffect(() => {
    const element = viewportRef.current;
    if (!element) return;
    const index = games.findIndex(game => gameFocusId(game.uuid) === focusedId);
    const tile = layout.tiles[index];
    if (index < 0 || !tile) return;
    element.scrollTop = scrollOffsetFor(tile, element.scrollTop, size.height);
  }, [focusedId, games, layout, size.height]);

  return (
    <div className={styles.viewport} ref={viewportRef} data-testid="game-grid">
      {games.length === 0 ? (
        <p className={styles.empty}>{emptyText ?? t('home.empty')}</p>
      ) : (
        <div
          className={styles.content}
          style={{ height: layout.contentHeight }}
          data-testid="game-grid-content"
        >
          {games.map((game, index) => {
            const placement = layout.tiles[index];
            if (!placement) return null;
            // uuid 可能重复，用下标区分
            return <GameTile key={`${game.uuid}-${index}`} game={game} placement={placement} />;
          })}
        </div>
      )}
    </div>
  );
}
