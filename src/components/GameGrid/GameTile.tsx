/**
 * 游戏卡片
 */

import { FocusIndicator } from '../FocusIndicator/FocusIndicator';
import { gameFocusId } from '../../utils/focusIds';
import type { TilePlacement } from '../../utils/gridLayout';
import type { GameData } from '../../types/launcher';
import styles from './GameGrid.module.css';

interface GameTileProps {
  game: GameData;
  placement: TilePlacement;
}

export function GameTile({ game, placement }: GameTileProps) {
  return (
    <FocusIndicator
      focusId={gameFocusId(game.uuid)}
      variant="scale"
      className={styles.tile}
      style={{
        left: placement.x,
        top: placement.y,
        width: placement.width,
        height: placement.height,
      }}
      label={game.title}
    >
      <span className={styles.cover}>
        <span className={styles.title}>{game.title}</span>
      </span>
    </FocusIndicator>
  );
}
