/**
 * 首页导航布局
 *
 * ╔═════════╦════════════════╦═════════╦══════════╗
 * ║ Games   ║ RecentlyPlayed ║         ║ Settings ║
 * ╠═════════╩════════════════╩═════════╩══════════╣
 * ║                                               ║
 * ║          Home@Games（可增长，每行 C 个）        ║
 * ║                                               ║
 * ╚═══════════════════════════════════════════════╝
 */

import type { GridLayoutConfig } from '../config/homeConfig';
import type { FocusId } from '../types/launcher';
import { buttonFocusId } from './focusIds';
import { createRect, LayoutGridBuilder, NavigationController } from './spatialGrid';

export const HOME_LAYOUT_ID = 'Home';
export const GAMES_LAYOUT_ID = 'Home@Games';

export function createHomeNavigation(config: GridLayoutConfig, gameIds: readonly FocusId[] = []): NavigationController {
  const builder = new LayoutGridBuilder(4, 6, HOME_LAYOUT_ID);
  builder
    .addElement(createRect(0, 0, 0, 0), buttonFocusId('GAMES'))
    .addElement(createRect(1, 1, 0, 0), buttonFocusId('RECENTLY_PLAYED'))
    .addElement(createRect(3, 3, 0, 0), buttonFocusId('SETTINGS'));
  builder
    .withSublayout(createRect(0, 3, 1, 5), GAMES_LAYOUT_ID, config.columns, config.visibleRows)
    .setGrowable(1, 1, 'x')
    .withSpecialHandler('prevPage', 'jumpToStart')
    .withSpecialHandler('nextPage', 'jumpToEnd');

  const controller = new NavigationController(builder.build());
  if (gameIds.length > 0) {
    controller.replaceElements(GAMES_LAYOUT_ID, gameIds);
  }
  return controller;
}
