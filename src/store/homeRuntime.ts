/**
 * 首页运行时
 * 焦点、游戏列表、激活分发由根组件统一创建，再通过 Context 注入
 */

import { createHomeConfig, type HomeConfig } from '../config/homeConfig';
import { ActivationDispatcher } from '../services/activationDispatcher';
import type { GameData } from '../types/launcher';
import { createFocusStore, type FocusStore } from './focusStore';
import { createGameListStore, type GameListStore } from './gameListStore';

export interface HomeRuntime {
  config: HomeConfig;
  focusStore: FocusStore;
  gameListStore: GameListStore;
  dispatcher: ActivationDispatcher;
}

export function createHomeRuntime(
  config: HomeConfig = createHomeConfig(),
  games: readonly GameData[] = []
): HomeRuntime {
  return {
    config,
    focusStore: createFocusStore(),
    gameListStore: createGameListStore(games),
    dispatcher: new ActivationDispatcher(),
  };
}
