/**
 * 游戏列表
 * 顺序即展示顺序，不排序不去重，由宿主整体替换
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { GameData } from '../types/launcher';

export interface GameListState {
  games: readonly GameData[];
  replaceGames: (games: readonly GameData[]) => void;
}

export function createGameListStore(initial: readonly GameData[] = []) {
  return createStore<GameListState>()(
    subscribeWithSelector((set) => ({
      games: initial,
      replaceGames: (games) => set({ games }),
    }))
  );
}

export type GameListStore = ReturnType<typeof createGameListStore>;
