/**
 * 读取首页运行时的 Hooks
 */

import { useContext } from 'react';
import { useStore } from 'zustand';
import { HomeContext } from './HomeContext';
import { isFocused } from '../store/focusStore';
import type { HomeRuntime } from '../store/homeRuntime';
import type { FocusId, GameData } from '../types/launcher';

export function useHome(): HomeRuntime {
  const runtime = useContext(HomeContext);
  if (!runtime) {
    throw new Error('useHome must be used inside <HomeProvider>');
  }
  return runtime;
}

/**
 * 当前元素是否获得焦点
 * 只在自己的焦点状态变化时重新渲染
 */
export function useIsFocused(id: FocusId): boolean {
  const { focusStore } = useHome();
  return useStore(focusStore, (state) => isFocused(state, id));
}

export function useFocusedId(): FocusId {
  const { focusStore } = useHome();
  return useStore(focusStore, (state) => state.focusedId);
}

export function useGames(): readonly GameData[] {
  const { gameListStore } = useHome();
  return useStore(gameListStore, (state) => state.games);
}
