/**
 * 首页导航 Hook
 * 手柄/键盘动作 -> 导航控制器 -> 焦点状态；确认键分发当前焦点
 *
 * 焦点状态仍是唯一事实来源：宿主直接 setFocus 时，
 * 控制器同步到该元素，之后的方向键从这里出发
 */

import { useCallback, useEffect, useRef, useState } from 'react';
import { useHome } from './useHome';
import { useInputActions, useRumble } from './useInputActions';
import { gameFocusId } from '../utils/focusIds';
import { createHomeNavigation, GAMES_LAYOUT_ID } from '../utils/homeNavigation';
import type { NavigationDirective, NavigationController } from '../utils/spatialGrid';
import type { GameData, InputAction } from '../types/launcher';

const toFocusIds = (games: readonly GameData[]) => games.map(game => gameFocusId(game.uuid));

function toDirective(action: InputAction): NavigationDirective | null {
  switch (action) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
      return { kind: 'direction', direction: action };
    case 'prevPage':
    case 'nextPage':
      return { kind: 'button', button: action };
    case 'confirm':
    case 'cancel':
      return null;
  }
}

export interface HomeNavigationOptions {
  onCancel?: () => void;
  enabled?: boolean;
}

export function useHomeNavigation(options: HomeNavigationOptions = {}) {
  const { onCancel, enabled = true } = options;
  const { config, focusStore, gameListStore, dispatcher } = useHome();
  const { tick } = useRumble();

  const [controller] = useState<NavigationController>(() =>
    createHomeNavigation(config.grid, toFocusIds(gameListStore.getState().games))
  );

  const callbacksRef = useRef({ onCancel });
  useEffect(() => { callbacksRef.current = { onCancel }; });

  const syncFocusFromController = useCallback(() => {
    focusStore.getState().setFocus(controller.getCurrentFocusId() ?? '');
  }, [controller, focusStore]);

  // 初始焦点；从其他页面返回时恢复原焦点
  useEffect(() => {
    const focusedId = focusStore.getState().focusedId;
    if (focusedId === '' || !controller.focus(focusedId)) {
      syncFocusFromController();
    }
  }, [controller, focusStore, syncFocusFromController]);

  // 游戏列表被宿主替换时重新填充网格
  useEffect(() => {
    return gameListStore.subscribe(
      state => state.games,
      games => {
        controller.replaceElements(GAMES_LAYOUT_ID, toFocusIds(games));
        syncFocusFromController();
      }
    );
  }, [controller, gameListStore, syncFocusFromController]);

  // 外部修改焦点时同步控制器
  useEffect(() => {
    return focusStore.subscribe(
      state => state.focusedId,
      focusedId => {
        if (focusedId !== '' && focusedId !== controller.getCurrentFocusId()) {
          controller.focus(focusedId);
        }
      }
    );
  }, [controller, focusStore]);

  const handleAction = useCallback((action: InputAction, gamepadIndex: number | null = null) => {
    if (action === 'confirm') {
      const focusedId = focusStore.getState().focusedId;
      if (focusedId !== '') dispatcher.dispatch(focusedId);
      return;
    }
    if (action === 'cancel') {
      callbacksRef.current.onCancel?.();
      return;
    }

    const directive = toDirective(action);
    if (!directive) return;
    const result = controller.navigate(directive);
    if (result.kind === 'none') return;
    tick(gamepadIndex);
    focusStore.getState().setFocus(result.focusId);
  }, [controller, dispatcher, focusStore, tick]);

  useInputActions(handleAction, enabled);

  return { handleAction, controller };
}
