/**
 * 输入动作 Hooks
 * 手柄和键盘统一成 InputAction，页面只处理动作
 */

import { useCallback, useEffect, useRef, useSyncExternalStore } from 'react';
import { gamepadService } from '../services/gamepadService';
import { mapKeyToAction } from '../services/keyboardInput';
import type { InputAction } from '../types/launcher';

/** gamepadIndex 为 null 表示来自键盘 */
export type InputActionHandler = (action: InputAction, gamepadIndex: number | null) => void;

/**
 * 订阅手柄和键盘动作
 * 始终调用最新的 handler，enabled 为 false 时不监听
 */
export function useInputActions(handler: InputActionHandler, enabled = true) {
  const handlerRef = useRef(handler);
  useEffect(() => {
    handlerRef.current = handler;
  });

  useEffect(() => {
    if (!enabled) return;

    const onKeyDown = (event: KeyboardEvent) => {
      if (event.altKey || event.ctrlKey || event.metaKey) return;
      const action = mapKeyToAction(event.key);
      if (!action) return;
      // 阻止按钮上的 Enter/Space 再触发一次 click
      event.preventDefault();
      handlerRef.current(action, null);
    };

    const unsubscribe = gamepadService.onAction((action, gamepadIndex) => {
      handlerRef.current(action, gamepadIndex);
    });
    window.addEventListener('keydown', onKeyDown);
    gamepadService.start();

    return () => {
      unsubscribe();
      window.removeEventListener('keydown', onKeyDown);
    };
  }, [enabled]);
}

/**
 * 震动反馈，只对发出动作的手柄生效
 */
export function useRumble() {
  // 焦点移动
  const tick = useCallback((gamepadIndex: number | null) => {
    if (gamepadIndex !== null) gamepadService.vibrate(gamepadIndex, 50, 0.3, 0);
  }, []);

  // 开关切换
  const pulse = useCallback((gamepadIndex: number | null) => {
    if (gamepadIndex !== null) gamepadService.vibrate(gamepadIndex, 100, 0.5, 0.3);
  }, []);

  return { tick, pulse };
}

const subscribeConnection = (onChange: () => void) => gamepadService.onConnect(onChange);
const readConnection = () => gamepadService.hasGamepad();

/**
 * 是否有手柄连接
 */
export function useGamepadConnected(): boolean {
  return useSyncExternalStore(subscribeConnection, readConnection, () => false);
}
