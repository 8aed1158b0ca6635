/**
 * 输入模式检测 Hook
 * 自动检测用户当前使用的输入方式（手柄/键鼠/触屏）
 * 手柄模式：控件效果只由焦点决定，禁用鼠标 hover
 * 键鼠模式：hover 和焦点同时生效
 */

import { useState, useEffect, useCallback, useRef } from 'react';
import { readGamepads } from '../services/gamepadService';

/** 输入模式类型 */
export type InputMode = 'gamepad' | 'keyboard' | 'touch';

// 手柄输入后这段时间内忽略键鼠事件（毫秒）
const GAMEPAD_GRACE = 100;

export function useInputMode() {
  const [inputMode, setInputMode] = useState<InputMode>('keyboard');
  const lastGamepadInput = useRef(0);

  const handleGamepadInput = useCallback(() => {
    lastGamepadInput.current = Date.now();
    setInputMode('gamepad');
  }, []);

  const handlePointerInput = useCallback((mode: Exclude<InputMode, 'gamepad'>) => {
    if (Date.now() - lastGamepadInput.current < GAMEPAD_GRACE) return;
    setInputMode(mode);
  }, []);

  // 设置输入模式属性，CSS 根据此属性决定 hover 是否生效
  useEffect(() => {
    document.documentElement.setAttribute('data-input-mode', inputMode);

    return () => {
      document.documentElement.removeAttribute('data-input-mode');
    };
  }, [inputMode]);

  useEffect(() => {
    const onKeyboardMouse = () => handlePointerInput('keyboard');
    const onTouchStart = () => handlePointerInput('touch');

    let animationFrameId = 0;
    let lastButtons: boolean[] = [];

    const pollGamepad = () => {
      for (const gamepad of readGamepads()) {
        if (!gamepad) continue;

        const currentButtons = gamepad.buttons.map(b => b.pressed);
        const hasButtonChange = currentButtons.some((pressed, i) => pressed && !lastButtons[i]);
        const hasAxisMove = gamepad.axes.some(axis => Math.abs(axis) > 0.5);

        if (hasButtonChange || hasAxisMove) {
          handleGamepadInput();
        }

        lastButtons = currentButtons;
      }

      animationFrameId = requestAnimationFrame(pollGamepad);
    };

    window.addEventListener('keydown', onKeyboardMouse);
    window.addEventListener('mousemove', onKeyboardMouse);
    window.addEventListener('mousedown', onKeyboardMouse);
    window.addEventListener('touchstart', onTouchStart);
    animationFrameId = requestAnimationFrame(pollGamepad);

    return () => {
      window.removeEventListener('keydown', onKeyboardMouse);
      window.removeEventListener('mousemove', onKeyboardMouse);
      window.removeEventListener('mousedown', onKeyboardMouse);
      window.removeEventListener('touchstart', onTouchStart);
      cancelAnimationFrame(animationFrameId);
    };
  }, [handlePointerInput, handleGamepadInput]);
}
