/**
 * 简单页面的布局导航 Hook
 * 按行描述可聚焦项，用空间导航网格移动，焦点只保存在组件内
 */

import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { useInputActions, useRumble } from './useInputActions';
import { createRect, LayoutGridBuilder, NavigationController } from '../utils/spatialGrid';
import type { InputAction } from '../types/launcher';

/**
 * 按行建立导航控制器，每项占一格
 */
export function createRowsNavigation(rows: readonly (readonly string[])[]): NavigationController {
  const width = Math.max(1, ...rows.map(row => row.length));
  const builder = new LayoutGridBuilder(width, Math.max(1, rows.length), 'rows');
  rows.forEach((row, y) => {
    row.forEach((id, x) => builder.addElement(createRect(x, x, y, y), id));
  });
  return new NavigationController(builder.build());
}

export function useLayoutFocus(options: {
  rows: readonly (readonly string[])[];
  onSelect?: (itemId: string, gamepadIndex: number | null) => void;
  onCancel?: () => void;
  enabled?: boolean;
}) {
  const { rows, onSelect, onCancel, enabled = true } = options;
  const { tick } = useRumble();

  const callbacksRef = useRef({ onSelect, onCancel });
  useEffect(() => { callbacksRef.current = { onSelect, onCancel }; });

  const controller = useMemo(() => createRowsNavigation(rows), [rows]);
  const [focusedItem, setFocusedItem] = useState<string | null>(() => controller.getCurrentFocusId());

  // 行变化后尽量保持原焦点
  useEffect(() => {
    setFocusedItem(prev => (prev !== null && controller.focus(prev) ? prev : controller.getCurrentFocusId()));
  }, [controller]);

  const handleAction = useCallback((action: InputAction, gamepadIndex: number | null = null) => {
    switch (action) {
      case 'confirm':
        if (focusedItem) callbacksRef.current.onSelect?.(focusedItem, gamepadIndex);
        return;
      case 'cancel':
        callbacksRef.current.onCancel?.();
        return;
      case 'up':
      case 'down':
      case 'left':
      case 'right': {
        const result = controller.navigate({ kind: 'direction', direction: action });
        if (result.kind === 'none') return;
        tick(gamepadIndex);
        setFocusedItem(result.focusId);
        return;
      }
      case 'prevPage':
      case 'nextPage':
        return;
    }
  }, [controller, focusedItem, tick]);

  useInputActions(handleAction, enabled);

  const isFocused = useCallback((itemId: string) => focusedItem === itemId, [focusedItem]);

  return { focusedItem, isFocused, handleAction };
}
