/**
 * 焦点状态
 * 整个首页只有一个焦点标识，所有可聚焦元素各自比较是否等于自己
 * 由根组件创建并通过 Context 注入，不做模块级单例
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import type { FocusId } from '../types/launcher';

export interface FocusState {
  /** 当前焦点，空串表示没有焦点 */
  focusedId: FocusId;
  /** 无条件覆盖，不校验标识是否存在 */
  setFocus: (id: FocusId) => void;
  getFocus: () => FocusId;
}

export function createFocusStore(initialId: FocusId = '') {
  return createStore<FocusState>()(
    subscribeWithSelector((set, get) => ({
      focusedId: initialId,
      setFocus: (id) => set({ focusedId: id }),
      getFocus: () => get().focusedId,
    }))
  );
}

export type FocusStore = ReturnType<typeof createFocusStore>;

// 标识重复时多个元素会同时显示焦点，这里不做唯一性检查
export const isFocused = (state: Pick<FocusState, 'focusedId'>, id: FocusId): boolean =>
  id !== '' && state.focusedId === id;
