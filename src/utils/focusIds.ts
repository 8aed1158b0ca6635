/**
 * 焦点标识
 * 按钮与游戏卡片共用同一个字符串空间，前缀区分类型
 */

import type { Activation, ButtonKind, FocusId } from '../types/launcher';

export const BUTTON_PREFIX = 'BTN@';
export const GAME_PREFIX = 'GAME@';

export const BUTTON_KINDS: readonly ButtonKind[] = ['GAMES', 'RECENTLY_PLAYED', 'SETTINGS'];

export function isButtonKind(value: string): value is ButtonKind {
  return (BUTTON_KINDS as readonly string[]).includes(value);
}

export function buttonFocusId(kind: ButtonKind): FocusId {
  return `${BUTTON_PREFIX}${kind}`;
}

export function gameFocusId(uuid: string): FocusId {
  return `${GAME_PREFIX}${uuid}`;
}

/**
 * 把焦点标识解析为激活事件
 * 空串、未知前缀、未知按钮都返回 null
 */
export function parseFocusId(id: FocusId): Activation | null {
  if (id.startsWith(BUTTON_PREFIX)) {
    const kind = id.slice(BUTTON_PREFIX.length);
    return isButtonKind(kind) ? { kind: 'button', button: kind } : null;
  }
  if (id.startsWith(GAME_PREFIX)) {
    const uuid = id.slice(GAME_PREFIX.length);
    return uuid ? { kind: 'launch', uuid } : null;
  }
  return null;
}
