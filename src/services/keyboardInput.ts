/**
 * 键盘输入映射
 */

import type { InputAction } from '../types/launcher';

const KEY_ACTIONS: Record<string, InputAction> = {
  ArrowUp: 'up',
  ArrowDown: 'down',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  Enter: 'confirm',
  ' ': 'confirm',
  Escape: 'cancel',
  Backspace: 'cancel',
  PageUp: 'prevPage',
  PageDown: 'nextPage',
  q: 'prevPage',
  e: 'nextPage',
};

/**
 * 把 KeyboardEvent.key 映射为动作，字母不区分大小写
 */
export function mapKeyToAction(key: string): InputAction | null {
  const normalized = key.length === 1 ? key.toLowerCase() : key;
  return Object.hasOwn(KEY_ACTIONS, normalized) ? KEY_ACTIONS[normalized] : null;
}
