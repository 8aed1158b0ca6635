/**
 * 激活分发
 * 点击/确认键产生一次激活，解析为带标签的 Activation 交给宿主
 * 分发只通知，不改变焦点
 */

import type { Activation, FocusId } from '../types/launcher';
import { parseFocusId } from '../utils/focusIds';

type ActivationListener = (activation: Activation) => void;

export class ActivationDispatcher {
  private listeners: Set<ActivationListener> = new Set();

  /**
   * 添加激活监听器，返回取消函数
   */
  onActivation(listener: ActivationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * 分发一次激活
   * 无法识别的标识或没有监听器时静默忽略
   */
  dispatch(id: FocusId): Activation | null {
    const activation = parseFocusId(id);
    if (!activation) {
      console.debug(`[ActivationDispatcher] 忽略未知标识: "${id}"`);
      return null;
    }
    if (this.listeners.size === 0) {
      console.debug(`[ActivationDispatcher] 没有监听器: ${id}`);
      return activation;
    }
    this.listeners.forEach(listener => listener(activation));
    return activation;
  }
}
