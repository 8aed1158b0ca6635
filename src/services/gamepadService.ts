/**
 * 手柄服务
 * 处理 Gamepad API 的封装和事件管理
 */

import { DEFAULT_INPUT_CONFIG, type InputConfig } from '../config/homeConfig';
import type { InputAction } from '../types/launcher';

// 标准手柄按键映射（参考 Xbox/PS 布局）
export const StandardButton = {
  A: 0,            // Xbox A / PS ✕ - 确认
  B: 1,            // Xbox B / PS ○ - 返回
  LeftBumper: 4,   // LB / L1 - 跳到开头
  RightBumper: 5,  // RB / R1 - 跳到末尾
  DpadUp: 12,
  DpadDown: 13,
  DpadLeft: 14,
  DpadRight: 15,
} as const;

// 手柄轴映射
export const StandardAxis = {
  LeftStickX: 0,   // 左摇杆横向 (-1 到 1)
  LeftStickY: 1,   // 左摇杆纵向 (-1 到 1)
} as const;

/** 轮询时读取的手柄状态，真实 Gamepad 对象满足此结构 */
export interface GamepadSnapshot {
  readonly index: number;
  readonly buttons: readonly { readonly pressed: boolean }[];
  readonly axes: readonly number[];
}

type ActionListener = (action: InputAction, gamepadIndex: number) => void;
type ConnectListener = (gamepad: Gamepad, connected: boolean) => void;

interface RumbleActuator {
  playEffect: (
    type: 'dual-rumble',
    params: { duration: number; weakMagnitude: number; strongMagnitude: number }
  ) => Promise<unknown>;
}

function canRumble(actuator: unknown): actuator is RumbleActuator {
  return typeof actuator === 'object'
    && actuator !== null
    && 'playEffect' in actuator
    && typeof actuator.playEffect === 'function';
}

/**
 * 读取当前手柄列表
 * 不支持 Gamepad API 的环境返回空数组
 */
export function readGamepads(): readonly (Gamepad | null)[] {
  if (typeof navigator === 'undefined' || typeof navigator.getGamepads !== 'function') {
    return [];
  }
  return navigator.getGamepads();
}

/**
 * 将按键索引映射到动作
 */
export function mapButtonToAction(buttonIndex: number): InputAction | null {
  switch (buttonIndex) {
    case StandardButton.A:
      return 'confirm';
    case StandardButton.B:
      return 'cancel';
    case StandardButton.LeftBumper:
      return 'prevPage';
    case StandardButton.RightBumper:
      return 'nextPage';
    case StandardButton.DpadUp:
      return 'up';
    case StandardButton.DpadDown:
      return 'down';
    case StandardButton.DpadLeft:
      return 'left';
    case StandardButton.DpadRight:
      return 'right';
    default:
      return null;
  }
}

const DIRECTIONAL_BUTTONS: readonly number[] = [
  StandardButton.DpadUp,
  StandardButton.DpadDown,
  StandardButton.DpadLeft,
  StandardButton.DpadRight,
];

/**
 * 手柄服务类
 * 按键只在按下的那一帧触发，方向键和摇杆按住后自动重复
 */
export class GamepadService {
  private isRunning = false;
  private animationFrameId: number | null = null;
  private actionListeners: Set<ActionListener> = new Set();
  private connectListeners: Set<ConnectListener> = new Set();

  // 按键状态追踪（用于检测按下/释放）
  private buttonStates: Map<number, Map<number, boolean>> = new Map();
  // 摇杆方向状态追踪
  private stickStates: Map<number, { x: number; y: number }> = new Map();
  // 按键重复计时器
  private repeatTimers: Map<string, { lastTime: number; isHeld: boolean }> = new Map();

  private connectedGamepads: Map<number, Gamepad> = new Map();
  private vibrationEnabled = true;
  private input: InputConfig;

  constructor(input: InputConfig = DEFAULT_INPUT_CONFIG) {
    this.input = input;
    if (typeof window !== 'undefined') {
      window.addEventListener('gamepadconnected', this.handleGamepadConnected);
      window.addEventListener('gamepaddisconnected', this.handleGamepadDisconnected);
    }
  }

  /**
   * 更新输入节奏配置
   */
  configure(input: InputConfig) {
    this.input = input;
  }

  /**
   * 启动手柄轮询
   */
  start() {
    if (this.isRunning || typeof requestAnimationFrame === 'undefined') return;
    this.isRunning = true;
    this.pollGamepads();
  }

  /**
   * 停止手柄轮询
   */
  stop() {
    this.isRunning = false;
    if (this.animationFrameId !== null) {
      cancelAnimationFrame(this.animationFrameId);
      this.animationFrameId = null;
    }
  }

  /**
   * 添加手柄动作监听器
   */
  onAction(listener: ActionListener): () => void {
    this.actionListeners.add(listener);
    return () => {
      this.actionListeners.delete(listener);
    };
  }

  /**
   * 添加手柄连接监听器
   */
  onConnect(listener: ConnectListener): () => void {
    this.connectListeners.add(listener);
    return () => {
      this.connectListeners.delete(listener);
    };
  }

  hasGamepad(): boolean {
    return this.connectedGamepads.size > 0;
  }

  /**
   * 触发手柄震动
   */
  vibrate(gamepadIndex: number, duration = 100, weakMagnitude = 0.5, strongMagnitude = 0.5) {
    if (!this.vibrationEnabled) return;

    const actuator = this.connectedGamepads.get(gamepadIndex)?.vibrationActuator;
    if (!canRumble(actuator)) return;

    actuator
      .playEffect('dual-rumble', { duration, weakMagnitude, strongMagnitude })
      .catch((e: unknown) => {
        // 某些浏览器声明了接口但不支持
        console.debug('[GamepadService] 手柄震动不可用:', e);
      });
  }

  setVibrationEnabled(enabled: boolean) {
    this.vibrationEnabled = enabled;
  }

  isVibrationEnabled(): boolean {
    return this.vibrationEnabled;
  }

  /**
   * 处理一帧的手柄状态
   */
  processGamepads(gamepads: readonly (GamepadSnapshot | null)[], now: number) {
    for (const gamepad of gamepads) {
      if (!gamepad) continue;
      this.processButtons(gamepad, now);
      this.processSticks(gamepad, now);
    }
  }

  private handleGamepadConnected = (event: GamepadEvent) => {
    const gamepad = event.gamepad;
    this.connectedGamepads.set(gamepad.index, gamepad);
    this.buttonStates.set(gamepad.index, new Map());
    this.stickStates.set(gamepad.index, { x: 0, y: 0 });

    console.log(`[GamepadService] 手柄已连接: ${gamepad.id} (索引: ${gamepad.index})`);
    this.connectListeners.forEach(listener => listener(gamepad, true));
    this.start();
  };

  private handleGamepadDisconnected = (event: GamepadEvent) => {
    const gamepad = event.gamepad;
    this.connectedGamepads.delete(gamepad.index);
    this.buttonStates.delete(gamepad.index);
    this.stickStates.delete(gamepad.index);

    console.log(`[GamepadService] 手柄已断开: ${gamepad.id} (索引: ${gamepad.index})`);
    this.connectListeners.forEach(listener => listener(gamepad, false));

    if (this.connectedGamepads.size === 0) {
      this.stop();
    }
  };

  private pollGamepads = () => {
    if (!this.isRunning) return;

    const gamepads = readGamepads();
    for (const gamepad of gamepads) {
      if (gamepad) this.connectedGamepads.set(gamepad.index, gamepad);
    }
    this.processGamepads(gamepads, Date.now());

    this.animationFrameId = requestAnimationFrame(this.pollGamepads);
  };

  // 按住时是否该重复触发
  private shouldRepeat(repeatKey: string, now: number): boolean {
    const repeatState = this.repeatTimers.get(repeatKey);
    if (!repeatState) return false;
    const elapsed = now - repeatState.lastTime;
    const threshold = repeatState.isHeld ? this.input.repeatDelay : this.input.repeatInterval;
    if (elapsed < threshold) return false;
    this.repeatTimers.set(repeatKey, { lastTime: now, isHeld: false });
    return true;
  }

  private processButtons(gamepad: GamepadSnapshot, now: number) {
    const buttonState = this.buttonStates.get(gamepad.index) ?? new Map<number, boolean>();

    gamepad.buttons.forEach((button, index) => {
      const wasPressed = buttonState.get(index) ?? false;
      const isPressed = button.pressed;
      const repeatKey = `${gamepad.index}-${index}`;

      if (isPressed && !wasPressed) {
        buttonState.set(index, true);
        const action = mapButtonToAction(index);
        if (action) {
          this.emitAction(action, gamepad.index);
          this.repeatTimers.set(repeatKey, { lastTime: now, isHeld: true });
        }
      } else if (!isPressed && wasPressed) {
        buttonState.set(index, false);
        this.repeatTimers.delete(repeatKey);
      } else if (isPressed && wasPressed && DIRECTIONAL_BUTTONS.includes(index)) {
        // 只对方向键启用重复
        const action = mapButtonToAction(index);
        if (action && this.shouldRepeat(repeatKey, now)) {
          this.emitAction(action, gamepad.index);
        }
      }
    });

    this.buttonStates.set(gamepad.index, buttonState);
  }

  private processSticks(gamepad: GamepadSnapshot, now: number) {
    const stickState = this.stickStates.get(gamepad.index) ?? { x: 0, y: 0 };
    const deadzone = this.input.stickDeadzone;

    const leftX = gamepad.axes[StandardAxis.LeftStickX] ?? 0;
    const leftY = gamepad.axes[StandardAxis.LeftStickY] ?? 0;

    const newX = Math.abs(leftX) > deadzone ? Math.sign(leftX) : 0;
    const newY = Math.abs(leftY) > deadzone ? Math.sign(leftY) : 0;
    const xKey = `${gamepad.index}-stickX`;
    const yKey = `${gamepad.index}-stickY`;

    if (newX !== stickState.x) {
      if (newX !== 0) {
        this.emitAction(newX > 0 ? 'right' : 'left', gamepad.index);
        this.repeatTimers.set(xKey, { lastTime: now, isHeld: true });
      } else {
        this.repeatTimers.delete(xKey);
      }
    } else if (newX !== 0 && this.shouldRepeat(xKey, now)) {
      this.emitAction(newX > 0 ? 'right' : 'left', gamepad.index);
    }

    if (newY !== stickState.y) {
      if (newY !== 0) {
        this.emitAction(newY > 0 ? 'down' : 'up', gamepad.index);
        this.repeatTimers.set(yKey, { lastTime: now, isHeld: true });
      } else {
        this.repeatTimers.delete(yKey);
      }
    } else if (newY !== 0 && this.shouldRepeat(yKey, now)) {
      this.emitAction(newY > 0 ? 'down' : 'up', gamepad.index);
    }

    this.stickStates.set(gamepad.index, { x: newX, y: newY });
  }

  private emitAction(action: InputAction, gamepadIndex: number) {
    this.actionListeners.forEach(listener => listener(action, gamepadIndex));
  }
}

// 导出单例实例，浏览器里手柄本身就是全局设备
export const gamepadService = new GamepadService();
