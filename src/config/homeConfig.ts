/**
 * 首页配置
 * 网格常量、输入节奏、背景图
 */

export class LayoutConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutConfigError';
  }
}

export interface GridLayoutConfig {
  /** 每行卡片数 */
  columns: number;
  /** 视口内可见行数，决定卡片高度 */
  visibleRows: number;
  /** 内容区底部留白 */
  contentPadding: number;
}

export interface InputConfig {
  /** 摇杆死区阈值 */
  stickDeadzone: number;
  /** 方向键按住后开始重复的延迟（毫秒） */
  repeatDelay: number;
  /** 重复间隔（毫秒） */
  repeatInterval: number;
}

export interface HomeConfig {
  grid: GridLayoutConfig;
  input: InputConfig;
  backgroundImage: string;
}

export const DEFAULT_GRID_CONFIG: GridLayoutConfig = {
  columns: 7,
  visibleRows: 3,
  contentPadding: 100,
};

export const DEFAULT_INPUT_CONFIG: InputConfig = {
  stickDeadzone: 0.5,
  repeatDelay: 400,
  repeatInterval: 100,
};

function requirePositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new LayoutConfigError(`${name} must be a positive integer, got ${value}`);
  }
}

// NaN 和 Infinity 也在这里拒绝
function requirePositiveDuration(name: string, value: number) {
  if (!Number.isFinite(value) || value <= 0) {
    throw new LayoutConfigError(`${name} must be a positive number of milliseconds, got ${value}`);
  }
}

/**
 * 创建网格配置
 * 列数为 0 之类的非法配置在这里拒绝，布局计算不再检查
 */
export function createGridLayoutConfig(overrides: Partial<GridLayoutConfig> = {}): GridLayoutConfig {
  const config = { ...DEFAULT_GRID_CONFIG, ...overrides };
  requirePositiveInteger('columns', config.columns);
  requirePositiveInteger('visibleRows', config.visibleRows);
  if (!Number.isFinite(config.contentPadding) || config.contentPadding < 0) {
    throw new LayoutConfigError(`contentPadding must be a non-negative number, got ${config.contentPadding}`);
  }
  return config;
}

export function createHomeConfig(overrides: {
  grid?: Partial<GridLayoutConfig>;
  input?: Partial<InputConfig>;
  backgroundImage?: string;
} = {}): HomeConfig {
  const input = { ...DEFAULT_INPUT_CONFIG, ...overrides.input };
  if (!Number.isFinite(input.stickDeadzone) || input.stickDeadzone < 0 || input.stickDeadzone >= 1) {
    throw new LayoutConfigError(`stickDeadzone must be in [0, 1), got ${input.stickDeadzone}`);
  }
  requirePositiveDuration('repeatDelay', input.repeatDelay);
  requirePositiveDuration('repeatInterval', input.repeatInterval);
  return {
    grid: createGridLayoutConfig(overrides.grid),
    input,
    backgroundImage: overrides.backgroundImage ?? '/assets/background.jpg',
  };
}
