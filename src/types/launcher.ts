/**
 * 启动器类型定义
 */

// 可聚焦元素的标识，静态按钮为 BTN@<KIND>，游戏卡片为 GAME@<uuid>
export type FocusId = string;

// 标题栏按钮
export type ButtonKind = 'GAMES' | 'RECENTLY_PLAYED' | 'SETTINGS';

// 首页网格中展示的游戏
export interface GameData {
  title: string;
  uuid: string; // 由宿主提供，列表内唯一
}

// 激活事件，宿主需对每种情况做穷尽处理
export type Activation =
  | { kind: 'button'; button: ButtonKind }
  | { kind: 'launch'; uuid: string };

// 手柄/键盘输入动作
export type InputAction =
  | 'confirm'   // 确认 (A / Enter)
  | 'cancel'    // 返回 (B / Escape)
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'prevPage'  // 左肩键，跳到列表开头
  | 'nextPage'; // 右肩键，跳到列表末尾

// 图片来源：文件路径或 base64 编码
export type ImageSource =
  | { kind: 'path'; path: string }
  | { kind: 'base64'; data: string };

/**
 * 游戏元数据
 * 数据来源可以是 igdb.com 之类的站点
 */
export interface GameMetadata {
  title: string;
  description?: string;
  /** 全部小写 */
  genres: string[];
  /** ISO 日期，不带时区 */
  releaseDate?: string;
  developers: string[];
  publishers: string[];
  platform?: string;
  links: string[];
  /** 用户自定义标签 */
  tags: string[];
  coverArt?: ImageSource;
  backgroundArt?: ImageSource;
  /** 游玩时长（分钟） */
  playtimeMinutes?: number;
  favorite: boolean;
  uuid: string;
  installSource?: string;
  launchOptions: string[];
}

// 视口尺寸
export interface ViewportSize {
  width: number;
  height: number;
}
