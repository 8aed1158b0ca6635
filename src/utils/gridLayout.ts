/**
 * 游戏网格布局
 * 固定列数，行高取视口高度 / 可见行数，与卡片数量无关
 */

import type { GridLayoutConfig } from '../config/homeConfig';
import type { ViewportSize } from '../types/launcher';

export interface TilePlacement {
  index: number;
  row: number;
  column: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface GridLayout {
  itemWidth: number;
  itemHeight: number;
  rowCount: number;
  /** 可滚动内容总高度 */
  contentHeight: number;
  tiles: TilePlacement[];
}

/**
 * 计算网格布局
 * config 需经 createGridLayoutConfig 校验
 */
export function computeGridLayout(
  itemCount: number,
  viewport: ViewportSize,
  config: GridLayoutConfig
): GridLayout {
  const { columns, visibleRows, contentPadding } = config;
  const itemWidth = viewport.width / columns;
  const itemHeight = viewport.height / visibleRows;
  // 向上取整，最后一行不满也要留出完整高度
  const rowCount = Math.ceil(itemCount / columns);

  const tiles: TilePlacement[] = [];
  for (let index = 0; index < itemCount; index++) {
    const row = Math.floor(index / columns);
    const column = index % columns;
    tiles.push({
      index,
      row,
      column,
      x: column * itemWidth,
      y: row * itemHeight,
      width: itemWidth,
      height: itemHeight,
    });
  }

  return {
    itemWidth,
    itemHeight,
    rowCount,
    contentHeight: rowCount * itemHeight + contentPadding,
    tiles,
  };
}

/**
 * 让指定卡片完整出现在视口内所需的滚动位置
 * 已经可见时返回原值
 */
export function scrollOffsetFor(tile: TilePlacement, scrollTop: number, viewportHeight: number): number {
  if (tile.y < scrollTop) return tile.y;
  const bottom = tile.y + tile.height;
  if (bottom > scrollTop + viewportHeight) return bottom - viewportHeight;
  return scrollTop;
}

/**
 * 根据列数把项目分行
 */
export function generateGridRows<T>(items: readonly T[], columns: number): T[][] {
  const rows: T[][] = [];
  for (let i = 0; i < items.length; i += columns) {
    rows.push(items.slice(i, i + columns));
  }
  return rows;
}
