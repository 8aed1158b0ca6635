/**
 * 空间导航网格
 * 把界面划分成粗粒度的格子，手柄/键盘方向键在格子之间移动焦点
 *
 * 坐标系：x 向右，y 向下
 * 一个布局可以嵌套子布局（例如首页可滚动的游戏区），
 * 进入/离开子布局时按比例换算入口和出口位置
 */

import type { FocusId } from '../types/launcher';

export class LayoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LayoutError';
  }
}

export interface Point {
  x: number;
  y: number;
}

/** 闭区间矩形 */
export interface Rect {
  readonly xStart: number;
  readonly xEnd: number;
  readonly yStart: number;
  readonly yEnd: number;
}

export function createRect(xStart: number, xEnd: number, yStart: number, yEnd: number): Rect {
  if (xEnd < xStart || yEnd < yStart) {
    throw new LayoutError('end must be greater than or equal to start');
  }
  if (xStart < 0 || yStart < 0) {
    throw new LayoutError(`invalid start ${xStart}, ${yStart}`);
  }
  return { xStart, xEnd, yStart, yEnd };
}

const topLeft = (rect: Rect): Point => ({ x: rect.xStart, y: rect.yStart });
const bottomRight = (rect: Rect): Point => ({ x: rect.xEnd, y: rect.yEnd });
const add = (p: Point, v: Point): Point => ({ x: p.x + v.x, y: p.y + v.y });
const subtract = (p: Point, v: Point): Point => ({ x: p.x - v.x, y: p.y - v.y });

export type Direction = 'up' | 'down' | 'left' | 'right';

const DIRECTION_VECTORS: Record<Direction, Point> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

// 侧向搜索的两个方向
const SIDE_VECTORS: Record<Direction, readonly [Point, Point]> = {
  up: [{ x: -1, y: 0 }, { x: 1, y: 0 }],
  down: [{ x: -1, y: 0 }, { x: 1, y: 0 }],
  left: [{ x: 0, y: -1 }, { x: 0, y: 1 }],
  right: [{ x: 0, y: -1 }, { x: 0, y: 1 }],
};

/** 可以绑定特殊行为的按键（肩键） */
export type NavigationButton = 'prevPage' | 'nextPage';

export type SpecialAction = 'jumpToStart' | 'jumpToEnd';

export type NavigationDirective =
  | { kind: 'direction'; direction: Direction }
  | { kind: 'button'; button: NavigationButton }
  | { kind: 'noop' }; // 只查询当前焦点

export type NavigationResult =
  | { kind: 'within'; focusId: FocusId }
  | { kind: 'across'; focusId: FocusId; layout: LayoutGrid }
  | { kind: 'none' };

export type GrowDirection = 'x' | 'y';

export interface ElementItem {
  kind: 'element';
  focusId: FocusId;
  rect: Rect;
}

export interface SublayoutItem {
  kind: 'sublayout';
  layout: LayoutGrid;
  rect: Rect;
}

type GridItem = ElementItem | SublayoutItem;

const NONE: NavigationResult = { kind: 'none' };

class Grid2D<T> {
  private cells: (T | undefined)[][];

  constructor(public xSize: number, public ySize: number) {
    if (xSize <= 0 || ySize <= 0) {
      throw new LayoutError(`invalid grid size ${xSize}x${ySize}`);
    }
    this.cells = Array.from({ length: xSize }, () => Array.from({ length: ySize }, (): T | undefined => undefined));
  }

  expand(xSize: number, ySize: number) {
    if (xSize < this.xSize || ySize < this.ySize) {
      throw new LayoutError(`cannot shrink grid from ${this.xSize}x${this.ySize} to ${xSize}x${ySize}`);
    }
    for (const column of this.cells) {
      while (column.length < ySize) column.push(undefined);
    }
    while (this.cells.length < xSize) {
      this.cells.push(Array.from({ length: ySize }, (): T | undefined => undefined));
    }
    this.xSize = xSize;
    this.ySize = ySize;
  }

  withinBounds(p: Point): boolean {
    return p.x >= 0 && p.x < this.xSize && p.y >= 0 && p.y < this.ySize;
  }

  fill(rect: Rect, item: T) {
    if (rect.xEnd >= this.xSize || rect.yEnd >= this.ySize) {
      throw new LayoutError('oversized rect detected');
    }
    for (let x = rect.xStart; x <= rect.xEnd; x++) {
      for (let y = rect.yStart; y <= rect.yEnd; y++) {
        if (this.cells[x][y] !== undefined) {
          throw new LayoutError(`overlapping rect at ${x}, ${y}`);
        }
      }
    }
    for (let x = rect.xStart; x <= rect.xEnd; x++) {
      for (let y = rect.yStart; y <= rect.yEnd; y++) {
        this.cells[x][y] = item;
      }
    }
  }

  at(p: Point): T | undefined {
    if (!this.withinBounds(p)) {
      throw new LayoutError(`invalid coordinate ${p.x}, ${p.y}`);
    }
    return this.cells[p.x][p.y];
  }
}

interface GrowState {
  itemX: number;
  itemY: number;
  direction: GrowDirection;
  cursor: Point;
}

export interface LayoutGridOptions {
  xSize: number;
  ySize: number;
  layoutId: string;
  parent?: LayoutGrid | null;
  grow?: { itemX: number; itemY: number; direction: GrowDirection } | null;
}

// 偏移在跨度中的比例，跨度为 0 时取 0
function spanRatio(offset: number, span: number): number {
  return span === 0 ? 0 : offset / span;
}

// 子布局内的结果对父布局来说都是跨布局的
function liftResult(result: NavigationResult, layout: LayoutGrid): NavigationResult {
  return result.kind === 'within' ? { kind: 'across', focusId: result.focusId, layout } : result;
}

export class LayoutGrid {
  readonly layoutId: string;
  private grid: Grid2D<GridItem>;
  private position: Point | null = null;
  private readonly parent: LayoutGrid | null;
  private readonly sublayouts = new Map<string, SublayoutItem>();
  private readonly specialHandlers = new Map<NavigationButton, SpecialAction>();
  private readonly grow: GrowState | null;
  private readonly initialSize: Point;

  constructor(options: LayoutGridOptions) {
    this.layoutId = options.layoutId;
    this.grid = new Grid2D(options.xSize, options.ySize);
    this.initialSize = { x: options.xSize, y: options.ySize };
    this.parent = options.parent ?? null;
    this.grow = options.grow ? { ...options.grow, cursor: { x: 0, y: 0 } } : null;
  }

  get size(): Point {
    return { x: this.grid.xSize, y: this.grid.ySize };
  }

  getParent(): LayoutGrid | null {
    return this.parent;
  }

  addElement(rect: Rect, focusId: FocusId) {
    if (this.grow) {
      throw new LayoutError(`layout ${this.layoutId} is growable, use insertElement instead`);
    }
    this.grid.fill(rect, { kind: 'element', focusId, rect });
  }

  attachSublayout(rect: Rect, layout: LayoutGrid) {
    if (layout.parent !== this) {
      throw new LayoutError(`layout ${layout.layoutId} does not belong to ${this.layoutId}`);
    }
    const item: SublayoutItem = { kind: 'sublayout', layout, rect };
    this.grid.fill(rect, item);
    this.sublayouts.set(layout.layoutId, item);
  }

  setSpecialHandler(button: NavigationButton, action: SpecialAction) {
    this.specialHandlers.set(button, action);
  }

  /**
   * 向可增长布局追加元素
   * 沿增长方向依次放置，行（列）满了换行，超出时扩展网格
   */
  insertElement(focusId: FocusId) {
    const grow = this.grow;
    if (!grow) {
      throw new LayoutError(`no grow config set for layout ${this.layoutId}`);
    }
    const { itemX, itemY, direction, cursor } = grow;
    let rect = createRect(cursor.x, cursor.x + itemX - 1, cursor.y, cursor.y + itemY - 1);

    if (direction === 'x' && rect.xEnd >= this.grid.xSize && rect.xStart > 0) {
      rect = createRect(0, itemX - 1, cursor.y + itemY, cursor.y + 2 * itemY - 1);
    } else if (direction === 'y' && rect.yEnd >= this.grid.ySize && rect.yStart > 0) {
      rect = createRect(cursor.x + itemX, cursor.x + 2 * itemX - 1, 0, itemY - 1);
    }

    if (rect.xEnd >= this.grid.xSize || rect.yEnd >= this.grid.ySize) {
      this.grid.expand(Math.max(this.grid.xSize, rect.xEnd + 1), Math.max(this.grid.ySize, rect.yEnd + 1));
    }

    this.grid.fill(rect, { kind: 'element', focusId, rect });
    grow.cursor = direction === 'x'
      ? { x: rect.xEnd + 1, y: rect.yStart }
      : { x: rect.xStart, y: rect.yEnd + 1 };
  }

  /**
   * 清空并按顺序重新填充可增长布局
   */
  replaceElements(focusIds: readonly FocusId[]) {
    const grow = this.grow;
    if (!grow) {
      throw new LayoutError(`no grow config set for layout ${this.layoutId}`);
    }
    this.grid = new Grid2D(this.initialSize.x, this.initialSize.y);
    grow.cursor = { x: 0, y: 0 };
    this.position = null;
    focusIds.forEach((id) => this.insertElement(id));
  }

  setPosition(p: Point) {
    if (!this.grid.withinBounds(p)) {
      throw new LayoutError(`point ${p.x},${p.y} is outside of the bounds`);
    }
    this.position = p;
  }

  findSublayout(layoutId: string): LayoutGrid | null {
    for (const [id, item] of this.sublayouts) {
      if (id === layoutId) return item.layout;
      const nested = item.layout.findSublayout(layoutId);
      if (nested) return nested;
    }
    return null;
  }

  /** 查找元素所在的布局和位置 */
  locate(focusId: FocusId): { layout: LayoutGrid; point: Point } | null {
    const element = this.elementsInReadingOrder().find((e) => e.focusId === focusId);
    if (element) return { layout: this, point: topLeft(element.rect) };
    for (const item of this.sublayouts.values()) {
      const found = item.layout.locate(focusId);
      if (found) return found;
    }
    return null;
  }

  /** 按阅读顺序（先行后列）列出本布局的元素 */
  elementsInReadingOrder(): ElementItem[] {
    const seen = new Set<GridItem>();
    const elements: ElementItem[] = [];
    for (let y = 0; y < this.grid.ySize; y++) {
      for (let x = 0; x < this.grid.xSize; x++) {
        const item = this.grid.at({ x, y });
        if (item && item.kind === 'element' && !seen.has(item)) {
          seen.add(item);
          elements.push(item);
        }
      }
    }
    return elements;
  }

  navigate(directive: NavigationDirective): NavigationResult {
    switch (directive.kind) {
      case 'button': {
        const action = this.specialHandlers.get(directive.button);
        return action ? this.jump(action) : NONE;
      }
      case 'direction': {
        const current = this.currentItem();
        const { direction } = directive;
        let corner: Point;
        if (current) {
          corner = direction === 'up' || direction === 'left' ? topLeft(current.rect) : bottomRight(current.rect);
        } else if (this.position) {
          corner = this.position;
        } else {
          return NONE;
        }
        return this.scanFrom(corner, direction);
      }
      case 'noop': {
        const current = this.currentItem();
        return current ? { kind: 'within', focusId: current.focusId } : NONE;
      }
    }
  }

  private currentItem(): ElementItem | null {
    if (!this.position) return null;
    const item = this.grid.at(this.position);
    return item && item.kind === 'element' ? item : null;
  }

  private jump(action: SpecialAction): NavigationResult {
    const elements = this.elementsInReadingOrder();
    const target = action === 'jumpToStart' ? elements.at(0) : elements.at(-1);
    if (!target) return NONE;
    this.position = topLeft(target.rect);
    return { kind: 'within', focusId: target.focusId };
  }

  /**
   * 从 corner 出发沿 direction 查找下一个元素
   * 先直线搜索，再逐行向两侧搜索（侧向不进入子布局），出界交给父布局
   */
  private scanFrom(corner: Point, direction: Direction): NavigationResult {
    const step = DIRECTION_VECTORS[direction];
    const first = add(corner, step);
    if (!this.grid.withinBounds(first)) {
      return this.tryNavigateOut(corner, direction);
    }

    for (let next = first; this.grid.withinBounds(next); next = add(next, step)) {
      const result = this.tryNavigateToPoint(next, direction);
      if (result) return result;
    }

    for (let next = first; this.grid.withinBounds(next); next = add(next, step)) {
      const sides = SIDE_VECTORS[direction].map((v) => ({ v, open: true }));
      for (let distance = 1; sides.some((s) => s.open); distance++) {
        for (const side of sides) {
          if (!side.open) continue;
          const p = { x: next.x + side.v.x * distance, y: next.y + side.v.y * distance };
          if (!this.grid.withinBounds(p) || this.grid.at(p)?.kind === 'sublayout') {
            side.open = false;
            continue;
          }
          const result = this.tryNavigateToPoint(p, direction);
          if (result) return result;
        }
      }
    }

    return NONE;
  }

  // 格子为空时返回 null
  private tryNavigateToPoint(p: Point, direction: Direction): NavigationResult | null {
    const item = this.grid.at(p);
    if (!item) return null;
    if (item.kind === 'element') {
      this.position = p;
      return { kind: 'within', focusId: item.focusId };
    }
    const ratio = {
      x: spanRatio(p.x - item.rect.xStart, item.rect.xEnd - item.rect.xStart),
      y: spanRatio(p.y - item.rect.yStart, item.rect.yEnd - item.rect.yStart),
    };
    return liftResult(item.layout.enterFromParent(ratio, direction), item.layout);
  }

  private tryNavigateOut(outFrom: Point, direction: Direction): NavigationResult {
    if (!this.parent) return NONE;
    const ratio = {
      x: spanRatio(outFrom.x, this.grid.xSize - 1),
      y: spanRatio(outFrom.y, this.grid.ySize - 1),
    };
    return liftResult(this.parent.returnFromChild(ratio, direction, this.layoutId), this.parent);
  }

  // 父布局 -> 子布局：父布局给出入口比例
  private enterFromParent(ratio: Point, direction: Direction): NavigationResult {
    const entry = {
      x: Math.floor((this.grid.xSize - 1) * ratio.x),
      y: Math.floor((this.grid.ySize - 1) * ratio.y),
    };
    this.position = entry;
    // 从入口格本身开始搜索，入口所在行也参与侧向搜索
    return this.scanFrom(subtract(entry, DIRECTION_VECTORS[direction]), direction);
  }

  // 子布局 -> 父布局：子布局给出出口比例，从子布局边缘继续搜索
  private returnFromChild(ratio: Point, direction: Direction, childId: string): NavigationResult {
    const child = this.sublayouts.get(childId);
    if (!child) {
      throw new LayoutError(`no sublayout ${childId} found in ${this.layoutId}`);
    }
    const { rect } = child;
    const x = rect.xStart + Math.floor((rect.xEnd - rect.xStart) * ratio.x);
    const y = rect.yStart + Math.floor((rect.yEnd - rect.yStart) * ratio.y);
    const edge: Record<Direction, Point> = {
      up: { x, y: rect.yStart },
      down: { x, y: rect.yEnd },
      left: { x: rect.xStart, y },
      right: { x: rect.xEnd, y },
    };
    return this.scanFrom(edge[direction], direction);
  }
}

/**
 * 布局构建器
 * 子构建器由 withSublayout 返回，只能从根构建器调用 build
 */
export class LayoutGridBuilder {
  private readonly elements: { rect: Rect; focusId: FocusId }[] = [];
  private readonly children: { rect: Rect; builder: LayoutGridBuilder }[] = [];
  private readonly specialHandlers = new Map<NavigationButton, SpecialAction>();
  private grow: { itemX: number; itemY: number; direction: GrowDirection } | null = null;

  constructor(
    private readonly xSize: number,
    private readonly ySize: number,
    private readonly layoutId: string,
    private readonly isRoot = true
  ) {}

  setGrowable(itemX: number, itemY: number, direction: GrowDirection): this {
    if (this.elements.length > 0 || this.children.length > 0) {
      throw new LayoutError("can't set growable when elements are added");
    }
    this.grow = { itemX, itemY, direction };
    return this;
  }

  addElement(rect: Rect, focusId: FocusId): this {
    if (this.grow) {
      throw new LayoutError(`layout ${this.layoutId} is growable, insert elements through the controller`);
    }
    this.elements.push({ rect, focusId });
    return this;
  }

  withSpecialHandler(button: NavigationButton, action: SpecialAction): this {
    this.specialHandlers.set(button, action);
    return this;
  }

  withSublayout(rect: Rect, layoutId: string, xSize: number, ySize: number): LayoutGridBuilder {
    if (this.grow) {
      throw new LayoutError(`growable layout ${this.layoutId} cannot hold sublayouts`);
    }
    const builder = new LayoutGridBuilder(xSize, ySize, layoutId, false);
    this.children.push({ rect, builder });
    return builder;
  }

  build(): LayoutGrid {
    if (!this.isRoot) {
      throw new LayoutError('build must be called from the root builder');
    }
    return this.buildUnder(null);
  }

  private buildUnder(parent: LayoutGrid | null): LayoutGrid {
    const layout = new LayoutGrid({
      xSize: this.xSize,
      ySize: this.ySize,
      layoutId: this.layoutId,
      parent,
      grow: this.grow,
    });
    this.elements.forEach(({ rect, focusId }) => layout.addElement(rect, focusId));
    this.specialHandlers.forEach((action, button) => layout.setSpecialHandler(button, action));
    this.children.forEach(({ rect, builder }) => layout.attachSublayout(rect, builder.buildUnder(layout)));
    return layout;
  }
}

/**
 * 导航控制器
 * 记录当前所在布局和焦点，把方向指令交给当前布局处理
 */
export class NavigationController {
  private currentLayout: LayoutGrid;
  private currentFocusId: FocusId | null = null;

  constructor(private readonly root: LayoutGrid) {
    this.currentLayout = root;
    // 根布局 (0, 0) 处的元素作为默认焦点
    root.setPosition({ x: 0, y: 0 });
    this.navigate({ kind: 'noop' });
  }

  getCurrentFocusId(): FocusId | null {
    return this.currentFocusId;
  }

  getCurrentLayoutId(): string {
    return this.currentLayout.layoutId;
  }

  findLayout(layoutId: string): LayoutGrid | null {
    return this.root.layoutId === layoutId ? this.root : this.root.findSublayout(layoutId);
  }

  navigate(directive: NavigationDirective): NavigationResult {
    const result = this.currentLayout.navigate(directive);
    switch (result.kind) {
      case 'within':
        this.currentFocusId = result.focusId;
        break;
      case 'across':
        this.currentLayout = result.layout;
        this.currentFocusId = result.focusId;
        break;
      case 'none':
        break;
    }
    return result;
  }

  /**
   * 直接把焦点移到指定元素（例如鼠标悬停后同步）
   * 找不到时返回 false，状态不变
   */
  focus(focusId: FocusId): boolean {
    const found = this.root.locate(focusId);
    if (!found) return false;
    found.layout.setPosition(found.point);
    this.currentLayout = found.layout;
    this.currentFocusId = focusId;
    return true;
  }

  /**
   * 替换可增长布局的元素
   * 当前焦点元素被移除时，焦点落到该布局第一个元素，布局为空则回到父布局
   */
  replaceElements(layoutId: string, focusIds: readonly FocusId[]) {
    const layout = this.findLayout(layoutId);
    if (!layout) {
      throw new LayoutError(`no layout ${layoutId} found`);
    }
    layout.replaceElements(focusIds);
    if (this.currentLayout !== layout) return;

    if (this.currentFocusId !== null && this.focus(this.currentFocusId)) return;
    const first = focusIds.at(0);
    if (first !== undefined && this.focus(first)) return;

    this.currentLayout = layout.getParent() ?? this.root;
    const result = this.currentLayout.navigate({ kind: 'noop' });
    this.currentFocusId = result.kind === 'none' ? null : result.focusId;
  }
}
