import { describe, it, expect } from 'vitest';
import { createGridLayoutConfig } from '../config/homeConfig';
import { computeGridLayout, generateGridRows, scrollOffsetFor } from './gridLayout';

const config = createGridLayoutConfig();
const viewport = { width: 1400, height: 600 };

describe('computeGridLayout', () => {
  it('rounds the row count up for a partial last row', () => {
    const layout = computeGridLayout(27, viewport, config);
    expect(layout.rowCount).toBe(4);
    expect(layout.itemWidth).toBe(200);
    expect(layout.itemHeight).toBe(200);
    expect(layout.contentHeight).toBe(4 * 200 + 100);
  });

  it('places index 26 at row 3, column 5', () => {
    const tile = computeGridLayout(27, viewport, config).tiles[26];
    expect(tile).toEqual({ index: 26, row: 3, column: 5, x: 1000, y: 600, width: 200, height: 200 });
  });

  it('fits the last row inside the content height', () => {
    for (const n of [1, 6, 7, 8, 14, 15, 50]) {
      const layout = computeGridLayout(n, viewport, config);
      const last = layout.tiles[n - 1];
      expect(layout.contentHeight).toBeGreaterThanOrEqual(last.y + last.height);
    }
  });

  it('gives every tile a distinct cell', () => {
    const layout = computeGridLayout(23, viewport, config);
    const cells = new Set(layout.tiles.map((t) => `${t.row}:${t.column}`));
    expect(cells.size).toBe(23);
    expect(layout.tiles.every((t) => t.column >= 0 && t.column < 7)).toBe(true);
  });

  it('returns only the padding for an empty list', () => {
    const layout = computeGridLayout(0, viewport, config);
    expect(layout.tiles).toEqual([]);
    expect(layout.rowCount).toBe(0);
    expect(layout.contentHeight).toBe(100);
  });

  it('keeps the row height fixed as the list grows', () => {
    expect(computeGridLayout(3, viewport, config).itemHeight).toBe(computeGridLayout(70, viewport, config).itemHeight);
  });

  it('is idempotent for identical input', () => {
    expect(computeGridLayout(12, viewport, config)).toEqual(computeGridLayout(12, viewport, config));
  });

  it('follows viewport width changes', () => {
    expect(computeGridLayout(1, { width: 700, height: 600 }, config).itemWidth).toBe(100);
  });
});

describe('scrollOffsetFor', () => {
  const tile = { index: 7, row: 1, column: 0, x: 0, y: 200, width: 200, height: 200 };

  it('keeps the scroll position when the tile is visible', () => {
    expect(scrollOffsetFor(tile, 0, 400)).toBe(0);
  });

  it('scrolls up to a tile above the viewport', () => {
    expect(scrollOffsetFor(tile, 350, 400)).toBe(200);
  });

  it('scrolls down so the tile bottom meets the viewport bottom', () => {
    expect(scrollOffsetFor(tile, 0, 300)).toBe(100);
  });
});

describe('generateGridRows', () => {
  it('splits items into rows', () => {
    expect(generateGridRows(['a', 'b', 'c', 'd', 'e'], 2)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });
});
