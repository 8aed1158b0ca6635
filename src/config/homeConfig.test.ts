import { describe, it, expect } from 'vitest';
import { createGridLayoutConfig, createHomeConfig, LayoutConfigError } from './homeConfig';

describe('createGridLayoutConfig', () => {
  it('fills in the defaults', () => {
    expect(createGridLayoutConfig()).toEqual({ columns: 7, visibleRows: 3, contentPadding: 100 });
  });

  it('rejects zero columns', () => {
    expect(() => createGridLayoutConfig({ columns: 0 })).toThrow(LayoutConfigError);
  });

  it('rejects fractional visible rows and negative padding', () => {
    expect(() => createGridLayoutConfig({ visibleRows: 2.5 })).toThrow('visibleRows must be a positive integer, got 2.5');
    expect(() => createGridLayoutConfig({ contentPadding: -1 })).toThrow(LayoutConfigError);
  });
});

describe('createHomeConfig', () => {
  it('merges overrides per section', () => {
    const config = createHomeConfig({ grid: { columns: 5 }, input: { repeatDelay: 250 } });
    expect(config.grid.columns).toBe(5);
    expect(config.grid.visibleRows).toBe(3);
    expect(config.input).toEqual({ stickDeadzone: 0.5, repeatDelay: 250, repeatInterval: 100 });
  });

  it('rejects a dead zone of one or more', () => {
    expect(() => createHomeConfig({ input: { stickDeadzone: 1 } })).toThrow(LayoutConfigError);
  });
});

describe('createHomeConfig input timing', () => {
  it('rejects NaN in every input field', () => {
    expect(() => createHomeConfig({ input: { stickDeadzone: NaN } }))
      .toThrow('stickDeadzone must be in [0, 1), got NaN');
    expect(() => createHomeConfig({ input: { repeatDelay: NaN } }))
      .toThrow('repeatDelay must be a positive number of milliseconds, got NaN');
    expect(() => createHomeConfig({ input: { repeatInterval: NaN } }))
      .toThrow('repeatInterval must be a positive number of milliseconds, got NaN');
  });

  it('rejects zero and infinite repeat timings', () => {
    expect(() => createHomeConfig({ input: { repeatDelay: 0 } })).toThrow(LayoutConfigError);
    expect(() => createHomeConfig({ input: { repeatInterval: Infinity } }))
      .toThrow('repeatInterval must be a positive number of milliseconds, got Infinity');
  });
});
