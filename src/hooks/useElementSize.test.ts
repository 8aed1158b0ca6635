import { describe, it, expect, vi, afterEach } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { useElementSize } from './useElementSize';

function sizedElement(width: number, height: number) {
  const element = document.createElement('div');
  const resize = (w: number, h: number) => {
    Object.defineProperty(element, 'clientWidth', { configurable: true, value: w });
    Object.defineProperty(element, 'clientHeight', { configurable: true, value: h });
  };
  resize(width, height);
  return { element, resize };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('useElementSize', () => {
  it('measures on mount', () => {
    const { element } = sizedElement(700, 300);
    const { result } = renderHook(() => useElementSize({ current: element }));
    expect(result.current).toEqual({ width: 700, height: 300 });
  });

  it('re-measures when the element resizes without a window resize', () => {
    const callbacks: (() => void)[] = [];
    const disconnect = vi.fn();
    vi.stubGlobal('ResizeObserver', class {
      constructor(callback: () => void) {
        callbacks.push(callback);
      }
      observe() {}
      disconnect() {
        disconnect();
      }
    });

    const { element, resize } = sizedElement(700, 300);
    const ref = { current: element };
    const { result, unmount } = renderHook(() => useElementSize(ref));

    resize(1400, 600);
    act(() => callbacks.forEach(callback => callback()));
    expect(result.current).toEqual({ width: 1400, height: 600 });

    unmount();
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it('falls back to window resize events', () => {
    vi.stubGlobal('ResizeObserver', undefined);
    const { element, resize } = sizedElement(700, 300);
    const ref = { current: element };
    const { result } = renderHook(() => useElementSize(ref));

    resize(350, 150);
    act(() => {
      window.dispatchEvent(new Event('resize'));
    });
    expect(result.current).toEqual({ width: 350, height: 150 });
  });
});
