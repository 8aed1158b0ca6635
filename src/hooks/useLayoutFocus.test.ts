import { describe, it, expect, vi } from 'vitest';
import { act, renderHook } from '@testing-library/react';
import { createRowsNavigation, useLayoutFocus } from './useLayoutFocus';

const ROWS = [['back'], ['lang-english', 'lang-schinese'], ['theme']];

describe('createRowsNavigation', () => {
  it('starts on the first item', () => {
    expect(createRowsNavigation(ROWS).getCurrentFocusId()).toBe('back');
  });

  it('moves between rows of different widths', () => {
    const controller = createRowsNavigation(ROWS);
    controller.navigate({ kind: 'direction', direction: 'down' });
    expect(controller.getCurrentFocusId()).toBe('lang-english');
    controller.navigate({ kind: 'direction', direction: 'right' });
    expect(controller.getCurrentFocusId()).toBe('lang-schinese');
    controller.navigate({ kind: 'direction', direction: 'down' });
    expect(controller.getCurrentFocusId()).toBe('theme');
  });
});

describe('useLayoutFocus', () => {
  it('selects the focused item on confirm', () => {
    const onSelect = vi.fn();
    const { result } = renderHook(() => useLayoutFocus({ rows: ROWS, onSelect, enabled: false }));

    act(() => result.current.handleAction('down'));
    expect(result.current.focusedItem).toBe('lang-english');
    expect(result.current.isFocused('lang-english')).toBe(true);

    act(() => result.current.handleAction('confirm'));
    expect(onSelect).toHaveBeenCalledWith('lang-english', null);
  });

  it('calls onCancel', () => {
    const onCancel = vi.fn();
    const { result } = renderHook(() => useLayoutFocus({ rows: ROWS, onCancel, enabled: false }));
    act(() => result.current.handleAction('cancel'));
    expect(onCancel).toHaveBeenCalledTimes(1);
  });
});
