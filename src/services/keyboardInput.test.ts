import { describe, it, expect } from 'vitest';
import { mapKeyToAction } from './keyboardInput';

describe('mapKeyToAction', () => {
  it('maps arrows, confirm and cancel keys', () => {
    expect(mapKeyToAction('ArrowLeft')).toBe('left');
    expect(mapKeyToAction('Enter')).toBe('confirm');
    expect(mapKeyToAction(' ')).toBe('confirm');
    expect(mapKeyToAction('Escape')).toBe('cancel');
  });

  it('maps page keys regardless of case', () => {
    expect(mapKeyToAction('Q')).toBe('prevPage');
    expect(mapKeyToAction('e')).toBe('nextPage');
    expect(mapKeyToAction('PageDown')).toBe('nextPage');
  });

  it('ignores other keys', () => {
    expect(mapKeyToAction('x')).toBeNull();
    expect(mapKeyToAction('toString')).toBeNull();
  });
});
