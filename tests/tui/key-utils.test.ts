import { describe, expect, it } from 'vitest';
import { isInputExitKey, isSpaceKeyName } from '../../src/tui/key-utils.js';

describe('key utils', () => {
  it('recognizes both spellings of space', () => {
    expect(isSpaceKeyName('SPACE')).toBe(true);
    expect(isSpaceKeyName(' ')).toBe(true);
    expect(isSpaceKeyName('s')).toBe(false);
  });

  it('treats the keys that leave an input as exit keys', () => {
    for (const key of ['ESCAPE', 'CTRL_C', 'ENTER', 'TAB']) expect(isInputExitKey(key)).toBe(true);
    expect(isInputExitKey('q')).toBe(false);
  });
});
