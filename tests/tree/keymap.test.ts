import { describe, expect, it } from 'vitest';
import { buildKeyLookup, DEFAULT_KEY_BINDINGS, isNavigateAction, NAVIGATE_ACTIONS } from '../../src/tree/keymap.js';

describe('buildKeyLookup', () => {
  it('maps the default keys', () => {
    const lookup = buildKeyLookup();
    expect(lookup.get('j')).toBe('moveDown');
    expect(lookup.get('DOWN')).toBe('moveDown');
    expect(lookup.get('K')).toBe('shiftUp');
    expect(lookup.get('/')).toBe('startFilter');
    expect(lookup.get('ESCAPE')).toBe('stopFilter');
    expect(lookup.get('TAB')).toBe('switchPane');
    expect(lookup.get('F5')).toBeUndefined();
  });

  it('replaces the whole key list of an overridden action', () => {
    const lookup = buildKeyLookup({ moveDown: ['n'] });
    expect(lookup.get('n')).toBe('moveDown');
    expect(lookup.get('j')).toBeUndefined();
    expect(lookup.get('DOWN')).toBeUndefined();
    expect(lookup.get('k')).toBe('moveUp');
  });

  it('lets the later action win a contested key', () => {
    const lookup = buildKeyLookup({ addSibling: ['x'] });
    expect(lookup.get('x')).toBe('remove');
  });

  it('binds every action by default', () => {
    for (const action of NAVIGATE_ACTIONS) {
      expect(DEFAULT_KEY_BINDINGS[action].length).toBeGreaterThan(0);
    }
  });
});

describe('isNavigateAction', () => {
  it('accepts action names only', () => {
    expect(isNavigateAction('moveToTop')).toBe(true);
    expect(isNavigateAction('fly')).toBe(false);
  });
});
