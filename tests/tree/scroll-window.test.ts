import { describe, expect, it } from 'vitest';
import { ScrollWindow } from '../../src/tree/scroll-window.js';

describe('ScrollWindow.fixView', () => {
  it('slides down until the selection is the last visible row', () => {
    const window = new ScrollWindow(0, 5);
    window.fixView(7);
    expect([window.a, window.b]).toEqual([2, 7]);
    expect(window.height).toBe(5);
  });

  it('slides up until the selection is the first visible row', () => {
    const window = new ScrollWindow(4, 9);
    window.fixView(2);
    expect([window.a, window.b]).toEqual([2, 7]);
  });

  it('moves a window that starts above zero back to zero', () => {
    const window = new ScrollWindow(-3, 2);
    window.fixView(0);
    expect([window.a, window.b]).toEqual([0, 5]);
  });

  it('leaves the window alone when the selection is inside', () => {
    const window = new ScrollWindow(3, 8);
    window.fixView(5);
    expect([window.a, window.b]).toEqual([3, 8]);
  });

  it('follows the selection one row at a time past the bottom', () => {
    const window = new ScrollWindow(0, 5);
    for (let current = 0; current <= 7; current++) window.fixView(current);
    expect(window.b).toBeGreaterThanOrEqual(7);
    expect(window.a).toBe(window.b - 5);
  });

  it('always ends with the selection inside the window', () => {
    for (let height = 0; height <= 6; height++) {
      for (let start = -4; start <= 12; start += 4) {
        for (let current = 0; current <= 20; current++) {
          const window = new ScrollWindow(start, start + height);
          window.fixView(current);
          expect(window.contains(current)).toBe(true);
          expect(window.height).toBe(height);
        }
      }
    }
  });
});

describe('ScrollWindow.resize', () => {
  it('grows upwards and is pushed back to zero', () => {
    const window = new ScrollWindow(0, 5);
    window.resize(8, 0);
    expect([window.a, window.b]).toEqual([0, 8]);
  });

  it('grows upwards when scrolled', () => {
    const window = new ScrollWindow(4, 9);
    window.resize(7, 9);
    expect([window.a, window.b]).toEqual([2, 9]);
  });

  it('anchors the bottom below the selection when shrinking', () => {
    const window = new ScrollWindow(2, 7);
    window.resize(3, 7);
    expect([window.a, window.b]).toEqual([5, 8]);
  });

  it('keeps the old top when the selection is near it', () => {
    const window = new ScrollWindow(0, 10);
    window.resize(4, 1);
    expect([window.a, window.b]).toEqual([0, 4]);
  });

  it('keeps the selection visible for any sequence of sizes', () => {
    const window = new ScrollWindow(0, 5);
    const current = 9;
    window.fixView(current);
    for (const height of [2, 8, 1, 12, 0, 3]) {
      window.resize(height, current);
      expect(window.height).toBe(height);
      expect(window.contains(current)).toBe(true);
    }
  });
});

describe('ScrollWindow.range', () => {
  it('lists both bounds inclusively', () => {
    expect(new ScrollWindow(2, 5).range()).toEqual([2, 3, 4, 5]);
  });
});
