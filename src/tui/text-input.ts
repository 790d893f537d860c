import { isInputExitKey, isSpaceKeyName } from './key-utils.js';

export interface TextInputState {
  value: string;
  /**
   * Cursor position measured in Unicode codepoints (i.e. `Array.from(value)` index).
   */
  cursor: number;
}

type Edit = (chars: string[], cursor: number) => { chars: string[]; cursor: number };

function clampCursor(chars: readonly string[], cursor: number): number {
  return Math.max(0, Math.min(cursor, chars.length));
}

function isWhitespaceChar(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function wordStartBefore(chars: readonly string[], cursor: number): number {
  let i = cursor;
  while (i > 0 && isWhitespaceChar(chars[i - 1])) i--;
  while (i > 0 && chars[i - 1] !== undefined && !isWhitespaceChar(chars[i - 1])) i--;
  return i;
}

function wordEndAfter(chars: readonly string[], cursor: number): number {
  let i = cursor;
  while (i < chars.length && isWhitespaceChar(chars[i])) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i])) i++;
  return i;
}

function remove(chars: string[], from: number, to: number): { chars: string[]; cursor: number } {
  if (to <= from) return { chars, cursor: from };
  const next = chars.slice();
  next.splice(from, to - from);
  return { chars: next, cursor: from };
}

const move =
  (target: (chars: readonly string[], cursor: number) => number): Edit =>
  (chars, cursor) => ({ chars, cursor: target(chars, cursor) });

const EDIT_TABLE: Record<string, Edit> = {
  LEFT: move((_, c) => c - 1),
  CTRL_B: move((_, c) => c - 1),
  RIGHT: move((_, c) => c + 1),
  CTRL_F: move((_, c) => c + 1),
  HOME: move(() => 0),
  CTRL_A: move(() => 0),
  END: move((chars) => chars.length),
  CTRL_E: move((chars) => chars.length),
  ALT_LEFT: move(wordStartBefore),
  CTRL_LEFT: move(wordStartBefore),
  ALT_B: move(wordStartBefore),
  ALT_RIGHT: move(wordEndAfter),
  CTRL_RIGHT: move(wordEndAfter),
  ALT_F: move(wordEndAfter),
  BACKSPACE: (chars, c) => (c <= 0 ? { chars, cursor: c } : remove(chars, c - 1, c)),
  DELETE: (chars, c) => (c >= chars.length ? { chars, cursor: c } : remove(chars, c, c + 1)),
  CTRL_D: (chars, c) => (c >= chars.length ? { chars, cursor: c } : remove(chars, c, c + 1)),
  CTRL_W: (chars, c) => remove(chars, wordStartBefore(chars, c), c),
  ALT_BACKSPACE: (chars, c) => remove(chars, wordStartBefore(chars, c), c),
  CTRL_U: (chars, c) => remove(chars, 0, c),
  CTRL_K: (chars, c) => remove(chars, c, chars.length),
};

const EDITS = new Map(Object.entries(EDIT_TABLE));

function insert(text: string): Edit {
  return (chars, cursor) => {
    const added = Array.from(text);
    const next = chars.slice();
    next.splice(cursor, 0, ...added);
    return { chars: next, cursor: cursor + added.length };
  };
}

export function createTextInput(initial: string): TextInputState {
  const value = initial ?? '';
  return { value, cursor: Array.from(value).length };
}

/**
 * Apply one terminal-kit key name to the input. Returns null for keys the
 * input does not handle (exit keys, function keys) so callers can route them.
 */
export function applyTextInputKey(
  state: TextInputState,
  name: string
): { state: TextInputState; didChangeValue: boolean } | null {
  if (isInputExitKey(name)) return null;

  const edit = EDITS.get(name) ?? (isSpaceKeyName(name) ? insert(' ') : name.length === 1 ? insert(name) : null);
  if (!edit) return null;

  const chars = Array.from(state.value ?? '');
  const result = edit(chars, clampCursor(chars, state.cursor));
  const value = result.chars.join('');
  return {
    state: { value, cursor: clampCursor(result.chars, result.cursor) },
    didChangeValue: value !== state.value,
  };
}

/**
 * Editable single-line buffer with a focus flag. Row fields and the filter
 * input both use it; keystrokes only ever change the buffer.
 */
export class FieldBuffer {
  private state: TextInputState;
  private hasFocus = false;

  constructor(initial = '') {
    this.state = createTextInput(initial);
  }

  get value(): string {
    return this.state.value;
  }

  get cursor(): number {
    return this.state.cursor;
  }

  get focused(): boolean {
    return this.hasFocus;
  }

  focus(): void {
    this.hasFocus = true;
    this.state = { value: this.state.value, cursor: Array.from(this.state.value).length };
  }

  blur(): void {
    this.hasFocus = false;
  }

  setValue(value: string): void {
    this.state = createTextInput(value);
  }

  clear(): void {
    this.hasFocus = false;
    this.state = createTextInput('');
  }

  /** @returns whether the key was consumed */
  handleKey(name: string): boolean {
    const result = applyTextInputKey(this.state, name);
    if (!result) return false;
    this.state = result.state;
    return true;
  }

  render(): string {
    if (!this.hasFocus) return this.state.value;
    const chars = Array.from(this.state.value);
    chars.splice(this.state.cursor, 0, '|');
    return chars.join('');
  }
}
