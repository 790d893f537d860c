import terminalKit from 'terminal-kit';
import type { NavigationController } from '../tree/controller.js';
import { FilterError } from '../tree/errors.js';
import { compileFilter } from '../tree/flatten.js';
import type { RowView } from '../tree/types.js';

export type SegmentStyle = 'text' | 'dim' | 'border' | 'focusBorder' | 'title' | 'selected' | 'editing' | 'match' | 'error';

export interface Segment {
  text: string;
  style: SegmentStyle;
}

export type Line = Segment[];

export interface PaneOptions {
  title: string;
  width: number;
  height: number;
  focused: boolean;
}

const INDENT = '  ';
const EXPANDED_MARK = '▾ ';
const COLLAPSED_MARK = '▸ ';
const LEAF_MARK = '  ';

export function lineWidth(line: Line): number {
  return line.reduce((sum, segment) => sum + terminalKit.stringWidth(segment.text), 0);
}

/** Cut a line to `width` columns and pad the rest with `padStyle` spaces. */
export function fitLine(line: Line, width: number, padStyle: SegmentStyle = 'text'): Line {
  const out: Line = [];
  let remaining = width;
  for (const segment of line) {
    if (remaining <= 0) break;
    if (!segment.text) continue;
    const segmentWidth = terminalKit.stringWidth(segment.text);
    if (segmentWidth <= remaining) {
      out.push(segment);
      remaining -= segmentWidth;
    } else {
      out.push({ text: terminalKit.truncateString(segment.text, remaining), style: segment.style });
      remaining = 0;
    }
  }
  if (remaining > 0) out.push({ text: ' '.repeat(remaining), style: padStyle });
  return out;
}

/** Split `text` into matched and unmatched runs of `pattern`. */
export function splitMatches(text: string, pattern: string): { text: string; match: boolean }[] {
  if (!pattern) return [{ text, match: false }];

  let matcher: RegExp;
  try {
    matcher = compileFilter(pattern, 'g');
  } catch (error) {
    if (error instanceof FilterError) return [{ text, match: false }];
    throw error;
  }

  const parts: { text: string; match: boolean }[] = [];
  let last = 0;
  for (let found = matcher.exec(text); found !== null; found = matcher.exec(text)) {
    if (found[0].length === 0) {
      matcher.lastIndex++;
      continue;
    }
    if (found.index > last) parts.push({ text: text.slice(last, found.index), match: false });
    parts.push({ text: found[0], match: true });
    last = found.index + found[0].length;
  }
  if (last < text.length) parts.push({ text: text.slice(last), match: false });
  return parts;
}

function rowStyle(row: RowView): SegmentStyle {
  if (row.editing) return 'editing';
  return row.selected ? 'selected' : 'text';
}

export function renderRowLine(row: RowView, filter: string, width: number): Line {
  const style = rowStyle(row);
  // Filtered rows come from any depth, so they are shown flat.
  const prefix = filter ? '' : INDENT.repeat(row.depth) + (row.hasChildren ? (row.expanded ? EXPANDED_MARK : COLLAPSED_MARK) : LEAF_MARK);

  const line: Line = [];
  if (prefix) line.push({ text: prefix, style });
  if (filter && !row.editing) {
    for (const part of splitMatches(row.label, filter)) {
      line.push({ text: part.text, style: part.match ? 'match' : style });
    }
  } else {
    line.push({ text: row.label, style });
  }
  return fitLine(line, width, style);
}

function borderLine(label: string, width: number, style: SegmentStyle): Line {
  const head = label ? `─ ${label} ` : '';
  const fill = Math.max(0, width - terminalKit.stringWidth(head));
  return fitLine([{ text: head + '─'.repeat(fill), style }], width);
}

function centered(lines: readonly string[], width: number, height: number): Line[] {
  const top = Math.max(0, Math.floor((height - lines.length) / 2));
  const out: Line[] = [];
  for (let i = 0; i < height; i++) {
    const text = lines[i - top];
    if (text === undefined) {
      out.push(fitLine([], width));
      continue;
    }
    const pad = Math.max(0, Math.floor((width - terminalKit.stringWidth(text)) / 2));
    out.push(fitLine([{ text: ' '.repeat(pad) + text, style: 'dim' }], width));
  }
  return out;
}

/**
 * Lines for one pane: a title border, the rows inside the scroll window (or
 * the sort menu, or the empty-state text) and a bottom border that doubles
 * as the filter echo.
 */
export function renderPane(controller: NavigationController, options: PaneOptions): Line[] {
  const { width, height } = options;
  if (height <= 0 || width <= 0) return [];

  const border: SegmentStyle = options.focused ? 'focusBorder' : 'border';
  const bodyHeight = Math.max(0, height - 2);
  const filter = controller.filterText;
  const mode = controller.mode;

  let body: Line[];
  if (mode.kind === 'sort') {
    body = [fitLine([{ text: 'Sort by:', style: 'title' }], width)];
    for (const text of controller.sortMenuLines()) body.push(fitLine([{ text, style: 'text' }], width));
  } else {
    const rows = controller.visibleRows();
    if (rows.length === 0 && !filter) {
      body = centered(controller.emptyText, width, bodyHeight);
    } else {
      body = rows.map((row) => renderRowLine(row, filter, width));
    }
  }

  body = body.slice(0, bodyHeight);
  while (body.length < bodyHeight) body.push(fitLine([], width));

  const filterLabel = mode.kind === 'filter' ? `/${filter}|` : filter ? `/${filter}` : '';
  const lines: Line[] = [borderLine(options.title, width, border), ...body];
  if (height > 1) lines.push(filterLabel ? fitLine([{ text: filterLabel, style: 'title' }], width, border) : borderLine('', width, border));
  return lines.slice(0, height);
}
