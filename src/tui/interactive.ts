import terminalKit from 'terminal-kit';
import type { Config } from '../config/loader.js';
import type { Outline } from '../model/outline.js';
import { EventQueue, type TuiEvent } from './event-queue.js';
import { Session, type PositionedLine } from './session.js';
import type { SegmentStyle } from './tree-render.js';

type Terminal = typeof terminalKit.terminal;

interface TuiOptions {
  outline: Outline;
  config: Config;
}

type Painter = (term: Terminal, text: string) => void;

const COLOR_STYLES: Record<SegmentStyle, Painter> = {
  text: (term, text) => term(text),
  dim: (term, text) => term.dim(text),
  border: (term, text) => term.dim(text),
  focusBorder: (term, text) => term.cyan(text),
  title: (term, text) => term.bold(text),
  selected: (term, text) => term.inverse(text),
  editing: (term, text) => term.bold.cyan(text),
  match: (term, text) => term.bold.yellow(text),
  error: (term, text) => term.red(text),
};

const PLAIN_STYLES: Record<SegmentStyle, Painter> = {
  ...COLOR_STYLES,
  dim: (term, text) => term(text),
  border: (term, text) => term(text),
  focusBorder: (term, text) => term(text),
  editing: (term, text) => term.inverse(text),
  match: (term, text) => term.inverse(text),
  error: (term, text) => term(text),
};

function draw(term: Terminal, lines: PositionedLine[], colorsDisabled: boolean): void {
  const styles = colorsDisabled ? PLAIN_STYLES : COLOR_STYLES;
  term.hideCursor();
  for (const { x, y, line } of lines) {
    term.moveTo(x, y);
    for (const segment of line) {
      styles[segment.style](term, segment.text);
      term.styleReset();
    }
  }
}

/** Run the two-pane editor until the user quits. The outline is edited in place. */
export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term = terminalKit.terminal;
  const colorsDisabled = Boolean(options.config.interactive?.colors?.disable);
  const session = new Session({
    outline: options.outline,
    config: options.config,
    width: term.width,
    height: term.height,
  });

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const queue = new EventQueue<TuiEvent>((event) => {
    session.handle(event);
    if (session.quitRequested) {
      resolveExit?.();
      return;
    }
    draw(term, session.frame(), colorsDisabled);
  });

  const onKey = (name: string): void => {
    queue.push({ type: 'key', name });
  };

  const onResize = (): void => {
    term.clear();
    queue.push({ type: 'resize', width: term.width, height: term.height });
  };

  term.fullscreen(true);
  term.grabInput(true);
  process.stdout.on('resize', onResize);
  term.on('key', onKey);

  try {
    term.clear();
    draw(term, session.frame(), colorsDisabled);
    await exitPromise;
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    term.grabInput(false);
    term.fullscreen(false);
    term.hideCursor(false);
    term.styleReset();
    term.clear();
  }
}
