import { describe, expect, it } from 'vitest';
import { ConfigSchema } from '../../src/config/loader.js';
import { Session } from '../../src/tui/session.js';
import type { Line } from '../../src/tui/tree-render.js';
import { makeOutline, press, rowNames } from '../fixtures/outline.js';

function text(line: Line): string {
  return line.map((segment) => segment.text).join('');
}

function homeAndWork() {
  return makeOutline([
    { name: 'w1', about: 'Home', todos: [{ name: 't1', about: 'dishes' }] },
    { name: 'w2', about: 'Work', todos: [{ name: 't2', about: 'report' }, { name: 't3', about: 'email' }] },
  ]);
}

function session(outline = homeAndWork(), config = ConfigSchema.parse({})): Session {
  return new Session({ outline, config, width: 80, height: 24 });
}

describe('Session', () => {
  it('starts on the workspace pane with no workspace shown', () => {
    const s = session();
    expect(s.focused).toBe('navbar');
    expect(s.status).toBe('NORMAL');
    expect(s.workspaceName).toBeNull();
    expect(s.todos.rows()).toEqual([]);
  });

  it('shows the todos of the selected workspace', () => {
    const s = session();
    press(s, 'j');
    expect(s.workspaceName).toBe('w1');
    expect(rowNames(s.todos)).toEqual(['t1']);

    press(s, 'j');
    expect(s.workspaceName).toBe('w2');
    expect(rowNames(s.todos)).toEqual(['t2', 't3']);
  });

  it('refuses to focus the todo pane before a workspace is chosen', () => {
    const s = session();
    press(s, 'TAB');
    expect(s.focused).toBe('navbar');
    expect(s.message).toEqual({ level: 'info', message: 'select a workspace first' });

    press(s, 'j');
    expect(s.message).toBeNull();
  });

  it('routes keys to the focused pane and back', () => {
    const outline = homeAndWork();
    const s = session(outline);
    press(s, 'j', 'j', 'TAB');
    expect(s.focused).toBe('todos');

    press(s, 'j', 'i');
    expect(s.status).toBe('INSERT');
    press(s, 'q', 'ESCAPE');
    expect(s.quitRequested).toBe(false);
    expect(outline.todo('t2')?.getField('about')).toBe('reportq');

    press(s, 'TAB');
    expect(s.focused).toBe('navbar');
    expect(s.navbar.selectedNode()?.name).toBe('w2');
  });

  it('quits on q only in navigate mode', () => {
    const s = session();
    press(s, '/', 'q');
    expect(s.quitRequested).toBe(false);
    expect(s.navbar.filterText).toBe('q');

    press(s, 'ESCAPE', 'q');
    expect(s.quitRequested).toBe(true);
  });

  it('commits an open edit on CTRL_C', () => {
    const outline = homeAndWork();
    const s = session(outline);
    press(s, 'j', 'i', 'X', 'CTRL_C');
    expect(s.quitRequested).toBe(true);
    expect(outline.workspace('w1')?.getField('about')).toBe('HomeX');
  });

  it('clears the todo pane when its workspace is removed', () => {
    const outline = makeOutline([{ name: 'w1', about: 'Home', todos: [{ name: 't1', about: 'dishes' }] }]);
    const s = session(outline);
    press(s, 'j', 'x');
    expect(s.workspaceName).toBeNull();
    expect(s.todos.rows()).toEqual([]);
  });

  it('shows the next workspace when the shown one is removed', () => {
    const s = session();
    press(s, 'j', 'x');
    expect(s.workspaceName).toBe('w2');
    expect(rowNames(s.todos)).toEqual(['t2', 't3']);
  });

  it('reports errors from the todo pane on the status line', () => {
    const s = session();
    press(s, 'j', 'TAB', 'j', 'd', 's', 'o', 'o', 'n', 'ESCAPE');
    expect(s.message).toEqual({ level: 'error', message: 'Cannot edit due: Invalid due date: soon' });
    expect(text(s.statusLine()).trimEnd()).toBe(' NORMAL  Cannot edit due: Invalid due date: soon');
  });

  it('resizes both panes', () => {
    const s = session();
    expect(s.navbar.viewRange()).toEqual({ a: 0, b: 20 });
    s.handle({ type: 'resize', width: 40, height: 10 });
    expect(s.navbar.viewRange()).toEqual({ a: 0, b: 6 });
    expect(s.todos.viewRange()).toEqual({ a: 0, b: 6 });
  });

  it('uses key overrides from the config', () => {
    const config = ConfigSchema.parse({ interactive: { keys: { moveDown: ['n'] } } });
    const s = session(homeAndWork(), config);
    press(s, 'j');
    expect(s.workspaceName).toBeNull();
    press(s, 'n');
    expect(s.workspaceName).toBe('w1');
  });

  it('lays out both panes and the status line', () => {
    const s = session();
    press(s, 'j');
    const frame = s.frame();

    const first = frame[0];
    expect(first && [first.x, first.y]).toEqual([1, 1]);
    expect(first && text(first.line).startsWith('─ Workspaces ')).toBe(true);

    const todoTitle = frame.find((line) => line.x === 25 && line.y === 1);
    expect(todoTitle && text(todoTitle.line).startsWith('─ Home ')).toBe(true);

    const status = frame[frame.length - 1];
    expect(status && [status.x, status.y]).toEqual([1, 24]);
    expect(status && text(status.line).trimEnd()).toBe(' NORMAL');
    expect(frame).toHaveLength(23 + 23 + 1);
  });
});
