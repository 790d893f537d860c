import { resolveKeyBindings, type Config } from '../config/loader.js';
import type { Outline } from '../model/outline.js';
import { NavigationController } from '../tree/controller.js';
import type { Notification, Status } from '../tree/types.js';
import type { TuiEvent } from './event-queue.js';
import { shouldAllowGlobalQuit } from './key-policy.js';
import { computeLayout, type ScreenLayout } from './layout.js';
import { NO_WORKSPACE, navbarStrategy, todoStrategy } from './strategies.js';
import { fitLine, renderPane, type Line } from './tree-render.js';

export type Pane = 'navbar' | 'todos';

export interface SessionOptions {
  outline: Outline;
  config: Config;
  width: number;
  height: number;
}

export interface PositionedLine {
  x: number;
  y: number;
  line: Line;
}

/**
 * The two panes and everything between them: which one has the keys, which
 * workspace the todo pane shows, and the status line. Terminal-free, so the
 * whole interaction can be driven from tests.
 */
export class Session {
  readonly navbar: NavigationController;
  readonly todos: NavigationController;

  private readonly outline: Outline;
  private layout: ScreenLayout;
  private width: number;
  private focus: Pane = 'navbar';
  private shownWorkspace: string | null = null;
  private notification: Notification | null = null;
  private quit = false;

  constructor(options: SessionOptions) {
    this.outline = options.outline;
    this.width = options.width;
    this.layout = computeLayout(options.width, options.height);

    const chrome = options.config.interactive?.chrome;
    const keys = resolveKeyBindings(options.config);
    const notify = (notification: Notification): void => {
      this.notification = notification;
    };

    this.navbar = new NavigationController({
      root: options.outline,
      strategy: navbarStrategy,
      viewHeight: this.layout.navbar.height,
      chrome,
      keys,
      events: {
        select: (node) => this.showWorkspace(node.name),
        notify,
        switchPane: () => this.focusTodos(),
      },
    });

    this.todos = new NavigationController({
      root: NO_WORKSPACE,
      strategy: todoStrategy,
      viewHeight: this.layout.todos.height,
      chrome,
      keys,
      events: {
        notify,
        switchPane: () => {
          this.focus = 'navbar';
        },
      },
    });
  }

  get focused(): Pane {
    return this.focus;
  }

  get quitRequested(): boolean {
    return this.quit;
  }

  get status(): Status {
    return this.active().status;
  }

  get message(): Notification | null {
    return this.notification;
  }

  get workspaceName(): string | null {
    return this.shownWorkspace;
  }

  handle(event: TuiEvent): void {
    if (event.type === 'resize') {
      this.resize(event.width, event.height);
      return;
    }
    this.handleKey(event.name);
  }

  handleKey(name: string): void {
    this.notification = null;
    const pane = this.active();

    if (name === 'CTRL_C') {
      this.finish();
      return;
    }
    if (name === 'q') {
      const mode = pane.mode.kind;
      if (shouldAllowGlobalQuit({ editing: mode === 'edit', filtering: mode === 'filter', sorting: mode === 'sort' })) {
        this.finish();
        return;
      }
    }

    pane.handleKey(name);
    this.dropStaleWorkspace();
  }

  resize(width: number, height: number): void {
    this.width = width;
    this.layout = computeLayout(width, height);
    this.navbar.resize(this.layout.navbar.height);
    this.todos.resize(this.layout.todos.height);
  }

  frame(): PositionedLine[] {
    const { navbar, todos, statusRow } = this.layout;
    const lines: PositionedLine[] = [];

    const navLines = renderPane(this.navbar, {
      title: 'Workspaces',
      width: navbar.width,
      height: navbar.height,
      focused: this.focus === 'navbar',
    });
    navLines.forEach((line, i) => lines.push({ x: navbar.x, y: navbar.y + i, line }));

    const todoLines = renderPane(this.todos, {
      title: this.todoTitle(),
      width: todos.width,
      height: todos.height,
      focused: this.focus === 'todos',
    });
    todoLines.forEach((line, i) => lines.push({ x: todos.x, y: todos.y + i, line }));

    lines.push({ x: 1, y: statusRow, line: this.statusLine() });
    return lines;
  }

  statusLine(): Line {
    const line: Line = [{ text: ` ${this.status} `, style: 'title' }];
    const note = this.notification;
    if (note) line.push({ text: ` ${note.message}`, style: note.level === 'error' ? 'error' : 'text' });
    return fitLine(line, this.width);
  }

  private active(): NavigationController {
    return this.focus === 'navbar' ? this.navbar : this.todos;
  }

  private showWorkspace(name: string): void {
    const workspace = this.outline.workspace(name);
    if (!workspace) return;
    this.shownWorkspace = workspace.name;
    this.todos.setRoot(workspace.todoRoot);
  }

  private focusTodos(): void {
    if (this.shownWorkspace === null) {
      this.notification = { level: 'info', message: 'select a workspace first' };
      return;
    }
    this.focus = 'todos';
  }

  private dropStaleWorkspace(): void {
    if (this.shownWorkspace === null || this.outline.workspace(this.shownWorkspace)) return;
    this.shownWorkspace = null;
    this.todos.setRoot(NO_WORKSPACE);
    this.focus = 'navbar';
  }

  private todoTitle(): string {
    const workspace = this.shownWorkspace === null ? null : this.outline.workspace(this.shownWorkspace);
    return workspace ? workspace.getField('about') || workspace.name : 'Todos';
  }

  /** Commit open edits before leaving. */
  private finish(): void {
    this.navbar.stopEdit();
    this.todos.stopEdit();
    this.quit = true;
  }
}
