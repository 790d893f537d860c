import type { HierarchyRoot } from '../tree/types.js';
import { OutlineNode } from './node.js';
import type { Outline } from './outline.js';
import type { Todo } from './todo.js';

export const WORKSPACE_FIELDS = ['about'] as const;

export class Workspace extends OutlineNode<Workspace> {
  readonly fields: readonly string[] = WORKSPACE_FIELDS;
  readonly workspaces: Workspace[] = [];
  readonly todos: Todo[] = [];

  /** Root of this workspace's todo tree. */
  readonly todoRoot: HierarchyRoot = {
    children: () => this.todos,
    addChild: () => this.addTodo(),
  };

  constructor(
    private readonly outline: Outline,
    name: string,
    parentName: string | null
  ) {
    super(name, parentName);
  }

  children(): readonly Workspace[] {
    return this.workspaces;
  }

  parent(): Workspace | null {
    return this.parentName ? this.outline.workspace(this.parentName) : null;
  }

  addChild(): Workspace {
    const child = this.outline.createWorkspace(this.name);
    this.workspaces.unshift(child);
    return child;
  }

  addTodo(): Todo {
    const todo = this.outline.createTodo(this.name, null);
    this.todos.push(todo);
    return todo;
  }

  protected siblings(): Workspace[] {
    return this.parent()?.workspaces ?? this.outline.workspaces;
  }

  protected createSibling(): Workspace {
    return this.outline.createWorkspace(this.parentName);
  }

  protected release(): void {
    this.outline.forgetWorkspace(this);
  }
}
