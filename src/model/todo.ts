import { normalizeDueDate } from './date-utils.js';
import { ModelError } from './errors.js';
import { OutlineNode } from './node.js';
import type { Outline } from './outline.js';

export const TODO_FIELDS = ['about', 'due'] as const;

export class Todo extends OutlineNode<Todo> {
  readonly fields: readonly string[] = TODO_FIELDS;
  readonly todos: Todo[] = [];

  constructor(
    private readonly outline: Outline,
    name: string,
    readonly workspaceName: string,
    parentName: string | null
  ) {
    super(name, parentName);
  }

  children(): readonly Todo[] {
    return this.todos;
  }

  parent(): Todo | null {
    return this.parentName ? this.outline.todo(this.parentName) : null;
  }

  addChild(): Todo {
    const child = this.outline.createTodo(this.workspaceName, this.name);
    this.todos.unshift(child);
    return child;
  }

  protected siblings(): Todo[] {
    const parent = this.parent();
    if (parent) return parent.todos;
    const workspace = this.outline.workspace(this.workspaceName);
    if (!workspace) throw new ModelError(`Workspace ${this.workspaceName} not found`);
    return workspace.todos;
  }

  protected createSibling(): Todo {
    return this.outline.createTodo(this.workspaceName, this.parentName);
  }

  protected release(): void {
    this.outline.forgetTodo(this);
  }

  protected override normalize(field: string, value: string): string {
    if (field !== 'due') return value;
    const due = normalizeDueDate(value);
    if (due === null) throw new ModelError(`Invalid due date: ${value.trim()}`);
    return due;
  }

  // Undated todos sort after dated ones.
  protected override compareValues(field: string, a: string, b: string): number {
    if (field !== 'due') return super.compareValues(field, a, b);
    if (!a && !b) return 0;
    if (!a) return 1;
    if (!b) return -1;
    return a.localeCompare(b);
  }
}
