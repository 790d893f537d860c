import type { HierarchyRoot } from '../tree/types.js';
import { ModelError } from './errors.js';
import { generateName } from './id-generator.js';
import { Todo } from './todo.js';
import { Workspace } from './workspace.js';

/**
 * Owner of every node. Top-level workspaces hang off it, and it is the name
 * registry that parent back-references are resolved through.
 */
export class Outline implements HierarchyRoot {
  readonly workspaces: Workspace[] = [];
  private readonly workspaceIndex = new Map<string, Workspace>();
  private readonly todoIndex = new Map<string, Todo>();

  children(): readonly Workspace[] {
    return this.workspaces;
  }

  addChild(): Workspace {
    const workspace = this.createWorkspace(null);
    this.workspaces.push(workspace);
    return workspace;
  }

  workspace(name: string): Workspace | null {
    return this.workspaceIndex.get(name) ?? null;
  }

  todo(name: string): Todo | null {
    return this.todoIndex.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.workspaceIndex.has(name) || this.todoIndex.has(name);
  }

  /** Create and register a detached workspace; the caller places it. */
  createWorkspace(parentName: string | null, name?: string): Workspace {
    const id = name ?? generateName('ws', this.workspaceIndex.keys());
    this.assertFree(id);
    const workspace = new Workspace(this, id, parentName);
    this.workspaceIndex.set(id, workspace);
    return workspace;
  }

  /** Create and register a detached todo; the caller places it. */
  createTodo(workspaceName: string, parentName: string | null, name?: string): Todo {
    const id = name ?? generateName('todo', this.todoIndex.keys());
    this.assertFree(id);
    const todo = new Todo(this, id, workspaceName, parentName);
    this.todoIndex.set(id, todo);
    return todo;
  }

  forgetWorkspace(workspace: Workspace): void {
    this.workspaceIndex.delete(workspace.name);
    for (const child of workspace.workspaces) this.forgetWorkspace(child);
    for (const todo of workspace.todos) this.forgetTodo(todo);
  }

  forgetTodo(todo: Todo): void {
    this.todoIndex.delete(todo.name);
    for (const child of todo.todos) this.forgetTodo(child);
  }

  private assertFree(name: string): void {
    if (this.has(name)) throw new ModelError(`Duplicate name: ${name}`);
  }
}
