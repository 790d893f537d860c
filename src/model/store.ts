import fs from 'node:fs';
import { z } from 'zod';
import { ModelError, OutlineFileError } from './errors.js';
import { generateName } from './id-generator.js';
import { Outline } from './outline.js';
import type { Todo } from './todo.js';
import type { Workspace } from './workspace.js';

export interface TodoData {
  name?: string;
  about: string;
  due?: string;
  todos?: TodoData[];
}

export interface WorkspaceData {
  name?: string;
  about: string;
  workspaces?: WorkspaceData[];
  todos?: TodoData[];
}

export const TodoDataSchema: z.ZodType<TodoData> = z.lazy(() =>
  z.object({
    name: z.string().min(1).optional(),
    about: z.string(),
    due: z.string().optional(),
    todos: z.array(TodoDataSchema).optional(),
  })
);

export const WorkspaceDataSchema: z.ZodType<WorkspaceData> = z.lazy(() =>
  z.object({
    name: z.string().min(1).optional(),
    about: z.string(),
    workspaces: z.array(WorkspaceDataSchema).optional(),
    todos: z.array(TodoDataSchema).optional(),
  })
);

export const OutlineFileSchema = z.object({
  version: z.literal(1).default(1),
  workspaces: z.array(WorkspaceDataSchema).default([]),
});

export type OutlineFile = z.infer<typeof OutlineFileSchema>;

/** Names given in the file, so generated ones never take them first. */
function collectNames(data: { name?: string; workspaces?: WorkspaceData[]; todos?: TodoData[] }, into: Set<string>): void {
  if (data.name) into.add(data.name);
  for (const child of data.workspaces ?? []) collectNames(child, into);
  for (const todo of data.todos ?? []) collectNames(todo, into);
}

function nameFor(prefix: string, data: { name?: string }, taken: Set<string>): string {
  if (data.name) return data.name;
  const name = generateName(prefix, taken);
  taken.add(name);
  return name;
}

function restoreTodo(outline: Outline, taken: Set<string>, data: TodoData, workspaceName: string, parentName: string | null): Todo {
  const todo = outline.createTodo(workspaceName, parentName, nameFor('todo', data, taken));
  todo.editField('about', data.about);
  todo.editField('due', data.due ?? '');
  for (const child of data.todos ?? []) {
    todo.todos.push(restoreTodo(outline, taken, child, workspaceName, todo.name));
  }
  return todo;
}

function restoreWorkspace(outline: Outline, taken: Set<string>, data: WorkspaceData, parentName: string | null): Workspace {
  const workspace = outline.createWorkspace(parentName, nameFor('ws', data, taken));
  workspace.editField('about', data.about);
  for (const child of data.workspaces ?? []) {
    workspace.workspaces.push(restoreWorkspace(outline, taken, child, workspace.name));
  }
  for (const todo of data.todos ?? []) {
    workspace.todos.push(restoreTodo(outline, taken, todo, workspace.name, null));
  }
  return workspace;
}

export function outlineFromData(data: OutlineFile): Outline {
  const outline = new Outline();
  const taken = new Set<string>();
  for (const workspace of data.workspaces) collectNames(workspace, taken);
  for (const workspace of data.workspaces) {
    outline.workspaces.push(restoreWorkspace(outline, taken, workspace, null));
  }
  return outline;
}

function todoToData(todo: Todo): TodoData {
  const data: TodoData = { name: todo.name, about: todo.getField('about') };
  const due = todo.getField('due');
  if (due) data.due = due;
  if (todo.todos.length > 0) data.todos = todo.todos.map(todoToData);
  return data;
}

function workspaceToData(workspace: Workspace): WorkspaceData {
  const data: WorkspaceData = { name: workspace.name, about: workspace.getField('about') };
  if (workspace.workspaces.length > 0) data.workspaces = workspace.workspaces.map(workspaceToData);
  if (workspace.todos.length > 0) data.todos = workspace.todos.map(todoToData);
  return data;
}

export function outlineToData(outline: Outline): OutlineFile {
  return { version: 1, workspaces: outline.workspaces.map(workspaceToData) };
}

/** A missing file is an empty outline. */
export function readOutlineFile(filePath: string): Outline {
  if (!fs.existsSync(filePath)) {
    return new Outline();
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) throw new OutlineFileError('invalid JSON', filePath);
    throw error;
  }

  const parsed = OutlineFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new OutlineFileError(`${issue?.message ?? 'invalid outline'}${where}`, filePath);
  }

  try {
    return outlineFromData(parsed.data);
  } catch (error) {
    if (error instanceof ModelError) throw new OutlineFileError(error.message, filePath);
    throw error;
  }
}

export function writeOutlineFile(outline: Outline, filePath: string): void {
  const content = JSON.stringify(outlineToData(outline), null, 2);
  fs.writeFileSync(filePath, `${content}\n`, 'utf-8');
}
