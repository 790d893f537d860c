import { ModelError } from '../model/errors.js';
import { TODO_FIELDS } from '../model/todo.js';
import { WORKSPACE_FIELDS } from '../model/workspace.js';
import type { HierarchyRoot, TreeStrategy } from '../tree/types.js';

export const navbarStrategy: TreeStrategy = {
  childrenOf: (node) => node.children(),
  renderRow: (row) => row.fieldValues()[0] ?? '',
  sortAttributes: WORKSPACE_FIELDS,
  emptyText: ['No workspaces yet', 'press a to add one'],
};

export const todoStrategy: TreeStrategy = {
  childrenOf: (node) => node.children(),
  renderRow: (row) => {
    const [about = '', due = ''] = row.fieldValues();
    return due ? `${about}  @${due}` : about;
  },
  sortAttributes: TODO_FIELDS,
  editKeys: { d: 'due' },
  emptyText: ['No todos here', 'press a to add one'],
};

/** Todo pane root while no workspace is chosen. */
export const NO_WORKSPACE: HierarchyRoot = {
  children: () => [],
  addChild: () => {
    throw new ModelError('select a workspace first');
  },
};
