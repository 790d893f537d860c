import type { RowBinding } from './row-binding.js';

/**
 * One entry of the outline, as seen by the tree engine. The engine never owns
 * nodes: it reads fields, walks children and asks the node to mutate itself.
 */
export interface HierarchyNode {
  /** Stable identity, unique across the whole outline. */
  readonly name: string;
  readonly fields: readonly string[];
  getField(field: string): string;
  editField(field: string, value: string): void;
  children(): readonly HierarchyNode[];
  /** Lookup only; the parent is resolved by name, never held. */
  parent(): HierarchyNode | null;
  addChild(): HierarchyNode;
  addSibling(): HierarchyNode;
  drop(): void;
  nextSibling(): HierarchyNode | null;
  prevSibling(): HierarchyNode | null;
  shiftUp(): void;
  shiftDown(): void;
  sort(attribute: string): void;
}

/** The invisible top of a tree: supplies the top-level nodes. */
export interface HierarchyRoot {
  children(): readonly HierarchyNode[];
  addChild(): HierarchyNode;
}

/**
 * What differs between the panes that share the engine: how children are
 * reached and how a row's text is produced.
 */
export interface TreeStrategy {
  childrenOf(node: HierarchyNode): readonly HierarchyNode[];
  renderRow(row: RowBinding, highlighted: boolean): string;
  sortAttributes: readonly string[];
  /** Key name to field, for fields edited with their own key (e.g. `d` for `due`). */
  editKeys?: Readonly<Record<string, string>>;
  emptyText?: readonly string[];
}

export type Mode =
  | { kind: 'navigate' }
  | { kind: 'edit'; field: string }
  | { kind: 'filter' }
  | { kind: 'sort' };

export type Status = 'NORMAL' | 'INSERT' | 'DATE' | 'FILTER' | 'SORT';

export interface Notification {
  level: 'info' | 'error';
  message: string;
}

export interface RowView {
  readonly node: HierarchyNode;
  readonly index: number;
  readonly depth: number;
  readonly expanded: boolean;
  readonly hasChildren: boolean;
  readonly selected: boolean;
  /** Field being edited on this row, if any. */
  readonly editing: string | null;
  readonly label: string;
}
