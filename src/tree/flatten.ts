import { FilterError } from './errors.js';
import { RowBinding } from './row-binding.js';
import type { HierarchyNode } from './types.js';

export const FILTER_FIELD = 'about';

export interface FlattenInput {
  roots: readonly HierarchyNode[];
  childrenOf: (node: HierarchyNode) => readonly HierarchyNode[];
  /** Empty or missing means unfiltered. */
  pattern?: string;
  previous?: ReadonlyMap<string, RowBinding>;
  /** Descend into every node, whatever its expanded flag. */
  expandAll?: boolean;
}

export interface FlattenResult {
  rows: RowBinding[];
  table: Map<string, RowBinding>;
  error: FilterError | null;
}

export function compileFilter(pattern: string, flags = ''): RegExp {
  try {
    return new RegExp(pattern, flags);
  } catch (error) {
    throw new FilterError(pattern, error instanceof Error ? error.message : String(error));
  }
}

/**
 * Pre-order walk producing the visible rows.
 *
 * Unfiltered, a node's children are visited only when its row is expanded.
 * Filtered, only nodes whose `about` matches become rows, but every subtree
 * is searched regardless of expansion.
 */
export function flattenTree(input: FlattenInput): FlattenResult {
  const previous = input.previous ?? new Map<string, RowBinding>();
  // Bindings of rows hidden by a collapse or a filter are kept, so their
  // state comes back with them.
  const table = new Map(previous);
  const seen = new Set<string>();
  const rows: RowBinding[] = [];

  let matcher: RegExp | null = null;
  if (input.pattern) {
    try {
      matcher = compileFilter(input.pattern);
    } catch (error) {
      if (!(error instanceof FilterError)) throw error;
      return { rows: [], table, error };
    }
  }

  const push = (node: HierarchyNode, depth: number): RowBinding => {
    const existing = table.get(node.name);
    const binding =
      existing && existing.node === node
        ? existing
        : new RowBinding(node, { depth, expanded: existing?.expanded ?? false });
    binding.depth = depth;
    binding.index = rows.length;
    binding.sync();
    table.set(node.name, binding);
    rows.push(binding);
    return binding;
  };

  const visit = (node: HierarchyNode, depth: number): void => {
    if (seen.has(node.name)) return;
    seen.add(node.name);

    if (matcher) {
      if (matcher.test(node.getField(FILTER_FIELD))) push(node, depth);
      for (const child of input.childrenOf(node)) visit(child, depth + 1);
      return;
    }

    const binding = push(node, depth);
    if (!binding.expanded && !input.expandAll) return;
    for (const child of input.childrenOf(node)) visit(child, depth + 1);
  };

  for (const node of input.roots) visit(node, 0);

  return { rows, table, error: null };
}
