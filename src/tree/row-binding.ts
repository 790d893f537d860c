import { FieldBuffer } from '../tui/text-input.js';
import type { HierarchyNode } from './types.js';

/**
 * Per-row UI state for one node. Bindings outlive flatten passes: the
 * flattener hands the same binding back for the same node name, so the
 * expanded flag and a half-typed edit survive sibling mutations.
 */
export class RowBinding {
  expanded: boolean;
  depth: number;
  index: number;
  private readonly buffers = new Map<string, FieldBuffer>();

  constructor(
    readonly node: HierarchyNode,
    options: { depth?: number; index?: number; expanded?: boolean } = {}
  ) {
    this.depth = options.depth ?? 0;
    this.index = options.index ?? 0;
    this.expanded = options.expanded ?? false;
    for (const field of node.fields) {
      this.buffers.set(field, new FieldBuffer(node.getField(field)));
    }
  }

  get name(): string {
    return this.node.name;
  }

  hasField(field: string): boolean {
    return this.buffers.has(field);
  }

  buffer(field: string): FieldBuffer | undefined {
    return this.buffers.get(field);
  }

  toggleExpand(): void {
    this.expanded = !this.expanded;
  }

  expand(expand = true): void {
    this.expanded = expand;
  }

  refreshField(field: string): void {
    const buffer = this.buffers.get(field);
    if (buffer) buffer.setValue(this.node.getField(field));
  }

  /** Re-seed every buffer that is not mid-edit from the node. */
  sync(): void {
    for (const [field, buffer] of this.buffers) {
      if (!buffer.focused) buffer.setValue(this.node.getField(field));
    }
  }

  editingField(): string | null {
    for (const [field, buffer] of this.buffers) {
      if (buffer.focused) return field;
    }
    return null;
  }

  /** Buffer renderings in field order; a focused buffer shows its cursor. */
  fieldValues(): string[] {
    return this.node.fields.map((field) => this.buffers.get(field)?.render() ?? '');
  }
}
