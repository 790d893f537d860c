import type { HierarchyNode } from '../tree/types.js';
import { ModelError } from './errors.js';

/**
 * Sibling-list behaviour shared by workspaces and todos. A node lives in
 * exactly one mutable array (its siblings); the parent is only a name.
 */
export abstract class OutlineNode<Self extends OutlineNode<Self>> implements HierarchyNode {
  abstract readonly fields: readonly string[];
  protected readonly values = new Map<string, string>();

  constructor(
    readonly name: string,
    protected readonly parentName: string | null
  ) {}

  abstract children(): readonly Self[];
  abstract parent(): Self | null;
  abstract addChild(): Self;
  protected abstract siblings(): Self[];
  protected abstract createSibling(): Self;
  /** Unregister this node and its descendants. */
  protected abstract release(): void;

  getField(field: string): string {
    this.assertField(field);
    return this.values.get(field) ?? '';
  }

  editField(field: string, value: string): void {
    this.assertField(field);
    this.values.set(field, this.normalize(field, value));
  }

  addSibling(): Self {
    const list = this.siblings();
    const sibling = this.createSibling();
    list.splice(this.position(list) + 1, 0, sibling);
    return sibling;
  }

  drop(): void {
    const list = this.siblings();
    const index = this.position(list);
    if (index === -1) throw new ModelError(`${this.name} is not attached`);
    list.splice(index, 1);
    this.release();
  }

  nextSibling(): Self | null {
    const list = this.siblings();
    const index = this.position(list);
    return index === -1 ? null : (list[index + 1] ?? null);
  }

  prevSibling(): Self | null {
    const list = this.siblings();
    const index = this.position(list);
    return index > 0 ? (list[index - 1] ?? null) : null;
  }

  shiftUp(): void {
    this.swapWith(-1);
  }

  shiftDown(): void {
    this.swapWith(1);
  }

  /** Stable sort of this node's sibling group. */
  sort(attribute: string): void {
    if (!this.fields.includes(attribute)) {
      throw new ModelError(`Cannot sort by '${attribute}'`);
    }
    this.siblings().sort((x, y) => this.compareValues(attribute, x.getField(attribute), y.getField(attribute)));
  }

  protected normalize(_field: string, value: string): string {
    return value;
  }

  protected compareValues(_field: string, a: string, b: string): number {
    return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
  }

  private assertField(field: string): void {
    if (!this.fields.includes(field)) {
      throw new ModelError(`Unknown field '${field}' on ${this.name}`);
    }
  }

  private position(list: readonly Self[]): number {
    return list.findIndex((node) => node.name === this.name);
  }

  private swapWith(delta: -1 | 1): void {
    const list = this.siblings();
    const from = this.position(list);
    const to = from + delta;
    const self = list[from];
    const other = list[to];
    if (!self || !other) return;
    list[from] = other;
    list[to] = self;
  }
}
