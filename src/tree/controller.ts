import { FieldBuffer } from '../tui/text-input.js';
import { MutationError, SelectionOutOfRangeError } from './errors.js';
import { flattenTree } from './flatten.js';
import { buildKeyLookup, type KeyBindings, type NavigateAction } from './keymap.js';
import type { RowBinding } from './row-binding.js';
import { ScrollWindow } from './scroll-window.js';
import { SortMenu } from './sort-menu.js';
import type { HierarchyNode, HierarchyRoot, Mode, Notification, RowView, Status, TreeStrategy } from './types.js';

/** Rows of a pane taken by borders and the title. */
export const DEFAULT_CHROME = 3;

export interface ControllerEvents {
  /** Fired once per real selection change, only for a valid row. */
  select?: (node: HierarchyNode) => void;
  notify?: (notification: Notification) => void;
  status?: (status: Status) => void;
  switchPane?: () => void;
}

export interface ControllerOptions {
  root: HierarchyRoot;
  strategy: TreeStrategy;
  /** Height of the pane, chrome included. */
  viewHeight: number;
  chrome?: number;
  keys?: Partial<KeyBindings>;
  events?: ControllerEvents;
}

interface Snapshot {
  rows: RowBinding[];
  table: Map<string, RowBinding>;
  bindings: { binding: RowBinding; index: number; depth: number; expanded: boolean }[];
  current: number;
  selectedName: string | null;
  window: { a: number; b: number };
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

function statusFor(mode: Mode): Status {
  switch (mode.kind) {
    case 'navigate':
      return 'NORMAL';
    case 'edit':
      return mode.field === 'about' ? 'INSERT' : 'DATE';
    case 'filter':
      return 'FILTER';
    case 'sort':
      return 'SORT';
  }
}

/**
 * Selection, mode and key dispatch for one tree pane. Every key is handled to
 * completion: mutate through the node, reflatten, clamp the selection, fix
 * the scroll window. Nothing thrown inside escapes `handleKey`.
 */
export class NavigationController {
  private root: HierarchyRoot;
  private readonly strategy: TreeStrategy;
  private readonly chrome: number;
  private readonly keys: Map<string, NavigateAction>;
  private readonly editKeys: Map<string, string>;
  private readonly events: ControllerEvents;
  private readonly window: ScrollWindow;
  private readonly sortMenu: SortMenu;
  private readonly filter = new FieldBuffer();
  private readonly tablesByRoot = new WeakMap<HierarchyRoot, Map<string, RowBinding>>();

  private rowList: RowBinding[] = [];
  private table = new Map<string, RowBinding>();
  private currentIndex = -1;
  private selectedName: string | null = null;
  private modeState: Mode = { kind: 'navigate' };

  constructor(options: ControllerOptions) {
    this.root = options.root;
    this.strategy = options.strategy;
    this.chrome = options.chrome ?? DEFAULT_CHROME;
    this.keys = buildKeyLookup(options.keys);
    this.editKeys = new Map(Object.entries(options.strategy.editKeys ?? {}));
    this.events = options.events ?? {};
    this.window = new ScrollWindow(0, Math.max(0, options.viewHeight - this.chrome));
    this.sortMenu = new SortMenu(options.strategy.sortAttributes);
    this.refresh();
  }

  // ------------ queries ----------------

  get current(): number {
    return this.currentIndex;
  }

  get mode(): Mode {
    return this.modeState;
  }

  get status(): Status {
    return statusFor(this.modeState);
  }

  get filterText(): string {
    return this.filter.value;
  }

  get emptyText(): readonly string[] {
    return this.strategy.emptyText ?? [];
  }

  viewRange(): { a: number; b: number } {
    return { a: this.window.a, b: this.window.b };
  }

  sortMenuLines(): string[] {
    return this.sortMenu.lines();
  }

  rows(): RowView[] {
    return this.rowList.map((binding) => this.toView(binding));
  }

  visibleRows(): RowView[] {
    return this.rowList.filter((binding) => this.window.contains(binding.index)).map((binding) => this.toView(binding));
  }

  selectedRow(): RowBinding | null {
    return this.rowList[this.currentIndex] ?? null;
  }

  selectedNode(): HierarchyNode | null {
    return this.selectedRow()?.node ?? null;
  }

  indexOf(name: string): number {
    const binding = this.table.get(name);
    if (binding && this.rowList[binding.index] === binding) return binding.index;
    return -1;
  }

  // ------------ entry points ----------------

  handleKey(key: string): void {
    try {
      this.dispatch(key);
    } catch (error) {
      this.recover(error);
    }
  }

  resize(viewHeight: number): void {
    this.window.resize(Math.max(0, viewHeight - this.chrome), Math.max(0, this.currentIndex));
  }

  /** Show another tree in this pane, keeping each tree's row state apart. */
  setRoot(root: HierarchyRoot): void {
    if (root === this.root) return;

    this.stopEdit();
    this.filter.clear();
    this.setMode({ kind: 'navigate' });

    this.tablesByRoot.set(this.root, this.table);
    this.root = root;
    this.table = this.tablesByRoot.get(root) ?? new Map<string, RowBinding>();
    this.currentIndex = -1;
    this.selectedName = null;
    this.window.shift(-this.window.a);
    this.refresh();
  }

  /** Reflatten and clamp the selection without announcing it. */
  refresh(): void {
    const result = flattenTree({
      roots: this.root.children(),
      childrenOf: (node) => this.strategy.childrenOf(node),
      pattern: this.filter.value,
      previous: this.table,
    });
    this.rowList = result.rows;
    this.table = result.table;
    if (result.error) this.report(result.error);
    this.clampSelection();
  }

  select(index: number): void {
    const next = clamp(index, -1, this.rowList.length - 1);
    const node = this.rowList[next]?.node ?? null;
    const changed = next !== this.currentIndex || (node?.name ?? null) !== this.selectedName;

    this.currentIndex = next;
    this.selectedName = node?.name ?? null;
    this.window.fixView(Math.max(0, next));

    if (changed && node) this.events.select?.(node);
  }

  // ------------ navigation ----------------

  moveUp(): void {
    if (this.currentIndex > 0) this.select(this.currentIndex - 1);
  }

  moveDown(): void {
    this.select(this.currentIndex + 1);
  }

  moveToTop(): void {
    this.select(0);
  }

  moveToBottom(): void {
    this.select(this.rowList.length - 1);
  }

  toggleExpand(): void {
    const row = this.selectedRow();
    if (!row) return;
    this.guarded('expand item', () => {
      row.toggleExpand();
      this.refresh();
    });
  }

  toggleExpandParent(): void {
    const node = this.selectedNode();
    if (!node) return;

    const parent = node.parent();
    if (parent) {
      const index = this.indexOf(parent.name);
      if (index !== -1) this.select(index);
    }
    this.toggleExpand();
  }

  // ------------ mutations ----------------

  shiftUp(): void {
    const node = this.selectedNode();
    if (!node) return;
    this.guarded('move item up', () => {
      node.shiftUp();
      this.refresh();
      this.selectByName(node.name);
    });
  }

  shiftDown(): void {
    const node = this.selectedNode();
    if (!node) return;
    this.guarded('move item down', () => {
      node.shiftDown();
      this.refresh();
      this.selectByName(node.name);
    });
  }

  addChild(): void {
    const row = this.selectedRow();
    this.guarded('add child', () => {
      row?.expand();
      const child = row ? row.node.addChild() : this.root.addChild();
      this.refresh();
      this.revealAndEdit(child);
    });
  }

  addSibling(): void {
    const node = this.selectedNode();
    this.guarded('add item', () => {
      const added = node ? node.addSibling() : this.root.addChild();
      this.refresh();
      this.revealAndEdit(added);
    });
  }

  /** Drop the selected node; the selection keeps its index, clamped to the new rows. */
  removeItem(): void {
    const node = this.selectedNode();
    if (!node) return;
    this.guarded('remove item', () => {
      const names = this.subtreeNames(node);
      node.drop();
      for (const name of names) this.table.delete(name);
      this.refresh();
      this.select(this.currentIndex);
    });
  }

  sort(attribute: string): void {
    const node = this.selectedNode();
    if (!node) return;
    this.guarded(`sort by ${attribute}`, () => {
      node.sort(attribute);
      this.refresh();
      this.selectByName(node.name);
    });
  }

  showSortMenu(): void {
    if (!this.selectedNode() || this.strategy.sortAttributes.length === 0) return;
    this.sortMenu.show();
    this.setMode({ kind: 'sort' });
  }

  // ------------ editing ----------------

  startEdit(field: string): void {
    if (this.modeState.kind !== 'navigate') return;
    const buffer = this.selectedRow()?.buffer(field);
    if (!buffer) return;
    buffer.focus();
    this.setMode({ kind: 'edit', field });
  }

  /** Commit the focused buffer to its node and go back to navigation. */
  stopEdit(): void {
    const mode = this.modeState;
    if (mode.kind !== 'edit') return;

    const row = this.requireRow(this.currentIndex);
    this.setMode({ kind: 'navigate' });
    const buffer = row.buffer(mode.field);
    if (!buffer) return;

    buffer.blur();
    try {
      row.node.editField(mode.field, buffer.value);
    } catch (error) {
      this.report(new MutationError(`edit ${mode.field}`, error));
    }
    row.refreshField(mode.field);
  }

  // ------------ filtering ----------------

  startFiltering(): void {
    this.filter.focus();
    this.setMode({ kind: 'filter' });
    this.echoFilter();
  }

  /** Clear the filter; does nothing when no filter is typed or active. */
  stopFiltering(): void {
    if (this.modeState.kind !== 'filter' && !this.filter.value) return;
    this.filter.clear();
    this.setMode({ kind: 'navigate' });
    this.refresh();
    this.select(-1);
  }

  /** Announce the filtered pick before the filter is cleared, then hand focus over. */
  switchPane(): void {
    if (this.filter.value) {
      const node = this.selectedNode();
      if (node) this.events.select?.(node);
      this.stopFiltering();
    }
    this.events.switchPane?.();
  }

  // ------------ internals ----------------

  private dispatch(key: string): void {
    const mode = this.modeState;

    if (mode.kind === 'edit') {
      if (key === 'ESCAPE') this.stopEdit();
      else this.requireRow(this.currentIndex).buffer(mode.field)?.handleKey(key);
      return;
    }

    if (mode.kind === 'sort') {
      const result = this.sortMenu.handleKey(key);
      if (!result.done) return;
      this.setMode({ kind: 'navigate' });
      if (result.attribute) this.sort(result.attribute);
      return;
    }

    if (mode.kind === 'filter') {
      this.handleFilterKey(key);
      return;
    }

    const action = this.keys.get(key);
    if (action) {
      this.run(action);
      return;
    }

    const field = this.editKeys.get(key);
    if (field) this.startEdit(field);
  }

  private run(action: NavigateAction): void {
    switch (action) {
      case 'moveUp':
        return this.moveUp();
      case 'moveDown':
        return this.moveDown();
      case 'shiftUp':
        return this.shiftUp();
      case 'shiftDown':
        return this.shiftDown();
      case 'editAbout':
        return this.startEdit('about');
      case 'toggleExpand':
        return this.toggleExpand();
      case 'toggleExpandParent':
        return this.toggleExpandParent();
      case 'addChild':
        return this.addChild();
      case 'addSibling':
        return this.addSibling();
      case 'remove':
        return this.removeItem();
      case 'moveToTop':
        return this.moveToTop();
      case 'moveToBottom':
        return this.moveToBottom();
      case 'showSortMenu':
        return this.showSortMenu();
      case 'startFilter':
        return this.startFiltering();
      case 'stopFilter':
        return this.stopFiltering();
      case 'switchPane':
        return this.switchPane();
    }
  }

  private handleFilterKey(key: string): void {
    if (key === 'ESCAPE') {
      this.stopFiltering();
      return;
    }
    if (key === 'ENTER') {
      // Keep the pattern and navigate the matches.
      this.filter.blur();
      this.setMode({ kind: 'navigate' });
      return;
    }
    if (this.keys.get(key) === 'switchPane') {
      this.switchPane();
      return;
    }

    this.filter.handleKey(key);
    this.echoFilter();
    this.refresh();
    this.select(0);
  }

  private echoFilter(): void {
    this.events.notify?.({ level: 'info', message: `/${this.filter.value}` });
  }

  private revealAndEdit(node: HierarchyNode): void {
    if (this.indexOf(node.name) === -1) this.reveal(node);
    const index = this.indexOf(node.name);
    if (index === -1) return;
    this.select(index);
    this.startEdit('about');
  }

  /** Drop the filter a blank node cannot match and open the rows above it. */
  private reveal(node: HierarchyNode): void {
    this.stopFiltering();
    const ancestors: HierarchyNode[] = [];
    for (let parent = node.parent(); parent; parent = parent.parent()) ancestors.unshift(parent);
    for (const ancestor of ancestors) {
      const binding = this.table.get(ancestor.name);
      if (!binding) return;
      binding.expand();
      this.refresh();
    }
  }

  private selectByName(name: string): void {
    const index = this.indexOf(name);
    this.select(index === -1 ? this.currentIndex : index);
  }

  private subtreeNames(node: HierarchyNode): string[] {
    const names = [node.name];
    for (const child of this.strategy.childrenOf(node)) names.push(...this.subtreeNames(child));
    return names;
  }

  private requireRow(index: number): RowBinding {
    const row = this.rowList[index];
    if (!row) throw new SelectionOutOfRangeError(index, this.rowList.length);
    return row;
  }

  private clampSelection(): void {
    this.currentIndex = clamp(this.currentIndex, -1, this.rowList.length - 1);
    this.window.fixView(Math.max(0, this.currentIndex));
  }

  private setMode(mode: Mode): void {
    const before = statusFor(this.modeState);
    this.modeState = mode;
    const after = statusFor(mode);
    if (before !== after) this.events.status?.(after);
  }

  private toView(binding: RowBinding): RowView {
    const selected = binding.index === this.currentIndex;
    return {
      node: binding.node,
      index: binding.index,
      depth: binding.depth,
      expanded: binding.expanded,
      hasChildren: this.strategy.childrenOf(binding.node).length > 0,
      selected,
      editing: binding.editingField(),
      label: this.strategy.renderRow(binding, selected),
    };
  }

  private report(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.events.notify?.({ level: 'error', message });
  }

  private guarded(operation: string, body: () => void): void {
    const snapshot = this.snapshot();
    try {
      body();
    } catch (error) {
      this.restore(snapshot);
      this.report(error instanceof MutationError ? error : new MutationError(operation, error));
    }
  }

  private snapshot(): Snapshot {
    return {
      rows: this.rowList.slice(),
      table: new Map(this.table),
      bindings: [...this.table.values()].map((binding) => ({
        binding,
        index: binding.index,
        depth: binding.depth,
        expanded: binding.expanded,
      })),
      current: this.currentIndex,
      selectedName: this.selectedName,
      window: { a: this.window.a, b: this.window.b },
    };
  }

  private restore(snapshot: Snapshot): void {
    this.rowList = snapshot.rows;
    this.table = snapshot.table;
    for (const saved of snapshot.bindings) {
      saved.binding.index = saved.index;
      saved.binding.depth = saved.depth;
      saved.binding.expanded = saved.expanded;
    }
    this.currentIndex = snapshot.current;
    this.selectedName = snapshot.selectedName;
    this.window.a = snapshot.window.a;
    this.window.b = snapshot.window.b;
  }

  /** Last line of defence for errors that are not mutation failures. */
  private recover(error: unknown): void {
    for (const binding of this.table.values()) {
      const field = binding.editingField();
      if (field === null) continue;
      binding.buffer(field)?.blur();
      binding.refreshField(field);
    }
    this.filter.blur();
    this.setMode({ kind: 'navigate' });
    this.clampSelection();
    this.report(error);
  }
}
