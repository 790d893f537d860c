export const NAVIGATE_ACTIONS = [
  'moveUp',
  'moveDown',
  'shiftUp',
  'shiftDown',
  'editAbout',
  'toggleExpand',
  'toggleExpandParent',
  'addChild',
  'addSibling',
  'remove',
  'moveToTop',
  'moveToBottom',
  'showSortMenu',
  'startFilter',
  'stopFilter',
  'switchPane',
] as const;

export type NavigateAction = (typeof NAVIGATE_ACTIONS)[number];

export type KeyBindings = Record<NavigateAction, readonly string[]>;

/** Key names as terminal-kit reports them. */
export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  moveUp: ['k', 'UP'],
  moveDown: ['j', 'DOWN'],
  shiftUp: ['K', 'SHIFT_UP'],
  shiftDown: ['J', 'SHIFT_DOWN'],
  editAbout: ['i'],
  toggleExpand: ['z'],
  toggleExpandParent: ['Z'],
  addChild: ['A'],
  addSibling: ['a'],
  remove: ['x'],
  moveToTop: ['g', 'HOME'],
  moveToBottom: ['G', 'END'],
  showSortMenu: ['s'],
  startFilter: ['/'],
  stopFilter: ['ESCAPE'],
  switchPane: ['TAB'],
};

/**
 * Key name to action. An override replaces the whole key list of its
 * action; when two actions claim a key the later one in
 * `NAVIGATE_ACTIONS` order wins.
 */
export function buildKeyLookup(overrides: Partial<KeyBindings> = {}): Map<string, NavigateAction> {
  const lookup = new Map<string, NavigateAction>();
  for (const action of NAVIGATE_ACTIONS) {
    for (const key of overrides[action] ?? DEFAULT_KEY_BINDINGS[action]) {
      lookup.set(key, action);
    }
  }
  return lookup;
}

export function isNavigateAction(value: string): value is NavigateAction {
  return NAVIGATE_ACTIONS.some((action) => action === value);
}
