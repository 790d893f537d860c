import type { Outline } from '../../src/model/outline.js';
import { OutlineFileSchema, outlineFromData, type WorkspaceData } from '../../src/model/store.js';
import type { NavigationController } from '../../src/tree/controller.js';

export function makeOutline(workspaces: WorkspaceData[]): Outline {
  return outlineFromData(OutlineFileSchema.parse({ workspaces }));
}

/** `count` flat workspaces named w1..wN with abouts "Item 1".."Item N". */
export function flatOutline(count: number): Outline {
  return makeOutline(Array.from({ length: count }, (_, i) => ({ name: `w${i + 1}`, about: `Item ${i + 1}` })));
}

export function rowNames(controller: NavigationController): string[] {
  return controller.rows().map((row) => row.node.name);
}

export function press(controller: { handleKey(name: string): void }, ...keys: string[]): void {
  for (const key of keys) controller.handleKey(key);
}

/** Key names for typing plain text. */
export function typed(text: string): string[] {
  return Array.from(text).map((ch) => (ch === ' ' ? 'SPACE' : ch));
}
