export interface PaneRect {
  /** 1-based terminal column. */
  x: number;
  /** 1-based terminal row. */
  y: number;
  width: number;
  height: number;
}

export interface ScreenLayout {
  navbar: PaneRect;
  todos: PaneRect;
  statusRow: number;
}

export const STATUS_LINE_HEIGHT = 1;
export const MIN_NAVBAR_WIDTH = 16;
export const NAVBAR_SHARE = 0.3;

/** Workspaces on the left, todos on the right, one status line at the bottom. */
export function computeLayout(width: number, height: number): ScreenLayout {
  const paneHeight = Math.max(1, height - STATUS_LINE_HEIGHT);
  const navbarWidth = Math.min(width, Math.max(MIN_NAVBAR_WIDTH, Math.floor(width * NAVBAR_SHARE)));
  return {
    navbar: { x: 1, y: 1, width: navbarWidth, height: paneHeight },
    todos: { x: navbarWidth + 1, y: 1, width: Math.max(0, width - navbarWidth), height: paneHeight },
    statusRow: paneHeight + 1,
  };
}
