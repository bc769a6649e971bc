/**
 * Component sizing from the terminal viewport.
 */

/** Padding around everything: one row top and bottom, two columns each side */
export const FRAME_HEIGHT = 2;
export const FRAME_WIDTH = 4;
/** Help line plus the blank row above it */
export const HELP_HEIGHT = 2;
/** Editor title plus the blank row below it */
export const TITLE_HEIGHT = 2;
/** Line-number gutter in front of the editor text */
export const EDITOR_GUTTER = 4;

export interface Dimensions {
  width: number;
  height: number;
}

export interface Layout {
  list: Dimensions;
  editor: Dimensions;
}

/**
 * Sizes for the list and the editor. Returns null for a zero-sized
 * viewport, which means no real size has been reported yet.
 */
export function computeLayout(width: number, height: number): Layout | null {
  if (width <= 0 || height <= 0) return null;

  return {
    list: {
      width: Math.max(0, width - FRAME_WIDTH),
      height: Math.max(0, height - FRAME_HEIGHT - HELP_HEIGHT),
    },
    editor: {
      width: Math.max(0, width - FRAME_WIDTH - EDITOR_GUTTER),
      height: Math.max(0, height - FRAME_HEIGHT - TITLE_HEIGHT - HELP_HEIGHT),
    },
  };
}
