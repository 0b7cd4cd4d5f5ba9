/**
 * Windowing for cursor-based buffers: the visible lines end at the line
 * holding the buffer cursor.
 */

export interface Viewport {
  lines: string[];
  hiddenAbove: number;
  hiddenBelow: number;
}

export function windowAtCursor(text: string, cursor: number, height: number): Viewport {
  if (!text || height <= 0) return { lines: [], hiddenAbove: 0, hiddenBelow: 0 };

  const lines = text.split('\n');
  if (text.endsWith('\n')) lines.pop();

  const before = text.slice(0, Math.max(0, cursor));
  let cursorLine = 0;
  for (const ch of before) {
    if (ch === '\n') cursorLine++;
  }
  cursorLine = Math.min(cursorLine, lines.length - 1);

  const end = cursorLine + 1;
  const start = Math.max(0, end - height);
  return {
    lines: lines.slice(start, end),
    hiddenAbove: start,
    hiddenBelow: lines.length - end,
  };
}

/** Keep the last `height` lines of a list. */
export function tail<T>(items: readonly T[], height: number): T[] {
  if (height <= 0) return [];
  return items.slice(Math.max(0, items.length - height));
}
