/**
 * Helpers for blessed-style tagged text (`{red-fg}…{/red-fg}`, `{bold}`).
 * Console buffers store tagged text; the renderer turns tags into styles.
 */

/** Escape literal braces so user/log text is never read as a tag. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, c => (c === '{' ? '{open}' : '{close}'));
}

/** Strip tags, turning `{open}` / `{close}` back into braces. */
export function stripBlessedTags(text: string): string {
  return text.replace(/\{(\/?)([^}]*)\}/g, (_m, slash: string, name: string) => {
    if (!slash && name === 'open') return '{';
    if (!slash && name === 'close') return '}';
    return '';
  });
}

/** Return the visible (non-tag) length of tagged text. */
export function visibleLength(text: string): number {
  return stripBlessedTags(text).length;
}

/** Truncate text to maxLength, appending "..." if truncated. */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.substring(0, maxLength - 3) + '...';
}

/** Wrap text in a color tag. */
export function color(name: string, text: string): string {
  return `{${name}-fg}${text}{/${name}-fg}`;
}
