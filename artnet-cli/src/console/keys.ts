/**
 * Key identifiers and the mapping from ink key events.
 *
 * Identifiers: printable characters stand for themselves; named keys are
 * `escape`, `enter`, `backspace`, `tab`, `space`, `up`, `down`, `left`,
 * `right`, `pageup`, `pagedown`, `home`, `end`; control chords are `c-<letter>`.
 */

import type { Key } from 'ink';

export type KeyId = string;

// ink 4 strips the leading ESC of unrecognised sequences and sets `meta`.
const HOME_SEQUENCES = new Set(['[H', 'OH', '[1~', '[7~']);
const END_SEQUENCES = new Set(['[F', 'OF', '[4~', '[8~']);

export function toKeyId(input: string, key: Key): KeyId | null {
  if (key.escape) return 'escape';
  if (key.return) return 'enter';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.tab) return 'tab';
  if (key.backspace || key.delete) return 'backspace';
  if (key.meta) {
    if (HOME_SEQUENCES.has(input)) return 'home';
    if (END_SEQUENCES.has(input)) return 'end';
    return null;
  }
  if (key.ctrl) {
    return /^[a-z]$/.test(input) ? `c-${input}` : null;
  }
  if (input === ' ') return 'space';
  if (input.length === 1) return input;
  return null;
}

export type TextEdit =
  | { type: 'insert'; text: string }
  | { type: 'backspace' }
  | { type: 'submit' }
  | { type: 'history'; direction: -1 | 1 }
  | { type: 'none' };

const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/** Interpret a key that no binding claimed as an edit of the input line. */
export function toTextEdit(input: string, key: Key): TextEdit {
  if (key.return) return { type: 'submit' };
  if (key.backspace || key.delete) return { type: 'backspace' };
  if (key.upArrow) return { type: 'history', direction: -1 };
  if (key.downArrow) return { type: 'history', direction: 1 };
  if (key.ctrl || key.meta || key.escape || key.tab) return { type: 'none' };
  const text = input.replace(CONTROL_CHARS, '');
  return text ? { type: 'insert', text } : { type: 'none' };
}
