/**
 * Render tagged console text (`{red-fg}…{/red-fg}`, `{bold}`) as ANSI
 * styles for one-shot command output.
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';

const STYLES: Record<string, ChalkInstance> = {
  bold: chalk.bold,
  underline: chalk.underline,
  'red-fg': chalk.red,
  'green-fg': chalk.green,
  'yellow-fg': chalk.yellow,
  'blue-fg': chalk.blue,
  'magenta-fg': chalk.magenta,
  'cyan-fg': chalk.cyan,
  'white-fg': chalk.white,
  'gray-fg': chalk.gray,
  'grey-fg': chalk.gray,
};

const TAG_RE = /\{(\/?)([^}]+)\}/g;

function styleLine(line: string): string {
  const stack: ChalkInstance[] = [];
  let out = '';
  let lastIndex = 0;

  const emit = (text: string) => {
    if (!text) return;
    out += stack.reduce((acc, style) => style(acc), text);
  };

  TAG_RE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TAG_RE.exec(line)) !== null) {
    emit(line.slice(lastIndex, match.index));
    lastIndex = match.index + match[0].length;
    const [, slash, name] = match;
    if (!slash && name === 'open') {
      emit('{');
    } else if (!slash && name === 'close') {
      emit('}');
    } else if (slash) {
      stack.pop();
    } else {
      stack.push(STYLES[name] ?? chalk.reset);
    }
  }
  emit(line.slice(lastIndex));
  return out;
}

export function tagsToAnsi(text: string): string {
  return text.split('\n').map(styleLine).join('\n');
}
