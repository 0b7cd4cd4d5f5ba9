/**
 * Stack-based parser converting blessed tag strings to React/Ink nodes.
 *
 * Supports: {bold}, {underline}, {color-fg}, {/tag}, nested tags, and the
 * {open} / {close} escapes for literal braces.
 */

import React from 'react';
import { Text } from 'ink';

/** Map blessed color names to Ink-compatible color strings. */
function mapColor(c: string): string {
  if (c === 'grey') return 'gray';
  return c;
}

interface StyleFrame {
  bold?: boolean;
  underline?: boolean;
  color?: string;
}

const TAG_RE = /\{(\/?)([^}]+)\}/g;

const LITERALS = new Map([['open', '{'], ['close', '}']]);

/**
 * Parse a single line of blessed-tagged text into a React node.
 *
 * Examples:
 *   "{bold}Hello{/bold}" → <Text bold>Hello</Text>
 *   "{red-fg}Error{/red-fg}" → <Text color="red">Error</Text>
 *   "a {open}b{close}" → "a {b}"
 */
export function parseBlessedTags(input: string): React.ReactNode {
  if (!input) return null;

  // Fast path: no tags at all
  if (!input.includes('{')) {
    return input;
  }

  const segments: React.ReactNode[] = [];
  const styleStack: StyleFrame[] = [{}];
  let pending = '';
  let lastIndex = 0;
  let segKey = 0;

  const flush = () => {
    if (pending) {
      segments.push(renderSpan(pending, currentStyle(styleStack), segKey++));
      pending = '';
    }
  };

  TAG_RE.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = TAG_RE.exec(input)) !== null) {
    pending += input.slice(lastIndex, match.index);
    lastIndex = match.index + match[0].length;

    const isClose = match[1] === '/';
    const tagName = match[2];

    const literal = isClose ? undefined : LITERALS.get(tagName);
    if (literal !== undefined) {
      pending += literal;
      continue;
    }

    flush();
    if (isClose) {
      if (styleStack.length > 1) {
        styleStack.pop();
      }
    } else if (tagName === 'bold') {
      styleStack.push({ ...currentStyle(styleStack), bold: true });
    } else if (tagName === 'underline') {
      styleStack.push({ ...currentStyle(styleStack), underline: true });
    } else if (tagName.endsWith('-fg')) {
      styleStack.push({ ...currentStyle(styleStack), color: mapColor(tagName.slice(0, -3)) });
    } else {
      // Unknown opening tags still get a frame so their closing tag pops it
      styleStack.push({ ...currentStyle(styleStack) });
    }
  }

  pending += input.slice(lastIndex);
  flush();

  if (segments.length === 0) return null;
  if (segments.length === 1) return segments[0];
  return <>{segments}</>;
}

function currentStyle(stack: StyleFrame[]): StyleFrame {
  return stack[stack.length - 1];
}

function renderSpan(text: string, style: StyleFrame, key: number): React.ReactNode {
  const hasStyle = style.bold || style.underline || style.color;
  if (!hasStyle) {
    return <Text key={key}>{text}</Text>;
  }
  return (
    <Text
      key={key}
      bold={style.bold}
      underline={style.underline}
      color={style.color}
    >
      {text}
    </Text>
  );
}

