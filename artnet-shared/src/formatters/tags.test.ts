import { describe, it, expect } from 'vitest';
import { escapeTags, stripBlessedTags, visibleLength, truncate, color } from './tags';

describe('escapeTags', () => {
  it('escapes both braces in one pass', () => {
    expect(escapeTags('a{b}c')).toBe('a{open}b{close}c');
  });

  it('leaves plain text unchanged', () => {
    expect(escapeTags('no braces')).toBe('no braces');
  });
});

describe('stripBlessedTags', () => {
  it('removes simple and nested tags', () => {
    expect(stripBlessedTags('{bold}{green-fg}OK{/green-fg}{/bold}')).toBe('OK');
  });

  it('restores escaped braces', () => {
    expect(stripBlessedTags(escapeTags('{"universe": 1}'))).toBe('{"universe": 1}');
  });
});

describe('visibleLength', () => {
  it('counts only visible characters', () => {
    expect(visibleLength('{cyan-fg}hello{/cyan-fg}')).toBe(5);
  });
});

describe('truncate', () => {
  it('keeps short text', () => {
    expect(truncate('short', 10)).toBe('short');
  });

  it('adds an ellipsis within the limit', () => {
    expect(truncate('abcdefghijkl', 8)).toBe('abcde...');
  });
});

describe('color', () => {
  it('wraps text in a foreground tag', () => {
    expect(color('red', 'x')).toBe('{red-fg}x{/red-fg}');
  });
});
