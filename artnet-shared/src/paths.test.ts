import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { getConfigDir, getConfigPath, getDefaultLogPath } from './paths';

describe('getConfigDir', () => {
  it('returns a non-empty path', () => {
    expect(getConfigDir().length).toBeGreaterThan(0);
  });

  it('ends with artnet-console', () => {
    expect(getConfigDir()).toMatch(/artnet-console$/);
  });
});

describe('file paths', () => {
  it('places config.json and console.log in the config dir', () => {
    expect(getConfigPath()).toBe(path.join(getConfigDir(), 'config.json'));
    expect(getDefaultLogPath()).toBe(path.join(getConfigDir(), 'console.log'));
  });
});
