import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';

vi.mock('fs', async () => {
  const actual = await vi.importActual<typeof import('fs')>('fs');
  return {
    ...actual,
    appendFileSync: vi.fn(),
    mkdirSync: vi.fn(),
  };
});

import { initLogger, closeLogger, log, logError } from './logger';

describe('logger', () => {
  beforeEach(() => {
    vi.mocked(fs.appendFileSync).mockReset();
  });

  afterEach(() => {
    closeLogger();
  });

  it('does nothing before initLogger', () => {
    log('hello');
    expect(fs.appendFileSync).not.toHaveBeenCalled();
  });

  it('appends timestamped lines once initialised', () => {
    initLogger('/tmp/artnet/console.log');
    log('entered watch mode');
    expect(fs.mkdirSync).toHaveBeenCalledWith('/tmp/artnet', { recursive: true });
    const [file, line] = vi.mocked(fs.appendFileSync).mock.calls[0];
    expect(file).toBe('/tmp/artnet/console.log');
    expect(String(line)).toMatch(/^\d{4}-\d{2}-\d{2}T\S+ \[INFO\] entered watch mode\n$/);
  });

  it('includes the error message', () => {
    initLogger('/tmp/artnet/console.log');
    logError('status query failed', new Error('connection refused'));
    const [, line] = vi.mocked(fs.appendFileSync).mock.calls[0];
    expect(String(line)).toContain('[ERROR] status query failed: connection refused');
  });

  it('swallows write failures', () => {
    initLogger('/tmp/artnet/console.log');
    vi.mocked(fs.appendFileSync).mockImplementation(() => {
      throw new Error('disk full');
    });
    expect(() => log('x')).not.toThrow();
  });
});
