import { describe, it, expect, vi, beforeEach } from 'vitest';
import * as fs from 'fs';
import { parseConfigLayer, loadConfigFile, configFromEnv, resolveConfig, defaultConfig } from './config';
import { ConfigError } from './errors';

vi.mock('fs', () => ({
  promises: {
    readFile: vi.fn(),
  },
}));

beforeEach(() => {
  vi.mocked(fs.promises.readFile).mockReset();
});

describe('parseConfigLayer', () => {
  it('returns an empty layer for non-object input', () => {
    expect(parseConfigLayer(null, 'cfg')).toEqual({});
    expect(parseConfigLayer([1, 2], 'cfg')).toEqual({});
  });

  it('keeps known fields and ignores unknown ones', () => {
    expect(parseConfigLayer({ serverUrl: 'http://bridge:9000', pageSize: 20, theme: 'dark' }, 'cfg')).toEqual({
      serverUrl: 'http://bridge:9000',
      pageSize: 20,
    });
  });

  it('rejects a field of the wrong type', () => {
    expect(() => parseConfigLayer({ timeoutMs: '5s' }, 'cfg.json')).toThrow(ConfigError);
    expect(() => parseConfigLayer({ timeoutMs: '5s' }, 'cfg.json')).toThrow('cfg.json: "timeoutMs" must be a positive number');
  });

  it('rejects non-positive numbers', () => {
    expect(() => parseConfigLayer({ refreshInterval: 0 }, 'cfg')).toThrow(ConfigError);
  });
});

describe('loadConfigFile', () => {
  it('parses the file contents', async () => {
    vi.mocked(fs.promises.readFile).mockResolvedValue('{"apiKey":"test-key"}');
    await expect(loadConfigFile('/fake/config.json')).resolves.toEqual({ apiKey: 'test-key' });
  });

  it('falls back to an empty layer when the file is missing', async () => {
    vi.mocked(fs.promises.readFile).mockRejectedValue(new Error('ENOENT'));
    await expect(loadConfigFile('/fake/config.json')).resolves.toEqual({});
  });

  it('falls back to an empty layer when the file is malformed', async () => {
    vi.mocked(fs.promises.readFile).mockResolvedValue('{not json');
    await expect(loadConfigFile('/fake/config.json')).resolves.toEqual({});
  });
});

describe('configFromEnv', () => {
  it('reads the supported variables', () => {
    expect(configFromEnv({
      ARTNET_SERVER_URL: 'http://10.0.0.9:8000',
      ARTNET_API_KEY: 'test-key',
      HOME: '/home/test',
    })).toEqual({ serverUrl: 'http://10.0.0.9:8000', apiKey: 'test-key' });
  });
});

describe('resolveConfig', () => {
  it('returns defaults with no layers', () => {
    expect(resolveConfig()).toEqual(defaultConfig());
  });

  it('lets later layers win and skips undefined values', () => {
    const config = resolveConfig(
      { serverUrl: 'http://file:8000', pageSize: 10 },
      { serverUrl: 'http://env:8000' },
      { serverUrl: undefined, apiKey: 'test-key' },
    );
    expect(config.serverUrl).toBe('http://env:8000');
    expect(config.pageSize).toBe(10);
    expect(config.apiKey).toBe('test-key');
  });

  it('rejects an invalid server URL', () => {
    expect(() => resolveConfig({ serverUrl: 'not a url' })).toThrow('Invalid server URL: not a url');
    expect(() => resolveConfig({ serverUrl: 'ftp://bridge' })).toThrow(ConfigError);
  });
});
