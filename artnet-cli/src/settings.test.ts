import { describe, it, expect } from 'vitest';
import { Command } from 'commander';
import { ConfigError } from 'artnet-shared';
import { createClient, globalOptions, loadSettings } from './settings';

const MISSING_CONFIG = '/nonexistent/artnet-console/config.json';

describe('loadSettings', () => {
  it('falls back to defaults when the config file is missing', async () => {
    const config = await loadSettings({ config: MISSING_CONFIG }, {});
    expect(config.serverUrl).toBe('http://127.0.0.1:8000');
    expect(config.apiKey).toBeNull();
  });

  it('prefers flags over the environment', async () => {
    const env = { ARTNET_SERVER_URL: 'http://bridge.local:8000', ARTNET_API_KEY: 'env-key' };
    const fromEnv = await loadSettings({ config: MISSING_CONFIG }, env);
    expect(fromEnv.serverUrl).toBe('http://bridge.local:8000');
    expect(fromEnv.apiKey).toBe('env-key');

    const fromFlags = await loadSettings({ config: MISSING_CONFIG, server: 'http://10.0.0.5:9000', apiKey: 'test-key' }, env);
    expect(fromFlags.serverUrl).toBe('http://10.0.0.5:9000');
    expect(fromFlags.apiKey).toBe('test-key');
  });

  it('rejects a non-http server URL', async () => {
    await expect(loadSettings({ config: MISSING_CONFIG, server: 'ftp://bridge' }, {})).rejects.toThrow(ConfigError);
  });
});

describe('globalOptions', () => {
  it('reads root options from a subcommand', async () => {
    let seen: ReturnType<typeof globalOptions> | null = null;
    const program = new Command('artnet-console')
      .option('--server <url>')
      .option('--json');
    program.command('status').action((_opts: Record<string, unknown>, cmd: Command) => {
      seen = globalOptions(cmd);
    });
    await program.parseAsync(['--server', 'http://bridge:8000', '--json', 'status'], { from: 'user' });
    expect(seen).toEqual({ server: 'http://bridge:8000', json: true });
  });
});

describe('createClient', () => {
  it('targets the configured server', async () => {
    const config = await loadSettings({ config: MISSING_CONFIG, server: 'http://bridge:8000/' }, {});
    expect(createClient(config).endpoint).toBe('http://bridge:8000');
  });
});
