/**
 * Global CLI options → resolved console config and a REST client.
 */

import type { Command } from 'commander';
import { BridgeClient, configFromEnv, loadConfigFile, resolveConfig } from 'artnet-shared';
import type { ConsoleConfig } from 'artnet-shared';

export interface GlobalOptions {
  server?: string;
  apiKey?: string;
  config?: string;
  json?: boolean;
}

/** Options of the root program, seen from any subcommand. */
export function globalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

/** Resolve config with precedence flags > environment > file > defaults. */
export async function loadSettings(
  opts: GlobalOptions,
  env: Record<string, string | undefined> = process.env,
): Promise<ConsoleConfig> {
  const fileLayer = await loadConfigFile(opts.config);
  return resolveConfig(fileLayer, configFromEnv(env), {
    serverUrl: opts.server,
    apiKey: opts.apiKey,
  });
}

export function createClient(config: ConsoleConfig): BridgeClient {
  return new BridgeClient(config.serverUrl, {
    apiKey: config.apiKey,
    timeoutMs: config.timeoutMs,
  });
}
