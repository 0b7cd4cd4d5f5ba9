/**
 * Shared plumbing for the one-shot commands: settings, client, and
 * either JSON or styled text on stdout.
 */

import type { Command } from 'commander';
import { errorMessage } from 'artnet-shared';
import type { BridgeClient, ConsoleConfig } from 'artnet-shared';
import { createClient, globalOptions, loadSettings } from '../settings';
import { tagsToAnsi } from './ansi';

export interface OneShot<T> {
  fetch: (client: BridgeClient, config: ConsoleConfig) => Promise<T>;
  /** Tagged text for the human-readable output. */
  render: (data: T) => string;
}

export async function runOneShot<T>(cmd: Command, oneShot: OneShot<T>): Promise<void> {
  const opts = globalOptions(cmd);
  try {
    const config = await loadSettings(opts);
    const data = await oneShot.fetch(createClient(config), config);
    if (opts.json) {
      process.stdout.write(JSON.stringify(data, null, 2) + '\n');
    } else {
      process.stdout.write(tagsToAnsi(oneShot.render(data)) + '\n');
    }
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }
}
