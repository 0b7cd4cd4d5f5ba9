/**
 * `artnet-console health` — check that the bridge answers.
 */

import type { Command } from 'commander';
import { formatHealth } from 'artnet-shared';
import { runOneShot } from './output';

export async function healthAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  await runOneShot(cmd, {
    fetch: (client) => client.getHealth(),
    render: formatHealth,
  });
}
