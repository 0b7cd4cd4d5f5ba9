/**
 * `artnet-console status` — bridge status summary.
 */

import type { Command } from 'commander';
import { formatStatus } from 'artnet-shared';
import { runOneShot } from './output';

export async function statusAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  await runOneShot(cmd, {
    fetch: (client) => client.getStatus(),
    render: formatStatus,
  });
}
