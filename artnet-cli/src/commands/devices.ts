/**
 * `artnet-console devices` — table of known devices.
 */

import type { Command } from 'commander';
import { formatDevices } from 'artnet-shared';
import { runOneShot } from './output';

export async function devicesAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  await runOneShot(cmd, {
    fetch: (client) => client.getDevices(),
    render: formatDevices,
  });
}
