#!/usr/bin/env tsx

import { Command, InvalidArgumentError, Option } from 'commander';
import type { LogsOptions } from './commands/logs';
import { parseLevelOption } from './console/CommandRunner';
import { VERSION } from './version';

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive whole number.');
  }
  return n;
}

const program = new Command();

program
  .name('artnet-console')
  .description('Operator console for an ArtNet/LAN lighting bridge')
  .version(VERSION)
  .option('--server <url>', 'Bridge REST endpoint (default: http://127.0.0.1:8000)')
  .option('--api-key <key>', 'API key sent as X-API-Key')
  .option('--config <path>', 'Config file (default: ~/.config/artnet-console/config.json)')
  .option('--json', 'Output as JSON (one-shot commands)');

// Console command uses Ink — lazy-load to avoid importing React at parse time
const consoleCmd = new Command('console')
  .description('Interactive console with log tail, watch and log view modes')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { consoleAction } = await import('./commands/console');
    return consoleAction(_opts, cmd);
  });
program.addCommand(consoleCmd, { isDefault: true });

const healthCmd = new Command('health')
  .description('Check that the bridge is reachable')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { healthAction } = await import('./commands/health');
    return healthAction(_opts, cmd);
  });
program.addCommand(healthCmd);

const statusCmd = new Command('status')
  .description('Show bridge status')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { statusAction } = await import('./commands/status');
    return statusAction(_opts, cmd);
  });
program.addCommand(statusCmd);

const devicesCmd = new Command('devices')
  .description('List known devices')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { devicesAction } = await import('./commands/devices');
    return devicesAction(_opts, cmd);
  });
program.addCommand(devicesCmd);

const logsCmd = new Command('logs')
  .description('Print one page of stored bridge logs')
  .addOption(new Option('--level <level>', 'Minimum severity').argParser(parseLevelOption))
  .option('--logger <prefix>', 'Only loggers with this name prefix')
  .option('--search <text>', 'Only messages containing this text')
  .addOption(new Option('--page <n>', 'Page number, starting at 1').argParser(parsePositiveInt))
  .addOption(new Option('--page-size <n>', 'Entries per page').argParser(parsePositiveInt))
  .action(async (opts: LogsOptions, cmd: Command) => {
    const { logsAction } = await import('./commands/logs');
    return logsAction(opts, cmd);
  });
program.addCommand(logsCmd);

program.parse();
