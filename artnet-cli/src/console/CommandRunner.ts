/**
 * Runs submitted console lines as commander commands.
 *
 * A fresh program is built per line with `exitOverride()`, so parse errors
 * and help output become exceptions and text in the output buffer rather
 * than process exits.
 */

import { Argument, Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import {
  LOG_LEVELS,
  WATCH_TARGETS,
  color,
  errorMessage,
  escapeTags,
  formatDevices,
  formatHealth,
  formatStatus,
  parseLogLevel,
} from 'artnet-shared';
import type { BridgeClient, LogLevel, WatchTarget } from 'artnet-shared';
import { log, logError } from '../logger';
import type { ConsoleSession } from './ConsoleSession';
import { ALL_MODES } from './controllers/types';
import { formatKey } from './keybindings';
import type { ConsoleKeyTable } from './keybindings';
import { splitCommandLine } from './splitCommandLine';

export const PROMPT = 'artnet>';

export type ConsoleApi = Pick<BridgeClient, 'getHealth' | 'getStatus' | 'getDevices'>;

export interface CommandRunnerDeps {
  session: ConsoleSession;
  client: ConsoleApi;
  keys: ConsoleKeyTable;
}

interface LogFilterOptions {
  level?: LogLevel;
  logger?: string;
}

interface LogsViewOptions extends LogFilterOptions {
  search?: string;
  follow?: boolean;
}

interface WatchOptions {
  interval?: number;
}

export function parseLevelOption(value: string): LogLevel {
  const level = parseLogLevel(value);
  if (!level) {
    throw new InvalidArgumentError(`Unknown log level "${value}" (expected one of ${LOG_LEVELS.join(', ')}).`);
  }
  return level;
}

export function parseSecondsOption(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Interval must be a positive number of seconds.');
  }
  return seconds;
}

function levelOption(): Option {
  return new Option('--level <level>', 'minimum severity (DEBUG, INFO, WARNING, ERROR, CRITICAL)').argParser(parseLevelOption);
}

export class CommandRunner {
  constructor(private readonly deps: CommandRunnerDeps) {}

  /** Echo and run one input line. Never rejects; failures are printed. */
  async run(line: string): Promise<void> {
    const { session } = this.deps;
    session.print(`${color('cyan', PROMPT)} ${escapeTags(line)}`);

    const trimmed = line.trim();
    if (!trimmed) return;

    let argv: string[];
    try {
      argv = splitCommandLine(trimmed);
    } catch (err) {
      session.print(color('red', `Error: ${escapeTags(errorMessage(err))}`));
      return;
    }

    try {
      await this.buildProgram().parseAsync(argv, { from: 'user' });
    } catch (err) {
      // commander has already written its own message
      if (err instanceof CommanderError) return;
      logError(`Command failed: ${trimmed}`, err);
      session.print(color('red', `Error: ${escapeTags(errorMessage(err))}`));
    }
  }

  private write(text: string): void {
    this.deps.session.appendOutput(escapeTags(text));
  }

  private buildProgram(): Command {
    const { session, client } = this.deps;
    const program = new Command('artnet')
      .description('ArtNet bridge console commands')
      .exitOverride()
      .configureOutput({
        writeOut: str => this.write(str),
        writeErr: str => this.write(str),
        outputError: str => session.appendOutput(`${color('red', escapeTags(str.trimEnd()))}\n`),
      });

    program
      .command('help-keys')
      .description('show key bindings for each mode')
      .action(() => this.printKeyHelp());

    program
      .command('health')
      .description('query bridge health')
      .action(async () => {
        session.print(formatHealth(await client.getHealth()));
      });

    program
      .command('status')
      .description('show bridge status')
      .action(async () => {
        session.print(formatStatus(await client.getStatus()));
      });

    program
      .command('devices')
      .description('list devices known to the bridge')
      .action(async () => {
        session.print(formatDevices(await client.getDevices()));
      });

    const logs = program
      .command('logs')
      .description('tail or browse bridge logs');

    logs
      .command('tail')
      .description('stream new log lines (q or Esc to stop)')
      .addOption(levelOption())
      .option('--logger <name>', 'logger name prefix')
      .action((_opts: Record<string, unknown>, cmd: Command) => {
        const opts = cmd.opts<LogFilterOptions>();
        session.enterMode({
          mode: 'log-tail',
          filters: { level: opts.level ?? null, logger: opts.logger ?? null },
        });
      });

    logs
      .command('view')
      .description('browse stored logs page by page')
      .addOption(levelOption())
      .option('--logger <name>', 'logger name prefix')
      .option('--search <text>', 'only entries containing text')
      .option('--follow', 'stay on the newest page')
      .action((_opts: Record<string, unknown>, cmd: Command) => {
        const opts = cmd.opts<LogsViewOptions>();
        session.enterMode({
          mode: 'log-view',
          filters: { level: opts.level ?? null, logger: opts.logger ?? null },
          search: opts.search ?? null,
          follow: opts.follow === true,
        });
      });

    program
      .command('watch')
      .description('refresh a view periodically (+/- to change the interval)')
      .addArgument(new Argument('<target>', 'what to watch').choices(WATCH_TARGETS))
      .addOption(new Option('--interval <seconds>', 'refresh interval').argParser(parseSecondsOption))
      .action((target: WatchTarget, _opts: Record<string, unknown>, cmd: Command) => {
        const opts = cmd.opts<WatchOptions>();
        session.enterMode({ mode: 'watch', target, interval: opts.interval });
      });

    program
      .command('follow')
      .description('toggle follow-tail for command output')
      .action(() => {
        session.toggleFollowTail();
      });

    program
      .command('clear')
      .description('clear the output')
      .action(() => session.clearOutput());

    program
      .command('exit')
      .alias('quit')
      .description('leave the console')
      .action(() => {
        log('Exit command');
        session.quit();
      });

    return program;
  }

  private printKeyHelp(): void {
    const { session, keys } = this.deps;
    for (const mode of ALL_MODES) {
      session.print(`{bold}${mode}{/bold}`);
      for (const help of keys.describe(mode)) {
        const label = help.keys.map(formatKey).join('/');
        session.print(`  ${escapeTags(label.padEnd(16))} ${help.description}`);
      }
    }
  }
}
