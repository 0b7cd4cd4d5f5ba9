/**
 * Live log tail: streams new entries from the log source into the
 * session's log tail buffer until the mode is exited.
 */

import { color, errorMessage, escapeTags, formatLogEntry, matchesFilters, sleep } from 'artnet-shared';
import type { LogFilters, LogSource, TailPosition } from 'artnet-shared';
import { log, logError } from '../../logger';
import type { KeyId } from '../keys';
import { TaskGroup } from './tasks';
import type { ControllerHost, ModeController } from './types';

export const TAIL_RETRY_MS = 5000;

export const FILTER_NOTICE =
  "[Filter UI not yet implemented - use 'logs tail --level LEVEL --logger LOGGER' to set filters]";

export interface LogTailOptions {
  filters: LogFilters;
  source: LogSource;
  retryDelayMs?: number;
}

export function describeFilters(filters: LogFilters): string {
  const parts: string[] = [];
  if (filters.level) parts.push(`level>=${filters.level}`);
  if (filters.logger) parts.push(`logger=${filters.logger}`);
  return parts.length > 0 ? parts.join(' ') : 'no filters';
}

export class LogTailController implements ModeController {
  readonly mode = 'log-tail' as const;
  readonly filters: LogFilters;
  private readonly source: LogSource;
  private readonly retryDelayMs: number;
  private readonly tasks: TaskGroup;
  /** Shared by every subscription so a retry resumes after the last line shown. */
  private readonly position: TailPosition = { since: null };
  private _followTail = true;

  constructor(private readonly host: ControllerHost, options: LogTailOptions) {
    this.filters = { level: options.filters.level ?? null, logger: options.filters.logger ?? null };
    this.source = options.source;
    this.retryDelayMs = options.retryDelayMs ?? TAIL_RETRY_MS;
    this.tasks = new TaskGroup(err => logError('Log tail task failed', err));
  }

  get alive(): boolean {
    return !this.tasks.cancelled;
  }

  get followTail(): boolean {
    return this._followTail;
  }

  setFollowTail(value: boolean): void {
    this._followTail = value;
  }

  /** Re-enable auto-scroll and jump to the newest line. */
  enableFollowTail(): void {
    this._followTail = true;
    this.host.logTailToEnd();
    this.host.requestRender();
  }

  start(): void {
    this.print(color('gray', `--- tailing logs (${escapeTags(describeFilters(this.filters))}), q or Esc to exit ---`));
    this.tasks.spawn(signal => this.pump(signal));
  }

  stop(): void {
    this.tasks.cancel();
  }

  handleKey(key: KeyId): boolean {
    switch (key) {
      case 'end':
        this.enableFollowTail();
        return true;
      case 'f':
        this.print(color('yellow', escapeTags(FILTER_NOTICE)));
        return true;
      default:
        return false;
    }
  }

  /** Resolves once the background pump has exited. */
  settled(): Promise<void> {
    return this.tasks.settled();
  }

  private print(line: string): void {
    this.host.appendLogTail(`${line}\n`, this._followTail);
  }

  private async pump(signal: AbortSignal): Promise<void> {
    while (this.alive) {
      try {
        for await (const entry of this.source.subscribe(this.filters, signal, this.position)) {
          if (!this.alive) return;
          if (!matchesFilters(entry, this.filters)) continue;
          this.print(formatLogEntry(entry));
        }
      } catch (err) {
        if (!this.alive) return;
        logError('Log tail subscription failed', err);
        const seconds = Math.round(this.retryDelayMs / 1000);
        this.print(
          `${color('red', `Log tail error: ${escapeTags(errorMessage(err))}`)} ${color('gray', `(retrying in ${seconds}s)`)}`,
        );
      }
      if (!this.alive) return;
      await sleep(this.retryDelayMs, signal);
      if (this.alive) log('Resubscribing to log tail');
    }
  }
}
