/**
 * Log source collaborator: a live tail (polled) and paged history,
 * both backed by the bridge REST API.
 */

import { sleep } from './async';
import type { BridgeClient } from './client';
import type { LogEntry, LogFilters, LogPage } from './types';

/**
 * Where a tail left off. The source advances `since` as batches arrive,
 * so passing the same position to a later subscription resumes after the
 * last line already delivered.
 */
export interface TailPosition {
  since: string | null;
}

export interface LogSource {
  /** Yield new log lines until `signal` aborts. Errors reject the iteration. */
  subscribe(filters: LogFilters, signal: AbortSignal, position?: TailPosition): AsyncIterable<LogEntry>;
  /** Fetch one zero-based page of stored logs. */
  queryPage(page: number, filters: LogFilters, search: string | null, signal?: AbortSignal): Promise<LogPage>;
}

/** The slice of the REST client the log source needs. */
export type LogApi = Pick<BridgeClient, 'tailLogs' | 'getLogs'>;

export interface PollingLogSourceOptions {
  pageSize: number;
  pollIntervalMs: number;
}

export class PollingLogSource implements LogSource {
  constructor(
    private readonly client: LogApi,
    private readonly options: PollingLogSourceOptions,
  ) {}

  get pageSize(): number {
    return this.options.pageSize;
  }

  async *subscribe(
    filters: LogFilters,
    signal: AbortSignal,
    position: TailPosition = { since: null },
  ): AsyncIterable<LogEntry> {
    while (!signal.aborted) {
      const batch = await this.client.tailLogs({ since: position.since, ...filters }, signal);
      position.since = batch.cursor;
      for (const entry of batch.entries) {
        if (signal.aborted) return;
        yield entry;
      }
      await sleep(this.options.pollIntervalMs, signal);
    }
  }

  queryPage(page: number, filters: LogFilters, search: string | null, signal?: AbortSignal): Promise<LogPage> {
    return this.client.getLogs({
      page,
      pageSize: this.options.pageSize,
      level: filters.level ?? null,
      logger: filters.logger ?? null,
      search,
    }, signal);
  }
}
