/**
 * Paginated log browser with level/logger/search filters and an optional
 * follow mode pinned to the newest page.
 *
 * Refreshes are last-request-wins: each one takes a sequence number and only
 * the most recent one applies its result, and only while the mode is active.
 */

import { errorMessage, formatLogEntry, sleep } from 'artnet-shared';
import type { LogFilters, LogLevel, LogPage, LogSource } from 'artnet-shared';
import { logError } from '../../logger';
import type { KeyId } from '../keys';
import { TaskGroup } from './tasks';
import type { ControllerHost, ModeController } from './types';

export type PageTarget = 'first' | 'prev' | 'next' | 'last';

export const LEVEL_CYCLE: readonly (LogLevel | null)[] = [null, 'DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

export const FOLLOW_REPAGE_MS = 2000;

export const LOGGER_PROMPT_NOTICE = "Logger filter prompt not implemented - use 'logs view --logger NAME' instead";
export const SEARCH_PROMPT_NOTICE = "Search prompt not implemented - use 'logs view --search TEXT' instead";
export const HELP_OVERLAY_NOTICE = "Help overlay not implemented - run 'help-keys' for the log view keys";

const PAGE_KEYS: Partial<Record<KeyId, PageTarget>> = {
  pageup: 'prev',
  pagedown: 'next',
  home: 'first',
  end: 'last',
};

const NOTICE_KEYS: Partial<Record<KeyId, string>> = {
  f: LOGGER_PROMPT_NOTICE,
  '/': SEARCH_PROMPT_NOTICE,
  '?': HELP_OVERLAY_NOTICE,
};

export interface LogViewOptions {
  source: LogSource;
  filters: LogFilters;
  search: string | null;
  follow: boolean;
  followIntervalMs?: number;
}

function lastPageOf(result: LogPage): number {
  return Math.max(0, result.totalPages - 1);
}

function emptyToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export class LogViewController implements ModeController {
  readonly mode = 'log-view' as const;
  private readonly source: LogSource;
  private readonly followIntervalMs: number;
  private readonly tasks: TaskGroup;
  private followTasks: TaskGroup | null = null;
  private requestSeq = 0;
  private _alive = true;

  private _page = 0;
  private _lastPage = 0;
  private _total = 0;
  private _levelFilter: LogLevel | null;
  private _loggerFilter: string | null;
  private _searchPattern: string | null;
  private _followMode = false;
  private readonly initialFollow: boolean;

  private _lines: string[] = [];
  private _error: string | null = null;
  private _notice: string | null = null;
  private _loading = false;

  constructor(private readonly host: ControllerHost, options: LogViewOptions) {
    this.source = options.source;
    this.followIntervalMs = options.followIntervalMs ?? FOLLOW_REPAGE_MS;
    this._levelFilter = options.filters.level ?? null;
    this._loggerFilter = emptyToNull(options.filters.logger);
    this._searchPattern = emptyToNull(options.search);
    this.initialFollow = options.follow;
    this.tasks = new TaskGroup(err => logError('Log view task failed', err));
  }

  get alive(): boolean { return this._alive; }
  get page(): number { return this._page; }
  get lastPage(): number { return this._lastPage; }
  get total(): number { return this._total; }
  get levelFilter(): LogLevel | null { return this._levelFilter; }
  get loggerFilter(): string | null { return this._loggerFilter; }
  get searchPattern(): string | null { return this._searchPattern; }
  get followMode(): boolean { return this._followMode; }
  get lines(): readonly string[] { return this._lines; }
  get error(): string | null { return this._error; }
  get notice(): string | null { return this._notice; }
  get loading(): boolean { return this._loading; }

  get filters(): LogFilters {
    return { level: this._levelFilter, logger: this._loggerFilter };
  }

  start(): void {
    if (this.initialFollow) this.setFollowMode(true);
    this.requestRefresh();
  }

  stop(): void {
    if (!this._alive) return;
    this.followTasks?.cancel();
    this.followTasks = null;
    this.tasks.cancel();
    this._alive = false;
  }

  handleKey(key: KeyId): boolean {
    const target = PAGE_KEYS[key];
    if (target) {
      this._notice = null;
      this.navigatePage(target);
      this.requestRefresh();
      return true;
    }
    const notice = NOTICE_KEYS[key];
    if (notice) {
      this._notice = notice;
      this.host.requestRender();
      return true;
    }
    switch (key) {
      case 'l':
        this._notice = null;
        this.cycleLevelFilter();
        this.requestRefresh();
        return true;
      case 'c':
        this._notice = null;
        this.setLoggerFilter(null);
        this.requestRefresh();
        return true;
      case 'r':
        this._notice = null;
        this.requestRefresh();
        return true;
      case 'space':
        this._notice = null;
        this.toggleFollowMode();
        this.requestRefresh();
        return true;
      default:
        return false;
    }
  }

  /** Move within `[0, lastPage]`. Returns whether the page changed. */
  navigatePage(target: PageTarget): boolean {
    const before = this._page;
    switch (target) {
      case 'first':
        this._page = 0;
        break;
      case 'prev':
        this._page = Math.max(0, this._page - 1);
        break;
      case 'next':
        this._page = Math.min(this._lastPage, this._page + 1);
        break;
      case 'last':
        this._page = this._lastPage;
        break;
    }
    if (target !== 'last' && this._followMode) this.setFollowMode(false);
    return this._page !== before;
  }

  cycleLevelFilter(): LogLevel | null {
    const index = LEVEL_CYCLE.indexOf(this._levelFilter);
    this._levelFilter = LEVEL_CYCLE[(index + 1) % LEVEL_CYCLE.length];
    this.resetPaging();
    return this._levelFilter;
  }

  setLoggerFilter(value: string | null): void {
    this._loggerFilter = emptyToNull(value);
    this.resetPaging();
  }

  setSearchPattern(value: string | null): void {
    this._searchPattern = emptyToNull(value);
    this.resetPaging();
  }

  toggleFollowMode(): boolean {
    this.setFollowMode(!this._followMode);
    return this._followMode;
  }

  /** Spawn a refresh in the controller's task group. */
  requestRefresh(): void {
    this.tasks.spawn(() => this.refresh());
  }

  async refresh(): Promise<void> {
    if (!this._alive) return;
    const seq = ++this.requestSeq;
    const page = this._followMode ? this._lastPage : this._page;
    this._loading = true;
    this.host.requestRender();

    try {
      let result = await this.source.queryPage(page, this.filters, this._searchPattern, this.tasks.signal);
      if (!this.isCurrent(seq)) return;
      // The log shrank past the requested page, or follow mode wants the newest one.
      const last = lastPageOf(result);
      if (result.page > last || (this._followMode && last !== result.page)) {
        result = await this.source.queryPage(last, this.filters, this._searchPattern, this.tasks.signal);
        if (!this.isCurrent(seq)) return;
      }
      this.apply(result);
    } catch (err) {
      if (!this.isCurrent(seq)) return;
      logError('Log page query failed', err);
      this._error = errorMessage(err);
    }
    this._loading = false;
    this.host.requestRender();
  }

  settled(): Promise<void> {
    return this.tasks.settled();
  }

  private isCurrent(seq: number): boolean {
    return this._alive && seq === this.requestSeq;
  }

  private apply(result: LogPage): void {
    this._page = result.page;
    this._lastPage = lastPageOf(result);
    this._total = result.total;
    this._lines = result.entries.map(formatLogEntry);
    this._error = null;
  }

  private resetPaging(): void {
    this._page = 0;
    this._lastPage = 0;
  }

  private setFollowMode(on: boolean): void {
    if (on === this._followMode) return;
    this._followMode = on;
    if (on) {
      this._page = this._lastPage;
      const group = new TaskGroup(err => logError('Log view follow task failed', err));
      group.spawn(signal => this.followLoop(signal));
      this.followTasks = group;
    } else {
      this.followTasks?.cancel();
      this.followTasks = null;
    }
  }

  private async followLoop(signal: AbortSignal): Promise<void> {
    while (this._alive && !signal.aborted) {
      await sleep(this.followIntervalMs, signal);
      if (!this._alive || signal.aborted) return;
      await this.refresh();
    }
  }
}
