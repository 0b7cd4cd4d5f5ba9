/**
 * Periodic refresh of a status snapshot (bridge status or device list).
 */

import { errorMessage, sleep } from 'artnet-shared';
import type { StatusSource } from 'artnet-shared';
import { logError } from '../../logger';
import type { KeyId } from '../keys';
import { TaskGroup } from './tasks';
import type { ControllerHost, ModeController } from './types';

export const MIN_REFRESH_INTERVAL = 0.5;
export const DEFAULT_REFRESH_INTERVAL = 2.0;
export const REFRESH_STEP = 0.5;

export class WatchController implements ModeController {
  readonly mode = 'watch' as const;
  private readonly tasks: TaskGroup;
  private _running = true;
  private _interval = DEFAULT_REFRESH_INTERVAL;
  private _content = '';
  private _error: string | null = null;
  private _lastUpdated: Date | null = null;
  private _refreshCount = 0;

  constructor(
    private readonly host: ControllerHost,
    readonly source: StatusSource,
    interval: number = DEFAULT_REFRESH_INTERVAL,
  ) {
    this.tasks = new TaskGroup(err => logError('Watch task failed', err));
    this.setInterval(interval);
  }

  get alive(): boolean {
    return this._running;
  }

  get running(): boolean {
    return this._running;
  }

  get label(): string {
    return this.source.label;
  }

  /** Seconds between refreshes. */
  get refreshInterval(): number {
    return this._interval;
  }

  get content(): string {
    return this._content;
  }

  get error(): string | null {
    return this._error;
  }

  get lastUpdated(): Date | null {
    return this._lastUpdated;
  }

  get refreshCount(): number {
    return this._refreshCount;
  }

  /**
   * Set the refresh interval in seconds, floored at 0.5. Non-finite values are
   * ignored. The next wait uses the new value; an in-flight refresh is not
   * interrupted.
   */
  setInterval(seconds: number): void {
    if (!Number.isFinite(seconds)) return;
    this._interval = Math.max(MIN_REFRESH_INTERVAL, seconds);
    this.host.requestRender();
  }

  faster(): void {
    this.setInterval(this._interval - REFRESH_STEP);
  }

  slower(): void {
    this.setInterval(this._interval + REFRESH_STEP);
  }

  start(): void {
    this.tasks.spawn(signal => this.loop(signal));
  }

  stop(): void {
    this.tasks.cancel();
    this._running = false;
  }

  handleKey(key: KeyId): boolean {
    switch (key) {
      case '+':
        this.faster();
        return true;
      case '-':
        this.slower();
        return true;
      default:
        return false;
    }
  }

  settled(): Promise<void> {
    return this.tasks.settled();
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (this._running) {
      await this.refreshOnce(signal);
      if (!this._running) return;
      await sleep(this._interval * 1000, signal);
    }
  }

  private async refreshOnce(signal: AbortSignal): Promise<void> {
    try {
      const content = await this.source.query(signal);
      if (!this._running) return;
      this._content = content;
      this._error = null;
    } catch (err) {
      if (!this._running) return;
      logError(`Watch ${this.source.label} query failed`, err);
      this._error = errorMessage(err);
    }
    this._refreshCount++;
    this._lastUpdated = new Date();
    this.host.requestRender();
  }
}
