/**
 * Shared shapes for the mode controllers.
 */

import type { LogFilters, WatchTarget } from 'artnet-shared';
import type { KeyId } from '../keys';

export type ConsoleMode = 'normal' | 'log-tail' | 'watch' | 'log-view';

/** Modes that own a controller. */
export type ControllerMode = Exclude<ConsoleMode, 'normal'>;

export const ALL_MODES: readonly ConsoleMode[] = ['normal', 'log-tail', 'watch', 'log-view'];

export interface ModeController {
  readonly mode: ControllerMode;
  /** False once `stop()` ran; background work checks it after every await. */
  readonly alive: boolean;
  /** Start background work. */
  start(): void;
  /** Cancel background work. Safe to call more than once. */
  stop(): void;
  /** Handle a mode-specific key; false if the key is not one of ours. */
  handleKey(key: KeyId): boolean;
}

export type ModeRequest =
  | { mode: 'log-tail'; filters: LogFilters }
  | { mode: 'watch'; target: WatchTarget; interval?: number }
  | { mode: 'log-view'; filters: LogFilters; search: string | null; follow: boolean };

/** What a controller may touch on the session that owns it. */
export interface ControllerHost {
  appendLogTail(text: string, follow: boolean): void;
  /** Move the log tail cursor to the newest line. */
  logTailToEnd(): void;
  requestRender(): void;
}
