/**
 * Console session: the current mode and its controller, the two output
 * buffers, follow-tail, the input line and quit.
 */

import { log } from '../logger';
import type { LogTailController } from './controllers/LogTailController';
import type { LogViewController } from './controllers/LogViewController';
import type { WatchController } from './controllers/WatchController';
import type { ConsoleMode, ControllerHost, ModeController, ModeRequest } from './controllers/types';
import { InputLine } from './InputLine';
import { OutputBuffer } from './OutputBuffer';

/** Characters per line assumed when converting page sizes to cursor moves. */
export const ASSUMED_LINE_WIDTH = 80;

/** Scrolling down to within this many characters of the end re-enables follow-tail. */
export const FOLLOW_THRESHOLD = 10;

export type ActiveMode =
  | { mode: 'normal' }
  | { mode: 'log-tail'; controller: LogTailController }
  | { mode: 'watch'; controller: WatchController }
  | { mode: 'log-view'; controller: LogViewController };

type RequestFor<M extends ModeRequest['mode']> = Extract<ModeRequest, { mode: M }>;

export interface ControllerFactory {
  logTail(request: RequestFor<'log-tail'>, host: ControllerHost): LogTailController;
  watch(request: RequestFor<'watch'>, host: ControllerHost): WatchController;
  logView(request: RequestFor<'log-view'>, host: ControllerHost): LogViewController;
}

export type ScrollDirection = 'up' | 'down';

const NORMAL: ActiveMode = { mode: 'normal' };

export class ConsoleSession implements ControllerHost {
  readonly outputBuffer = new OutputBuffer();
  readonly logTailBuffer = new OutputBuffer();
  readonly input = new InputLine();

  private _active: ActiveMode = NORMAL;
  private _followTail = true;
  private _quitRequested = false;
  private readonly renderListeners = new Set<() => void>();
  private readonly quitListeners = new Set<() => void>();

  constructor(private readonly factory: ControllerFactory) {}

  get mode(): ConsoleMode {
    return this._active.mode;
  }

  get active(): ActiveMode {
    return this._active;
  }

  get activeController(): ModeController | null {
    return this._active.mode === 'normal' ? null : this._active.controller;
  }

  get followTail(): boolean {
    return this._followTail;
  }

  get quitRequested(): boolean {
    return this._quitRequested;
  }

  // ── Mode transitions ──

  /** Switch to the requested mode. Returns false if already in it. */
  enterMode(request: ModeRequest): boolean {
    if (this._quitRequested || this._active.mode === request.mode) return false;
    this.exitMode();
    const next = this.createActive(request);
    this._active = next;
    log(`Entered ${request.mode} mode`);
    next.controller.start();
    this.requestRender();
    return true;
  }

  /** Return to normal mode. Returns false (and does nothing) when already there. */
  exitMode(): boolean {
    const current = this._active;
    if (current.mode === 'normal') return false;
    current.controller.stop();
    this._active = NORMAL;
    log(`Exited ${current.mode} mode`);
    this.requestRender();
    return true;
  }

  private createActive(request: ModeRequest): Exclude<ActiveMode, { mode: 'normal' }> {
    switch (request.mode) {
      case 'log-tail':
        return { mode: 'log-tail', controller: this.factory.logTail(request, this) };
      case 'watch':
        return { mode: 'watch', controller: this.factory.watch(request, this) };
      case 'log-view':
        return { mode: 'log-view', controller: this.factory.logView(request, this) };
    }
  }

  // ── Output ──

  appendOutput(text: string): void {
    this.outputBuffer.append(text);
    if (this._followTail) this.outputBuffer.moveToEnd();
    this.requestRender();
  }

  /** Append one line of tagged text to the command output. */
  print(line: string): void {
    this.appendOutput(`${line}\n`);
  }

  appendLogTail(text: string, follow: boolean): void {
    this.logTailBuffer.append(text);
    if (follow) this.logTailBuffer.moveToEnd();
    this.requestRender();
  }

  logTailToEnd(): void {
    this.logTailBuffer.moveToEnd();
  }

  /** Scroll the visible buffer by `pageSizeLines` assumed-width lines. */
  scroll(direction: ScrollDirection, pageSizeLines: number): void {
    const delta = Math.max(1, pageSizeLines) * ASSUMED_LINE_WIDTH;
    const active = this._active;
    const tail = active.mode === 'log-tail' ? active.controller : null;
    const buffer = tail ? this.logTailBuffer : this.outputBuffer;
    let follow = tail ? tail.followTail : this._followTail;

    if (direction === 'up') {
      buffer.cursor = buffer.cursor - delta;
      follow = false;
    } else {
      buffer.cursor = buffer.cursor + delta;
      if (buffer.cursor >= buffer.length - FOLLOW_THRESHOLD) follow = true;
    }

    if (tail) {
      tail.setFollowTail(follow);
    } else {
      this._followTail = follow;
    }
    this.requestRender();
  }

  /** Flip follow-tail for the visible buffer and report the new state. */
  toggleFollowTail(): boolean {
    const active = this._active;
    if (active.mode === 'log-tail') {
      const follow = !active.controller.followTail;
      active.controller.setFollowTail(follow);
      this.appendLogTail(`Follow-tail ${follow ? 'enabled' : 'disabled'}\n`, follow);
      return follow;
    }
    this._followTail = !this._followTail;
    if (this._followTail) this.outputBuffer.moveToEnd();
    this.print(`Follow-tail ${this._followTail ? 'enabled' : 'disabled'}`);
    return this._followTail;
  }

  /** Clear the visible buffer: the log tail in log-tail mode, command output otherwise. */
  clearOutput(): void {
    if (this._active.mode === 'log-tail') {
      this.logTailBuffer.clear();
    } else {
      this.outputBuffer.clear();
    }
    this.requestRender();
  }

  // ── Quit ──

  /** Always honoured: leaves the active mode, drops unsent input, notifies once. */
  quit(): void {
    if (this._quitRequested) return;
    this._quitRequested = true;
    this.exitMode();
    this.input.clear();
    log('Quit requested');
    for (const listener of [...this.quitListeners]) listener();
  }

  // ── Listeners ──

  onRender(listener: () => void): () => void {
    this.renderListeners.add(listener);
    return () => {
      this.renderListeners.delete(listener);
    };
  }

  onQuit(listener: () => void): () => void {
    this.quitListeners.add(listener);
    return () => {
      this.quitListeners.delete(listener);
    };
  }

  requestRender(): void {
    for (const listener of [...this.renderListeners]) listener();
  }
}
