/**
 * Ordered key bindings with mode guards.
 *
 * A guard is a pure predicate over the current mode; the first binding whose
 * key matches and whose guard passes handles the key.
 */

import { ALL_MODES } from './controllers/types';
import type { ConsoleMode } from './controllers/types';
import type { KeyId } from './keys';

export type Guard = (mode: ConsoleMode) => boolean;

export interface KeyEvent {
  key: KeyId;
  /** Visible lines in the output pane, for page-sized scrolling. */
  pageSizeLines: number;
}

export type KeyHandler<C> = (context: C, event: KeyEvent) => void;

interface Binding<C> {
  key: KeyId;
  guard: Guard | null;
  handler: KeyHandler<C>;
  description: string;
}

export interface BindingHelp {
  keys: KeyId[];
  description: string;
}

export class BindingConflictError extends Error {
  constructor(readonly key: KeyId, readonly mode: ConsoleMode) {
    super(`Key "${key}" is already bound in ${mode} mode`);
    this.name = 'BindingConflictError';
  }
}

/** Guard that passes only in the given modes. */
export function inMode(...modes: ConsoleMode[]): Guard {
  return mode => modes.includes(mode);
}

/** Guard that passes in every mode except the given ones. */
export function notInMode(...modes: ConsoleMode[]): Guard {
  return mode => !modes.includes(mode);
}

function passes(guard: Guard | null, mode: ConsoleMode): boolean {
  return guard === null || guard(mode);
}

export class KeyDispatchTable<C> {
  private readonly bindings: Binding<C>[] = [];

  get size(): number {
    return this.bindings.length;
  }

  /** Register a binding. `guard: null` means every mode. */
  add(key: KeyId, guard: Guard | null, handler: KeyHandler<C>, description: string): this {
    for (const existing of this.bindings) {
      if (existing.key !== key) continue;
      const overlap = ALL_MODES.find(mode => passes(existing.guard, mode) && passes(guard, mode));
      if (overlap) throw new BindingConflictError(key, overlap);
    }
    this.bindings.push({ key, guard, handler, description });
    return this;
  }

  /** Run the first matching binding. Returns false when nothing matched. */
  dispatch(context: C, mode: ConsoleMode, event: KeyEvent): boolean {
    const binding = this.bindings.find(b => b.key === event.key && passes(b.guard, mode));
    if (!binding) return false;
    binding.handler(context, event);
    return true;
  }

  /**
   * Bindings active in `mode`, in registration order. Adjacent bindings that
   * share a description are merged into one entry.
   */
  describe(mode: ConsoleMode): BindingHelp[] {
    const help: BindingHelp[] = [];
    for (const binding of this.bindings) {
      if (!passes(binding.guard, mode)) continue;
      const last = help[help.length - 1];
      if (last && last.description === binding.description) {
        last.keys.push(binding.key);
      } else {
        help.push({ keys: [binding.key], description: binding.description });
      }
    }
    return help;
  }
}
