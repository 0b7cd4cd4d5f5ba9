/**
 * The console's key binding table, in registration order.
 */

import { KeyDispatchTable, inMode, notInMode } from './KeyDispatchTable';
import type { ConsoleSession } from './ConsoleSession';
import type { KeyEvent } from './KeyDispatchTable';

export type ConsoleKeyTable = KeyDispatchTable<ConsoleSession>;

export const QUIT_HINT = "Use 'exit' or Ctrl+D to quit.";

function routeToController(session: ConsoleSession, event: KeyEvent): void {
  session.activeController?.handleKey(event.key);
}

function exitMode(session: ConsoleSession): void {
  session.exitMode();
}

export function createKeyBindings(): ConsoleKeyTable {
  const table = new KeyDispatchTable<ConsoleSession>();

  // Any mode
  table
    .add('c-c', null, session => {
      if (session.input.isEmpty) {
        session.print(QUIT_HINT);
      } else {
        session.input.clear();
        session.requestRender();
      }
    }, 'clear input')
    .add('c-d', null, session => session.quit(), 'quit')
    .add('c-l', null, session => session.clearOutput(), 'clear output')
    .add('c-t', null, session => {
      session.toggleFollowTail();
    }, 'toggle follow-tail');

  // Scrolling (log view pages instead)
  table
    .add('pageup', notInMode('log-view'), (session, event) => session.scroll('up', event.pageSizeLines), 'scroll')
    .add('pagedown', notInMode('log-view'), (session, event) => session.scroll('down', event.pageSizeLines), 'scroll');

  // Log tail
  const logTail = inMode('log-tail');
  table
    .add('escape', logTail, exitMode, 'exit')
    .add('q', logTail, exitMode, 'exit')
    .add('end', logTail, routeToController, 'follow')
    .add('f', logTail, routeToController, 'filter');

  // Watch
  const watch = inMode('watch');
  table
    .add('escape', watch, exitMode, 'exit')
    .add('q', watch, exitMode, 'exit')
    .add('+', watch, routeToController, 'faster')
    .add('-', watch, routeToController, 'slower');

  // Log view
  const logView = inMode('log-view');
  table
    .add('escape', logView, exitMode, 'exit')
    .add('q', logView, exitMode, 'exit')
    .add('pageup', logView, routeToController, 'prev page')
    .add('pagedown', logView, routeToController, 'next page')
    .add('home', logView, routeToController, 'first page')
    .add('end', logView, routeToController, 'last page')
    .add('l', logView, routeToController, 'level')
    .add('c', logView, routeToController, 'clear logger')
    .add('r', logView, routeToController, 'refresh')
    .add('space', logView, routeToController, 'follow')
    .add('f', logView, routeToController, 'logger')
    .add('/', logView, routeToController, 'search')
    .add('?', logView, routeToController, 'help');

  return table;
}

const KEY_LABELS: Record<string, string> = {
  escape: 'Esc',
  pageup: 'PgUp',
  pagedown: 'PgDn',
  home: 'Home',
  end: 'End',
  space: 'Space',
};

/** Human-readable key name, e.g. `c-t` → `Ctrl+T`. */
export function formatKey(key: string): string {
  if (key.startsWith('c-') && key.length === 3) return `Ctrl+${key.slice(2).toUpperCase()}`;
  return KEY_LABELS[key] ?? key;
}
