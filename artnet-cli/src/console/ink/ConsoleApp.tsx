/**
 * Root Ink component: the active pane, the toolbar and the input line.
 *
 * Keys go through the dispatch table first; whatever no binding claims
 * edits the input line, and Enter submits it to the command runner.
 */

import React, { useEffect, useReducer } from 'react';
import { Box, useApp, useInput } from 'ink';
import { logError } from '../../logger';
import type { CommandRunner } from '../CommandRunner';
import type { ConsoleSession } from '../ConsoleSession';
import type { ConsoleKeyTable } from '../keybindings';
import { toKeyId, toTextEdit } from '../keys';
import { InputPrompt } from './InputPrompt';
import { LogViewPane } from './LogViewPane';
import { OutputPane } from './OutputPane';
import { Toolbar, modeHints } from './Toolbar';
import { WatchPane } from './WatchPane';
import { pageSizeFor, useTerminalSize } from './useTerminalSize';

interface ConsoleAppProps {
  session: ConsoleSession;
  keys: ConsoleKeyTable;
  runner: CommandRunner;
  serverUrl: string;
}

function renderBody(session: ConsoleSession, height: number): React.ReactElement {
  const active = session.active;
  switch (active.mode) {
    case 'log-tail':
      return <OutputPane buffer={session.logTailBuffer} height={height} emptyText="Waiting for log lines..." />;
    case 'watch':
      return <WatchPane controller={active.controller} height={height} />;
    case 'log-view':
      return <LogViewPane controller={active.controller} height={height} />;
    case 'normal':
      return (
        <OutputPane
          buffer={session.outputBuffer}
          height={height}
          emptyText="Type 'help' for commands, 'help-keys' for key bindings."
        />
      );
  }
}

export function ConsoleApp({ session, keys, runner, serverUrl }: ConsoleAppProps): React.ReactElement {
  const { exit } = useApp();
  const { columns, rows } = useTerminalSize();
  const [, tick] = useReducer((n: number) => n + 1, 0);
  const pageSizeLines = pageSizeFor(rows);
  const bodyHeight = Math.max(1, rows - 2);

  useEffect(() => session.onQuit(() => exit()), [session, exit]);

  useInput((input, key) => {
    const keyId = toKeyId(input, key);
    if (keyId && keys.dispatch(session, session.mode, { key: keyId, pageSizeLines })) {
      tick();
      return;
    }

    const edit = toTextEdit(input, key);
    switch (edit.type) {
      case 'insert':
        session.input.insert(edit.text);
        break;
      case 'backspace':
        session.input.backspace();
        break;
      case 'history':
        session.input.recall(edit.direction);
        break;
      case 'submit':
        runner.run(session.input.submit()).catch((err: unknown) => logError('Command runner failed', err));
        break;
      case 'none':
        return;
    }
    tick();
  });

  const active = session.active;
  const followTail = active.mode === 'log-tail' ? active.controller.followTail : session.followTail;

  return (
    <Box flexDirection="column" width={columns} height={rows}>
      {renderBody(session, bodyHeight)}
      <Toolbar
        mode={active.mode}
        serverUrl={serverUrl}
        followTail={followTail}
        hints={modeHints(keys.describe(active.mode), keys.describe('normal'), active.mode)}
      />
      <InputPrompt text={session.input.text} />
    </Box>
  );
}
