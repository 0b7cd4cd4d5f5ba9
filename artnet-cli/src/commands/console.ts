/**
 * `artnet-console console` — the interactive full-screen console.
 * Uses Ink (React for the terminal) for rendering.
 */

import React from 'react';
import type { Command } from 'commander';
import { PollingLogSource, errorMessage, escapeTags } from 'artnet-shared';
import type { ConsoleConfig } from 'artnet-shared';
import { closeLogger, initLogger, log } from '../logger';
import { createClient, globalOptions, loadSettings } from '../settings';
import { VERSION } from '../version';
import { CommandRunner } from '../console/CommandRunner';
import { ConsoleSession } from '../console/ConsoleSession';
import { createControllerFactory } from '../console/controllers/factory';
import { createKeyBindings } from '../console/keybindings';
import { ConsoleApp } from '../console/ink/ConsoleApp';

export async function consoleAction(_opts: Record<string, unknown>, cmd: Command): Promise<void> {
  let config: ConsoleConfig;
  try {
    config = await loadSettings(globalOptions(cmd));
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`);
    process.exit(1);
  }

  if (!process.stdin.isTTY) {
    process.stderr.write('Error: the console needs an interactive terminal. Use the one-shot commands instead.\n');
    process.exit(1);
  }

  initLogger(config.logFile);
  log(`Console starting against ${config.serverUrl}`);

  const client = createClient(config);
  const logSource = new PollingLogSource(client, {
    pageSize: config.pageSize,
    pollIntervalMs: config.tailPollMs,
  });
  const session = new ConsoleSession(createControllerFactory({
    logSource,
    statusApi: client,
    refreshInterval: config.refreshInterval,
  }));
  const keys = createKeyBindings();
  const runner = new CommandRunner({ session, client, keys });

  session.print(`{bold}ArtNet console{/bold} v${VERSION}`);
  session.print(`{gray-fg}Connected to ${escapeTags(config.serverUrl)}{/gray-fg}`);
  session.print("{gray-fg}Type 'help' for commands, 'help-keys' for key bindings, 'exit' to quit.{/gray-fg}");

  // ── Render with Ink ──
  const { render } = await import('ink');
  const element = () => React.createElement(ConsoleApp, {
    session,
    keys,
    runner,
    serverUrl: config.serverUrl,
  });

  const instance = render(element(), { exitOnCtrlC: false });

  // Re-render bridge: throttled rerender driven by session changes
  let renderTimer: ReturnType<typeof setTimeout> | null = null;
  function scheduleRender() {
    if (renderTimer) return;
    renderTimer = setTimeout(() => {
      renderTimer = null;
      instance.rerender(element());
    }, 100);
  }
  const unsubscribeRender = session.onRender(scheduleRender);

  let stopped = false;
  function cleanup() {
    if (stopped) return;
    stopped = true;
    unsubscribeRender();
    if (renderTimer) clearTimeout(renderTimer);
    try { session.quit(); } catch { /* ignore */ }
    log('Console stopped');
    closeLogger();
  }

  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);

  await instance.waitUntilExit();
  cleanup();
  process.exit(0);
}
