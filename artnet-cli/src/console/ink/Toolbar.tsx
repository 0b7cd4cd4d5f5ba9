/**
 * Toolbar (row above the input) with segmented zones:
 * Left: brand + mode | Center: server, follow-tail | Right: key hints for the mode
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { ConsoleMode } from '../controllers/types';
import type { BindingHelp } from '../KeyDispatchTable';
import { formatKey } from '../keybindings';
import { VERSION } from '../../version';

const MODE_LABELS: Record<ConsoleMode, { label: string; color: string }> = {
  normal: { label: 'CONSOLE', color: 'cyan' },
  'log-tail': { label: 'LOG TAIL', color: 'green' },
  watch: { label: 'WATCH', color: 'yellow' },
  'log-view': { label: 'LOG VIEW', color: 'magenta' },
};

interface ToolbarProps {
  mode: ConsoleMode;
  serverUrl: string;
  followTail: boolean;
  hints: BindingHelp[];
}

/**
 * Hints worth showing in a mode: its own bindings, or the global ones in
 * normal mode.
 */
export function modeHints(all: BindingHelp[], global: BindingHelp[], mode: ConsoleMode): BindingHelp[] {
  if (mode === 'normal') return all;
  const shared = new Set(global.map(h => h.description));
  return all.filter(h => !shared.has(h.description));
}

export function Toolbar({ mode, serverUrl, followTail, hints }: ToolbarProps): React.ReactElement {
  const { label, color } = MODE_LABELS[mode];

  return (
    <Box height={1} width="100%">
      {/* Left zone: brand + mode */}
      <Box>
        <Text bold color="magenta">ARTNET</Text>
        <Text dimColor> v{VERSION} </Text>
        <Text bold color={color}>[{label}]</Text>
      </Box>

      {/* Center zone: server + follow state */}
      <Box flexGrow={1} justifyContent="center">
        <Text dimColor> {'│'} </Text>
        <Text color="cyan">{serverUrl}</Text>
        <Text dimColor> {'│'} </Text>
        <Text color={followTail ? 'green' : 'yellow'}>follow {followTail ? 'on' : 'off'}</Text>
      </Box>

      {/* Right zone: keybinding hints */}
      <Box>
        <Text dimColor>{'│'} </Text>
        <Text wrap="truncate">
          {hints.map((hint, i) => (
            <Text key={i}>
              <Text bold>{hint.keys.map(formatKey).join('/')}</Text>
              <Text dimColor> {hint.description} </Text>
            </Text>
          ))}
        </Text>
      </Box>
    </Box>
  );
}
