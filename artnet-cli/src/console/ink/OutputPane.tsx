/**
 * Scrollback pane for the command output and the log tail.
 * Shows the lines ending at the buffer cursor, with ▲/▼ indicators.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { OutputBuffer } from '../OutputBuffer';
import { parseBlessedTags } from './parseBlessedTags';
import { windowAtCursor } from './viewport';

interface OutputPaneProps {
  buffer: OutputBuffer;
  height: number;
  emptyText?: string;
}

export function OutputPane({ buffer, height, emptyText }: OutputPaneProps): React.ReactElement {
  const indicatorBelow = windowAtCursor(buffer.text, buffer.cursor, 1).hiddenBelow > 0 ? 1 : 0;
  let view = windowAtCursor(buffer.text, buffer.cursor, Math.max(1, height - indicatorBelow));
  if (view.hiddenAbove > 0) {
    view = windowAtCursor(buffer.text, buffer.cursor, Math.max(1, height - indicatorBelow - 1));
  }

  return (
    <Box flexDirection="column" height={height} paddingLeft={1}>
      {view.hiddenAbove > 0 && (
        <Text color="gray">▲ ({view.hiddenAbove} more)</Text>
      )}
      {view.lines.length === 0 && emptyText && (
        <Text dimColor>{emptyText}</Text>
      )}
      {view.lines.map((line, i) => (
        <Text key={view.hiddenAbove + i} wrap="truncate">
          {parseBlessedTags(line)}
        </Text>
      ))}
      {view.hiddenBelow > 0 && (
        <Text color="gray">▼ ({view.hiddenBelow} more)</Text>
      )}
    </Box>
  );
}
