/**
 * Paged log browser view: header with page and filter state, then the
 * entries of the current page.
 */

import React from 'react';
import { Box, Text } from 'ink';
import type { LogViewController } from '../controllers/LogViewController';
import { parseBlessedTags } from './parseBlessedTags';
import { tail } from './viewport';

interface LogViewPaneProps {
  controller: LogViewController;
  height: number;
}

export function LogViewPane({ controller, height }: LogViewPaneProps): React.ReactElement {
  const extra = (controller.notice ? 1 : 0) + (controller.error ? 1 : 0);
  const bodyHeight = Math.max(0, height - 2 - extra);
  const visible = tail(controller.lines, bodyHeight);

  return (
    <Box flexDirection="column" height={height} paddingLeft={1}>
      <Text wrap="truncate">
        <Text bold color="cyan">Logs</Text>
        <Text> page {controller.page + 1}/{controller.lastPage + 1}</Text>
        <Text dimColor> ({controller.total} entries)</Text>
        <Text dimColor> {'│'} level </Text><Text>{controller.levelFilter ? `>=${controller.levelFilter}` : 'all'}</Text>
        {controller.loggerFilter && (
          <><Text dimColor> {'│'} logger </Text><Text>{controller.loggerFilter}</Text></>
        )}
        {controller.searchPattern && (
          <><Text dimColor> {'│'} search </Text><Text color="yellow">"{controller.searchPattern}"</Text></>
        )}
        {controller.followMode && <Text color="green"> {'│'} FOLLOW</Text>}
        {controller.loading && <Text dimColor> ...</Text>}
      </Text>
      <Text> </Text>
      {controller.notice && <Text color="yellow" wrap="truncate">{controller.notice}</Text>}
      {controller.error && <Text color="red" wrap="truncate">Error: {controller.error}</Text>}
      {visible.length === 0 && !controller.loading && !controller.error && (
        <Text dimColor>(no log entries)</Text>
      )}
      {visible.map((line, i) => (
        <Text key={i} wrap="truncate">{parseBlessedTags(line)}</Text>
      ))}
    </Box>
  );
}
