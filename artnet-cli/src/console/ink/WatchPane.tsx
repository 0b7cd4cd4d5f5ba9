import React from 'react';
import { Box, Text } from 'ink';
import type { WatchController } from '../controllers/WatchController';
import { parseBlessedTags } from './parseBlessedTags';
import { tail } from './viewport';

interface WatchPaneProps {
  controller: WatchController;
  height: number;
}

function clock(date: Date | null): string {
  return date ? date.toTimeString().slice(0, 8) : '--:--:--';
}

export function WatchPane({ controller, height }: WatchPaneProps): React.ReactElement {
  const bodyHeight = Math.max(0, height - 2);
  const lines = controller.content ? controller.content.split('\n') : [];
  const visible = tail(lines, controller.error ? bodyHeight - 1 : bodyHeight);

  return (
    <Box flexDirection="column" height={height} paddingLeft={1}>
      <Text>
        <Text bold color="cyan">Watching {controller.label}</Text>
        <Text dimColor> every {controller.refreshInterval.toFixed(1)}s {'│'} refresh #{controller.refreshCount} at {clock(controller.lastUpdated)}</Text>
      </Text>
      <Text> </Text>
      {controller.error && (
        <Text color="red" wrap="truncate">Error: {controller.error}</Text>
      )}
      {controller.refreshCount === 0 && !controller.error && (
        <Text dimColor>Loading...</Text>
      )}
      {visible.map((line, i) => (
        <Text key={i} wrap="truncate">{parseBlessedTags(line)}</Text>
      ))}
    </Box>
  );
}
