import React from 'react';
import { Box, Text } from 'ink';
import { PROMPT } from '../CommandRunner';

interface InputPromptProps {
  text: string;
}

export function InputPrompt({ text }: InputPromptProps): React.ReactElement {
  return (
    <Box height={1}>
      <Text bold color="cyan">{PROMPT} </Text>
      <Text wrap="truncate-start">{text}</Text>
      <Text inverse> </Text>
    </Box>
  );
}
