import React from 'react';
import { Box, Text } from 'ink';
import type { HarnessRunState } from './hooks/useHarnessRun.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: HarnessRunState;
  /** Shown beside the title, e.g. the judge model of an evaluation */
  subtitle?: string;
}

export function App({ state, subtitle }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">promptbench</Text>
        {subtitle && <Text color="gray"> {subtitle}</Text>}
      </Box>
      <RunView state={state} />
      {!state.done && (
        <Box paddingX={2}>
          <Text dimColor>Ctrl+C cancels; finished prompts are kept</Text>
        </Box>
      )}
    </Box>
  );
}
