import React from 'react';
import { Box, Text } from 'ink';
import type { HarnessRunState } from './hooks/useHarnessRun.js';
import { RunHeader } from './components/RunHeader.js';
import { IndexProgress } from './components/IndexProgress.js';
import { SummaryView } from './components/SummaryView.js';

interface RunViewProps {
  state: HarnessRunState;
}

const MAX_ROWS = 20;

export function RunView({ state }: RunViewProps) {
  const now = Date.now();
  // Active indices first, then the most recently finished
  const entries = Array.from(state.indices.values()).sort((a, b) => {
    const aActive = a.finishedAt === undefined ? 0 : 1;
    const bActive = b.finishedAt === undefined ? 0 : 1;
    if (aActive !== bActive) return aActive - bActive;
    return (b.finishedAt ?? 0) - (a.finishedAt ?? 0) || a.index - b.index;
  });
  const hidden = entries.length - MAX_ROWS;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <RunHeader state={state} />

      {entries.length > 0 && (
        <Box flexDirection="column" marginBottom={1}>
          {entries.slice(0, MAX_ROWS).map((entry) => (
            <IndexProgress key={entry.index} entry={entry} now={now} />
          ))}
          {hidden > 0 && <Text color="gray">... {hidden} more</Text>}
        </Box>
      )}

      {state.summary && <SummaryView summary={state.summary} />}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
