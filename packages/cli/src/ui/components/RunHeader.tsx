import React, { useState } from 'react';
import { Text, Box } from 'ink';
import { pairKey } from '@promptbench/core';
import type { HarnessRunState } from '../hooks/useHarnessRun.js';
import { countStatuses } from '../hooks/useHarnessRun.js';
import { Spinner } from './Spinner.js';

export function RunHeader({ state }: { state: HarnessRunState }) {
  const [startedAt] = useState(() => Date.now());

  if (!state.kind || !state.pair) {
    return <Spinner label="Preparing run" />;
  }

  const counts = countStatuses(state);
  const finished = counts.success + counts.error + counts.skipped + counts.abandoned;
  const label = state.kind === 'generation' ? 'Generating' : 'Evaluating';

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text bold color="cyan">{label} </Text>
        <Text>{pairKey(state.pair)}</Text>
        <Text color="gray"> {finished}/{state.taskCount}</Text>
      </Box>
      {!state.done && state.taskCount > 0 && (
        <Box marginTop={1}>
          <Spinner label={`${counts.running + counts.retrying} in flight, ${counts.retrying} retrying`} since={startedAt} />
        </Box>
      )}
    </Box>
  );
}
