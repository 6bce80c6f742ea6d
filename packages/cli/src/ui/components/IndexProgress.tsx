import React from 'react';
import { Text, Box } from 'ink';
import type { IndexState } from '../hooks/useHarnessRun.js';
import { formatDuration } from '../format.js';

interface IndexProgressProps {
  entry: IndexState;
  now: number;
}

export function IndexProgress({ entry, now }: IndexProgressProps) {
  const { status } = entry;
  const icon = status === 'success' ? '✓' : status === 'error' ? '✗' : status === 'running' || status === 'retrying' ? '▶' : '○';
  const color =
    status === 'success' ? 'green' : status === 'error' ? 'red' : status === 'retrying' ? 'yellow' : status === 'running' ? 'cyan' : 'gray';
  const elapsed = entry.startedAt ? (entry.finishedAt ?? now) - entry.startedAt : undefined;

  return (
    <Box>
      <Text color={color}>{icon} </Text>
      <Text>{`#${entry.index}`.padEnd(8)}</Text>
      <Text color={color}>{status}</Text>
      {elapsed !== undefined && <Text color="gray"> ({formatDuration(elapsed)})</Text>}
      {entry.attempts > 1 && <Text color="gray"> attempt {entry.attempts}</Text>}
      {entry.detail && status !== 'success' && <Text color="gray"> {entry.detail.slice(0, 80)}</Text>}
    </Box>
  );
}
