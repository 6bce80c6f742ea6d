import React from 'react';
import { Text, Box } from 'ink';
import type { RunSummary } from '@promptbench/core';
import { formatDuration } from '../format.js';

export function SummaryView({ summary }: { summary: RunSummary }) {
  if (summary.kind === 'generation' && summary.alreadyComplete) {
    return (
      <Box marginTop={1}>
        <Text color="green">Already generated: {summary.generatedCount} responses, {summary.failedCount} failed. Use --force to regenerate.</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text bold color="green">{'─'.repeat(40)}</Text>
      {summary.kind === 'generation' ? (
        <Box>
          <Text color="green">{summary.generatedCount} generated</Text>
          <Text>, </Text>
          <Text color={summary.failedCount > 0 ? 'red' : undefined}>{summary.failedCount} failed</Text>
        </Box>
      ) : (
        <Box>
          <Text color="green">{summary.evaluatedCount} evaluated</Text>
          <Text>, </Text>
          <Text color={summary.skippedCount > 0 ? 'yellow' : undefined}>{summary.skippedCount} skipped</Text>
        </Box>
      )}
      {summary.abandonedCount > 0 && <Text color="yellow">{summary.abandonedCount} abandoned (run again to resume)</Text>}
      <Text color="gray">Elapsed {formatDuration(summary.elapsedMs)}</Text>
    </Box>
  );
}
