import type { Command } from 'commander';
import type { Pair } from '@promptbench/core';
import { createHarness } from '../harness.js';
import { createFormatter } from '../formatters/index.js';
import { isFormatName } from '../formatters/formatter.js';
import { renderMarkdown } from '../formatters/terminal-markdown.js';
import { applyLogLevel, exitWithError, parsePairArg, type OutputOptions } from './shared.js';

export function registerCompareCommand(program: Command): void {
  program
    .command('compare')
    .description('Show two pairs side by side, matched by prompt index')
    .argument('<left>', 'First pair as <promptSetId>:<modelId>', parsePairArg)
    .argument('<right>', 'Second pair as <promptSetId>:<modelId>', parsePairArg)
    .option('--format <type>', 'Output format: md (default), plain, json', 'md')
    .option('--verbose', 'Debug logging')
    .action(async (left: Pair, right: Pair, opts: OutputOptions & { format: string }) => {
      applyLogLevel(opts);
      const format = opts.format;
      if (!isFormatName(format)) {
        exitWithError(`Unknown format: ${format}. Valid formats: md, plain, json`, false);
      }
      try {
        const { service } = await createHarness();
        // Selection order decides the sides
        service.toggleSelection(left, true);
        service.toggleSelection(right, true);
        const view = await service.compare();
        const output = createFormatter(format).formatComparison(view);
        console.log(format === 'md' && process.stdout.isTTY ? renderMarkdown(output) : output);
      } catch (err) {
        exitWithError(err, format === 'json');
      }
    });
}
