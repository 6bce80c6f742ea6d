import type { Command } from 'commander';
import { createHarness } from '../harness.js';
import { createFormatter } from '../formatters/index.js';
import { isFormatName } from '../formatters/formatter.js';
import { renderMarkdown } from '../formatters/terminal-markdown.js';
import { applyLogLevel, exitWithError, wantsJson, type OutputOptions } from './shared.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Latency and verdict statistics for a pair')
    .argument('<prompt-set>', 'Prompt set id')
    .argument('<model>', 'Model id')
    .option('--format <type>', 'Output format: plain (default), md, json', 'plain')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .action(async (promptSetId: string, modelId: string, opts: OutputOptions & { format: string }) => {
      applyLogLevel(opts);
      const format = opts.json ? 'json' : opts.format;
      if (!isFormatName(format)) {
        exitWithError(`Unknown format: ${format}. Valid formats: plain, md, json`, false);
      }
      const isJson = format === 'json' || wantsJson(opts);
      try {
        const { service } = await createHarness();
        const pair = { promptSetId, modelId };
        const [status, stats] = await Promise.all([service.getPairStatus(pair), service.getStats(pair)]);
        const output = createFormatter(format).formatStats({ pair, status, stats });
        console.log(format === 'md' && process.stdout.isTTY ? renderMarkdown(output) : output);
      } catch (err) {
        exitWithError(err, isJson);
      }
    });
}
