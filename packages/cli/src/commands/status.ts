import type { Command } from 'commander';
import { createHarness } from '../harness.js';
import { applyLogLevel, exitWithError, wantsJson, type OutputOptions } from './shared.js';

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of every prompt set and model pair')
    .option('--set <id>', 'Only pairs of this prompt set')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .action(async (opts: OutputOptions & { set?: string }) => {
      applyLogLevel(opts);
      const isJson = wantsJson(opts);
      try {
        const { service } = await createHarness();
        const pairs = (await service.listPairs()).filter((p) => !opts.set || p.pair.promptSetId === opts.set);

        if (isJson) {
          console.log(JSON.stringify(pairs.map(({ pair, status, unlisted }) => ({ ...pair, ...status, unlisted })), null, 2));
          return;
        }
        if (pairs.length === 0) {
          console.log('No prompt sets found.');
          return;
        }

        console.log(`\n  ${'Prompt set'.padEnd(24)} ${'Model'.padEnd(36)} ${'State'.padEnd(14)} Progress`);
        console.log(`  ${'-'.repeat(24)} ${'-'.repeat(36)} ${'-'.repeat(14)} ${'-'.repeat(24)}`);
        for (const { pair, status, unlisted } of pairs) {
          const model = unlisted ? `${pair.modelId} *` : pair.modelId;
          const progress = `${status.responded}/${status.promptCount} resp, ${status.failed} err, ${status.evaluated} eval`;
          console.log(`  ${pair.promptSetId.padEnd(24)} ${model.padEnd(36)} ${status.state.padEnd(14)} ${progress}`);
        }
        if (pairs.some((p) => p.unlisted)) {
          console.log('\n  * not among the configured models');
        }
        console.log();
      } catch (err) {
        exitWithError(err, isJson);
      }
    });
}
