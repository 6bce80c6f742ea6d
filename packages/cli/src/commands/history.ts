import type { Command } from 'commander';
import { createHarness } from '../harness.js';
import { applyLogLevel, exitWithError, wantsJson, type OutputOptions } from './shared.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List the superseded runs of a pair')
    .argument('<prompt-set>', 'Prompt set id')
    .argument('<model>', 'Model id')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .action(async (promptSetId: string, modelId: string, opts: OutputOptions) => {
      applyLogLevel(opts);
      const isJson = wantsJson(opts);
      try {
        const { service } = await createHarness();
        const history = await service.getHistory({ promptSetId, modelId });

        if (isJson) {
          console.log(JSON.stringify(history, null, 2));
          return;
        }
        if (history.length === 0) {
          console.log('No superseded runs.');
          return;
        }

        console.log(`\n  ${'Superseded at'.padEnd(24)} ${'Responses'.padEnd(10)} ${'Failed'.padEnd(8)} Evaluations`);
        console.log(`  ${'-'.repeat(24)} ${'-'.repeat(10)} ${'-'.repeat(8)} ${'-'.repeat(11)}`);
        for (const run of history) {
          const date = new Date(run.supersededAt).toLocaleString();
          const failed = run.responses.filter((r) => r.outcome.status === 'error').length;
          console.log(`  ${date.padEnd(24)} ${String(run.responses.length).padEnd(10)} ${String(failed).padEnd(8)} ${run.evaluations.length}`);
        }
        console.log();
      } catch (err) {
        exitWithError(err, isJson);
      }
    });
}
