import type { Command } from 'commander';
import { createHarness } from '../harness.js';
import { getPromptSetsDir } from '../adapters/xdg-paths.js';
import { applyLogLevel, exitWithError, wantsJson, type OutputOptions } from './shared.js';

export function registerPromptSetsCommand(program: Command): void {
  program
    .command('prompt-sets')
    .description('List the available prompt sets, oldest first')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .action(async (opts: OutputOptions) => {
      applyLogLevel(opts);
      const isJson = wantsJson(opts);
      try {
        const { service } = await createHarness();
        const sets = await service.listPromptSets();

        if (isJson) {
          console.log(JSON.stringify(sets, null, 2));
          return;
        }
        if (sets.length === 0) {
          console.log(`No prompt sets found in ${getPromptSetsDir()}`);
          return;
        }

        console.log(`\n  ${'ID'.padEnd(30)} ${'Created'.padEnd(22)} ${'Prompts'.padEnd(8)} Source`);
        console.log(`  ${'-'.repeat(30)} ${'-'.repeat(22)} ${'-'.repeat(8)} ${'-'.repeat(30)}`);
        for (const set of sets) {
          const date = new Date(set.createdAt).toLocaleString();
          console.log(`  ${set.id.padEnd(30)} ${date.padEnd(22)} ${String(set.promptCount).padEnd(8)} ${set.sourceFileRef}#${set.promptFuncName}`);
        }
        console.log();
      } catch (err) {
        exitWithError(err, isJson);
      }
    });
}
