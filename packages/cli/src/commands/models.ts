import type { Command } from 'commander';
import { createHarness } from '../harness.js';
import { applyLogLevel, exitWithError, wantsJson, type OutputOptions } from './shared.js';

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('List the configured candidate models')
    .option('--remote', 'List every model OpenRouter offers')
    .option('--json', 'Output as JSON')
    .option('--verbose', 'Debug logging')
    .action(async (opts: OutputOptions & { remote?: boolean }) => {
      applyLogLevel(opts);
      const isJson = wantsJson(opts);
      try {
        if (opts.remote) {
          const { modelClient } = await createHarness({ requireApiKey: true });
          const models = await modelClient.listModels();

          if (isJson) {
            console.log(JSON.stringify(models, null, 2));
          } else {
            console.log(`\n  OpenRouter Models (${models.length}):\n`);
            for (const m of models.slice(0, 50)) {
              const price = `$${m.pricing.prompt.toFixed(2)}/$${m.pricing.completion.toFixed(2)} per 1M`;
              console.log(`  ${m.id.padEnd(45)} ${m.name.padEnd(40)} ${price}`);
            }
            if (models.length > 50) {
              console.log(`  ... and ${models.length - 50} more (use --json for full list)`);
            }
            console.log();
          }
          return;
        }

        const { config } = await createHarness();
        if (isJson) {
          console.log(JSON.stringify({ models: config.models, judgeModel: config.judgeModel }, null, 2));
        } else {
          console.log(`\n  Candidate models:`);
          for (const model of config.models) {
            console.log(`    ${model}`);
          }
          console.log(`\n  Judge: ${config.judgeModel}\n`);
        }
      } catch (err) {
        exitWithError(err, isJson);
      }
    });
}
