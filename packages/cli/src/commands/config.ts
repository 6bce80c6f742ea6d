import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { createInterface } from 'node:readline';
import type { Command } from 'commander';
import { errorMessage } from '@promptbench/core';
import { createConfigService } from '../harness.js';
import { getConfigDir, getDataDir, getPromptSetsDir } from '../adapters/xdg-paths.js';

const KEYS = 'api-key, models, judge, judge-rubric, concurrency, max-attempts, run-timeout';

function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function requireValue(key: string, value: string | undefined, hint: string): string {
  if (!value) {
    console.error(`Usage: promptbench config set ${key} ${hint}`);
    process.exit(1);
  }
  return value;
}

function toPositiveInt(key: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    console.error(`${key} must be a positive integer, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}

export function registerConfigCommand(program: Command): void {
  const config = program
    .command('config')
    .description('Manage configuration');

  config
    .command('show')
    .description('Show current configuration')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      const resolved = await createConfigService().resolve();

      const display = {
        openRouterApiKey: resolved.openRouterApiKey ? '***' + resolved.openRouterApiKey.slice(-4) : '(not set)',
        openRouterApiUrl: resolved.openRouterApiUrl,
        models: resolved.models,
        judgeModel: resolved.judgeModel,
        judgeRubric: resolved.judgeRubric ? `${resolved.judgeRubric.length} chars` : '(not set)',
        concurrency: resolved.concurrency,
        maxAttempts: resolved.retry.maxAttempts,
        runTimeoutMs: resolved.runTimeoutMs,
        configDir: getConfigDir(),
        dataDir: getDataDir(),
        promptSetsDir: getPromptSetsDir(),
      };

      if (opts.json) {
        console.log(JSON.stringify(display, null, 2));
      } else {
        console.log(`\n  Configuration:`);
        console.log(`  API Key:        ${display.openRouterApiKey}`);
        console.log(`  API URL:        ${display.openRouterApiUrl}`);
        console.log(`  Models:         ${display.models.join(', ')}`);
        console.log(`  Judge:          ${display.judgeModel}`);
        console.log(`  Judge rubric:   ${display.judgeRubric}`);
        console.log(`  Concurrency:    ${display.concurrency}`);
        console.log(`  Max attempts:   ${display.maxAttempts}`);
        console.log(`  Run timeout:    ${display.runTimeoutMs === null ? 'none' : `${display.runTimeoutMs}ms`}`);
        console.log(`  Config Dir:     ${display.configDir}`);
        console.log(`  Data Dir:       ${display.dataDir}`);
        console.log(`  Prompt sets:    ${display.promptSetsDir}`);
        console.log();
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', `Configuration key (${KEYS})`)
    .argument('[value]', 'Value to set')
    .action(async (key: string, value?: string) => {
      const configService = createConfigService();

      try {
        switch (key) {
          case 'api-key': {
            const apiKey = value ?? await prompt('OpenRouter API Key: ');
            if (!apiKey) {
              console.error('No API key provided.');
              process.exit(1);
            }
            await configService.saveApiKey(apiKey);
            console.log('API key saved.');
            break;
          }
          case 'models': {
            const models = requireValue(key, value, '<model1,model2,...>').split(',').map((s) => s.trim()).filter(Boolean);
            await configService.save({ models });
            console.log(`Candidate models set to: ${models.join(', ')}`);
            break;
          }
          case 'judge': {
            const judgeModel = requireValue(key, value, '<model-id>');
            await configService.save({ judgeModel });
            console.log(`Judge model set to: ${judgeModel}`);
            break;
          }
          case 'judge-rubric': {
            const path = requireValue(key, value, '<file>');
            const judgeRubric = readFileSync(resolve(path), 'utf-8').trim();
            await configService.save({ judgeRubric });
            console.log(`Judge rubric loaded from ${path} (${judgeRubric.length} chars).`);
            break;
          }
          case 'concurrency': {
            const concurrency = toPositiveInt(key, requireValue(key, value, '<n>'));
            await configService.save({ concurrency });
            console.log(`Concurrency set to: ${concurrency}`);
            break;
          }
          case 'max-attempts': {
            const maxAttempts = toPositiveInt(key, requireValue(key, value, '<n>'));
            await configService.save({ maxAttempts });
            console.log(`Max attempts set to: ${maxAttempts}`);
            break;
          }
          case 'run-timeout': {
            const seconds = toPositiveInt(key, requireValue(key, value, '<seconds>'));
            await configService.save({ runTimeoutMs: seconds * 1000 });
            console.log(`Run timeout set to: ${seconds}s`);
            break;
          }
          default:
            console.error(`Unknown config key: ${key}. Valid keys: ${KEYS}`);
            process.exit(1);
        }
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
        process.exit(1);
      }
    });

  config
    .command('reset')
    .description('Reset configuration to defaults')
    .action(async () => {
      await createConfigService().reset();
      console.log('Configuration reset to defaults.');
    });

  config
    .command('path')
    .description('Print the config file location')
    .action(() => {
      console.log(getConfigDir());
    });

  // Default: show config when no subcommand
  config.action(async () => {
    await config.commands.find((c) => c.name() === 'show')?.parseAsync([], { from: 'user' });
  });
}
