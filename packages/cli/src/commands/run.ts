import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import { pairKey, setLogLevel, type HarnessService, type RunSummary } from '@promptbench/core';
import type { EventHandler } from '../adapters/callback-event-bridge.js';
import { createHarness, type HarnessOptions } from '../harness.js';
import { App } from '../ui/App.js';
import { formatDuration } from '../ui/format.js';
import {
  harnessRunReducer,
  initialState,
  type Action,
  type HarnessRunState,
} from '../ui/hooks/useHarnessRun.js';
import { applyLogLevel, exitWithError, parsePositiveInt, wantsJson, type OutputOptions } from './shared.js';

interface RunCommandOptions extends OutputOptions {
  force?: boolean;
  timeout?: number;
  concurrency?: number;
  judge?: string;
  save?: boolean;
}

type StartRun = (service: HarnessService, timeoutMs: number | undefined) => Promise<RunSummary>;

function describeSummary(summary: RunSummary): string {
  if (summary.kind === 'generation') {
    if (summary.alreadyComplete) {
      return `Already generated: ${summary.generatedCount} responses, ${summary.failedCount} failed (use --force to regenerate)`;
    }
    return `${summary.generatedCount} generated, ${summary.failedCount} failed, ${summary.abandonedCount} abandoned in ${formatDuration(summary.elapsedMs)}`;
  }
  return `${summary.evaluatedCount} evaluated, ${summary.skippedCount} skipped, ${summary.abandonedCount} abandoned in ${formatDuration(summary.elapsedMs)}`;
}

async function executeRun(
  opts: RunCommandOptions,
  harnessOptions: HarnessOptions,
  subtitle: string,
  start: StartRun,
): Promise<void> {
  applyLogLevel(opts);
  const isJson = wantsJson(opts);
  const isQuiet = opts.quiet ?? false;
  const isInteractive = process.stdout.isTTY && !isJson && !isQuiet;
  const timeoutMs = opts.timeout !== undefined ? opts.timeout * 1000 : undefined;

  // --- Interactive mode: Ink UI ---
  if (isInteractive) {
    // Info logs would corrupt Ink's rendering; errors still reach stderr
    if (!opts.verbose) setLogLevel('error');

    let state: HarnessRunState = { ...initialState };
    const ink = inkRender(React.createElement(App, { state, subtitle }));
    const dispatch = (action: Action) => {
      state = harnessRunReducer(state, action);
      ink.rerender(React.createElement(App, { state, subtitle }));
    };

    const onProgress: EventHandler = {
      onRunStart: (kind, pair, taskCount) => dispatch({ type: 'RUN_START', kind, pair, taskCount }),
      onIndexStatus: (_kind, _pair, index, status, detail) =>
        dispatch({ type: 'INDEX_STATUS', index, status, detail, now: Date.now() }),
      onRunComplete: (_kind, _pair, summary) => dispatch({ type: 'COMPLETE', summary }),
      onError: (_kind, _pair, error) => dispatch({ type: 'ERROR', error }),
    };

    let service: HarnessService;
    try {
      ({ service } = await createHarness({ ...harnessOptions, onProgress }));
    } catch (err) {
      ink.unmount();
      exitWithError(err, false);
    }

    const onSigint = () => service.cancelAll();
    process.once('SIGINT', onSigint);
    try {
      const summary = await start(service, timeoutMs);
      if (!state.summary) dispatch({ type: 'COMPLETE', summary });
      // Brief delay so the final frame renders before unmount
      await new Promise((resolve) => setTimeout(resolve, 100));
      ink.unmount();
      await ink.waitUntilExit();
    } catch (err) {
      await new Promise((resolve) => setTimeout(resolve, 100));
      ink.unmount();
      exitWithError(err, false);
    } finally {
      process.removeListener('SIGINT', onSigint);
    }
    return;
  }

  // --- Non-interactive mode: plain console output (JSON / quiet / no TTY) ---
  const onProgress: EventHandler = {
    onRunStart: (kind, pair, taskCount) => {
      if (!isJson && !isQuiet) {
        console.log(`\n  ${kind === 'generation' ? 'Generating' : 'Evaluating'} ${pairKey(pair)}: ${taskCount} prompts\n`);
      }
    },
    onIndexStatus: (_kind, _pair, index, status, detail) => {
      if (isJson || isQuiet || status === 'running') return;
      const icon = status === 'success' ? '✓' : status === 'error' ? '✗' : status === 'retrying' ? '↻' : '○';
      console.log(`  ${icon} #${index}: ${status}${detail ? ` (${detail})` : ''}`);
    },
  };

  let service: HarnessService;
  try {
    ({ service } = await createHarness({ ...harnessOptions, onProgress }));
  } catch (err) {
    exitWithError(err, isJson);
  }

  const onSigint = () => service.cancelAll();
  process.once('SIGINT', onSigint);
  try {
    const summary = await start(service, timeoutMs);
    if (isJson) {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      console.log(`\n  ${describeSummary(summary)}\n`);
    }
  } catch (err) {
    exitWithError(err, isJson);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Generate responses for every prompt of a set with one model')
    .argument('<prompt-set>', 'Prompt set id')
    .argument('<model>', 'Model id (see `promptbench models`)')
    .option('--force', 'Supersede existing responses and regenerate every prompt')
    .option('--timeout <seconds>', 'Abandon the run after this many seconds', parsePositiveInt)
    .option('--concurrency <n>', 'Concurrent provider calls', parsePositiveInt)
    .option('--json', 'Output the summary as JSON')
    .option('--no-save', 'Keep responses in memory only')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (promptSetId: string, modelId: string, opts: RunCommandOptions) => {
      await executeRun(
        opts,
        { save: opts.save, requireApiKey: true, concurrency: opts.concurrency },
        opts.force ? 'generate (forced)' : 'generate',
        (service, timeoutMs) => service.generate(promptSetId, modelId, { force: opts.force, timeoutMs }),
      );
    });
}

export function registerEvaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Judge every successful response of a generated pair')
    .argument('<prompt-set>', 'Prompt set id')
    .argument('<model>', 'Model whose responses are judged')
    .option('--judge <model>', 'Judge model (defaults to the configured judge)')
    .option('--timeout <seconds>', 'Abandon the run after this many seconds', parsePositiveInt)
    .option('--concurrency <n>', 'Concurrent judge calls', parsePositiveInt)
    .option('--json', 'Output the summary as JSON')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (promptSetId: string, modelId: string, opts: RunCommandOptions) => {
      await executeRun(
        opts,
        { requireApiKey: true, withJudge: true, concurrency: opts.concurrency },
        opts.judge ? `evaluate with ${opts.judge}` : 'evaluate',
        (service, timeoutMs) => service.evaluate(promptSetId, modelId, opts.judge, { timeoutMs }),
      );
    });
}
