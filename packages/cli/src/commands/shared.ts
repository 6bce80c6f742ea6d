import { InvalidArgumentError } from 'commander';
import { errorMessage, parsePairSpec, setLogLevel, type Pair } from '@promptbench/core';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export function applyLogLevel(opts: OutputOptions): void {
  if (opts.verbose) setLogLevel('debug');
  if (opts.quiet) setLogLevel('error');
}

/** JSON when asked for, or when stdout is not a terminal. */
export function wantsJson(opts: OutputOptions): boolean {
  return Boolean(opts.json) || !process.stdout.isTTY;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parsePairArg(value: string): Pair {
  const pair = parsePairSpec(value);
  if (!pair) {
    throw new InvalidArgumentError('Expected <promptSetId>:<modelId>.');
  }
  return pair;
}

export function exitWithError(err: unknown, json: boolean): never {
  const message = errorMessage(err);
  if (json) {
    const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    console.error(JSON.stringify({ error: message, code }));
  } else {
    console.error(`Error: ${message}`);
  }
  process.exit(1);
}
