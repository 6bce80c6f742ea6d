#!/usr/bin/env -S node --import tsx

import { existsSync, readFileSync } from "node:fs";
import { Command } from "commander";
import { registerCompareCommand } from "../src/commands/compare.js";
import { registerConfigCommand } from "../src/commands/config.js";
import { registerHistoryCommand } from "../src/commands/history.js";
import { registerModelsCommand } from "../src/commands/models.js";
import { registerPromptSetsCommand } from "../src/commands/prompt-sets.js";
import { registerEvaluateCommand, registerGenerateCommand } from "../src/commands/run.js";
import { registerStatsCommand } from "../src/commands/stats.js";
import { registerStatusCommand } from "../src/commands/status.js";

// Run from source the manifest sits one level up; from dist/packages/cli/bin it is four
function readVersion(): string {
  for (const candidate of ["../package.json", "../../../../packages/cli/package.json"]) {
    const url = new URL(candidate, import.meta.url);
    if (!existsSync(url)) continue;
    const manifest: unknown = JSON.parse(readFileSync(url, "utf-8"));
    if (typeof manifest === "object" && manifest !== null && "version" in manifest && typeof manifest.version === "string") {
      return manifest.version;
    }
  }
  return "0.0.0";
}

const program = new Command();

program
  .name("promptbench")
  .description("Generate model responses for prompt sets, judge them and compare the results")
  .version(readVersion());

registerPromptSetsCommand(program);
registerModelsCommand(program);
registerStatusCommand(program);
registerGenerateCommand(program);
registerEvaluateCommand(program);
registerStatsCommand(program);
registerCompareCommand(program);
registerHistoryCommand(program);
registerConfigCommand(program);
await program.parseAsync();
