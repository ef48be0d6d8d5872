#!/usr/bin/env node
import { parseArgs } from "./cli.js";
import { handleResults, handleRun } from "./commands.js";

async function main() {
  let code: number;
  try {
    const cmd = await parseArgs();
    code = cmd.command === "run" ? await handleRun(cmd.args) : await handleResults(cmd.args);
  } catch (error) {
    console.error("Benchmark failed:", error instanceof Error ? error.message : error);
    code = 1;
  }
  process.exit(code);
}

void main();
