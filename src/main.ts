#!/usr/bin/env node

import {
  ExitCode,
  handlePtrguardResult,
  resultToExitCode,
  runPtrguardCommand,
} from "./cli";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  try {
    const [driver, result] = await runPtrguardCommand(args);
    handlePtrguardResult(driver, result);
    process.exit(resultToExitCode(result));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.EXECUTION_FAILURE);
  }
}

void main();
